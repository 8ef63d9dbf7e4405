import { createHash, timingSafeEqual } from 'node:crypto';
import { BlockList, isIP } from 'node:net';
import { ForbiddenError, UnauthorizedError } from './errors.js';
import { createLogger } from './log.js';

const log = createLogger('access-gate');

export type AllowList = {
  blockList: BlockList;
  errors: string[];
};

export function parseAllowList(entries: readonly string[]): AllowList {
  const blockList = new BlockList();
  const errors: string[] = [];

  for (const raw of entries) {
    const entry = raw.trim();
    if (!entry) continue;

    const slash = entry.indexOf('/');
    if (slash === -1) {
      const family = isIP(entry);
      if (family === 0) {
        errors.push(`not an IP address or CIDR block: "${entry}"`);
        continue;
      }
      blockList.addAddress(entry, family === 4 ? 'ipv4' : 'ipv6');
      continue;
    }

    const address = entry.slice(0, slash);
    const prefixText = entry.slice(slash + 1);
    const family = isIP(address);
    const prefix = /^\d{1,3}$/.test(prefixText) ? Number(prefixText) : Number.NaN;
    const maxPrefix = family === 4 ? 32 : 128;
    if (family === 0 || !Number.isInteger(prefix) || prefix > maxPrefix) {
      errors.push(`invalid CIDR block: "${entry}"`);
      continue;
    }
    blockList.addSubnet(address, prefix, family === 4 ? 'ipv4' : 'ipv6');
  }

  return { blockList, errors };
}

/** Strips a zone id and unwraps IPv4-mapped IPv6 (`::ffff:10.0.0.1`). */
export function normalizeRemoteAddress(address: string): string {
  const withoutZone = address.split('%')[0] ?? address;
  const mapped = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i.exec(withoutZone);
  return mapped?.[1] ?? withoutZone;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export type AccessGateOptions = {
  apiKey: string;
  /** Addresses or CIDR blocks; empty disables the origin check. */
  allowedOrigins: readonly string[];
};

/**
 * Front door for internal-only operations: shared-secret match plus an
 * optional origin allow-list. An allow-list that does not parse denies every
 * caller.
 */
export class AccessGate {
  private readonly expectedKeyDigest: Buffer;
  private readonly allowList: BlockList | null;
  readonly configurationErrors: readonly string[];

  constructor(options: AccessGateOptions) {
    if (!options.apiKey) {
      throw new Error('Internal API key required');
    }
    this.expectedKeyDigest = digest(options.apiKey);

    const entries = options.allowedOrigins.filter((entry) => entry.trim().length > 0);
    if (entries.length === 0) {
      this.allowList = null;
      this.configurationErrors = [];
      return;
    }
    const parsed = parseAllowList(entries);
    this.allowList = parsed.blockList;
    this.configurationErrors = parsed.errors;
    if (parsed.errors.length > 0) {
      log.error('internal allow-list is invalid; denying all internal callers', {
        errors: parsed.errors,
      });
    }
  }

  get originCheckEnabled(): boolean {
    return this.allowList !== null;
  }

  check(request: { apiKey?: string; remoteAddress?: string }): void {
    // Digests keep the comparison length-independent.
    const provided = digest(request.apiKey ?? '');
    if (!request.apiKey || !timingSafeEqual(provided, this.expectedKeyDigest)) {
      throw new UnauthorizedError('missing or invalid API key');
    }

    if (!this.allowList) {
      return;
    }
    if (this.configurationErrors.length > 0) {
      throw new ForbiddenError('allow-list misconfigured');
    }
    const address = request.remoteAddress ? normalizeRemoteAddress(request.remoteAddress) : '';
    const family = isIP(address);
    if (family === 0 || !this.allowList.check(address, family === 4 ? 'ipv4' : 'ipv6')) {
      throw new ForbiddenError('origin not allowed');
    }
  }
}
