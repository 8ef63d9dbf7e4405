import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { InvalidStateError } from './errors.js';
import type { FlowState } from './types.js';

const STATE_PURPOSE = 'google_oauth';
const NONCE_BYTES = 16;
// Tolerated clock skew for an issued-at in the future.
const ISSUED_AT_LEEWAY_MS = 5_000;

const payloadSchema = z.object({
  u: z.string().min(1),
  n: z.string().min(1),
  p: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
});

type StatePayload = z.infer<typeof payloadSchema>;

/**
 * Stateless, signed OAuth `state` values.
 *
 * A token is `base64url(payload) "." base64url(HMAC-SHA256(payload))`. Nothing
 * is stored server side; a token is valid while its signature matches and its
 * expiry has not been reached.
 */
export class StateCodec {
  constructor(
    private readonly secret: string,
    private readonly defaultTtlMs: number,
    private readonly now: () => number = Date.now,
  ) {
    if (!secret) {
      throw new Error('State signing secret required');
    }
  }

  encode(userId: string, ttlMs: number = this.defaultTtlMs): string {
    if (!userId) {
      throw new InvalidStateError('user id required');
    }
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new Error('State ttl must be positive');
    }
    const issuedAt = this.now();
    const payload: StatePayload = {
      u: userId,
      n: randomBytes(NONCE_BYTES).toString('base64url'),
      p: STATE_PURPOSE,
      iat: issuedAt,
      exp: issuedAt + Math.trunc(ttlMs),
    };
    const encoded = Buffer.from(JSON.stringify(payload), 'utf8').toString('base64url');
    return `${encoded}.${this.sign(encoded).toString('base64url')}`;
  }

  decode(token: string): FlowState {
    const parts = token.split('.');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new InvalidStateError('Malformed state');
    }
    const [encoded, signature] = parts;

    const expected = this.sign(encoded);
    const provided = Buffer.from(signature, 'base64url');
    // Re-encoding catches non-canonical base64url that would decode to the same bytes.
    if (
      provided.length !== expected.length ||
      provided.toString('base64url') !== signature ||
      !timingSafeEqual(provided, expected)
    ) {
      throw new InvalidStateError('Invalid state signature');
    }

    let payload: StatePayload;
    try {
      const decoded: unknown = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
      payload = payloadSchema.parse(decoded);
    } catch (error) {
      throw new InvalidStateError('Invalid state payload', { cause: error });
    }

    if (payload.p !== STATE_PURPOSE) {
      throw new InvalidStateError('Unexpected state purpose');
    }
    const now = this.now();
    if (payload.iat - now > ISSUED_AT_LEEWAY_MS) {
      throw new InvalidStateError('State issued in the future');
    }
    if (now >= payload.exp) {
      throw new InvalidStateError('State expired');
    }

    return {
      userId: payload.u,
      nonce: payload.n,
      issuedAt: payload.iat,
      expiresAt: payload.exp,
    };
  }

  private sign(encodedPayload: string): Buffer {
    return createHmac('sha256', this.secret).update(encodedPayload).digest();
  }
}
