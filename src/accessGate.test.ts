import { afterEach, describe, expect, it, vi } from 'vitest';
import { AccessGate, normalizeRemoteAddress, parseAllowList } from './accessGate.js';
import { ForbiddenError, UnauthorizedError } from './errors.js';

const API_KEY = 'test-internal-key-0001';

describe('AccessGate', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('admits the right key from anywhere when no allow-list is set', () => {
    const gate = new AccessGate({ apiKey: API_KEY, allowedOrigins: [] });
    expect(gate.originCheckEnabled).toBe(false);
    expect(() => gate.check({ apiKey: API_KEY, remoteAddress: '203.0.113.9' })).not.toThrow();
  });

  it.each([undefined, '', 'test-internal-key-0002', `${API_KEY}x`])(
    'rejects api key %j',
    (apiKey) => {
      const gate = new AccessGate({ apiKey: API_KEY, allowedOrigins: [] });
      expect(() => gate.check({ apiKey, remoteAddress: '127.0.0.1' })).toThrow(UnauthorizedError);
    },
  );

  it('checks the key before the origin', () => {
    const gate = new AccessGate({ apiKey: API_KEY, allowedOrigins: ['10.0.0.0/8'] });
    expect(() => gate.check({ apiKey: 'wrong-key', remoteAddress: '192.0.2.1' })).toThrow(
      UnauthorizedError,
    );
  });

  it('admits addresses inside a listed CIDR block and single address', () => {
    const gate = new AccessGate({
      apiKey: API_KEY,
      allowedOrigins: ['10.0.0.0/8', '192.0.2.7', 'fd00::/8'],
    });

    expect(() => gate.check({ apiKey: API_KEY, remoteAddress: '10.20.30.40' })).not.toThrow();
    expect(() => gate.check({ apiKey: API_KEY, remoteAddress: '::ffff:10.1.1.1' })).not.toThrow();
    expect(() => gate.check({ apiKey: API_KEY, remoteAddress: '192.0.2.7' })).not.toThrow();
    expect(() => gate.check({ apiKey: API_KEY, remoteAddress: 'fd12::1' })).not.toThrow();
  });

  it.each(['192.0.2.8', '11.0.0.1', 'fe80::1', 'not-an-ip', undefined])(
    'forbids origin %j outside the allow-list',
    (remoteAddress) => {
      const gate = new AccessGate({ apiKey: API_KEY, allowedOrigins: ['10.0.0.0/8', '192.0.2.7'] });
      expect(() => gate.check({ apiKey: API_KEY, remoteAddress })).toThrow(ForbiddenError);
    },
  );

  it('denies everyone when the allow-list does not parse', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const gate = new AccessGate({ apiKey: API_KEY, allowedOrigins: ['10.0.0.0/8', '10.0.0.0/33'] });

    expect(gate.configurationErrors).toEqual(['invalid CIDR block: "10.0.0.0/33"']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(() => gate.check({ apiKey: API_KEY, remoteAddress: '10.0.0.1' })).toThrow(
      ForbiddenError,
    );
  });

  it('refuses to start without a key', () => {
    expect(() => new AccessGate({ apiKey: '', allowedOrigins: [] })).toThrow(
      'Internal API key required',
    );
  });
});

describe('parseAllowList', () => {
  it('collects every bad entry', () => {
    const { errors } = parseAllowList(['bogus', '10.0.0.0/x', '::1/129', ' ', '127.0.0.1']);
    expect(errors).toEqual([
      'not an IP address or CIDR block: "bogus"',
      'invalid CIDR block: "10.0.0.0/x"',
      'invalid CIDR block: "::1/129"',
    ]);
  });
});

describe('normalizeRemoteAddress', () => {
  it('unwraps IPv4-mapped addresses and drops zone ids', () => {
    expect(normalizeRemoteAddress('::ffff:127.0.0.1')).toBe('127.0.0.1');
    expect(normalizeRemoteAddress('fe80::1%eth0')).toBe('fe80::1');
    expect(normalizeRemoteAddress('::1')).toBe('::1');
  });
});
