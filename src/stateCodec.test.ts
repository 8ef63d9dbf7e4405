import { describe, expect, it } from 'vitest';
import { InvalidStateError } from './errors.js';
import { StateCodec } from './stateCodec.js';

const SECRET = 'test-secret-for-state';
const TTL_MS = 300_000;

function clock(start: number) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('StateCodec', () => {
  it('decodes its own token back to the user before the ttl elapses', () => {
    const time = clock(1_700_000_000_000);
    const codec = new StateCodec(SECRET, TTL_MS, time.now);

    const token = codec.encode('user-42');
    time.advance(TTL_MS - 1);

    const flow = codec.decode(token);
    expect(flow.userId).toBe('user-42');
    expect(flow.issuedAt).toBe(1_700_000_000_000);
    expect(flow.expiresAt).toBe(1_700_000_000_000 + TTL_MS);
    expect(flow.nonce.length).toBeGreaterThan(0);
  });

  it('produces a url-safe token with a fresh nonce each time', () => {
    const codec = new StateCodec(SECRET, TTL_MS);
    const first = codec.encode('user-42');
    const second = codec.encode('user-42');

    expect(first).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/);
    expect(first).not.toBe(second);
    expect(codec.decode(first).nonce).not.toBe(codec.decode(second).nonce);
  });

  it('rejects a token exactly at its expiry', () => {
    const time = clock(1_000_000);
    const codec = new StateCodec(SECRET, TTL_MS, time.now);
    const token = codec.encode('user-42');

    time.advance(TTL_MS);

    expect(() => codec.decode(token)).toThrow(InvalidStateError);
    expect(() => codec.decode(token)).toThrow('State expired');
  });

  it('honours a per-call ttl', () => {
    const time = clock(1_000_000);
    const codec = new StateCodec(SECRET, TTL_MS, time.now);
    const token = codec.encode('user-42', 1_000);

    time.advance(999);
    expect(codec.decode(token).userId).toBe('user-42');
    time.advance(1);
    expect(() => codec.decode(token)).toThrow('State expired');
  });

  it('rejects a tampered payload', () => {
    const codec = new StateCodec(SECRET, TTL_MS);
    const [payload, signature] = codec.encode('user-42').split('.');
    const forged = Buffer.from(
      JSON.stringify({
        ...JSON.parse(Buffer.from(payload ?? '', 'base64url').toString('utf8')),
        u: 'user-43',
      }),
      'utf8',
    ).toString('base64url');

    expect(() => codec.decode(`${forged}.${signature}`)).toThrow('Invalid state signature');
  });

  it('rejects a flipped signature bit', () => {
    const codec = new StateCodec(SECRET, TTL_MS);
    const [payload, signature] = codec.encode('user-42').split('.');
    const bytes = Buffer.from(signature ?? '', 'base64url');
    bytes[0] = (bytes[0] ?? 0) ^ 0x01;

    expect(() => codec.decode(`${payload}.${bytes.toString('base64url')}`)).toThrow(
      'Invalid state signature',
    );
  });

  it('rejects a token signed with another secret', () => {
    const token = new StateCodec('another-test-secret', TTL_MS).encode('user-42');
    expect(() => new StateCodec(SECRET, TTL_MS).decode(token)).toThrow(InvalidStateError);
  });

  it.each(['', 'no-dot', 'a.b.c', '.sig', 'payload.'])('rejects malformed token %j', (token) => {
    expect(() => new StateCodec(SECRET, TTL_MS).decode(token)).toThrow(InvalidStateError);
  });

  it('rejects a token issued too far in the future', () => {
    const time = clock(1_000_000);
    const codec = new StateCodec(SECRET, TTL_MS, time.now);
    const token = codec.encode('user-42');

    time.advance(-10_000);

    expect(() => codec.decode(token)).toThrow('State issued in the future');
  });
});
