import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenCodec } from '../tokenCodec.js';
import {
  ExpiredTokenError,
  InvalidSignatureError,
  InvalidTokenError,
  MalformedTokenError,
} from '../../../domain/auth/errors.js';
import { START_TIME_MS, TEST_SECRET, fakeClock } from '../../../__tests__/fixtures.js';

const START_SECONDS = START_TIME_MS / 1000;

function codecAt(clock = fakeClock(), secret = TEST_SECRET) {
  return new TokenCodec({ secret, clock: clock.now });
}

function decodeError(codec: TokenCodec, token: string): unknown {
  try {
    codec.decode(token);
  } catch (error) {
    return error;
  }
  throw new Error('expected decode to throw');
}

describe('TokenCodec', () => {
  describe('encode / decode', () => {
    it('should round-trip subject, expiry and scopes', () => {
      const codec = codecAt();
      const expiresAt = new Date(START_TIME_MS + 3600 * 1000);

      const token = codec.encode('42', ['items:read', 'items:write'], expiresAt);

      expect(codec.decode(token)).toEqual({
        sub: '42',
        exp: START_SECONDS + 3600,
        scopes: ['items:read', 'items:write'],
      });
    });

    it('should carry numeric subjects as strings', () => {
      const codec = codecAt();
      const token = codec.encode(7, [], new Date(START_TIME_MS + 60_000));

      expect(codec.decode(token).sub).toBe('7');
    });

    it('should keep an empty scope list', () => {
      const codec = codecAt();
      const token = codec.encode('1', [], new Date(START_TIME_MS + 60_000));

      expect(codec.decode(token).scopes).toEqual([]);
    });

    it('should produce three url-safe segments', () => {
      const codec = codecAt();
      const token = codec.encode('1', ['a'], new Date(START_TIME_MS + 60_000));
      const segments = token.split('.');

      expect(segments).toHaveLength(3);
      for (const segment of segments) {
        expect(segment).toMatch(/^[A-Za-z0-9_-]+$/);
      }
      expect(JSON.parse(Buffer.from(segments[0], 'base64url').toString())).toEqual({
        alg: 'HS256',
        typ: 'JWT',
      });
    });

    it('should truncate expiry to whole seconds', () => {
      const codec = codecAt();
      const token = codec.encode('1', [], new Date(START_TIME_MS + 90_500));

      expect(codec.decode(token).exp).toBe(START_SECONDS + 90);
    });

    it('should refuse an expiry that is not in the future', () => {
      const codec = codecAt();

      expect(() => codec.encode('1', [], new Date(START_TIME_MS))).toThrow(RangeError);
      expect(() => codec.encode('1', [], new Date(START_TIME_MS - 1000))).toThrow(RangeError);
      // Rounds down to the current second
      expect(() => codec.encode('1', [], new Date(START_TIME_MS + 500))).toThrow(RangeError);
    });
  });

  describe('issue', () => {
    it('should default to a 30 minute lifetime and no scopes', () => {
      const codec = codecAt();

      expect(codec.decode(codec.issue(5))).toEqual({
        sub: '5',
        exp: START_SECONDS + 1800,
        scopes: [],
      });
    });

    it('should honour the configured default lifetime', () => {
      const clock = fakeClock();
      const codec = new TokenCodec({
        secret: TEST_SECRET,
        clock: clock.now,
        defaultExpiresInSeconds: 120,
      });

      expect(codec.decode(codec.issue(5)).exp).toBe(START_SECONDS + 120);
    });

    it('should take a per-call lifetime and scopes', () => {
      const codec = codecAt();
      const token = codec.issue('5', { expiresInSeconds: 10, scopes: ['admin'] });

      expect(codec.decode(token)).toEqual({ sub: '5', exp: START_SECONDS + 10, scopes: ['admin'] });
    });
  });

  describe('expiry', () => {
    it('should accept a token one second before it expires', () => {
      const clock = fakeClock();
      const codec = codecAt(clock);
      const token = codec.issue('1', { expiresInSeconds: 60 });

      clock.advanceSeconds(59);

      expect(codec.decode(token).sub).toBe('1');
    });

    it('should reject a token at its expiry instant', () => {
      const clock = fakeClock();
      const codec = codecAt(clock);
      const token = codec.issue('1', { expiresInSeconds: 60 });

      clock.advanceSeconds(60);

      const error = decodeError(codec, token);
      expect(error).toBeInstanceOf(ExpiredTokenError);
      expect(error).toMatchObject({ reason: 'Expired', code: 'INVALID_TOKEN' });
    });

    it('should report expiry even when the signature is also wrong', () => {
      const clock = fakeClock();
      const foreign = codecAt(clock, 'another-secret-entirely');
      const codec = codecAt(clock);
      const token = foreign.issue('1', { expiresInSeconds: 60 });

      clock.advanceSeconds(3600);

      expect(decodeError(codec, token)).toBeInstanceOf(ExpiredTokenError);
    });
  });

  describe('signature', () => {
    it('should reject a token signed with a different secret', () => {
      const clock = fakeClock();
      const token = codecAt(clock, 'another-secret-entirely').issue('1');

      const error = decodeError(codecAt(clock), token);
      expect(error).toBeInstanceOf(InvalidSignatureError);
      expect(error).toMatchObject({ reason: 'InvalidSignature' });
    });

    it('should reject a token whose payload was altered', () => {
      const codec = codecAt();
      const [header, , signature] = codec.issue('1').split('.');
      const forged = Buffer.from(
        JSON.stringify({ sub: '2', exp: START_SECONDS + 1800, scopes: [] })
      ).toString('base64url');

      expect(decodeError(codec, `${header}.${forged}.${signature}`)).toBeInstanceOf(
        InvalidSignatureError
      );
    });

    it('should reject a token signed with another algorithm', () => {
      const clock = fakeClock();
      const hs512 = new TokenCodec({ secret: TEST_SECRET, algorithm: 'HS512', clock: clock.now });
      const token = hs512.issue('1');

      expect(hs512.decode(token).sub).toBe('1');
      expect(decodeError(codecAt(clock), token)).toBeInstanceOf(InvalidSignatureError);
    });

    it('should reject an unsigned token', () => {
      const codec = codecAt();
      const [, payload] = codec.issue('1').split('.');
      const header = Buffer.from(JSON.stringify({ alg: 'none', typ: 'JWT' })).toString('base64url');

      expect(decodeError(codec, `${header}.${payload}.`)).toBeInstanceOf(InvalidSignatureError);
    });
  });

  describe('structure', () => {
    it('should reject strings that are not JWTs', () => {
      const codec = codecAt();

      for (const token of ['', 'not-a-token', 'a.b', 'a.b.c']) {
        const error = decodeError(codec, token);
        expect(error).toBeInstanceOf(MalformedTokenError);
        expect(error).toMatchObject({ reason: 'Malformed' });
      }
    });

    it('should reject tokens missing a required claim', () => {
      const codec = codecAt();
      const exp = START_SECONDS + 600;
      const sign = (payload: object) =>
        jwt.sign(payload, TEST_SECRET, { algorithm: 'HS256', noTimestamp: true });

      expect(decodeError(codec, sign({ sub: '1', exp }))).toBeInstanceOf(MalformedTokenError);
      expect(decodeError(codec, sign({ exp, scopes: [] }))).toBeInstanceOf(MalformedTokenError);
      expect(decodeError(codec, sign({ sub: '1', scopes: [] }))).toBeInstanceOf(
        MalformedTokenError
      );
      expect(decodeError(codec, sign({ sub: '', exp, scopes: [] }))).toBeInstanceOf(
        MalformedTokenError
      );
      expect(decodeError(codec, sign({ sub: '1', exp, scopes: 'admin' }))).toBeInstanceOf(
        MalformedTokenError
      );
    });

    it('should reject an expiry no date can represent', () => {
      const codec = codecAt();
      const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
      const header = encode({ alg: 'HS256', typ: 'JWT' });

      for (const exp of [-1e13, -1, 1e13]) {
        const token = `${header}.${encode({ sub: '1', exp, scopes: [] })}.sig`;
        const error = decodeError(codec, token);
        expect(error).toBeInstanceOf(MalformedTokenError);
        expect(error).toMatchObject({ reason: 'Malformed' });
      }
    });

    it('should accept a well-signed token that also carries extra claims', () => {
      const codec = codecAt();
      const token = jwt.sign(
        { sub: 9, exp: START_SECONDS + 600, scopes: ['x'], iss: 'elsewhere' },
        TEST_SECRET,
        { algorithm: 'HS256', noTimestamp: true }
      );

      expect(codec.decode(token)).toEqual({ sub: '9', exp: START_SECONDS + 600, scopes: ['x'] });
    });
  });

  it('should surface every failure as an InvalidTokenError', () => {
    const clock = fakeClock();
    const codec = codecAt(clock);
    const expired = codec.issue('1', { expiresInSeconds: 1 });
    const foreign = codecAt(clock, 'another-secret-entirely').issue('1');
    clock.advanceSeconds(2);

    for (const token of ['garbage', expired, foreign]) {
      const error = decodeError(codec, token);
      expect(error).toBeInstanceOf(InvalidTokenError);
      expect(error).toMatchObject({ code: 'INVALID_TOKEN', message: 'Could not validate credentials' });
    }
  });

  it('should refuse an empty secret', () => {
    expect(() => new TokenCodec({ secret: '' })).toThrow('Token signing secret must not be empty');
  });
});
