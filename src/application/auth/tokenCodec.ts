import jwt, { type Jwt } from 'jsonwebtoken';
import { z } from 'zod';
import {
  ExpiredTokenError,
  InvalidSignatureError,
  MalformedTokenError,
} from '../../domain/auth/errors.js';

export type TokenAlgorithm = 'HS256' | 'HS384' | 'HS512';
export type TokenSubject = string | number;
export type Clock = () => Date;

/**
 * Claims carried by an access token. `sub` is always a string on the wire,
 * whatever the caller passed to `encode`.
 */
export interface TokenPayload {
  sub: string;
  /** Expiry in seconds since the epoch. */
  exp: number;
  scopes: string[];
}

export interface TokenCodecOptions {
  secret: string;
  algorithm?: TokenAlgorithm;
  /** Lifetime used by `issue` when the caller does not pass one. */
  defaultExpiresInSeconds?: number;
  clock?: Clock;
}

export interface IssueOptions {
  scopes?: string[];
  expiresInSeconds?: number;
}

export interface IssuedToken {
  accessToken: string;
  tokenType: 'bearer';
}

export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 30 * 60;

// Latest instant a Date can hold, in seconds
const MAX_EXP_SECONDS = 8_640_000_000_000;

const payloadSchema = z.object({
  sub: z.union([z.string().min(1), z.number().int()]).transform(String),
  exp: z.number().int().min(0).max(MAX_EXP_SECONDS),
  scopes: z.array(z.string()),
});

/**
 * Signs and checks compact HMAC JWTs. The secret and algorithm are fixed
 * for the lifetime of the codec; rotating the secret means building a new
 * codec, which invalidates every token issued by the old one.
 */
export class TokenCodec {
  private readonly secret: string;
  private readonly algorithm: TokenAlgorithm;
  private readonly defaultExpiresInSeconds: number;
  private readonly clock: Clock;

  constructor(options: TokenCodecOptions) {
    if (options.secret.length === 0) {
      throw new Error('Token signing secret must not be empty');
    }
    this.secret = options.secret;
    this.algorithm = options.algorithm ?? 'HS256';
    this.defaultExpiresInSeconds =
      options.defaultExpiresInSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS;
    this.clock = options.clock ?? (() => new Date());
  }

  encode(subject: TokenSubject, scopes: readonly string[], expiresAt: Date): string {
    const exp = Math.floor(expiresAt.getTime() / 1000);
    if (exp * 1000 <= this.clock().getTime()) {
      throw new RangeError('Token expiry must be in the future');
    }

    const payload: TokenPayload = {
      sub: String(subject),
      exp,
      scopes: [...scopes],
    };

    return jwt.sign(payload, this.secret, {
      algorithm: this.algorithm,
      noTimestamp: true,
    });
  }

  /**
   * Encode a token that expires `expiresInSeconds` from now.
   */
  issue(subject: TokenSubject, options: IssueOptions = {}): string {
    const expiresInSeconds = options.expiresInSeconds ?? this.defaultExpiresInSeconds;
    const expiresAt = new Date(this.clock().getTime() + expiresInSeconds * 1000);
    return this.encode(subject, options.scopes ?? [], expiresAt);
  }

  /**
   * Decode and check a token.
   *
   * Structure is checked first, then expiry, then the signature: an expired
   * token reports ExpiredTokenError whether or not its signature holds.
   *
   * @throws MalformedTokenError, ExpiredTokenError or InvalidSignatureError
   */
  decode(token: string): TokenPayload {
    const payload = this.parse(token);

    if (payload.exp * 1000 <= this.clock().getTime()) {
      throw new ExpiredTokenError(`Token expired at ${new Date(payload.exp * 1000).toISOString()}`);
    }

    try {
      jwt.verify(token, this.secret, {
        algorithms: [this.algorithm],
        ignoreExpiration: true,
      });
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        throw new InvalidSignatureError(error.message);
      }
      throw error;
    }

    return payload;
  }

  private parse(token: string): TokenPayload {
    let decoded: Jwt | null;
    try {
      decoded = jwt.decode(token, { complete: true });
    } catch (error) {
      throw new MalformedTokenError(error instanceof Error ? error.message : 'Unreadable token');
    }

    if (decoded === null || typeof decoded.payload === 'string') {
      throw new MalformedTokenError('Token is not a JSON web token');
    }

    const result = payloadSchema.safeParse(decoded.payload);
    if (!result.success) {
      const fields = result.error.errors.map((e) => e.path.join('.')).join(', ');
      throw new MalformedTokenError(`Invalid claims: ${fields}`);
    }
    return result.data;
  }
}
