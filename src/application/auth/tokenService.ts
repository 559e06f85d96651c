import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { JwtAlgorithm } from '../../config.js';

export interface AccessTokenClaims {
  userId: number;
  email: string;
}

export interface TokenServiceOptions {
  secret: string;
  algorithm: JwtAlgorithm;
  expiresInMinutes: number;
}

const payloadSchema = z.object({
  user_id: z.number().int(),
  email: z.string(),
  exp: z.number(),
});

/**
 * Issues and verifies stateless access tokens (JWT). Nothing is stored
 * server-side, so a token stays valid until it expires.
 */
export class TokenService {
  constructor(private readonly options: TokenServiceOptions) {}

  /**
   * Sign a token for the given claims. `expiresInSeconds` overrides the
   * configured lifetime.
   */
  issue(claims: AccessTokenClaims, expiresInSeconds?: number): string {
    return jwt.sign(
      {
        user_id: claims.userId,
        email: claims.email,
      },
      this.options.secret,
      {
        algorithm: this.options.algorithm,
        expiresIn: expiresInSeconds ?? this.options.expiresInMinutes * 60,
      }
    );
  }

  /**
   * Decode a token. Returns null for a bad signature, an expired token,
   * missing claims or anything that is not a token at all.
   */
  verify(token: string): AccessTokenClaims | null {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [this.options.algorithm],
      });
    } catch {
      return null;
    }

    const payload = payloadSchema.safeParse(decoded);
    if (!payload.success) {
      return null;
    }

    return {
      userId: payload.data.user_id,
      email: payload.data.email,
    };
  }
}
