import jwt, { Algorithm, JsonWebTokenError, JwtPayload, TokenExpiredError } from 'jsonwebtoken';
import { AuthenticationError } from '../middleware/errorHandler';
import { AuthResult, TokenView } from '../types';
import { CredentialService } from './credentialService';

export interface AuthServiceOptions {
  secret: string;
  algorithm: Algorithm;
  expiresInMinutes: number;
  /** Seconds since the epoch. Defaults to the system clock. */
  clock?: () => number;
}

export type AuthService = ReturnType<typeof createAuthService>;

const systemClock = () => Math.floor(Date.now() / 1000);

/**
 * Issues and checks stateless bearer tokens. A token stays valid until its
 * `exp`; nothing revokes it early.
 */
export function createAuthService(credentials: CredentialService, options: AuthServiceOptions) {
  if (!options.secret) {
    throw new Error('JWT signing secret must not be empty');
  }

  const clock = options.clock ?? systemClock;
  const defaultTtl = options.expiresInMinutes * 60;

  function issueToken(username: string, ttlSeconds = defaultTtl): string {
    const iat = clock();
    return jwt.sign({ sub: username, iat, exp: iat + ttlSeconds }, options.secret, {
      algorithm: options.algorithm,
    });
  }

  return {
    issueToken,

    /**
     * The same error comes back for an unknown user and for a wrong
     * password.
     */
    async login(username: string, password: string): Promise<TokenView> {
      const ok = await credentials.verify(username, password);
      if (!ok) {
        throw new AuthenticationError('Incorrect username or password');
      }
      return { accessToken: issueToken(username), tokenType: 'bearer' };
    },

    authenticate(token: string): AuthResult {
      let payload: string | JwtPayload;
      try {
        payload = jwt.verify(token, options.secret, {
          algorithms: [options.algorithm],
          clockTimestamp: clock(),
        });
      } catch (err) {
        if (err instanceof TokenExpiredError) {
          return { ok: false, reason: 'expired' };
        }
        if (err instanceof JsonWebTokenError) {
          return { ok: false, reason: 'invalid_signature' };
        }
        throw err;
      }

      if (typeof payload === 'string' || typeof payload.sub !== 'string' || !payload.sub) {
        return { ok: false, reason: 'missing_subject' };
      }
      if (!credentials.exists(payload.sub)) {
        return { ok: false, reason: 'unknown_subject' };
      }
      return { ok: true, username: payload.sub };
    },
  };
}
