import jwt, { type JwtPayload } from 'jsonwebtoken';
import type { RpcUser } from '../rpc/types';

export interface ValidatedSessionToken {
  token: string;
  payload: JwtPayload;
  username: string;
  expiresAt?: number;
  issuedAt?: number;
}

export class TokenValidationError extends Error {
  public readonly code: string;
  public readonly status: number;

  constructor(message: string, code = 'invalid_token', status = 401, cause?: Error) {
    super(message);
    this.name = 'TokenValidationError';
    this.code = code;
    this.status = status;
    if (cause && cause.stack) {
      this.stack = `${this.name}: ${this.message}\nCaused by: ${cause.stack}`;
    }
  }
}

export function isTokenValidationError(error: unknown): error is TokenValidationError {
  return error instanceof TokenValidationError;
}

export interface SessionTokenOptions {
  secret: string;
  ttlSeconds: number;
  issuer: string;
}

/** Issues and checks the HS256 tokens that carry a logged-in session between requests. */
export class SessionTokenService {
  constructor(private readonly options: SessionTokenOptions) {}

  public issue(user: RpcUser): string {
    return jwt.sign({}, this.options.secret, {
      algorithm: 'HS256',
      subject: user.username,
      issuer: this.options.issuer,
      expiresIn: this.options.ttlSeconds,
    });
  }

  public verify(token: string): ValidatedSessionToken {
    if (!token) {
      throw new TokenValidationError('Missing session token.');
    }

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        issuer: this.options.issuer,
      });
    } catch (error) {
      throw normalizeJwtError(error);
    }

    if (typeof decoded === 'string') {
      throw new TokenValidationError('Token payload is not a JWT object.');
    }
    if (!decoded.sub) {
      throw new TokenValidationError('Session token has no subject.');
    }

    return {
      token,
      payload: decoded,
      username: decoded.sub,
      expiresAt: typeof decoded.exp === 'number' ? decoded.exp : undefined,
      issuedAt: typeof decoded.iat === 'number' ? decoded.iat : undefined,
    };
  }
}

function normalizeJwtError(error: unknown): TokenValidationError {
  if (error instanceof TokenValidationError) {
    return error;
  }

  if (error instanceof jwt.TokenExpiredError) {
    return new TokenValidationError('Session token has expired.', 'invalid_token', 401, error);
  }
  if (error instanceof jwt.NotBeforeError) {
    return new TokenValidationError('Session token is not yet valid.', 'invalid_token', 401, error);
  }
  if (error instanceof Error) {
    return new TokenValidationError(error.message || 'Session token is not valid.', 'invalid_token', 401, error);
  }
  return new TokenValidationError('Failed to validate session token.');
}
