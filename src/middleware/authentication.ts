import type { AuthBackend } from '../auth/backend';
import { TokenSession } from '../auth/session';
import { isTokenValidationError, type SessionTokenService } from '../auth/token-validator';
import { componentLogger } from '../logging/logger';

const logger = componentLogger('auth');

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }

  const match = header.match(/^Bearer\s+(.+)$/i);
  return match ? match[1].trim() : null;
}

export type SessionResolver = (authorizationHeader: string | undefined) => TokenSession;

/**
 * Turns the bearer session token of a request into a {@link TokenSession}.
 * Missing, invalid or expired tokens, and tokens for users that are gone or
 * inactive, all yield an anonymous session.
 */
export function createSessionResolver(sessions: SessionTokenService, users: AuthBackend): SessionResolver {
  return (authorizationHeader) => {
    const bearer = extractBearerToken(authorizationHeader);
    if (!bearer) {
      return new TokenSession();
    }

    try {
      const validated = sessions.verify(bearer);
      const user = users.findUser(validated.username);
      if (!user || !user.isActive) {
        logger.warn({ username: validated.username }, 'Session token refers to an unknown or inactive user');
        return new TokenSession();
      }
      return new TokenSession(user);
    } catch (error) {
      if (isTokenValidationError(error)) {
        logger.warn({ err: error }, 'Ignoring invalid session token');
        return new TokenSession();
      }
      throw error;
    }
  };
}
