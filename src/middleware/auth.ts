import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { AuthenticationError } from '../utils/errors';

// Extend Express Request to include the verified caller
declare global {
  namespace Express {
    interface Request {
      user?: {
        id: string;
      };
    }
  }
}

export const JWT_SECRET_SETTING = 'jwtSecret';

/**
 * Verifies an HS256 bearer token and returns its subject. Shared by the
 * HTTP middleware and the socket.io handshake.
 */
export function verifyAccessToken(token: string, secret: string): string {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AuthenticationError(`Invalid or expired token: ${reason}`);
  }

  if (typeof payload === 'string' || !payload.sub) {
    throw new AuthenticationError('Token has no subject');
  }
  return payload.sub;
}

export function bearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.substring(7).trim();
  return token.length > 0 ? token : null;
}

export const authenticateUser = (req: Request, res: Response, next: NextFunction) => {
  try {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      throw new AuthenticationError();
    }

    const secret: unknown = req.app.get(JWT_SECRET_SETTING);
    if (typeof secret !== 'string' || secret.length === 0) {
      throw new Error('JWT secret is not configured');
    }

    req.user = { id: verifyAccessToken(token, secret) };
    next();
  } catch (error) {
    if (error instanceof AuthenticationError) {
      console.log('[AUTH] Authentication failed:', error.message);
    }
    next(error);
  }
};

export function requireUser(req: Request): string {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user.id;
}
