import { Request, Response, NextFunction } from 'express';
import { AuthService } from '../../auth/authService';
import { AuthError } from '../../shared/errors';
import { AuthContext } from '../../shared/types';

// Extend Express Request to include auth context
declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}

export function createAuthMiddleware(authService: AuthService) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      next(new AuthError('MALFORMED', 'Missing authorization header'));
      return;
    }
    if (!authHeader.startsWith('Bearer ')) {
      next(new AuthError('MALFORMED', 'Malformed authorization header'));
      return;
    }

    const token = authHeader.slice(7);
    if (!token) {
      next(new AuthError('MALFORMED', 'Missing token'));
      return;
    }

    try {
      const verified = await authService.verifyToken(token);
      req.authContext = {
        tenantId: verified.tenantId,
        userId: verified.userId,
        credentialId: verified.credentialId,
        expiresAt: verified.expiresAt,
      };
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function getAuthContext(req: Request): AuthContext {
  if (!req.authContext) {
    throw new AuthError('UNKNOWN', 'No auth context');
  }
  return req.authContext;
}
