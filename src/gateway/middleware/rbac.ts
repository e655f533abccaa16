import { Request, Response, NextFunction } from 'express';
import { PermissionResolver } from '../../rbac/permissionResolver';
import { getAuthContext } from './auth';

// Checks the permission within the caller's own tenant
export function createRbacMiddleware(resolver: PermissionResolver) {
  return (permission: string) => {
    return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
      try {
        const { tenantId, userId } = getAuthContext(req);
        await resolver.hasPermission(tenantId, userId, permission, tenantId);
        next();
      } catch (error) {
        next(error);
      }
    };
  };
}
