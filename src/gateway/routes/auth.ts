import { Request, Router } from 'express';
import { AuthService } from '../../auth/authService';
import { PermissionResolver } from '../../rbac/permissionResolver';
import { createAuthMiddleware, getAuthContext } from '../middleware/auth';
import { createRbacMiddleware } from '../middleware/rbac';

// Untyped JSON bodies: anything that is not a string reads as missing
function bodyString(req: Request, name: string): string {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || !(name in body)) return '';
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : '';
}

function bodyStrings(req: Request, name: string): string[] {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) return [];
  const value: unknown = Reflect.get(body, name);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function createAuthRoutes(authService: AuthService, resolver: PermissionResolver): Router {
  const router = Router();
  const authenticate = createAuthMiddleware(authService);
  const requirePermission = createRbacMiddleware(resolver);
  const { userRevocationPermission } = authService.getSettings();

  // POST /auth/login - password login, returns a token pair
  router.post('/login', async (req, res, next) => {
    try {
      const pair = await authService.authenticate({
        tenantId: bodyString(req, 'tenantId'),
        userId: bodyString(req, 'userId'),
        password: bodyString(req, 'password'),
      });
      res.json(pair);
    } catch (error) {
      next(error);
    }
  });

  router.post('/verify', async (req, res, next) => {
    try {
      res.json(await authService.verifyToken(bodyString(req, 'token')));
    } catch (error) {
      next(error);
    }
  });

  // POST /auth/refresh - rotates the refresh token, old pair is revoked
  router.post('/refresh', async (req, res, next) => {
    try {
      const pair = await authService.refreshToken({
        tenantId: bodyString(req, 'tenantId'),
        userId: bodyString(req, 'userId'),
        refreshToken: bodyString(req, 'refreshToken'),
      });
      res.json(pair);
    } catch (error) {
      next(error);
    }
  });

  router.post('/revoke', async (req, res, next) => {
    try {
      const userId = bodyString(req, 'userId');
      const accessToken = bodyString(req, 'accessToken');
      const refreshToken = bodyString(req, 'refreshToken');
      const result = await authService.revokeToken({
        tenantId: bodyString(req, 'tenantId'),
        userId,
        accessToken: accessToken || undefined,
        refreshToken: refreshToken || undefined,
        revokedBy: bodyString(req, 'revokedBy') || userId,
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  // POST /auth/tenants/:targetTenantId/revoke-all - emergency tenant-wide logout
  router.post(
    '/tenants/:targetTenantId/revoke-all',
    authenticate,
    // Authorization happens inside revokeAllTenantTokens
    async (req, res, next) => {
      try {
        const { tenantId, userId } = getAuthContext(req);
        const counts = await authService.revokeAllTenantTokens({
          tenantId,
          userId,
          targetTenantId: req.params.targetTenantId,
        });
        res.json({ revoked: counts });
      } catch (error) {
        next(error);
      }
    },
  );

  router.get('/me/permissions', authenticate, async (req, res, next) => {
    try {
      const { tenantId, userId } = getAuthContext(req);
      const effective = await authService.getEffectivePermissions(tenantId, userId);
      res.json({
        tenantId,
        userId,
        isTenantAdmin: effective.isTenantAdmin,
        permissions: [...effective.permissions.keys()].sort(),
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/me/permissions/check', authenticate, async (req, res, next) => {
    try {
      const { tenantId, userId } = getAuthContext(req);
      const results = await authService.checkPermissions(tenantId, userId, bodyStrings(req, 'permissions'));
      res.json({ results });
    } catch (error) {
      next(error);
    }
  });

  // POST /auth/users/:targetUserId/logout-all - an administrator logs a user
  // of their own tenant out everywhere
  router.post(
    '/users/:targetUserId/logout-all',
    authenticate,
    requirePermission(userRevocationPermission),
    async (req, res, next) => {
      try {
        const { tenantId, userId } = getAuthContext(req);
        const counts = await authService.revokeAllUserTokens(tenantId, req.params.targetUserId, userId);
        res.json({ revoked: counts });
      } catch (error) {
        next(error);
      }
    },
  );

  // POST /auth/me/logout-all - revokes every credential of the caller
  router.post('/me/logout-all', authenticate, async (req, res, next) => {
    try {
      const { tenantId, userId } = getAuthContext(req);
      const counts = await authService.revokeAllUserTokens(tenantId, userId, userId);
      res.json({ revoked: counts });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
