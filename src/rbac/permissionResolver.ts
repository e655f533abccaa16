import { AuthError, NotFoundError } from '../shared/errors';
import { createChildLogger } from '../shared/logger';
import { EffectivePermissionSet, Permission, Role } from '../shared/types';
import { requireIdentifiers } from '../shared/validation';
import { PermissionDataSource } from '../store/permissionStore';
import { grants, normalizePermission, permissionIdentity } from './permissions';

const logger = createChildLogger({ module: 'permission-resolver' });

export interface PermissionResolverSettings {
  systemTenantId: string;
}

/**
 * Computes a user's effective permissions from roles and direct grants. The
 * number of data source calls is fixed at four, however many roles and
 * permissions are involved.
 */
export class PermissionResolver {
  constructor(
    private readonly source: PermissionDataSource,
    private readonly settings: PermissionResolverSettings,
  ) {}

  async resolve(tenantId: string, userId: string): Promise<EffectivePermissionSet> {
    requireIdentifiers({ tenantId, userId });

    const [user, assignments] = await Promise.all([
      this.source.findUser(tenantId, userId),
      this.source.findAssignments({ tenantId, by: { kind: 'user', userId } }),
    ]);
    if (!user || user.tenantId !== tenantId) {
      throw new NotFoundError('User', userId);
    }

    const roleIds = unique(assignments.map(a => a.roleId));
    const fetchedRoles = await this.source.findRoles({ tenantId, by: { kind: 'id', roleIds } });
    const roles = this.usableRoles(tenantId, userId, roleIds, fetchedRoles);

    const grantedIds = unique([...roles.flatMap(r => r.permissionIds), ...user.additionalPermissionIds]);
    const permissionIds = unique([...grantedIds, ...user.revokedPermissionIds]);
    const fetched = await this.source.findPermissions({ tenantId, by: { kind: 'id', permissionIds } });

    const byId = new Map<string, Permission>();
    for (const permission of fetched) {
      if (permission.tenantId !== tenantId) {
        logger.warn({ tenantId, userId, permissionId: permission.permissionId }, 'Skipping cross-tenant permission');
        continue;
      }
      byId.set(permission.permissionId, permission);
    }

    const permissions = new Map<string, Permission>();
    for (const permissionId of grantedIds) {
      const permission = byId.get(permissionId);
      if (!permission) {
        logger.warn({ tenantId, userId, permissionId }, 'Skipping missing permission');
        continue;
      }
      if (permission.status !== 'active') {
        logger.warn({ tenantId, userId, permissionId }, 'Skipping inactive permission');
        continue;
      }
      permissions.set(permissionIdentity(permission), permission);
    }

    // Revocations win over any role or direct grant of the same identity
    for (const permissionId of user.revokedPermissionIds) {
      const permission = byId.get(permissionId);
      if (permission) permissions.delete(permissionIdentity(permission));
    }

    const effective: EffectivePermissionSet = {
      tenantId,
      userId,
      isTenantAdmin: roles.some(r => r.isTenantAdmin),
      permissions,
    };

    logger.debug(
      { tenantId, userId, roles: roles.length, permissions: permissions.size, isTenantAdmin: effective.isTenantAdmin },
      'Resolved effective permissions',
    );
    return effective;
  }

  async checkPermissions(tenantId: string, userId: string, identities: string[]): Promise<Record<string, boolean>> {
    const effective = await this.resolve(tenantId, userId);
    const granted = new Set(effective.permissions.keys());

    const results: Record<string, boolean> = {};
    for (const identity of identities) {
      results[identity] = effective.isTenantAdmin || grants(granted, identity);
    }
    return results;
  }

  /**
   * Throws PERMISSION_DENIED unless the user may perform `identity` against
   * `targetTenantId`. Only users of the system tenant reach across tenants.
   */
  async hasPermission(tenantId: string, userId: string, identity: string, targetTenantId: string): Promise<void> {
    requireIdentifiers({ targetTenantId });
    const required = normalizePermission(identity);
    const effective = await this.resolve(tenantId, userId);

    const sameTenant = tenantId === targetTenantId;
    if (sameTenant && effective.isTenantAdmin) return;

    const holds = grants(new Set(effective.permissions.keys()), required);
    if (holds && (sameTenant || tenantId === this.settings.systemTenantId)) return;

    logger.warn({ tenantId, userId, permission: required, targetTenantId }, 'Permission denied');
    throw new AuthError('PERMISSION_DENIED');
  }

  private usableRoles(tenantId: string, userId: string, roleIds: string[], fetched: Role[]): Role[] {
    const byId = new Map(fetched.map(r => [r.roleId, r]));
    const usable: Role[] = [];
    for (const roleId of roleIds) {
      const role = byId.get(roleId);
      if (!role) {
        logger.warn({ tenantId, userId, roleId }, 'Skipping missing role');
      } else if (role.tenantId !== tenantId) {
        logger.warn({ tenantId, userId, roleId }, 'Skipping cross-tenant role');
      } else if (role.status !== 'active') {
        logger.warn({ tenantId, userId, roleId }, 'Skipping inactive role');
      } else {
        usable.push(role);
      }
    }
    return usable;
  }
}

function unique(ids: string[]): string[] {
  return [...new Set(ids)];
}
