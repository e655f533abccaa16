import { AuthError, NotFoundError } from '../shared/errors';
import { InMemoryPermissionDataSource } from '../store/permissionStore';
import { PermissionResolver } from '../rbac/permissionResolver';
import { grants, normalizePermission, permissionIdentity } from '../rbac/permissions';
import { assignment, permission, role, user } from './helpers';

const T = 'tenant-a';

function seedSource(): InMemoryPermissionDataSource {
  return new InMemoryPermissionDataSource({
    permissions: [
      permission(T, 'orders.read'),
      permission(T, 'orders.write'),
      permission(T, 'invoices.read'),
      permission(T, 'reports.export'),
      permission(T, 'legacy.read', { status: 'inactive' }),
      permission(T, 'tokens.revoke_all', { isDangerous: true }),
      permission(T, 'everything', { resource: '*', action: '*' }),
      permission('tenant-b', 'foreign.read'),
      permission('system', 'sys.revoke', { resource: 'tokens', action: 'revoke_all' }),
    ],
    roles: [
      role(T, 'r1', ['orders.read', 'orders.write']),
      role(T, 'r2', ['orders.write', 'invoices.read']),
      role(T, 'mixed', ['orders.read', 'foreign.read', 'legacy.read', 'missing.perm']),
      role(T, 'retired', ['reports.export'], { status: 'inactive' }),
      role(T, 'admin', [], { isTenantAdmin: true }),
      role(T, 'revoker', ['tokens.revoke_all']),
      role(T, 'root', ['everything']),
      role('tenant-b', 'rb', ['foreign.read']),
      role('system', 'operator', ['sys.revoke']),
    ],
    users: [
      user(T, 'alice', { additionalPermissionIds: ['reports.export'] }),
      user(T, 'bob', { additionalPermissionIds: ['reports.export'] }),
      user(T, 'carol'),
      user(T, 'dave', { additionalPermissionIds: ['invoices.read'] }),
      user(T, 'erin', { revokedPermissionIds: ['orders.write'] }),
      user(T, 'frank'),
      user(T, 'grace'),
      user(T, 'heidi'),
      user(T, 'ivan'),
      user('system', 'ops'),
      user('system', 'intern'),
    ],
    assignments: [
      assignment(T, 'alice', 'r1'),
      assignment(T, 'alice', 'r2'),
      assignment(T, 'bob', 'r2'),
      assignment(T, 'bob', 'r1'),
      assignment(T, 'carol', 'mixed'),
      assignment(T, 'carol', 'rb'),
      assignment(T, 'carol', 'retired'),
      assignment(T, 'carol', 'ghost'),
      assignment(T, 'erin', 'r1'),
      assignment(T, 'erin', 'r2'),
      assignment(T, 'frank', 'admin'),
      assignment(T, 'grace', 'revoker'),
      assignment(T, 'heidi', 'r1'),
      assignment(T, 'ivan', 'root'),
      assignment('system', 'ops', 'operator'),
    ],
  });
}

describe('permission identities', () => {
  it('lower-cases resource and action', () => {
    expect(permissionIdentity({ resource: 'Orders', action: 'READ' })).toBe('orders:read');
    expect(normalizePermission('Orders:Read:own')).toBe('orders:read');
  });

  it('rejects strings without an action', () => {
    expect(() => normalizePermission('orders')).toThrow('Invalid permission string: orders');
  });

  it('honours wildcards', () => {
    expect(grants(new Set(['orders:*']), 'orders:delete')).toBe(true);
    expect(grants(new Set(['*:read']), 'invoices:read')).toBe(true);
    expect(grants(new Set(['*:*']), 'anything:at_all')).toBe(true);
    expect(grants(new Set(['orders:read']), 'orders:write')).toBe(false);
  });
});

describe('PermissionResolver', () => {
  let source: InMemoryPermissionDataSource;
  let resolver: PermissionResolver;

  beforeEach(() => {
    source = seedSource();
    resolver = new PermissionResolver(source, { systemTenantId: 'system' });
  });

  describe('resolve', () => {
    it('unions roles and direct grants without duplicates', async () => {
      const effective = await resolver.resolve(T, 'alice');

      expect(effective.permissions.size).toBe(4);
      expect([...effective.permissions.keys()].sort()).toEqual([
        'invoices:read',
        'orders:read',
        'orders:write',
        'reports:export',
      ]);
      expect(effective.isTenantAdmin).toBe(false);
    });

    it('does not depend on assignment order', async () => {
      const alice = await resolver.resolve(T, 'alice');
      const bob = await resolver.resolve(T, 'bob');

      expect([...bob.permissions.keys()].sort()).toEqual([...alice.permissions.keys()].sort());
    });

    it('returns only direct grants for a user without roles', async () => {
      const effective = await resolver.resolve(T, 'dave');
      expect([...effective.permissions.keys()]).toEqual(['invoices:read']);
    });

    it('makes exactly four data source calls', async () => {
      await resolver.resolve(T, 'carol');

      expect(source.getCounts()).toEqual({ findUser: 1, findAssignments: 1, findRoles: 1, findPermissions: 1 });
    });

    it('skips missing, inactive and cross-tenant references', async () => {
      const effective = await resolver.resolve(T, 'carol');

      expect([...effective.permissions.keys()]).toEqual(['orders:read']);
      for (const granted of effective.permissions.values()) {
        expect(granted.tenantId).toBe(T);
      }
    });

    it('subtracts revoked permissions after the union', async () => {
      const effective = await resolver.resolve(T, 'erin');
      expect([...effective.permissions.keys()].sort()).toEqual(['invoices:read', 'orders:read']);
    });

    it('flags tenant admins', async () => {
      const effective = await resolver.resolve(T, 'frank');
      expect(effective.isTenantAdmin).toBe(true);
      expect(effective.permissions.size).toBe(0);
    });

    it('throws NotFoundError for an unknown user', async () => {
      await expect(resolver.resolve(T, 'nobody')).rejects.toBeInstanceOf(NotFoundError);
      await expect(resolver.resolve(T, 'nobody')).rejects.toThrow('User not found: nobody');
    });

    it('does not find a user of another tenant', async () => {
      await expect(resolver.resolve('tenant-b', 'alice')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('checkPermissions', () => {
    it('answers each identity', async () => {
      const results = await resolver.checkPermissions(T, 'heidi', ['orders:read', 'Orders:Write', 'invoices:read']);
      expect(results).toEqual({ 'orders:read': true, 'Orders:Write': true, 'invoices:read': false });
    });

    it('answers true for everything when the user is a tenant admin', async () => {
      const results = await resolver.checkPermissions(T, 'frank', ['orders:read', 'tokens:revoke_all']);
      expect(results).toEqual({ 'orders:read': true, 'tokens:revoke_all': true });
    });
  });

  describe('hasPermission', () => {
    async function denied(tenantId: string, userId: string, identity: string, target: string): Promise<boolean> {
      try {
        await resolver.hasPermission(tenantId, userId, identity, target);
        return false;
      } catch (error) {
        if (error instanceof AuthError && error.code === 'PERMISSION_DENIED') return true;
        throw error;
      }
    }

    it('allows a same-tenant holder', async () => {
      await expect(resolver.hasPermission(T, 'grace', 'tokens:revoke_all', T)).resolves.toBeUndefined();
    });

    it('denies a same-tenant user without the permission', async () => {
      expect(await denied(T, 'heidi', 'tokens:revoke_all', T)).toBe(true);
    });

    it('allows a tenant admin within their own tenant only', async () => {
      await expect(resolver.hasPermission(T, 'frank', 'tokens:revoke_all', T)).resolves.toBeUndefined();
      expect(await denied(T, 'frank', 'tokens:revoke_all', 'tenant-b')).toBe(true);
    });

    it('denies a regular tenant acting on another tenant even with the permission', async () => {
      expect(await denied(T, 'grace', 'tokens:revoke_all', 'tenant-b')).toBe(true);
    });

    it('lets system tenant users act on any tenant when they hold the permission', async () => {
      await expect(resolver.hasPermission('system', 'ops', 'tokens:revoke_all', T)).resolves.toBeUndefined();
      expect(await denied('system', 'intern', 'tokens:revoke_all', T)).toBe(true);
    });

    it('treats *:* as every permission', async () => {
      await expect(resolver.hasPermission(T, 'ivan', 'tokens:revoke_all', T)).resolves.toBeUndefined();
    });
  });
});
