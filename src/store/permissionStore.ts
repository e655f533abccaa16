import { Permission, Role, UserGrants, UserRoleAssignment } from '../shared/types';

export type RoleQuery = {
  tenantId: string;
  by:
    | { kind: 'id'; roleIds: string[] }
    | { kind: 'name'; names: string[] }
    | { kind: 'permission'; permissionId: string };
};

export type PermissionQuery = {
  tenantId: string;
  by:
    | { kind: 'id'; permissionIds: string[] }
    | { kind: 'role'; roleIds: string[] };
};

export type AssignmentQuery = {
  tenantId: string;
  by:
    | { kind: 'user'; userId: string }
    | { kind: 'role'; roleId: string };
};

/**
 * Read-only, batched view of the document store. Each call is one round
 * trip however many ids it carries. Implementations may return fewer rows
 * than ids asked for; callers treat the gaps as dangling references.
 */
export interface PermissionDataSource {
  findUser(tenantId: string, userId: string): Promise<UserGrants | null>;
  findAssignments(query: AssignmentQuery): Promise<UserRoleAssignment[]>;
  findRoles(query: RoleQuery): Promise<Role[]>;
  findPermissions(query: PermissionQuery): Promise<Permission[]>;
}

export interface PermissionSeed {
  users?: UserGrants[];
  roles?: Role[];
  permissions?: Permission[];
  assignments?: UserRoleAssignment[];
}

type LookupCounts = Record<keyof PermissionDataSource, number>;

function emptyCounts(): LookupCounts {
  return { findUser: 0, findAssignments: 0, findRoles: 0, findPermissions: 0 };
}

/**
 * Backs the local server and the tests. Rows are stored as given, without a
 * tenant filter on the id lookups, the way a careless collection would hold
 * them: tenant scoping is the resolver's job to enforce.
 */
export class InMemoryPermissionDataSource implements PermissionDataSource {
  private users: Map<string, UserGrants> = new Map();
  private roles: Map<string, Role> = new Map();
  private permissions: Map<string, Permission> = new Map();
  private assignments: UserRoleAssignment[] = [];
  private counts: LookupCounts = emptyCounts();

  constructor(seed: PermissionSeed = {}) {
    this.seed(seed);
  }

  async findUser(tenantId: string, userId: string): Promise<UserGrants | null> {
    this.counts.findUser++;
    const user = this.users.get(userKey(tenantId, userId));
    return user ? { ...user } : null;
  }

  async findAssignments(query: AssignmentQuery): Promise<UserRoleAssignment[]> {
    this.counts.findAssignments++;
    const { by } = query;
    return this.assignments.filter(a => {
      if (a.tenantId !== query.tenantId) return false;
      return by.kind === 'user' ? a.userId === by.userId : a.roleId === by.roleId;
    });
  }

  async findRoles(query: RoleQuery): Promise<Role[]> {
    this.counts.findRoles++;
    const { by } = query;
    switch (by.kind) {
      case 'id':
        return pick(this.roles, by.roleIds);
      case 'name':
        return [...this.roles.values()].filter(r => r.tenantId === query.tenantId && by.names.includes(r.name));
      case 'permission':
        return [...this.roles.values()].filter(
          r => r.tenantId === query.tenantId && r.permissionIds.includes(by.permissionId),
        );
    }
  }

  async findPermissions(query: PermissionQuery): Promise<Permission[]> {
    this.counts.findPermissions++;
    const { by } = query;
    switch (by.kind) {
      case 'id':
        return pick(this.permissions, by.permissionIds);
      case 'role': {
        const ids = new Set(pick(this.roles, by.roleIds).flatMap(r => r.permissionIds));
        return pick(this.permissions, [...ids]);
      }
    }
  }

  seed(data: PermissionSeed): void {
    for (const user of data.users ?? []) this.users.set(userKey(user.tenantId, user.userId), user);
    for (const role of data.roles ?? []) this.roles.set(role.roleId, role);
    for (const permission of data.permissions ?? []) this.permissions.set(permission.permissionId, permission);
    this.assignments.push(...(data.assignments ?? []));
  }

  reset(): void {
    this.users.clear();
    this.roles.clear();
    this.permissions.clear();
    this.assignments = [];
    this.resetCounts();
  }

  getCounts(): LookupCounts {
    return { ...this.counts };
  }

  resetCounts(): void {
    this.counts = emptyCounts();
  }
}

function userKey(tenantId: string, userId: string): string {
  return `${tenantId}/${userId}`;
}

function pick<T>(rows: Map<string, T>, ids: string[]): T[] {
  const found: T[] = [];
  for (const id of ids) {
    const row = rows.get(id);
    if (row) found.push(row);
  }
  return found;
}
