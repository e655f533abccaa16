import * as jose from 'jose';
import bcrypt from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import { AuthCore, AuthCoreOptions, createAuthCore } from '../auth';
import { InMemoryAuditSink } from '../auth/audit';
import { InMemoryPasswordHashLookup, PasswordIdentityVerifier } from '../auth/identity';
import { config } from '../shared/config';
import { Permission, Role, UserGrants, UserRoleAssignment } from '../shared/types';
import { InMemoryPermissionDataSource, PermissionSeed } from '../store/permissionStore';
import { InMemoryRevocationStore } from '../store/revocationStore';

export const TEST_SECRET = 'test-secret';
export const TEST_ISSUER = config.tokens.jwtIssuer;
export const TEST_PASSWORD = 'test-password';

// Whole second, so exp * 1000 - now is an exact multiple of 1000
export const BASE_TIME = new Date('2026-01-15T10:00:00.000Z');

export function permission(tenantId: string, permissionId: string, overrides: Partial<Permission> = {}): Permission {
  const [resource, action] = permissionId.split('.');
  return {
    tenantId,
    permissionId,
    resource: resource ?? permissionId,
    action: action ?? 'read',
    isDangerous: false,
    status: 'active',
    ...overrides,
  };
}

export function role(tenantId: string, roleId: string, permissionIds: string[], overrides: Partial<Role> = {}): Role {
  return {
    tenantId,
    roleId,
    name: roleId,
    permissionIds,
    isTenantAdmin: false,
    status: 'active',
    ...overrides,
  };
}

export function user(tenantId: string, userId: string, overrides: Partial<UserGrants> = {}): UserGrants {
  return {
    tenantId,
    userId,
    status: 'active',
    additionalPermissionIds: [],
    revokedPermissionIds: [],
    ...overrides,
  };
}

export function assignment(tenantId: string, userId: string, roleId: string): UserRoleAssignment {
  return { tenantId, userId, roleId, assignedAt: BASE_TIME.getTime(), assignedBy: 'seed' };
}

export interface TestCore extends AuthCore {
  permissions: InMemoryPermissionDataSource;
  passwords: InMemoryPasswordHashLookup;
  audit: InMemoryAuditSink;
  addUser(tenantId: string, userId: string, password?: string): void;
}

/**
 * Fully in-memory core: no Redis, no network. Users added through addUser
 * log in with TEST_PASSWORD.
 */
export function createTestCore(seed: PermissionSeed = {}, options: AuthCoreOptions = {}): TestCore {
  const permissions = new InMemoryPermissionDataSource(seed);
  const passwords = new InMemoryPasswordHashLookup();
  const audit = new InMemoryAuditSink();

  const core = createAuthCore({
    jwtSecret: TEST_SECRET,
    permissions,
    identity: new PasswordIdentityVerifier(passwords),
    audit,
    accessStore: new InMemoryRevocationStore(),
    refreshStore: new InMemoryRevocationStore(),
    ...options,
  });

  return {
    ...core,
    permissions,
    passwords,
    audit,
    addUser(tenantId: string, userId: string, password: string = TEST_PASSWORD) {
      // Low cost factor keeps the suite fast
      passwords.set(tenantId, userId, bcrypt.hashSync(password, 4));
      permissions.seed({ users: [user(tenantId, userId)] });
    },
  };
}

export interface RawTokenOptions {
  sub?: string;
  tenantId?: string;
  jti?: string;
  iss?: string;
  iat?: number;
  exp?: number;
  secret?: string;
}

// Signs a token directly, bypassing the services (and so the store)
export async function createRawToken(options: RawTokenOptions = {}): Promise<string> {
  const now = Math.floor(BASE_TIME.getTime() / 1000);
  const payload: jose.JWTPayload = {};
  if (options.tenantId !== '') payload.tenant_id = options.tenantId ?? 'tenant-a';

  return new jose.SignJWT(payload)
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(options.sub ?? 'user-1')
    .setJti(options.jti ?? uuidv4())
    .setIssuedAt(options.iat ?? now)
    .setExpirationTime(options.exp ?? now + 3600)
    .setIssuer(options.iss ?? TEST_ISSUER)
    .sign(new TextEncoder().encode(options.secret ?? TEST_SECRET));
}

export function createAlgNoneToken(options: { sub?: string; tenantId?: string } = {}): string {
  const now = Math.floor(BASE_TIME.getTime() / 1000);

  const header = { alg: 'none', typ: 'JWT' };
  const payload = {
    sub: options.sub ?? 'user-1',
    tenant_id: options.tenantId ?? 'tenant-a',
    jti: uuidv4(),
    iss: TEST_ISSUER,
    iat: now,
    exp: now + 3600,
  };

  const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');

  return `${encodedHeader}.${encodedPayload}.`;
}
