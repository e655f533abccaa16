export { createAuthCore, settingsFromConfig } from './auth';
export type { AuthCore, AuthCoreOptions } from './auth';
export { AuthService } from './auth/authService';
export type {
  AuthSettings,
  AuthServiceDeps,
  AuthenticateRequest,
  RefreshRequest,
  RevokeRequest,
  RevokeTenantRequest,
  VerifiedToken,
} from './auth/authService';
export { AUDIT_ACTIONS, InMemoryAuditSink, LoggerAuditSink } from './auth/audit';
export type { AuditAction, AuditEvent, AuditSink } from './auth/audit';
export { InMemoryPasswordHashLookup, PasswordIdentityVerifier, hashPassword } from './auth/identity';
export type { IdentityVerifier, PasswordHashLookup } from './auth/identity';
export { createApp } from './gateway';
export { PermissionResolver } from './rbac/permissionResolver';
export { PERMISSION_WILDCARD, grants, normalizePermission, permissionIdentity } from './rbac/permissions';
export { InMemoryPermissionDataSource } from './store/permissionStore';
export type { AssignmentQuery, PermissionDataSource, PermissionQuery, RoleQuery } from './store/permissionStore';
export { InMemoryRevocationStore, RedisRevocationStore, createRevocationStore } from './store/revocationStore';
export type { MarkRevokedResult, RedisClientFactory, RevocationStore } from './store/revocationStore';
export { AccessTokenService } from './tokens/accessTokens';
export { CredentialCodec } from './tokens/codec';
export { RefreshTokenService, hashRefreshToken } from './tokens/refreshTokens';
export * from './shared/errors';
export * from './shared/types';
