import { config } from '../shared/config';
import { AccessCredentialMetadata, RefreshCredentialMetadata } from '../shared/types';
import { PermissionResolver } from '../rbac/permissionResolver';
import { createRevocationStore, RevocationStore } from '../store/revocationStore';
import { InMemoryPermissionDataSource, PermissionDataSource } from '../store/permissionStore';
import { AccessTokenService } from '../tokens/accessTokens';
import { CredentialCodec } from '../tokens/codec';
import { RefreshTokenService } from '../tokens/refreshTokens';
import { AuditSink, LoggerAuditSink } from './audit';
import { AuthService, AuthSettings } from './authService';
import { IdentityVerifier, InMemoryPasswordHashLookup, PasswordIdentityVerifier } from './identity';

export interface AuthCoreOptions {
  settings?: Partial<AuthSettings>;
  permissions?: PermissionDataSource;
  identity?: IdentityVerifier;
  audit?: AuditSink;
  accessStore?: RevocationStore<AccessCredentialMetadata>;
  refreshStore?: RevocationStore<RefreshCredentialMetadata>;
  jwtSecret?: string;
}

export interface AuthCore {
  authService: AuthService;
  resolver: PermissionResolver;
  accessTokens: AccessTokenService;
  refreshTokens: RefreshTokenService;
  accessStore: RevocationStore<AccessCredentialMetadata>;
  refreshStore: RevocationStore<RefreshCredentialMetadata>;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

export function settingsFromConfig(): AuthSettings {
  return {
    systemTenantId: config.rbac.systemTenantId,
    accessTokenTtlSeconds: config.tokens.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: config.tokens.refreshTokenTtlSeconds,
    tenantRevocationPermission: config.rbac.tenantRevocationPermission,
    userRevocationPermission: config.rbac.userRevocationPermission,
  };
}

/**
 * Wires the services from configuration. Any collaborator can be swapped in,
 * which is how the tests and the local server get in-memory backends.
 */
export function createAuthCore(options: AuthCoreOptions = {}): AuthCore {
  const settings: AuthSettings = { ...settingsFromConfig(), ...options.settings };

  const accessStore =
    options.accessStore ??
    createRevocationStore<AccessCredentialMetadata>({
      driver: config.store.driver,
      redisUrl: config.store.redisUrl,
      prefix: 'access',
    });
  const refreshStore =
    options.refreshStore ??
    createRevocationStore<RefreshCredentialMetadata>({
      driver: config.store.driver,
      redisUrl: config.store.refreshRedisUrl,
      prefix: 'refresh',
    });

  const codec = new CredentialCodec({
    secret: options.jwtSecret ?? config.tokens.jwtSecret,
    issuer: config.tokens.jwtIssuer,
  });
  const accessTokens = new AccessTokenService(codec, accessStore, { ttlSeconds: settings.accessTokenTtlSeconds });
  const refreshTokens = new RefreshTokenService(refreshStore, { ttlSeconds: settings.refreshTokenTtlSeconds });
  const resolver = new PermissionResolver(options.permissions ?? new InMemoryPermissionDataSource(), {
    systemTenantId: settings.systemTenantId,
  });

  const authService = new AuthService(
    {
      accessTokens,
      refreshTokens,
      resolver,
      identity: options.identity ?? new PasswordIdentityVerifier(new InMemoryPasswordHashLookup()),
      audit: options.audit ?? new LoggerAuditSink(),
    },
    settings,
  );

  return {
    authService,
    resolver,
    accessTokens,
    refreshTokens,
    accessStore,
    refreshStore,
    async connect() {
      await Promise.all([accessStore.connect(), refreshStore.connect()]);
    },
    async disconnect() {
      await Promise.all([accessStore.disconnect(), refreshStore.disconnect()]);
    },
  };
}
