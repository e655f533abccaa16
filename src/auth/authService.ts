import { AuthCoreError, AuthError, isAuthError, toInternalError, ValidationError } from '../shared/errors';
import { createChildLogger } from '../shared/logger';
import {
  CredentialKind,
  EffectivePermissionSet,
  RefreshCredentialMetadata,
  RevocationCounts,
  TokenPair,
} from '../shared/types';
import { requireIdentifiers, requireNonEmpty } from '../shared/validation';
import { PermissionResolver } from '../rbac/permissionResolver';
import { AccessTokenService, IssuedAccessCredential } from '../tokens/accessTokens';
import { IssuedRefreshCredential, RefreshTokenService } from '../tokens/refreshTokens';
import { AuditEventInput, AuditSink, createAuditEvent } from './audit';
import { IdentityVerifier } from './identity';

const logger = createChildLogger({ module: 'auth-service' });

export interface AuthSettings {
  readonly systemTenantId: string;
  readonly accessTokenTtlSeconds: number;
  readonly refreshTokenTtlSeconds: number;
  // Permission a caller needs to revoke every credential of a tenant
  readonly tenantRevocationPermission: string;
  // Permission an administrator needs to log another user out everywhere
  readonly userRevocationPermission: string;
}

export interface AuthServiceDeps {
  accessTokens: AccessTokenService;
  refreshTokens: RefreshTokenService;
  resolver: PermissionResolver;
  identity: IdentityVerifier;
  audit: AuditSink;
}

export interface AuthenticateRequest {
  tenantId: string;
  userId: string;
  password: string;
}

export interface RefreshRequest {
  tenantId: string;
  userId: string;
  refreshToken: string;
}

export interface RevokeRequest {
  tenantId: string;
  userId: string;
  accessToken?: string;
  refreshToken?: string;
  revokedBy: string;
}

export interface RevokeTenantRequest {
  // Caller identity
  tenantId: string;
  userId: string;
  targetTenantId: string;
}

export interface VerifiedToken {
  valid: true;
  tenantId: string;
  userId: string;
  credentialId: string;
  expiresAt: number;
}

type AuditTemplate = Omit<AuditEventInput, 'status' | 'errorCode'>;

/**
 * Entry point for every token lifecycle operation. Settings are fixed at
 * construction; nothing here reads process-wide state.
 */
export class AuthService {
  private readonly settings: AuthSettings;

  constructor(
    private readonly deps: AuthServiceDeps,
    settings: AuthSettings,
  ) {
    this.settings = Object.freeze({ ...settings });
  }

  getSettings(): AuthSettings {
    return this.settings;
  }

  async authenticate(req: AuthenticateRequest): Promise<TokenPair> {
    const { tenantId, userId, password } = req;
    const event: AuditTemplate = {
      action: 'auth.authenticate',
      tenantId,
      actorId: userId,
      resourceType: 'user',
      resourceId: userId,
    };

    return this.audited(event, async () => {
      requireIdentifiers({ tenantId, userId });
      requireNonEmpty({ password });

      const verified = await this.deps.identity.verify(tenantId, userId, password);
      if (!verified) {
        logger.info({ tenantId, userId }, 'Authentication rejected');
        throw new AuthError('INVALID_CREDENTIALS');
      }

      const access = await this.deps.accessTokens.issue(tenantId, userId, {
        ttlSeconds: this.settings.accessTokenTtlSeconds,
      });

      let refresh: IssuedRefreshCredential;
      try {
        refresh = await this.deps.refreshTokens.issue(tenantId, userId, {
          accessCredentialId: access.metadata.credentialId,
        });
      } catch (error) {
        await this.discardAccess(access, 'auth-cleanup');
        throw toInternalError('Failed to issue refresh credential', error);
      }

      logger.info({ tenantId, userId, credentialId: access.metadata.credentialId }, 'User authenticated');
      return toTokenPair(access, refresh);
    });
  }

  /**
   * Read-only: checks signature, expiry and store state. Account state is
   * not consulted here.
   */
  async verifyToken(token: string): Promise<VerifiedToken> {
    const event: AuditTemplate = {
      action: 'auth.verify',
      tenantId: null,
      actorId: null,
      resourceType: 'credential',
      resourceId: null,
    };

    return this.audited(
      event,
      async () => {
        requireNonEmpty({ token });
        const metadata = await this.deps.accessTokens.validate(token);
        return {
          valid: true as const,
          tenantId: metadata.tenantId,
          userId: metadata.userId,
          credentialId: metadata.credentialId,
          expiresAt: metadata.expiresAt,
        };
      },
      result => ({ tenantId: result.tenantId, actorId: result.userId, resourceId: result.credentialId }),
    );
  }

  /**
   * Trades a refresh token for a new pair. The old refresh credential and the
   * access credential issued with it both end revoked.
   */
  async refreshToken(req: RefreshRequest): Promise<TokenPair> {
    const { tenantId, userId, refreshToken } = req;
    const event: AuditTemplate = {
      action: 'auth.refresh',
      tenantId,
      actorId: userId,
      resourceType: 'user',
      resourceId: userId,
    };

    return this.audited(event, async () => {
      requireIdentifiers({ tenantId, userId });
      requireNonEmpty({ refreshToken });

      let previous: RefreshCredentialMetadata;
      try {
        previous = await this.deps.refreshTokens.validate(tenantId, userId, refreshToken);
      } catch (error) {
        if (isAuthError(error, 'REUSE_DETECTED')) {
          await this.deps.accessTokens.revokeAll(tenantId, userId, 'reuse-detection');
        }
        throw error;
      }

      // Retire the old access credential first: if this fails nothing new
      // exists yet and the old refresh token can simply be retried
      if (previous.accessCredentialId) {
        await this.deps.accessTokens.revoke(tenantId, previous.accessCredentialId, 'rotation');
      }

      const access = await this.deps.accessTokens.issue(tenantId, userId, {
        ttlSeconds: this.settings.accessTokenTtlSeconds,
      });

      let refresh: IssuedRefreshCredential;
      try {
        refresh = await this.deps.refreshTokens.rotate(tenantId, userId, refreshToken, {
          accessCredentialId: access.metadata.credentialId,
        });
      } catch (error) {
        await this.discardAccess(access, 'rotation-cleanup');
        throw error;
      }

      logger.info({ tenantId, userId, credentialId: access.metadata.credentialId }, 'Token pair refreshed');
      return toTokenPair(access, refresh);
    });
  }

  async revokeToken(req: RevokeRequest): Promise<{ revoked: true }> {
    const { tenantId, userId, accessToken, refreshToken, revokedBy } = req;
    const event: AuditTemplate = {
      action: 'auth.revoke',
      tenantId,
      actorId: revokedBy,
      resourceType: 'credential',
      resourceId: userId,
    };

    return this.audited(event, async () => {
      requireIdentifiers({ tenantId, userId });
      requireNonEmpty({ revokedBy });
      if (!accessToken && !refreshToken) {
        throw new ValidationError('Provide accessToken or refreshToken', ['accessToken', 'refreshToken']);
      }

      if (accessToken) {
        await this.deps.accessTokens.revokeToken(tenantId, userId, accessToken, revokedBy);
      }
      if (refreshToken) {
        await this.deps.refreshTokens.revoke(tenantId, userId, refreshToken, revokedBy);
      }

      logger.info({ tenantId, userId, revokedBy }, 'Credentials revoked');
      return { revoked: true as const };
    });
  }

  // Log out everywhere
  async revokeAllUserTokens(tenantId: string, userId: string, revokedBy: string): Promise<RevocationCounts> {
    const event: AuditTemplate = {
      action: 'auth.revoke_all_user',
      tenantId,
      actorId: revokedBy,
      resourceType: 'user',
      resourceId: userId,
    };

    return this.audited(
      event,
      async () => {
        requireIdentifiers({ tenantId, userId });
        requireNonEmpty({ revokedBy });

        return settleCounts(
          { tenantId, userId, revokedBy },
          this.deps.accessTokens.revokeAll(tenantId, userId, revokedBy),
          this.deps.refreshTokens.revokeAll(tenantId, userId, revokedBy),
        );
      },
      counts => ({ details: { ...counts } }),
    );
  }

  async revokeAllTenantTokens(req: RevokeTenantRequest): Promise<RevocationCounts> {
    const { tenantId, userId, targetTenantId } = req;
    const event: AuditTemplate = {
      action: 'auth.revoke_all_tenant',
      tenantId,
      actorId: userId,
      resourceType: 'tenant',
      resourceId: targetTenantId,
    };

    return this.audited(
      event,
      async () => {
        requireIdentifiers({ tenantId, userId, targetTenantId });

        await this.deps.resolver.hasPermission(
          tenantId,
          userId,
          this.settings.tenantRevocationPermission,
          targetTenantId,
        );

        const counts = await settleCounts(
          { tenantId: targetTenantId, revokedBy: userId },
          this.deps.accessTokens.revokeTenant(targetTenantId, userId),
          this.deps.refreshTokens.revokeTenant(targetTenantId, userId),
        );

        logger.warn({ tenantId, userId, targetTenantId, ...counts }, 'All tenant credentials revoked');
        return counts;
      },
      counts => ({ details: { ...counts } }),
    );
  }

  async getEffectivePermissions(tenantId: string, userId: string): Promise<EffectivePermissionSet> {
    return this.deps.resolver.resolve(tenantId, userId);
  }

  async checkPermissions(tenantId: string, userId: string, identities: string[]): Promise<Record<string, boolean>> {
    return this.deps.resolver.checkPermissions(tenantId, userId, identities);
  }

  private async audited<T>(
    event: AuditTemplate,
    operation: () => Promise<T>,
    describe?: (result: T) => Partial<AuditTemplate>,
  ): Promise<T> {
    let result: T;
    try {
      result = await operation();
    } catch (error) {
      const errorCode = error instanceof AuthCoreError ? error.code : 'INTERNAL';
      await this.emit({ ...event, status: 'failure', errorCode });
      throw error;
    }

    await this.emit({ ...event, ...describe?.(result), status: 'success' });
    return result;
  }

  // Audit failures are logged and never surface to the caller
  private async emit(input: AuditEventInput): Promise<void> {
    try {
      await this.deps.audit.record(createAuditEvent(input));
    } catch (error) {
      logger.warn({ err: error, action: input.action, tenantId: input.tenantId }, 'Failed to record audit event');
    }
  }

  private async discardAccess(access: IssuedAccessCredential, revokedBy: string): Promise<void> {
    const { tenantId, userId, credentialId } = access.metadata;
    try {
      await this.deps.accessTokens.revoke(tenantId, credentialId, revokedBy);
    } catch (error) {
      // Left to expire with its short TTL
      logger.error({ err: error, tenantId, userId, credentialId }, 'Failed to revoke orphaned access credential');
    }
  }
}

/**
 * Runs both halves of a bulk revocation independently. A failed half is
 * reported in `failed` with a count of 0; only when both fail does the call
 * throw.
 */
async function settleCounts(
  context: Record<string, string>,
  access: Promise<number>,
  refresh: Promise<number>,
): Promise<RevocationCounts> {
  const [accessResult, refreshResult] = await Promise.allSettled([access, refresh]);
  if (accessResult.status === 'rejected' && refreshResult.status === 'rejected') {
    throw toInternalError('Bulk revocation failed', accessResult.reason);
  }

  const counts: RevocationCounts = { access: 0, refresh: 0 };
  const failed: CredentialKind[] = [];
  if (accessResult.status === 'fulfilled') {
    counts.access = accessResult.value;
  } else {
    failed.push('access');
    logger.warn({ ...context, err: accessResult.reason }, 'Bulk revocation of access credentials failed');
  }
  if (refreshResult.status === 'fulfilled') {
    counts.refresh = refreshResult.value;
  } else {
    failed.push('refresh');
    logger.warn({ ...context, err: refreshResult.reason }, 'Bulk revocation of refresh credentials failed');
  }

  if (failed.length > 0) counts.failed = failed;
  return counts;
}

function toTokenPair(access: IssuedAccessCredential, refresh: IssuedRefreshCredential): TokenPair {
  return {
    tenantId: access.metadata.tenantId,
    userId: access.metadata.userId,
    accessToken: access.token,
    accessTokenExpiresAt: access.metadata.expiresAt,
    refreshToken: refresh.token,
    refreshTokenExpiresAt: refresh.metadata.expiresAt,
  };
}
