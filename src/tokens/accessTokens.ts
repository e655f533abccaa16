import { nowMs, nowSeconds } from '../shared/clock';
import { AuthError, isAuthError, ValidationError } from '../shared/errors';
import { createChildLogger } from '../shared/logger';
import { AccessCredentialMetadata, CredentialClaims } from '../shared/types';
import { requireIdentifiers } from '../shared/validation';
import { RevocationStore } from '../store/revocationStore';
import { CredentialCodec } from './codec';

const logger = createChildLogger({ module: 'access-tokens' });

export interface IssuedAccessCredential {
  token: string;
  metadata: AccessCredentialMetadata;
}

export interface AccessTokenServiceOptions {
  ttlSeconds: number;
}

export class AccessTokenService {
  constructor(
    private readonly codec: CredentialCodec,
    private readonly store: RevocationStore<AccessCredentialMetadata>,
    private readonly options: AccessTokenServiceOptions,
  ) {}

  async issue(tenantId: string, userId: string, opts: { ttlSeconds?: number } = {}): Promise<IssuedAccessCredential> {
    requireIdentifiers({ tenantId, userId });

    const ttlSeconds = opts.ttlSeconds ?? this.options.ttlSeconds;
    const iat = nowSeconds();
    const { token, claims } = await this.codec.encode({ sub: userId, tenantId, iat, exp: iat + ttlSeconds });

    const metadata: AccessCredentialMetadata = {
      kind: 'access',
      tenantId,
      credentialId: claims.jti,
      userId,
      issuedAt: claims.iat * 1000,
      expiresAt: claims.exp * 1000,
      revoked: false,
    };

    // Store TTL is the remaining lifetime, so the record dies with the token
    await this.store.put(metadata, metadata.expiresAt - nowMs());

    logger.debug({ tenantId, userId, credentialId: metadata.credentialId }, 'Access credential issued');
    return { token, metadata };
  }

  async get(tenantId: string, credentialId: string): Promise<AccessCredentialMetadata | null> {
    requireIdentifiers({ tenantId, credentialId });
    return this.store.get(tenantId, credentialId);
  }

  /**
   * Signature and store must agree: a well-signed token the store has never
   * seen is as untrusted as a forged one.
   */
  async validate(token: string, expectedTenantId?: string): Promise<AccessCredentialMetadata> {
    const claims = await this.codec.decode(token);

    if (expectedTenantId !== undefined && claims.tenantId !== expectedTenantId) {
      throw new AuthError('TENANT_MISMATCH');
    }

    const metadata = await this.store.get(claims.tenantId, claims.jti);
    if (!metadata || metadata.userId !== claims.sub) {
      throw new AuthError('UNKNOWN');
    }
    if (metadata.revoked) {
      throw new AuthError('REVOKED');
    }

    return metadata;
  }

  // Idempotent: unknown and already-revoked ids are success
  async revoke(tenantId: string, credentialId: string, revokedBy: string): Promise<void> {
    requireIdentifiers({ tenantId, credentialId });

    const result = await this.store.markRevoked(tenantId, credentialId, revokedBy);
    logger.debug({ tenantId, credentialId, revokedBy, result }, 'Access credential revoke');
  }

  /**
   * Revokes by token string on behalf of (tenantId, userId). A token that can
   * no longer pass the codec is already unusable, so there is nothing to do.
   */
  async revokeToken(tenantId: string, userId: string, token: string, revokedBy: string): Promise<void> {
    requireIdentifiers({ tenantId, userId });

    let claims: CredentialClaims;
    try {
      claims = await this.codec.decode(token);
    } catch (error) {
      if (isAuthError(error)) {
        logger.debug({ tenantId, userId, code: error.code }, 'Access credential already unusable');
        return;
      }
      throw error;
    }

    if (claims.tenantId !== tenantId || claims.sub !== userId) {
      throw new ValidationError('Access token does not belong to this user', ['accessToken']);
    }

    await this.revoke(tenantId, claims.jti, revokedBy);
  }

  async revokeAll(tenantId: string, userId: string, revokedBy: string): Promise<number> {
    requireIdentifiers({ tenantId, userId });

    const count = await this.store.deleteAll(tenantId, userId, revokedBy);
    logger.info({ tenantId, userId, revokedBy, count }, 'Access credentials revoked for user');
    return count;
  }

  async revokeTenant(tenantId: string, revokedBy: string): Promise<number> {
    requireIdentifiers({ tenantId });

    const count = await this.store.deleteTenant(tenantId, revokedBy);
    logger.warn({ tenantId, revokedBy, count }, 'Access credentials revoked for tenant');
    return count;
  }
}
