import crypto from 'crypto';
import { nowMs } from '../shared/clock';
import { AuthError, toInternalError, ValidationError } from '../shared/errors';
import { createChildLogger } from '../shared/logger';
import { RefreshCredentialMetadata } from '../shared/types';
import { requireIdentifiers, requireNonEmpty } from '../shared/validation';
import { RevocationStore } from '../store/revocationStore';

const logger = createChildLogger({ module: 'refresh-tokens' });

// revokedBy marker for credentials retired by rotation
export const ROTATION_ACTOR = 'rotation';

const TOKEN_BYTES = 32;

// Records outlive their expiry by this much, so a late presentation reads as
// EXPIRED instead of UNKNOWN
export const EXPIRED_RETENTION_MS = 24 * 60 * 60 * 1000;

export interface IssuedRefreshCredential {
  token: string;
  metadata: RefreshCredentialMetadata;
}

export interface RefreshIssueOptions {
  accessCredentialId?: string;
  rotatedFrom?: string;
}

export interface RefreshTokenServiceOptions {
  ttlSeconds: number;
}

// Raw refresh tokens are never stored; records are keyed by their digest
export function hashRefreshToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

export class RefreshTokenService {
  constructor(
    private readonly store: RevocationStore<RefreshCredentialMetadata>,
    private readonly options: RefreshTokenServiceOptions,
  ) {}

  async issue(tenantId: string, userId: string, opts: RefreshIssueOptions = {}): Promise<IssuedRefreshCredential> {
    requireIdentifiers({ tenantId, userId });

    const token = crypto.randomBytes(TOKEN_BYTES).toString('base64url');
    const issuedAt = nowMs();
    const ttlMs = this.options.ttlSeconds * 1000;

    const metadata: RefreshCredentialMetadata = {
      kind: 'refresh',
      tenantId,
      userId,
      credentialId: hashRefreshToken(token),
      issuedAt,
      expiresAt: issuedAt + ttlMs,
      revoked: false,
    };
    if (opts.accessCredentialId) metadata.accessCredentialId = opts.accessCredentialId;
    if (opts.rotatedFrom) metadata.rotatedFrom = opts.rotatedFrom;

    await this.store.put(metadata, ttlMs + EXPIRED_RETENTION_MS);

    logger.debug({ tenantId, userId, credentialId: metadata.credentialId }, 'Refresh credential issued');
    return { token, metadata };
  }

  async get(tenantId: string, token: string): Promise<RefreshCredentialMetadata | null> {
    requireIdentifiers({ tenantId });
    requireNonEmpty({ refreshToken: token });
    return this.store.get(tenantId, hashRefreshToken(token));
  }

  async validate(tenantId: string, userId: string, token: string): Promise<RefreshCredentialMetadata> {
    requireIdentifiers({ tenantId, userId });
    requireNonEmpty({ refreshToken: token });

    const metadata = await this.store.get(tenantId, hashRefreshToken(token));
    if (!metadata || metadata.userId !== userId) {
      throw new AuthError('UNKNOWN');
    }

    if (metadata.revoked) {
      if (metadata.revokedBy === ROTATION_ACTOR) {
        await this.handleReuse(metadata);
        throw new AuthError('REUSE_DETECTED');
      }
      throw new AuthError('REVOKED');
    }

    if (metadata.expiresAt <= nowMs()) {
      throw new AuthError('EXPIRED');
    }

    return metadata;
  }

  /**
   * Retires oldToken and issues its successor. Only the caller that actually
   * flips the old record to revoked may issue, so two concurrent rotations of
   * the same token cannot both succeed. If issuing fails after the old token
   * is gone, the user stays logged out.
   */
  async rotate(
    tenantId: string,
    userId: string,
    oldToken: string,
    opts: { accessCredentialId?: string } = {},
  ): Promise<IssuedRefreshCredential> {
    const previous = await this.validate(tenantId, userId, oldToken);

    await this.updateLastUsed(tenantId, userId, oldToken);

    const outcome = await this.store.markRevoked(tenantId, previous.credentialId, ROTATION_ACTOR);
    if (outcome !== 'revoked') {
      logger.warn({ tenantId, userId, credentialId: previous.credentialId, outcome }, 'Lost refresh rotation race');
      throw new AuthError('REVOKED');
    }

    try {
      const next = await this.issue(tenantId, userId, {
        accessCredentialId: opts.accessCredentialId,
        rotatedFrom: previous.credentialId,
      });
      logger.debug(
        { tenantId, userId, from: previous.credentialId, to: next.metadata.credentialId },
        'Refresh credential rotated',
      );
      return next;
    } catch (error) {
      logger.error({ err: error, tenantId, userId }, 'Refresh rotation failed after revoking previous credential');
      throw toInternalError('Failed to issue rotated refresh credential', error);
    }
  }

  // Bookkeeping only; a failure here must never fail the refresh
  async updateLastUsed(tenantId: string, userId: string, token: string): Promise<void> {
    try {
      const touched = await this.store.touch(tenantId, hashRefreshToken(token), nowMs());
      if (!touched) {
        logger.debug({ tenantId, userId }, 'No refresh credential to touch');
      }
    } catch (error) {
      logger.warn({ err: error, tenantId, userId }, 'Failed to update refresh credential last used');
    }
  }

  // Idempotent: unknown and already-revoked tokens are success
  async revoke(tenantId: string, userId: string, token: string, revokedBy: string): Promise<void> {
    requireIdentifiers({ tenantId, userId });
    requireNonEmpty({ refreshToken: token });

    const credentialId = hashRefreshToken(token);
    const metadata = await this.store.get(tenantId, credentialId);
    if (!metadata) {
      logger.debug({ tenantId, userId }, 'No refresh credential to revoke');
      return;
    }
    if (metadata.userId !== userId) {
      throw new ValidationError('Refresh token does not belong to this user', ['refreshToken']);
    }

    const result = await this.store.markRevoked(tenantId, credentialId, revokedBy);
    logger.debug({ tenantId, userId, credentialId, revokedBy, result }, 'Refresh credential revoke');
  }

  async revokeAll(tenantId: string, userId: string, revokedBy: string): Promise<number> {
    requireIdentifiers({ tenantId, userId });

    const count = await this.store.deleteAll(tenantId, userId, revokedBy);
    logger.info({ tenantId, userId, revokedBy, count }, 'Refresh credentials revoked for user');
    return count;
  }

  async revokeTenant(tenantId: string, revokedBy: string): Promise<number> {
    requireIdentifiers({ tenantId });

    const count = await this.store.deleteTenant(tenantId, revokedBy);
    logger.warn({ tenantId, revokedBy, count }, 'Refresh credentials revoked for tenant');
    return count;
  }

  // A rotated-away token came back: assume the chain leaked
  private async handleReuse(metadata: RefreshCredentialMetadata): Promise<void> {
    const { tenantId, userId, credentialId } = metadata;
    logger.warn({ tenantId, userId, credentialId }, 'Refresh credential reuse detected, revoking all sessions');
    await this.store.deleteAll(tenantId, userId, 'reuse-detection');
  }
}
