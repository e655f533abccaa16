import { advanceTestClock, setTestNow } from '../shared/clock';
import { AuthError, ValidationError } from '../shared/errors';
import { AccessCredentialMetadata } from '../shared/types';
import { InMemoryRevocationStore } from '../store/revocationStore';
import { AccessTokenService } from '../tokens/accessTokens';
import { CredentialCodec } from '../tokens/codec';
import { BASE_TIME, TEST_ISSUER, TEST_SECRET, createRawToken } from './helpers';

async function validationFailure(service: AccessTokenService, token: string, tenantId?: string): Promise<string> {
  try {
    await service.validate(token, tenantId);
  } catch (error) {
    if (error instanceof AuthError) return error.code;
    throw error;
  }
  throw new Error('Expected validation to fail');
}

describe('AccessTokenService', () => {
  let store: InMemoryRevocationStore<AccessCredentialMetadata>;
  let service: AccessTokenService;

  beforeEach(() => {
    setTestNow(BASE_TIME);
    store = new InMemoryRevocationStore();
    service = new AccessTokenService(new CredentialCodec({ secret: TEST_SECRET, issuer: TEST_ISSUER }), store, {
      ttlSeconds: 900,
    });
  });

  afterEach(() => {
    setTestNow(null);
  });

  it('issues a credential whose metadata is stored under its jti', async () => {
    const { token, metadata } = await service.issue('tenant-a', 'user-1');

    expect(metadata.issuedAt).toBe(BASE_TIME.getTime());
    expect(metadata.expiresAt).toBe(BASE_TIME.getTime() + 900_000);
    expect(await service.get('tenant-a', metadata.credentialId)).toEqual(metadata);

    const validated = await service.validate(token, 'tenant-a');
    expect(validated.credentialId).toBe(metadata.credentialId);
    expect(validated.userId).toBe('user-1');
  });

  it('rejects missing or unsafe identifiers', async () => {
    await expect(service.issue('', 'user-1')).rejects.toBeInstanceOf(ValidationError);
    await expect(service.issue('tenant:*', 'user-1')).rejects.toThrow('Missing or invalid: tenantId');
  });

  it('reports REVOKED for every validation after revoke', async () => {
    const { token, metadata } = await service.issue('tenant-a', 'user-1');

    await service.revoke('tenant-a', metadata.credentialId, 'admin');

    expect(await validationFailure(service, token)).toBe('REVOKED');
    expect(await validationFailure(service, token)).toBe('REVOKED');
    expect((await service.get('tenant-a', metadata.credentialId))?.revokedBy).toBe('admin');
  });

  it('treats revoking an unknown or already revoked credential as success', async () => {
    await expect(service.revoke('tenant-a', 'never-issued', 'admin')).resolves.toBeUndefined();

    const { metadata } = await service.issue('tenant-a', 'user-1');
    await service.revoke('tenant-a', metadata.credentialId, 'admin');
    await expect(service.revoke('tenant-a', metadata.credentialId, 'admin')).resolves.toBeUndefined();
  });

  it('reports EXPIRED, not REVOKED, once a short-lived credential lapses', async () => {
    const { token } = await service.issue('tenant-a', 'user-1', { ttlSeconds: 1 });

    advanceTestClock(2000);

    expect(await validationFailure(service, token)).toBe('EXPIRED');
  });

  it('reports UNKNOWN for a well-signed token the store never saw', async () => {
    const token = await createRawToken({ tenantId: 'tenant-a', sub: 'user-1' });
    expect(await validationFailure(service, token)).toBe('UNKNOWN');
  });

  it('reports UNKNOWN when the stored owner differs from the subject', async () => {
    const { metadata } = await service.issue('tenant-a', 'user-1');
    const token = await createRawToken({ tenantId: 'tenant-a', sub: 'user-2', jti: metadata.credentialId });

    expect(await validationFailure(service, token)).toBe('UNKNOWN');
  });

  it('reports TENANT_MISMATCH when the caller expects another tenant', async () => {
    const { token } = await service.issue('tenant-a', 'user-1');
    expect(await validationFailure(service, token, 'tenant-b')).toBe('TENANT_MISMATCH');
  });

  describe('revokeToken', () => {
    it('revokes by token string', async () => {
      const { token } = await service.issue('tenant-a', 'user-1');

      await service.revokeToken('tenant-a', 'user-1', token, 'user-1');

      expect(await validationFailure(service, token)).toBe('REVOKED');
    });

    it('ignores tokens that are already unusable', async () => {
      await expect(service.revokeToken('tenant-a', 'user-1', 'not-a-token', 'user-1')).resolves.toBeUndefined();
    });

    it("refuses to revoke another user's token", async () => {
      const { token } = await service.issue('tenant-a', 'user-2');

      await expect(service.revokeToken('tenant-a', 'user-1', token, 'user-1')).rejects.toThrow(
        'Access token does not belong to this user',
      );
      await expect(service.validate(token)).resolves.toMatchObject({ userId: 'user-2', revoked: false });
    });
  });

  it('revokeAll and revokeTenant count what they revoke', async () => {
    await service.issue('tenant-a', 'user-1');
    await service.issue('tenant-a', 'user-1');
    await service.issue('tenant-a', 'user-2');

    expect(await service.revokeAll('tenant-a', 'user-1', 'admin')).toBe(2);
    expect(await service.revokeTenant('tenant-a', 'admin')).toBe(1);
    expect(await service.revokeTenant('tenant-a', 'admin')).toBe(0);
  });
});
