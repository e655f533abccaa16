import Redis from 'ioredis';
import { nowMs } from '../shared/clock';
import { InternalError } from '../shared/errors';
import { createChildLogger, Logger } from '../shared/logger';
import { CredentialRecord } from '../shared/types';

export type MarkRevokedResult = 'revoked' | 'already-revoked' | 'not-found';

/**
 * Credential state keyed by (tenantId, credentialId), with a TTL aligned to
 * the credential's own expiry. Every write touches a single key, so a caller
 * abandoning a request can never leave half a record behind.
 */
export interface RevocationStore<T extends CredentialRecord> {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  put(record: T, ttlMs: number): Promise<void>;
  get(tenantId: string, credentialId: string): Promise<T | null>;
  markRevoked(tenantId: string, credentialId: string, revokedBy: string): Promise<MarkRevokedResult>;
  touch(tenantId: string, credentialId: string, lastUsedAt: number): Promise<boolean>;
  /** Revokes every live entry of one user; returns how many changed state. */
  deleteAll(tenantId: string, userId: string, revokedBy: string): Promise<number>;
  /** Same as deleteAll, for every user of the tenant. */
  deleteTenant(tenantId: string, revokedBy: string): Promise<number>;
}

interface MemoryEntry<T> {
  record: T;
  evictAt: number;
}

export class InMemoryRevocationStore<T extends CredentialRecord> implements RevocationStore<T> {
  // tenantId -> credentialId -> entry
  private tenants: Map<string, Map<string, MemoryEntry<T>>> = new Map();

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.tenants.clear();
  }

  async put(record: T, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) {
      throw new InternalError(`Refusing to store credential ${record.credentialId} with non-positive TTL`);
    }
    let entries = this.tenants.get(record.tenantId);
    if (!entries) {
      entries = new Map();
      this.tenants.set(record.tenantId, entries);
    }
    entries.set(record.credentialId, { record: { ...record }, evictAt: nowMs() + ttlMs });
  }

  async get(tenantId: string, credentialId: string): Promise<T | null> {
    const entry = this.live(tenantId, credentialId);
    return entry ? { ...entry.record } : null;
  }

  async markRevoked(tenantId: string, credentialId: string, revokedBy: string): Promise<MarkRevokedResult> {
    const entry = this.live(tenantId, credentialId);
    if (!entry) return 'not-found';
    if (entry.record.revoked) return 'already-revoked';

    entry.record = { ...entry.record, revoked: true, revokedBy, revokedAt: nowMs() };
    return 'revoked';
  }

  async touch(tenantId: string, credentialId: string, lastUsedAt: number): Promise<boolean> {
    const entry = this.live(tenantId, credentialId);
    if (!entry) return false;

    entry.record = { ...entry.record, lastUsedAt };
    return true;
  }

  async deleteAll(tenantId: string, userId: string, revokedBy: string): Promise<number> {
    return this.revokeMatching(tenantId, revokedBy, record => record.userId === userId);
  }

  async deleteTenant(tenantId: string, revokedBy: string): Promise<number> {
    return this.revokeMatching(tenantId, revokedBy, () => true);
  }

  private revokeMatching(tenantId: string, revokedBy: string, matches: (record: T) => boolean): number {
    const entries = this.tenants.get(tenantId);
    if (!entries) return 0;

    const now = nowMs();
    let count = 0;
    for (const [credentialId, entry] of entries) {
      if (entry.evictAt <= now) {
        entries.delete(credentialId);
        continue;
      }
      if (entry.record.revoked || !matches(entry.record)) continue;

      entry.record = { ...entry.record, revoked: true, revokedBy, revokedAt: now };
      count++;
    }
    return count;
  }

  // TTL is enforced lazily, against the same clock the services use
  private live(tenantId: string, credentialId: string): MemoryEntry<T> | null {
    const entries = this.tenants.get(tenantId);
    const entry = entries?.get(credentialId);
    if (!entries || !entry) return null;

    if (entry.evictAt <= nowMs()) {
      entries.delete(credentialId);
      return null;
    }
    return entry;
  }
}

// KEYS[1] record, KEYS[2] user index; ARGV[1] json, ARGV[2] ttl ms, ARGV[3] credentialId, ARGV[4] revoked flag
const PUT_SCRIPT = `
redis.call('DEL', KEYS[1])
redis.call('HSET', KEYS[1], 'data', ARGV[1], 'revoked', ARGV[4])
redis.call('PEXPIRE', KEYS[1], ARGV[2])
redis.call('SADD', KEYS[2], ARGV[3])
if redis.call('PTTL', KEYS[2]) < tonumber(ARGV[2]) then
  redis.call('PEXPIRE', KEYS[2], ARGV[2])
end
return 1
`;

// KEYS[1] record; ARGV[1] revokedBy, ARGV[2] revokedAt ms
// Returns 1 revoked, 0 already revoked, -1 missing
const MARK_REVOKED_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return -1 end
if redis.call('HGET', KEYS[1], 'revoked') == '1' then return 0 end
redis.call('HSET', KEYS[1], 'revoked', '1', 'revokedBy', ARGV[1], 'revokedAt', ARGV[2])
return 1
`;

// KEYS[1] record; ARGV[1] lastUsedAt ms
const TOUCH_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return 0 end
redis.call('HSET', KEYS[1], 'lastUsedAt', ARGV[1])
return 1
`;

export type RedisClientFactory = (redisUrl: string) => Redis;

function connectRedis(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => {
      if (times > 3) return null;
      return Math.min(times * 100, 1000);
    },
  });
}

/**
 * Key layout:
 *   {prefix}:{tenantId}:cred:{credentialId} -> HASH (PX = credential TTL)
 *     data: JSON record as issued; revoked: '0' | '1';
 *     revokedBy, revokedAt, lastUsedAt: written in place by later updates
 *   {prefix}:{tenantId}:user:{userId}       -> SET of credentialIds
 */
export class RedisRevocationStore<T extends CredentialRecord> implements RevocationStore<T> {
  private client: Redis | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly redisUrl: string,
    private readonly prefix: string,
    private readonly createClient: RedisClientFactory = connectRedis,
  ) {
    this.logger = createChildLogger({ module: 'revocation-store', prefix });
  }

  async connect(): Promise<void> {
    this.client = this.createClient(this.redisUrl);

    await this.client.ping();
    this.logger.info('Revocation store connected');
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  async put(record: T, ttlMs: number): Promise<void> {
    const client = this.requireClient();
    if (ttlMs <= 0) {
      throw new InternalError(`Refusing to store credential ${record.credentialId} with non-positive TTL`);
    }
    try {
      await client.eval(
        PUT_SCRIPT,
        2,
        this.recordKey(record.tenantId, record.credentialId),
        this.userKey(record.tenantId, record.userId),
        JSON.stringify(record),
        Math.ceil(ttlMs),
        record.credentialId,
        record.revoked ? '1' : '0',
      );
    } catch (error) {
      throw new InternalError('Failed to store credential', error);
    }
  }

  async get(tenantId: string, credentialId: string): Promise<T | null> {
    const client = this.requireClient();
    let hash: Record<string, string>;
    try {
      hash = await client.hgetall(this.recordKey(tenantId, credentialId));
    } catch (error) {
      throw new InternalError('Failed to read credential', error);
    }
    if (!hash.data) return null;

    const record = JSON.parse(hash.data) as T;
    record.revoked = hash.revoked === '1';
    if (hash.revokedBy !== undefined) record.revokedBy = hash.revokedBy;
    if (hash.revokedAt !== undefined) record.revokedAt = Number(hash.revokedAt);
    if (hash.lastUsedAt !== undefined) record.lastUsedAt = Number(hash.lastUsedAt);
    return record;
  }

  async markRevoked(tenantId: string, credentialId: string, revokedBy: string): Promise<MarkRevokedResult> {
    const result = await this.evalNumber(
      'Failed to revoke credential',
      MARK_REVOKED_SCRIPT,
      this.recordKey(tenantId, credentialId),
      revokedBy,
      nowMs(),
    );
    if (result === 1) return 'revoked';
    if (result === 0) return 'already-revoked';
    return 'not-found';
  }

  async touch(tenantId: string, credentialId: string, lastUsedAt: number): Promise<boolean> {
    const result = await this.evalNumber(
      'Failed to update credential',
      TOUCH_SCRIPT,
      this.recordKey(tenantId, credentialId),
      lastUsedAt,
    );
    return result === 1;
  }

  async deleteAll(tenantId: string, userId: string, revokedBy: string): Promise<number> {
    const client = this.requireClient();
    const indexKey = this.userKey(tenantId, userId);

    let credentialIds: string[];
    try {
      credentialIds = await client.smembers(indexKey);
    } catch (error) {
      throw new InternalError('Failed to read credential index', error);
    }

    let count = 0;
    const gone: string[] = [];
    for (const credentialId of credentialIds) {
      try {
        const result = await this.markRevoked(tenantId, credentialId, revokedBy);
        if (result === 'revoked') count++;
        if (result === 'not-found') gone.push(credentialId);
      } catch (error) {
        // Keep going: a retry picks up whatever is still live
        this.logger.warn({ err: error, tenantId, credentialId }, 'Failed to revoke credential during bulk revoke');
      }
    }

    if (gone.length > 0) {
      await client.srem(indexKey, ...gone).catch((error: unknown) => {
        this.logger.warn({ err: error, tenantId, userId }, 'Failed to prune credential index');
      });
    }

    this.logger.info({ tenantId, userId, count }, 'Bulk revoked user credentials');
    return count;
  }

  async deleteTenant(tenantId: string, revokedBy: string): Promise<number> {
    const client = this.requireClient();
    const userKeyPrefix = `${this.prefix}:${tenantId}:user:`;

    let total = 0;
    let scanned = 0;
    let failedUsers = 0;
    let cursor = '0';
    do {
      let keys: string[];
      try {
        [cursor, keys] = await client.scan(cursor, 'MATCH', `${userKeyPrefix}*`, 'COUNT', 100);
      } catch (error) {
        if (scanned === 0) throw new InternalError('Failed to scan tenant credentials', error);
        this.logger.warn({ err: error, tenantId, count: total }, 'Tenant scan interrupted, returning partial count');
        break;
      }
      for (const key of keys) {
        const userId = key.slice(userKeyPrefix.length);
        scanned++;
        try {
          total += await this.deleteAll(tenantId, userId, revokedBy);
        } catch (error) {
          // Keep going: a retry picks up whatever is still live
          failedUsers++;
          this.logger.warn({ err: error, tenantId, userId }, 'Failed to revoke user credentials during tenant revoke');
        }
      }
    } while (cursor !== '0');

    this.logger.info({ tenantId, count: total, failedUsers }, 'Bulk revoked tenant credentials');
    return total;
  }

  private async evalNumber(failure: string, script: string, key: string, ...args: (string | number)[]): Promise<number> {
    const client = this.requireClient();
    let result: unknown;
    try {
      result = await client.eval(script, 1, key, ...args);
    } catch (error) {
      throw new InternalError(failure, error);
    }
    const value = Number(result);
    if (result === null || Number.isNaN(value)) {
      throw new InternalError(`${failure}: unexpected script result`);
    }
    return value;
  }

  private recordKey(tenantId: string, credentialId: string): string {
    return `${this.prefix}:${tenantId}:cred:${credentialId}`;
  }

  private userKey(tenantId: string, userId: string): string {
    return `${this.prefix}:${tenantId}:user:${userId}`;
  }

  private requireClient(): Redis {
    if (!this.client) throw new InternalError('Redis not connected');
    return this.client;
  }
}

export interface RevocationStoreOptions {
  driver: 'memory' | 'redis';
  redisUrl: string;
  prefix: string;
  createClient?: RedisClientFactory;
}

// Create the appropriate store based on configuration
export function createRevocationStore<T extends CredentialRecord>(options: RevocationStoreOptions): RevocationStore<T> {
  if (options.driver === 'redis') {
    return new RedisRevocationStore<T>(options.redisUrl, options.prefix, options.createClient);
  }
  return new InMemoryRevocationStore<T>();
}
