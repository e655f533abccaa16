export type StoreDriver = 'memory' | 'redis';

// Accepts "900", "90s", "15m", "12h", "7d"
export function parseDuration(value: string | undefined, fallbackSeconds: number): number {
  if (!value) return fallbackSeconds;

  const match = value.trim().match(/^(\d+)(s|m|h|d)?$/);
  if (!match) return fallbackSeconds;

  const amount = parseInt(match[1], 10);
  switch (match[2]) {
    case 'm': return amount * 60;
    case 'h': return amount * 3600;
    case 'd': return amount * 86400;
    default: return amount;
  }
}

function parseStoreDriver(value: string | undefined): StoreDriver {
  // Always use in-memory for tests to avoid Redis dependency
  if (process.env.NODE_ENV === 'test') return 'memory';
  return value === 'redis' ? 'redis' : 'memory';
}

const TEST_JWT_SECRET = 'test-secret-key-for-access-tokens';

// Only tests may run without a configured signing secret
export function resolveJwtSecret(env: NodeJS.ProcessEnv): string {
  if (env.JWT_SECRET) return env.JWT_SECRET;
  if (env.NODE_ENV === 'test') return TEST_JWT_SECRET;
  throw new Error('JWT_SECRET must be set outside tests');
}

const redisUrl = process.env.REDIS_URL || 'redis://localhost:6379';

export const config = Object.freeze({
  gateway: {
    port: parseInt(process.env.PORT || '3000', 10),
  },
  tokens: {
    jwtSecret: resolveJwtSecret(process.env),
    jwtIssuer: process.env.JWT_ISSUER || 'tenant-auth-core',
    accessTokenTtlSeconds: parseDuration(process.env.ACCESS_TOKEN_TTL, 15 * 60),
    refreshTokenTtlSeconds: parseDuration(process.env.REFRESH_TOKEN_TTL, 7 * 86400),
  },
  store: {
    driver: parseStoreDriver(process.env.STORE_DRIVER),
    redisUrl,
    // Refresh credentials may live on a separate, persistent instance
    refreshRedisUrl: process.env.REFRESH_REDIS_URL || redisUrl,
  },
  rbac: {
    systemTenantId: process.env.SYSTEM_TENANT_ID || 'system',
    tenantRevocationPermission: 'tokens:revoke_all',
    userRevocationPermission: 'tokens:revoke_user',
  },
  log: {
    level: process.env.LOG_LEVEL || 'info',
  },
  isTest: process.env.NODE_ENV === 'test',
});

export type AppConfig = typeof config;
