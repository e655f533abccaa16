import bcrypt from 'bcryptjs';
import { createChildLogger } from '../shared/logger';

const logger = createChildLogger({ module: 'identity' });

const BCRYPT_ROUNDS = 12;

/**
 * Answers one question: does this secret prove the user is who they claim?
 * Account state (suspension and the like) is a separate layer.
 */
export interface IdentityVerifier {
  verify(tenantId: string, userId: string, password: string): Promise<boolean>;
}

// Where password hashes live; null when the user has none
export interface PasswordHashLookup {
  getPasswordHash(tenantId: string, userId: string): Promise<string | null>;
}

export async function hashPassword(password: string, rounds: number = BCRYPT_ROUNDS): Promise<string> {
  return bcrypt.hash(password, rounds);
}

export class PasswordIdentityVerifier implements IdentityVerifier {
  constructor(private readonly lookup: PasswordHashLookup) {}

  async verify(tenantId: string, userId: string, password: string): Promise<boolean> {
    const hash = await this.lookup.getPasswordHash(tenantId, userId);
    if (!hash) {
      logger.debug({ tenantId, userId }, 'No password hash for user');
      return false;
    }
    return bcrypt.compare(password, hash);
  }
}

export class InMemoryPasswordHashLookup implements PasswordHashLookup {
  private hashes: Map<string, string> = new Map();

  async getPasswordHash(tenantId: string, userId: string): Promise<string | null> {
    return this.hashes.get(`${tenantId}/${userId}`) ?? null;
  }

  set(tenantId: string, userId: string, hash: string): void {
    this.hashes.set(`${tenantId}/${userId}`, hash);
  }

  reset(): void {
    this.hashes.clear();
  }
}
