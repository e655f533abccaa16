export type ErrorCategory =
  | 'invalid-argument'
  | 'unauthenticated'
  | 'permission-denied'
  | 'not-found'
  | 'internal';

/**
 * Base class for every error the core raises. Callers switch on `category`
 * (what went wrong, and whether a retry can help) and `code` (which case).
 */
export abstract class AuthCoreError extends Error {
  abstract readonly category: ErrorCategory;
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  /** Only store outages are worth retrying. */
  get retryable(): boolean {
    return this.category === 'internal';
  }
}

/**
 * Missing or malformed identifiers. Caller's fault, never retried.
 */
export class ValidationError extends AuthCoreError {
  readonly category = 'invalid-argument' as const;
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super('VALIDATION_FAILED', message);
    this.fields = fields;
  }
}

export const AUTH_ERROR_CODES = [
  'MALFORMED',
  'SIGNATURE_INVALID',
  'EXPIRED',
  'REVOKED',
  'UNKNOWN',
  'REUSE_DETECTED',
  'TENANT_MISMATCH',
  'INVALID_CREDENTIALS',
  'PERMISSION_DENIED',
] as const;

export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[number];

const AUTH_ERROR_MESSAGES: Record<AuthErrorCode, string> = {
  MALFORMED: 'Malformed credential',
  SIGNATURE_INVALID: 'Invalid credential signature',
  EXPIRED: 'Credential has expired',
  REVOKED: 'Credential has been revoked',
  UNKNOWN: 'Credential is not recognised',
  REUSE_DETECTED: 'Refresh credential reuse detected, all sessions terminated',
  TENANT_MISMATCH: 'Credential does not belong to this tenant',
  INVALID_CREDENTIALS: 'Invalid credentials',
  PERMISSION_DENIED: "You don't have permission to perform this action",
};

/**
 * Authentication and authorization failures. The caller must re-authenticate
 * (or is simply not allowed); retrying the same input cannot succeed.
 */
export class AuthError extends AuthCoreError {
  readonly category: 'unauthenticated' | 'permission-denied';
  declare readonly code: AuthErrorCode;

  constructor(code: AuthErrorCode, message: string = AUTH_ERROR_MESSAGES[code]) {
    super(code, message);
    this.category = code === 'PERMISSION_DENIED' ? 'permission-denied' : 'unauthenticated';
  }
}

export class NotFoundError extends AuthCoreError {
  readonly category = 'not-found' as const;
  readonly resource: string;

  constructor(resource: string, id: string) {
    super('NOT_FOUND', `${resource} not found: ${id}`);
    this.resource = resource;
  }
}

/**
 * Store or collaborator failure. Safe to retry with backoff one layer up.
 */
export class InternalError extends AuthCoreError {
  readonly category = 'internal' as const;

  constructor(message: string, cause?: unknown) {
    super('INTERNAL', message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function isAuthError(error: unknown, code?: AuthErrorCode): error is AuthError {
  return error instanceof AuthError && (code === undefined || error.code === code);
}

/**
 * Wraps anything that is not already one of ours. Typed errors pass through
 * untouched so their category survives the trip up the stack.
 */
export function toInternalError(message: string, error: unknown): AuthCoreError {
  if (error instanceof AuthCoreError) return error;
  return new InternalError(message, error);
}
