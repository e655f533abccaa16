/**
 * Audit trail for the token lifecycle: who did what to which tenant, and
 * whether it worked. Sinks are fire-and-forget from the caller's point of
 * view; a failing sink never fails the operation being audited.
 */

import { getNow } from '../shared/clock';
import { createChildLogger, Logger } from '../shared/logger';

export const AUDIT_ACTIONS = [
  'auth.authenticate',
  'auth.verify',
  'auth.refresh',
  'auth.revoke',
  'auth.revoke_all_user',
  'auth.revoke_all_tenant',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export type AuditStatus = 'success' | 'failure';

export interface AuditEvent {
  timestamp: string;
  action: AuditAction;
  status: AuditStatus;
  // Null when the operation failed before a tenant was known
  tenantId: string | null;
  // Who acted; absent when the caller could not be identified
  actorId: string | null;
  resourceType: 'credential' | 'user' | 'tenant';
  resourceId: string | null;
  errorCode?: string;
  details?: Record<string, unknown>;
}

export interface AuditSink {
  record(event: AuditEvent): Promise<void>;
}

export type AuditEventInput = Omit<AuditEvent, 'timestamp'>;

export function createAuditEvent(input: AuditEventInput): AuditEvent {
  return { timestamp: getNow().toISOString(), ...input };
}

/**
 * Writes events to the structured log under an `audit` level marker.
 */
export class LoggerAuditSink implements AuditSink {
  private readonly logger: Logger;

  constructor(logger: Logger = createChildLogger({ module: 'audit' })) {
    this.logger = logger;
  }

  async record(event: AuditEvent): Promise<void> {
    this.logger.info({ audit: true, ...event }, `audit ${event.action} ${event.status}`);
  }
}

// Keeps events in order; used by tests and local tooling
export class InMemoryAuditSink implements AuditSink {
  private events: AuditEvent[] = [];

  async record(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }

  getEvents(filter: { action?: AuditAction; tenantId?: string } = {}): AuditEvent[] {
    return this.events.filter(
      e =>
        (filter.action === undefined || e.action === filter.action) &&
        (filter.tenantId === undefined || e.tenantId === filter.tenantId),
    );
  }

  reset(): void {
    this.events = [];
  }
}
