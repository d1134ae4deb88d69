// =============================================================================
// CASE EVALUATION — Audit Service
//
// Append-only audit trail of lifecycle changes: profiles provisioned or
// changed, cases imported or removed, sessions started, completed or
// deleted. Rating upserts are not audited; they are working data.
// =============================================================================

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { AuditEvent, AuditEventInput, AuditFilter } from '../types/audit';
import { IAccessPolicy } from '../types/authorization';
import { IEvaluationStore } from '../types/store';

export class AuditTrail {
  constructor(
    private readonly store: IEvaluationStore,
    private readonly policy: IAccessPolicy,
    private readonly now: () => Date
  ) {}

  /**
   * Record an audit event. The store rejects updates and deletes.
   * Returns the event ID and its SHA-512 hash.
   */
  async record(event: AuditEventInput): Promise<{ eventId: string; eventHash: string }> {
    const eventId = uuidv4();
    const eventTime = this.now();
    const metadata = event.metadata || {};

    const hashInput = JSON.stringify({
      id: eventId,
      timestamp: eventTime.toISOString(),
      eventType: event.eventType,
      description: event.description,
      actorId: event.actorId,
      targetType: event.targetType,
      targetId: event.targetId,
      metadata,
    });
    const eventHash = createHash('sha512').update(hashInput).digest('hex');

    const record: AuditEvent = {
      id: eventId,
      eventTime,
      eventType: event.eventType,
      description: event.description,
      actorId: event.actorId,
      actorRole: event.actorRole,
      targetType: event.targetType,
      targetId: event.targetId,
      metadata,
      eventHash,
    };
    await this.store.appendAuditEvent(record);

    return { eventId, eventHash };
  }

  /**
   * Query audit events, newest first. Admin only.
   */
  async query(callerId: string, filter: AuditFilter = {}): Promise<AuditEvent[]> {
    await this.policy.enforce(callerId, 'select', { type: 'audit_event' });
    return this.store.queryAuditEvents({
      ...filter,
      limit: Math.min(Math.max(filter.limit ?? 50, 1), 500),
      offset: Math.max(filter.offset ?? 0, 0),
    });
  }
}
