// =============================================================================
// CASE EVALUATION — Audit Trail Types
// =============================================================================

import { Role } from './roles';

export type AuditTargetType = 'profile' | 'synthetic_case' | 'evaluation_session';

export interface AuditEventInput {
  eventType: string;
  description: string;
  actorId: string;
  actorRole: Role | null;
  targetType: AuditTargetType;
  targetId: string;
  metadata?: Record<string, unknown>;
}

/** Append-only record. eventHash is SHA-512 over the event body. */
export interface AuditEvent {
  id: string;
  eventTime: Date;
  eventType: string;
  description: string;
  actorId: string;
  actorRole: Role | null;
  targetType: AuditTargetType;
  targetId: string;
  metadata: Record<string, unknown>;
  eventHash: string;
}

export interface AuditFilter {
  eventType?: string;
  actorId?: string;
  targetType?: AuditTargetType;
  targetId?: string;
  limit?: number;
  offset?: number;
}
