// =============================================================================
// CASE EVALUATION — Access Policy Interface
//
// Every data operation is checked against (caller, action, resource)
// before it runs. The engine is two-tier:
//
//   1. Admin override: admins may do anything to anything.
//   2. Per-row ownership predicate for the resource type.
//
// Anything not allowed by one of those is denied.
// =============================================================================

import { RatingFormat } from './evaluation';
import { Role } from './roles';

export type PolicyAction = 'select' | 'insert' | 'update' | 'delete';

/**
 * Resource an operation targets. Carries only what the ownership
 * predicate needs; ratings are resolved through their session.
 */
export type PolicyResource =
  | { type: 'profile'; id: string }
  | { type: 'synthetic_case'; id?: string }
  | { type: 'evaluation_session'; navigatorId: string }
  | { type: 'rating'; format: RatingFormat; sessionId: string }
  | { type: 'audit_event' };

/** Which rule produced the decision */
export type PolicyRule =
  | 'admin_override'
  | 'profile_self'
  | 'case_navigator_read'
  | 'session_owner'
  | 'rating_session_owner'
  | 'default_deny';

export type DenialReason =
  | 'no_profile'
  | 'not_owner'
  | 'role_not_permitted'
  | 'action_not_permitted'
  | 'session_missing';

/**
 * Result of a policy evaluation.
 */
export interface PolicyDecision {
  /** Whether the operation may proceed */
  allowed: boolean;

  /** Rule that allowed it, or 'default_deny' */
  rule: PolicyRule;

  /** Caller's role at decision time (null when no profile exists) */
  callerRole: Role | null;

  /** Machine-readable reason (if denied) */
  denialReason?: DenialReason;

  /** When the decision was made */
  decidedAt: Date;
}

/**
 * The access policy interface. Services call enforce() before every
 * read or write; evaluate() is exposed for tests and diagnostics.
 */
export interface IAccessPolicy {
  evaluate(callerId: string, action: PolicyAction, resource: PolicyResource): Promise<PolicyDecision>;

  /**
   * Evaluate and throw FORBIDDEN on denial. Returns the decision so
   * callers can branch on the caller's role without a second lookup.
   */
  enforce(callerId: string, action: PolicyAction, resource: PolicyResource): Promise<PolicyDecision>;

  /**
   * The admin override alone. Used where a missing record must read as
   * NOT_FOUND to admins and FORBIDDEN to everyone else.
   */
  isAdmin(callerId: string): Promise<boolean>;
}
