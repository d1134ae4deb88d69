// =============================================================================
// CASE EVALUATION — Record Store Interface
//
// The shared store behind every service. Each cross-entity rule is a
// single atomic call here rather than a read followed by a write from
// the service:
//
//   insertProfile  : primary key on id          → ALREADY_EXISTS
//   insertSession  : unique (case, navigator)   → CONFLICT
//   *OpenSession / upsertRating / deleteRating
//                  : session status read and write in one step
//
// Deletes cascade: profile/case → sessions → ratings.
//
// Implementations:
//   PostgresEvaluationStore: pg pool, constraints and row locks
//   MemoryEvaluationStore  : single-process maps, for local runs and tests
// =============================================================================

import { AuditEvent, AuditFilter } from './audit';
import {
  EvaluationSession,
  NewEvaluationSession,
  NewProfile,
  NewSyntheticCase,
  Profile,
  ProfilePatch,
  RatingFormat,
  RatingInput,
  RatingRecord,
  SessionFilter,
  SyntheticCase,
  SyntheticCasePatch,
} from './evaluation';
import { Role } from './roles';

/**
 * Outcome of a write that requires the session to still be open.
 * 'closed' carries the session so callers can report its state.
 */
export type OpenSessionWrite<T> =
  | { outcome: 'ok'; value: T }
  | { outcome: 'session_missing' }
  | { outcome: 'closed'; session: EvaluationSession };

export interface CaseFilter {
  batchId?: string;
}

export interface IEvaluationStore {
  /** Human-readable name (for logging/health) */
  readonly name: string;

  // ── Profiles ─────────────────────────────────────────────────────────
  getProfile(id: string): Promise<Profile | null>;
  listProfiles(filter?: { role?: Role }): Promise<Profile[]>;
  /** Throws ALREADY_EXISTS if a profile with this id exists. */
  insertProfile(profile: NewProfile): Promise<Profile>;
  updateProfile(id: string, patch: ProfilePatch): Promise<Profile | null>;
  deleteProfile(id: string): Promise<boolean>;

  // ── Synthetic Cases ──────────────────────────────────────────────────
  getCase(id: string): Promise<SyntheticCase | null>;
  listCases(filter?: CaseFilter): Promise<SyntheticCase[]>;
  countCases(): Promise<number>;
  /** All-or-nothing. */
  insertCases(cases: NewSyntheticCase[]): Promise<SyntheticCase[]>;
  updateCase(id: string, patch: SyntheticCasePatch): Promise<SyntheticCase | null>;
  deleteCase(id: string): Promise<boolean>;

  // ── Evaluation Sessions ──────────────────────────────────────────────
  getSession(id: string): Promise<EvaluationSession | null>;
  listSessions(filter?: SessionFilter): Promise<EvaluationSession[]>;
  /**
   * Create an in_progress session. Throws CONFLICT if the
   * (caseId, navigatorId) pair already has one, NOT_FOUND if the case
   * or navigator profile is gone.
   */
  insertSession(session: NewEvaluationSession): Promise<EvaluationSession>;
  setOverallScore(id: string, score: number): Promise<OpenSessionWrite<EvaluationSession>>;
  /** in_progress → completed, stamping completedAt (and the score, if given). */
  completeSession(
    id: string,
    completedAt: Date,
    overallFieldAuthenticity?: number
  ): Promise<OpenSessionWrite<EvaluationSession>>;
  deleteSession(id: string): Promise<boolean>;

  // ── Ratings ──────────────────────────────────────────────────────────
  /** Insert or overwrite the rating at (sessionId, index) for input.format. */
  upsertRating(sessionId: string, index: number, input: RatingInput): Promise<OpenSessionWrite<RatingRecord>>;
  listRatings(sessionId: string, format: RatingFormat): Promise<RatingRecord[]>;
  /** value is false when there was no rating at that index */
  deleteRating(sessionId: string, format: RatingFormat, index: number): Promise<OpenSessionWrite<boolean>>;

  // ── Audit Trail ──────────────────────────────────────────────────────
  appendAuditEvent(event: AuditEvent): Promise<void>;
  queryAuditEvents(filter: AuditFilter): Promise<AuditEvent[]>;

  // ── Lifecycle ────────────────────────────────────────────────────────
  isAvailable(): Promise<boolean>;
  close(): Promise<void>;
}
