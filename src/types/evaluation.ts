// =============================================================================
// CASE EVALUATION — Domain Types
//
// Profiles, synthetic cases, evaluation sessions and the three rating
// formats attached to a session.
// =============================================================================

import { Role } from './roles';

/** Arbitrary JSON tree. Case payloads are stored and returned verbatim. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ── Profiles ───────────────────────────────────────────────────────────

export interface Profile {
  /** Equals the external identity ID */
  id: string;
  role: Role;
  fullName: string;
  /** Exactly four decimal digits; secondary verification only */
  pin: string | null;
  createdAt: Date;
}

export interface NewProfile {
  id: string;
  role: Role;
  fullName: string;
  pin: string | null;
}

export interface ProfilePatch {
  role?: Role;
  fullName?: string;
  pin?: string | null;
}

// ── Synthetic Cases ────────────────────────────────────────────────────

export interface SyntheticCase {
  id: string;
  batchId: string | null;
  label: string | null;
  narrativeSummary: string | null;
  /** Timeline / state-log representation */
  format1StateLog: JsonValue | null;
  /** Tactic-triple representation */
  format2Triples: JsonValue | null;
  /** RL-scenario representation */
  format3RlScenario: JsonValue | null;
  createdAt: Date;
}

export type NewSyntheticCase = Omit<SyntheticCase, 'id' | 'createdAt'>;

export type SyntheticCasePatch = Partial<NewSyntheticCase>;

// ── Evaluation Sessions ────────────────────────────────────────────────

/**
 * Session lifecycle. 'completed' is terminal: nothing re-opens it.
 */
export type SessionStatus = 'in_progress' | 'completed';

export interface EvaluationSession {
  id: string;
  caseId: string;
  /** Case label captured when the session started */
  caseLabel: string | null;
  navigatorId: string;
  /** Navigator name captured when the session started */
  navigatorName: string | null;
  status: SessionStatus;
  /** 1–5, null until submitted */
  overallFieldAuthenticity: number | null;
  createdAt: Date;
  /** Non-null iff status = 'completed' */
  completedAt: Date | null;
}

export interface NewEvaluationSession {
  caseId: string;
  caseLabel: string | null;
  navigatorId: string;
  navigatorName: string | null;
}

export interface SessionFilter {
  navigatorId?: string;
  caseId?: string;
  status?: SessionStatus;
}

// ── Ratings ────────────────────────────────────────────────────────────

export type RatingFormat = 'format_1' | 'format_2' | 'format_3';

/** Format 1: one rating per timeline event, keyed by event index */
export interface TimelineRatingFields {
  clinicalImpact: string;
  environmentalImpact: string;
  homeServiceAdoptionImpact: string;
  eddDelta: string;
  bottleneckRealism: boolean;
}

/** Format 2: one rating per tactic triple, keyed by triple index */
export interface TacticRatingFields {
  intentFeasibilityScore: number;
}

/** Format 3: one rating per boundary option, keyed by option index */
export interface BoundaryRatingFields {
  pnCategory: string;
  aiIntendedCategory: string;
}

export type RatingInput =
  | ({ format: 'format_1' } & TimelineRatingFields)
  | ({ format: 'format_2' } & TacticRatingFields)
  | ({ format: 'format_3' } & BoundaryRatingFields);

interface RatingKey {
  id: string;
  sessionId: string;
  /** eventIndex, tripleIndex or optionIndex depending on format */
  index: number;
  updatedAt: Date;
}

export type RatingRecord = RatingInput & RatingKey;

export type TimelineRating = Extract<RatingRecord, { format: 'format_1' }>;
export type TacticRating = Extract<RatingRecord, { format: 'format_2' }>;
export type BoundaryRating = Extract<RatingRecord, { format: 'format_3' }>;
