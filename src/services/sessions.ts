// =============================================================================
// CASE EVALUATION — Session Manager
//
// Lifecycle of an evaluation session:
//
//   startSession ──→ in_progress ──completeSession──→ completed (terminal)
//
// One session per (case, navigator), enforced atomically by the store.
// The overall score may change only while the session is open.
// =============================================================================

import { forbidden, invalidState, notFound } from '../errors';
import { IAccessPolicy, PolicyAction, PolicyDecision } from '../types/authorization';
import {
  BoundaryRating,
  EvaluationSession,
  RatingRecord,
  SessionFilter,
  TacticRating,
  TimelineRating,
} from '../types/evaluation';
import { IEvaluationStore, OpenSessionWrite } from '../types/store';
import { AuditTrail } from './audit';
import { overallScoreSchema, parseInput, startSessionSchema } from './validation';

export interface StartSessionInput {
  caseId: string;
  /** Defaults to the caller */
  navigatorId?: string;
}

export interface SessionDetail {
  session: EvaluationSession;
  format1: TimelineRating[];
  format2: TacticRating[];
  format3: BoundaryRating[];
}

const isTimeline = (r: RatingRecord): r is TimelineRating => r.format === 'format_1';
const isTactic = (r: RatingRecord): r is TacticRating => r.format === 'format_2';
const isBoundary = (r: RatingRecord): r is BoundaryRating => r.format === 'format_3';

/**
 * Unwrap an open-session write. A session that vanished between the
 * policy check and the write reads as NOT_FOUND.
 */
export function requireOpen<T>(result: OpenSessionWrite<T>, sessionId: string): T {
  switch (result.outcome) {
    case 'ok':
      return result.value;
    case 'session_missing':
      throw notFound(`Session ${sessionId} not found`);
    case 'closed':
      throw invalidState(`Session ${sessionId} is ${result.session.status}`);
  }
}

export class SessionManager {
  constructor(
    private readonly store: IEvaluationStore,
    private readonly policy: IAccessPolicy,
    private readonly audit: AuditTrail,
    private readonly now: () => Date
  ) {}

  /**
   * Open a session on a case. CONFLICT if the navigator already has one
   * for it, NOT_FOUND if the case or the navigator's profile is missing.
   */
  async startSession(callerId: string, input: StartSessionInput): Promise<EvaluationSession> {
    const parsed = parseInput(startSessionSchema, input, 'session');
    const navigatorId = parsed.navigatorId ?? callerId;

    const decision = await this.policy.enforce(callerId, 'insert', { type: 'evaluation_session', navigatorId });
    await this.policy.enforce(callerId, 'select', { type: 'synthetic_case', id: parsed.caseId });

    const [syntheticCase, navigator] = await Promise.all([
      this.store.getCase(parsed.caseId),
      this.store.getProfile(navigatorId),
    ]);
    if (!syntheticCase) {
      throw notFound(`Case ${parsed.caseId} not found`);
    }
    if (!navigator) {
      throw notFound(`Profile ${navigatorId} not found`);
    }

    const session = await this.store.insertSession({
      caseId: syntheticCase.id,
      caseLabel: syntheticCase.label,
      navigatorId,
      navigatorName: navigator.fullName,
    });
    console.log(`[Sessions] ${navigatorId} started session ${session.id} on ${syntheticCase.label ?? syntheticCase.id}`);

    await this.audit.record({
      eventType: 'session.started',
      description: `Session started on case "${syntheticCase.label ?? syntheticCase.id}"`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'evaluation_session',
      targetId: session.id,
      metadata: { caseId: session.caseId, navigatorId },
    });

    return session;
  }

  async getSession(callerId: string, id: string): Promise<EvaluationSession> {
    const { session } = await this.loadVisibleSession(callerId, id, 'select');
    return session;
  }

  /** The session with its ratings in all three formats, by index. */
  async getSessionDetail(callerId: string, id: string): Promise<SessionDetail> {
    const { session } = await this.loadVisibleSession(callerId, id, 'select');
    const [format1, format2, format3] = await Promise.all([
      this.store.listRatings(id, 'format_1'),
      this.store.listRatings(id, 'format_2'),
      this.store.listRatings(id, 'format_3'),
    ]);
    return {
      session,
      format1: format1.filter(isTimeline),
      format2: format2.filter(isTactic),
      format3: format3.filter(isBoundary),
    };
  }

  /**
   * Admins see every session matching the filter. Anyone else sees only
   * their own; asking for another navigator's sessions yields nothing.
   */
  async listSessions(callerId: string, filter: SessionFilter = {}): Promise<EvaluationSession[]> {
    if (await this.policy.isAdmin(callerId)) {
      return this.store.listSessions(filter);
    }
    if (filter.navigatorId !== undefined && filter.navigatorId !== callerId) {
      return [];
    }
    return this.store.listSessions({ ...filter, navigatorId: callerId });
  }

  async submitOverallScore(callerId: string, id: string, score: unknown): Promise<EvaluationSession> {
    await this.loadVisibleSession(callerId, id, 'update');
    const value = parseInput(overallScoreSchema, score, 'overall score');
    return requireOpen(await this.store.setOverallScore(id, value), id);
  }

  /**
   * in_progress → completed. The optional final score is written in the
   * same step. INVALID_STATE if the session is already completed.
   */
  async completeSession(
    callerId: string,
    id: string,
    input: { overallFieldAuthenticity?: unknown } = {}
  ): Promise<EvaluationSession> {
    const { session, decision } = await this.loadVisibleSession(callerId, id, 'update');
    const score = input.overallFieldAuthenticity === undefined
      ? undefined
      : parseInput(overallScoreSchema, input.overallFieldAuthenticity, 'overall score');

    const completed = requireOpen(await this.store.completeSession(id, this.now(), score), id);
    console.log(`[Sessions] Session ${id} completed`);

    await this.audit.record({
      eventType: 'session.completed',
      description: `Session on case "${session.caseLabel ?? session.caseId}" completed`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'evaluation_session',
      targetId: id,
      metadata: { overallFieldAuthenticity: completed.overallFieldAuthenticity },
    });

    return completed;
  }

  /** Cascades to the session's ratings. */
  async deleteSession(callerId: string, id: string): Promise<void> {
    const { session, decision } = await this.loadVisibleSession(callerId, id, 'delete');
    if (!(await this.store.deleteSession(id))) {
      throw notFound(`Session ${id} not found`);
    }

    await this.audit.record({
      eventType: 'session.deleted',
      description: `Session on case "${session.caseLabel ?? session.caseId}" deleted`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'evaluation_session',
      targetId: id,
      metadata: { caseId: session.caseId, navigatorId: session.navigatorId },
    });
  }

  /**
   * Fetch a session and enforce the action on it. A missing session is
   * NOT_FOUND for admins and FORBIDDEN for everyone else.
   */
  private async loadVisibleSession(
    callerId: string,
    id: string,
    action: PolicyAction
  ): Promise<{ session: EvaluationSession; decision: PolicyDecision }> {
    const session = await this.store.getSession(id);
    if (!session) {
      if (await this.policy.isAdmin(callerId)) {
        throw notFound(`Session ${id} not found`);
      }
      throw forbidden();
    }
    const decision = await this.policy.enforce(callerId, action, {
      type: 'evaluation_session',
      navigatorId: session.navigatorId,
    });
    return { session, decision };
  }
}
