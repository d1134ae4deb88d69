// =============================================================================
// CASE EVALUATION — In-Memory Record Store
//
// Single-process implementation of IEvaluationStore for local runs
// (STORE_DRIVER=memory) and the test suites.
//
// Each method does its check and its write without yielding to the
// event loop, which is what makes uniqueness and the open-session
// check atomic here. Do not add awaits inside these methods.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { alreadyExists, conflict, notFound } from '../errors';
import { AuditEvent, AuditFilter } from '../types/audit';
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
} from '../types/evaluation';
import { Role } from '../types/roles';
import { CaseFilter, IEvaluationStore, OpenSessionWrite } from '../types/store';

const pairKey = (caseId: string, navigatorId: string) => `${caseId}\u0000${navigatorId}`;
const ratingKey = (format: RatingFormat, sessionId: string, index: number) =>
  `${format}\u0000${sessionId}\u0000${index}`;

function cloneCase(c: SyntheticCase): SyntheticCase {
  return {
    ...c,
    format1StateLog: structuredClone(c.format1StateLog),
    format2Triples: structuredClone(c.format2Triples),
    format3RlScenario: structuredClone(c.format3RlScenario),
  };
}

export class MemoryEvaluationStore implements IEvaluationStore {
  readonly name = 'In-memory store';

  private profiles = new Map<string, Profile>();
  private cases = new Map<string, SyntheticCase>();
  private sessions = new Map<string, EvaluationSession>();
  /** (caseId, navigatorId) → sessionId; the uniqueness index */
  private sessionPairs = new Map<string, string>();
  private ratings = new Map<string, RatingRecord>();
  private auditTrail: AuditEvent[] = [];

  // ── Profiles ─────────────────────────────────────────────────────────

  async getProfile(id: string): Promise<Profile | null> {
    const profile = this.profiles.get(id);
    return profile ? { ...profile } : null;
  }

  async listProfiles(filter: { role?: Role } = {}): Promise<Profile[]> {
    return [...this.profiles.values()]
      .filter((p) => !filter.role || p.role === filter.role)
      .sort((a, b) => a.fullName.localeCompare(b.fullName) || a.id.localeCompare(b.id))
      .map((p) => ({ ...p }));
  }

  async insertProfile(profile: NewProfile): Promise<Profile> {
    if (this.profiles.has(profile.id)) {
      throw alreadyExists(`Profile ${profile.id} already exists`);
    }
    const created: Profile = { ...profile, createdAt: new Date() };
    this.profiles.set(created.id, created);
    return { ...created };
  }

  async updateProfile(id: string, patch: ProfilePatch): Promise<Profile | null> {
    const existing = this.profiles.get(id);
    if (!existing) return null;
    const updated: Profile = {
      ...existing,
      role: patch.role ?? existing.role,
      fullName: patch.fullName ?? existing.fullName,
      pin: patch.pin === undefined ? existing.pin : patch.pin,
    };
    this.profiles.set(id, updated);
    return { ...updated };
  }

  async deleteProfile(id: string): Promise<boolean> {
    if (!this.profiles.delete(id)) return false;
    for (const session of [...this.sessions.values()]) {
      if (session.navigatorId === id) this.removeSession(session);
    }
    return true;
  }

  // ── Synthetic Cases ──────────────────────────────────────────────────

  async getCase(id: string): Promise<SyntheticCase | null> {
    const found = this.cases.get(id);
    return found ? cloneCase(found) : null;
  }

  async listCases(filter: CaseFilter = {}): Promise<SyntheticCase[]> {
    return [...this.cases.values()]
      .filter((c) => filter.batchId === undefined || c.batchId === filter.batchId)
      .map(cloneCase);
  }

  async countCases(): Promise<number> {
    return this.cases.size;
  }

  async insertCases(cases: NewSyntheticCase[]): Promise<SyntheticCase[]> {
    const createdAt = new Date();
    const created = cases.map((c): SyntheticCase => cloneCase({ ...c, id: uuidv4(), createdAt }));
    for (const c of created) this.cases.set(c.id, c);
    return created.map(cloneCase);
  }

  async updateCase(id: string, patch: SyntheticCasePatch): Promise<SyntheticCase | null> {
    const existing = this.cases.get(id);
    if (!existing) return null;
    const updated = cloneCase({
      ...existing,
      batchId: patch.batchId === undefined ? existing.batchId : patch.batchId,
      label: patch.label === undefined ? existing.label : patch.label,
      narrativeSummary: patch.narrativeSummary === undefined ? existing.narrativeSummary : patch.narrativeSummary,
      format1StateLog: patch.format1StateLog === undefined ? existing.format1StateLog : patch.format1StateLog,
      format2Triples: patch.format2Triples === undefined ? existing.format2Triples : patch.format2Triples,
      format3RlScenario: patch.format3RlScenario === undefined ? existing.format3RlScenario : patch.format3RlScenario,
    });
    this.cases.set(id, updated);
    return cloneCase(updated);
  }

  async deleteCase(id: string): Promise<boolean> {
    if (!this.cases.delete(id)) return false;
    for (const session of [...this.sessions.values()]) {
      if (session.caseId === id) this.removeSession(session);
    }
    return true;
  }

  // ── Evaluation Sessions ──────────────────────────────────────────────

  async getSession(id: string): Promise<EvaluationSession | null> {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  async listSessions(filter: SessionFilter = {}): Promise<EvaluationSession[]> {
    return [...this.sessions.values()]
      .filter((s) => !filter.navigatorId || s.navigatorId === filter.navigatorId)
      .filter((s) => !filter.caseId || s.caseId === filter.caseId)
      .filter((s) => !filter.status || s.status === filter.status)
      .map((s) => ({ ...s }));
  }

  async insertSession(session: NewEvaluationSession): Promise<EvaluationSession> {
    if (!this.cases.has(session.caseId)) {
      throw notFound(`Case ${session.caseId} not found`);
    }
    if (!this.profiles.has(session.navigatorId)) {
      throw notFound(`Profile ${session.navigatorId} not found`);
    }

    const key = pairKey(session.caseId, session.navigatorId);
    if (this.sessionPairs.has(key)) {
      throw conflict('A session already exists for this case and navigator');
    }

    const created: EvaluationSession = {
      id: uuidv4(),
      ...session,
      status: 'in_progress',
      overallFieldAuthenticity: null,
      createdAt: new Date(),
      completedAt: null,
    };
    this.sessions.set(created.id, created);
    this.sessionPairs.set(key, created.id);
    return { ...created };
  }

  async setOverallScore(id: string, score: number): Promise<OpenSessionWrite<EvaluationSession>> {
    return this.writeOpenSession(id, (session) => {
      const updated: EvaluationSession = { ...session, overallFieldAuthenticity: score };
      this.sessions.set(id, updated);
      return { ...updated };
    });
  }

  async completeSession(
    id: string,
    completedAt: Date,
    overallFieldAuthenticity?: number
  ): Promise<OpenSessionWrite<EvaluationSession>> {
    return this.writeOpenSession(id, (session) => {
      const updated: EvaluationSession = {
        ...session,
        status: 'completed',
        completedAt,
        overallFieldAuthenticity: overallFieldAuthenticity ?? session.overallFieldAuthenticity,
      };
      this.sessions.set(id, updated);
      return { ...updated };
    });
  }

  async deleteSession(id: string): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.removeSession(session);
    return true;
  }

  // ── Ratings ──────────────────────────────────────────────────────────

  async upsertRating(
    sessionId: string,
    index: number,
    input: RatingInput
  ): Promise<OpenSessionWrite<RatingRecord>> {
    return this.writeOpenSession(sessionId, () => {
      const key = ratingKey(input.format, sessionId, index);
      const existing = this.ratings.get(key);
      const record: RatingRecord = {
        ...input,
        id: existing ? existing.id : uuidv4(),
        sessionId,
        index,
        updatedAt: new Date(),
      };
      this.ratings.set(key, record);
      return { ...record };
    });
  }

  async listRatings(sessionId: string, format: RatingFormat): Promise<RatingRecord[]> {
    return [...this.ratings.values()]
      .filter((r) => r.sessionId === sessionId && r.format === format)
      .sort((a, b) => a.index - b.index)
      .map((r) => ({ ...r }));
  }

  async deleteRating(
    sessionId: string,
    format: RatingFormat,
    index: number
  ): Promise<OpenSessionWrite<boolean>> {
    return this.writeOpenSession(sessionId, () => this.ratings.delete(ratingKey(format, sessionId, index)));
  }

  // ── Audit Trail ──────────────────────────────────────────────────────

  async appendAuditEvent(event: AuditEvent): Promise<void> {
    this.auditTrail.push({ ...event, metadata: { ...event.metadata } });
  }

  async queryAuditEvents(filter: AuditFilter): Promise<AuditEvent[]> {
    const limit = filter.limit ?? 50;
    const offset = filter.offset ?? 0;
    return this.auditTrail
      .filter((e) => !filter.eventType || e.eventType === filter.eventType)
      .filter((e) => !filter.actorId || e.actorId === filter.actorId)
      .filter((e) => !filter.targetType || e.targetType === filter.targetType)
      .filter((e) => !filter.targetId || e.targetId === filter.targetId)
      .reverse()
      .slice(offset, offset + limit)
      .map((e) => ({ ...e }));
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // Nothing to release.
  }

  // ── Internals ────────────────────────────────────────────────────────

  private writeOpenSession<T>(
    sessionId: string,
    write: (session: EvaluationSession) => T
  ): OpenSessionWrite<T> {
    const session = this.sessions.get(sessionId);
    if (!session) return { outcome: 'session_missing' };
    if (session.status !== 'in_progress') return { outcome: 'closed', session: { ...session } };
    return { outcome: 'ok', value: write(session) };
  }

  private removeSession(session: EvaluationSession): void {
    this.sessions.delete(session.id);
    this.sessionPairs.delete(pairKey(session.caseId, session.navigatorId));
    for (const [key, rating] of [...this.ratings.entries()]) {
      if (rating.sessionId === session.id) this.ratings.delete(key);
    }
  }
}
