// =============================================================================
// CASE EVALUATION — Test Suite 09: Record Stores
//
// One contract, run against the in-memory store and against the
// PostgreSQL store over pg-mem: uniqueness, upserts, open-session
// gating, cascades and the audit trail.
// =============================================================================

import { MemoryEvaluationStore } from '../src/db/memory-store';
import { Services } from '../src/services';
import { AuditEvent } from '../src/types/audit';
import { EvaluationSession, SyntheticCase } from '../src/types/evaluation';
import { IEvaluationStore, OpenSessionWrite } from '../src/types/store';
import { createPostgresTestStore } from './db-helper';
import {
  ADMIN,
  buildServices,
  FIXED_NOW,
  NAV1,
  NAV2,
  sampleCase,
  seedWorld,
  TIMELINE_FIELDS,
} from './helpers';

const STORES: Array<[string, () => Promise<IEvaluationStore>]> = [
  ['in-memory', async () => new MemoryEvaluationStore()],
  ['PostgreSQL', createPostgresTestStore],
];

function written<T>(result: OpenSessionWrite<T>): T {
  if (result.outcome !== 'ok') {
    throw new Error(`Expected the write to land, got ${result.outcome}`);
  }
  return result.value;
}

function auditEvent(n: number, eventType: string): AuditEvent {
  return {
    id: `evt-${n}`,
    eventTime: new Date(Date.UTC(2026, 2, 2, 10, n)),
    eventType,
    description: `event ${n}`,
    actorId: ADMIN,
    actorRole: 'admin',
    targetType: 'synthetic_case',
    targetId: `case-${n}`,
    metadata: { n },
    eventHash: `hash-${n}`,
  };
}

describe.each(STORES)('%s store', (_label, openStore) => {
  let store: IEvaluationStore;
  let cases: SyntheticCase[];

  beforeEach(async () => {
    store = await openStore();
    cases = await seedWorld(buildServices({ store }), 2);
  });

  function openSession(caseRecord: SyntheticCase, navigatorId = NAV1): Promise<EvaluationSession> {
    return store.insertSession({
      caseId: caseRecord.id,
      caseLabel: caseRecord.label,
      navigatorId,
      navigatorName: null,
    });
  }

  test('is available', async () => {
    await expect(store.isAvailable()).resolves.toBe(true);
  });

  // ── Profiles ──────────────────────────────────────────────────────────

  describe('profiles', () => {
    test('reads back what was inserted', async () => {
      const profile = await store.getProfile(NAV1);
      expect(profile).toMatchObject({ id: NAV1, role: 'navigator', fullName: 'Nora Navigator', pin: '1234' });
      await expect(store.getProfile('ghost')).resolves.toBeNull();
    });

    test('a second profile with the same id is ALREADY_EXISTS', async () => {
      await expect(
        store.insertProfile({ id: NAV1, role: 'admin', fullName: 'Someone Else', pin: null })
      ).rejects.toMatchObject({ code: 'ALREADY_EXISTS' });
      await expect(store.getProfile(NAV1)).resolves.toMatchObject({ role: 'navigator' });
    });

    test('role filter, ordered by full name', async () => {
      const navigators = await store.listProfiles({ role: 'navigator' });
      expect(navigators.map((p) => p.id)).toEqual([NAV2, NAV1]);
      await expect(store.listProfiles()).resolves.toHaveLength(3);
    });

    test('the PIN is kept, replaced or cleared only when the patch names it', async () => {
      const renamed = await store.updateProfile(NAV1, { fullName: 'Nora N.' });
      expect(renamed).toMatchObject({ fullName: 'Nora N.', pin: '1234', role: 'navigator' });

      const repinned = await store.updateProfile(NAV1, { pin: '4321' });
      expect(repinned?.pin).toBe('4321');

      const cleared = await store.updateProfile(NAV1, { pin: null });
      expect(cleared).toMatchObject({ fullName: 'Nora N.', pin: null });

      const promoted = await store.updateProfile(NAV1, { role: 'admin' });
      expect(promoted?.role).toBe('admin');
    });

    test('updating or deleting a missing profile reports it', async () => {
      await expect(store.updateProfile('ghost', { fullName: 'Ghost' })).resolves.toBeNull();
      await expect(store.deleteProfile(NAV2)).resolves.toBe(true);
      await expect(store.deleteProfile(NAV2)).resolves.toBe(false);
    });
  });

  // ── Synthetic Cases ───────────────────────────────────────────────────

  describe('cases', () => {
    test('payloads round-trip unchanged', async () => {
      const found = await store.getCase(cases[0].id);
      const expected = sampleCase('Case_1');
      expect(found).toMatchObject({
        id: cases[0].id,
        batchId: 'batch-test',
        label: 'Case_1',
        narrativeSummary: expected.narrativeSummary,
        format1StateLog: expected.format1StateLog,
        format2Triples: expected.format2Triples,
        format3RlScenario: expected.format3RlScenario,
      });
    });

    test('count and batch filter', async () => {
      await store.insertCases([sampleCase('Case_3', 'batch-other')]);
      await expect(store.countCases()).resolves.toBe(3);

      const other = await store.listCases({ batchId: 'batch-other' });
      expect(other.map((c) => c.label)).toEqual(['Case_3']);
      await expect(store.listCases()).resolves.toHaveLength(3);
    });

    test('a patch changes only the fields it names', async () => {
      const updated = await store.updateCase(cases[0].id, { label: 'Renamed', format2Triples: [{ step: 1 }] });
      expect(updated).toMatchObject({
        label: 'Renamed',
        format2Triples: [{ step: 1 }],
        narrativeSummary: 'Narrative for Case_1',
        format3RlScenario: { options: ['escalate', 'wait'] },
      });

      const unchanged = await store.updateCase(cases[0].id, {});
      expect(unchanged?.label).toBe('Renamed');

      await expect(store.updateCase('ghost', { label: 'x' })).resolves.toBeNull();
    });

    test('payload columns may be cleared to null', async () => {
      const updated = await store.updateCase(cases[1].id, { format1StateLog: null });
      expect(updated?.format1StateLog).toBeNull();
    });
  });

  // ── Evaluation Sessions ───────────────────────────────────────────────

  describe('sessions', () => {
    test('a new session starts in_progress with no score', async () => {
      const session = await openSession(cases[0]);
      expect(session).toMatchObject({
        caseId: cases[0].id,
        caseLabel: 'Case_1',
        navigatorId: NAV1,
        status: 'in_progress',
        overallFieldAuthenticity: null,
        completedAt: null,
      });
      await expect(store.getSession(session.id)).resolves.toMatchObject({ id: session.id });
    });

    test('a second session for the same case and navigator is CONFLICT', async () => {
      await openSession(cases[0]);
      await expect(openSession(cases[0])).rejects.toMatchObject({ code: 'CONFLICT' });
      await expect(openSession(cases[0], NAV2)).resolves.toMatchObject({ navigatorId: NAV2 });
    });

    test('a session on a missing case or navigator is NOT_FOUND', async () => {
      await expect(
        store.insertSession({ caseId: 'ghost', caseLabel: null, navigatorId: NAV1, navigatorName: null })
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });
      await expect(openSession(cases[0], 'ghost')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    test('completion is a one-way step that keeps an earlier score', async () => {
      const session = await openSession(cases[0]);

      const scored = written(await store.setOverallScore(session.id, 4));
      expect(scored.overallFieldAuthenticity).toBe(4);

      const completed = written(await store.completeSession(session.id, FIXED_NOW));
      expect(completed.status).toBe('completed');
      expect(completed.overallFieldAuthenticity).toBe(4);
      expect(completed.completedAt).not.toBeNull();

      const again = await store.completeSession(session.id, FIXED_NOW, 1);
      expect(again).toMatchObject({ outcome: 'closed', session: { status: 'completed', overallFieldAuthenticity: 4 } });

      await expect(store.setOverallScore(session.id, 2)).resolves.toMatchObject({ outcome: 'closed' });
    });

    test('completion may carry the final score', async () => {
      const session = await openSession(cases[0]);
      const completed = written(await store.completeSession(session.id, FIXED_NOW, 2));
      expect(completed.overallFieldAuthenticity).toBe(2);
    });

    test('writes to a missing session report session_missing', async () => {
      await expect(store.setOverallScore('ghost', 3)).resolves.toEqual({ outcome: 'session_missing' });
      await expect(store.completeSession('ghost', FIXED_NOW)).resolves.toEqual({ outcome: 'session_missing' });
    });

    test('filters combine', async () => {
      const done = await openSession(cases[0]);
      await openSession(cases[1]);
      await openSession(cases[0], NAV2);
      written(await store.completeSession(done.id, FIXED_NOW));

      const mine = await store.listSessions({ navigatorId: NAV1 });
      expect(mine).toHaveLength(2);

      const completed = await store.listSessions({ navigatorId: NAV1, status: 'completed' });
      expect(completed.map((s) => s.id)).toEqual([done.id]);

      const onCase = await store.listSessions({ caseId: cases[0].id });
      expect(onCase.map((s) => s.navigatorId).sort()).toEqual([NAV1, NAV2]);
    });
  });

  // ── Ratings ───────────────────────────────────────────────────────────

  describe('ratings', () => {
    let session: EvaluationSession;

    beforeEach(async () => {
      session = await openSession(cases[0]);
    });

    test('each format maps its own columns', async () => {
      const timeline = written(await store.upsertRating(session.id, 0, { format: 'format_1', ...TIMELINE_FIELDS }));
      expect(timeline).toMatchObject({ format: 'format_1', sessionId: session.id, index: 0, ...TIMELINE_FIELDS });

      const tactic = written(await store.upsertRating(session.id, 2, { format: 'format_2', intentFeasibilityScore: 5 }));
      expect(tactic).toMatchObject({ format: 'format_2', sessionId: session.id, index: 2, intentFeasibilityScore: 5 });

      const boundary = written(await store.upsertRating(session.id, 1, {
        format: 'format_3',
        pnCategory: 'escalate',
        aiIntendedCategory: 'wait',
      }));
      expect(boundary).toMatchObject({
        format: 'format_3',
        sessionId: session.id,
        index: 1,
        pnCategory: 'escalate',
        aiIntendedCategory: 'wait',
      });
    });

    test('a second write to the same index overwrites in place', async () => {
      const first = written(await store.upsertRating(session.id, 3, { format: 'format_2', intentFeasibilityScore: 2 }));
      const second = written(await store.upsertRating(session.id, 3, { format: 'format_2', intentFeasibilityScore: 4 }));

      expect(second.id).toBe(first.id);
      const ratings = await store.listRatings(session.id, 'format_2');
      expect(ratings).toHaveLength(1);
      expect(ratings[0]).toMatchObject({ index: 3, intentFeasibilityScore: 4 });
    });

    test('listing is per format and ordered by index', async () => {
      for (const index of [2, 0, 1]) {
        written(await store.upsertRating(session.id, index, { format: 'format_2', intentFeasibilityScore: 3 }));
      }
      written(await store.upsertRating(session.id, 0, { format: 'format_1', ...TIMELINE_FIELDS }));

      const tactics = await store.listRatings(session.id, 'format_2');
      expect(tactics.map((r) => r.index)).toEqual([0, 1, 2]);
      await expect(store.listRatings(session.id, 'format_1')).resolves.toHaveLength(1);
      await expect(store.listRatings(session.id, 'format_3')).resolves.toEqual([]);
    });

    test('a completed session takes no writes and no deletes', async () => {
      written(await store.upsertRating(session.id, 0, { format: 'format_2', intentFeasibilityScore: 3 }));
      written(await store.completeSession(session.id, FIXED_NOW));

      const late = await store.upsertRating(session.id, 0, { format: 'format_2', intentFeasibilityScore: 1 });
      expect(late).toMatchObject({ outcome: 'closed', session: { id: session.id, status: 'completed' } });

      const removal = await store.deleteRating(session.id, 'format_2', 0);
      expect(removal.outcome).toBe('closed');

      const ratings = await store.listRatings(session.id, 'format_2');
      expect(ratings).toHaveLength(1);
      expect(ratings[0]).toMatchObject({ intentFeasibilityScore: 3 });
    });

    test('rating writes on a missing session report session_missing', async () => {
      await expect(
        store.upsertRating('ghost', 0, { format: 'format_2', intentFeasibilityScore: 3 })
      ).resolves.toEqual({ outcome: 'session_missing' });
      await expect(store.deleteRating('ghost', 'format_2', 0)).resolves.toEqual({ outcome: 'session_missing' });
    });

    test('deleteRating reports whether a rating was removed', async () => {
      written(await store.upsertRating(session.id, 0, { format: 'format_3', pnCategory: 'a', aiIntendedCategory: 'b' }));
      await expect(store.deleteRating(session.id, 'format_3', 0)).resolves.toEqual({ outcome: 'ok', value: true });
      await expect(store.deleteRating(session.id, 'format_3', 0)).resolves.toEqual({ outcome: 'ok', value: false });
    });
  });

  // ── Cascades ──────────────────────────────────────────────────────────

  describe('cascading deletes', () => {
    let session: EvaluationSession;

    beforeEach(async () => {
      session = await openSession(cases[0]);
      written(await store.upsertRating(session.id, 0, { format: 'format_1', ...TIMELINE_FIELDS }));
      written(await store.upsertRating(session.id, 0, { format: 'format_2', intentFeasibilityScore: 3 }));
    });

    test('session → ratings', async () => {
      await expect(store.deleteSession(session.id)).resolves.toBe(true);
      await expect(store.deleteSession(session.id)).resolves.toBe(false);
      await expect(store.listRatings(session.id, 'format_1')).resolves.toEqual([]);
      await expect(store.listRatings(session.id, 'format_2')).resolves.toEqual([]);
    });

    test('case → sessions → ratings', async () => {
      await expect(store.deleteCase(cases[0].id)).resolves.toBe(true);
      await expect(store.getSession(session.id)).resolves.toBeNull();
      await expect(store.listRatings(session.id, 'format_2')).resolves.toEqual([]);
      await expect(store.deleteCase(cases[0].id)).resolves.toBe(false);
    });

    test('profile → sessions → ratings; the pair may be reopened afterwards', async () => {
      await expect(store.deleteProfile(NAV1)).resolves.toBe(true);
      await expect(store.getSession(session.id)).resolves.toBeNull();
      await expect(store.listRatings(session.id, 'format_1')).resolves.toEqual([]);

      await store.insertProfile({ id: NAV1, role: 'navigator', fullName: 'Nora Navigator', pin: null });
      await expect(openSession(cases[0])).resolves.toMatchObject({ status: 'in_progress' });
    });
  });

  // ── Audit Trail ───────────────────────────────────────────────────────

  describe('audit trail', () => {
    beforeEach(async () => {
      await store.appendAuditEvent(auditEvent(1, 'case.created'));
      await store.appendAuditEvent(auditEvent(2, 'case.deleted'));
      await store.appendAuditEvent(auditEvent(3, 'case.created'));
    });

    test('newest first, fields intact', async () => {
      const events = await store.queryAuditEvents({});
      expect(events.map((e) => e.id)).toEqual(['evt-3', 'evt-2', 'evt-1']);
      expect(events[1]).toMatchObject({
        eventType: 'case.deleted',
        description: 'event 2',
        actorId: ADMIN,
        actorRole: 'admin',
        targetType: 'synthetic_case',
        targetId: 'case-2',
        metadata: { n: 2 },
        eventHash: 'hash-2',
      });
    });

    test('filters and paging', async () => {
      const created = await store.queryAuditEvents({ eventType: 'case.created' });
      expect(created.map((e) => e.id)).toEqual(['evt-3', 'evt-1']);

      const byTarget = await store.queryAuditEvents({ targetId: 'case-2' });
      expect(byTarget.map((e) => e.id)).toEqual(['evt-2']);

      const page = await store.queryAuditEvents({ limit: 1, offset: 1 });
      expect(page.map((e) => e.id)).toEqual(['evt-2']);
    });
  });

  // ── Through the Services ──────────────────────────────────────────────

  describe('through the services', () => {
    let services: Services;

    beforeEach(() => {
      services = buildServices({ store });
    });

    test('session lifecycle with ratings, completion gating and audit', async () => {
      const session = await services.sessions.startSession(NAV1, { caseId: cases[0].id });
      await expect(services.sessions.startSession(NAV1, { caseId: cases[0].id })).rejects.toMatchObject({
        code: 'CONFLICT',
      });

      await services.ratings.upsertTimelineRating(NAV1, session.id, 0, TIMELINE_FIELDS);
      await services.ratings.upsertTacticRating(NAV1, session.id, 1, { intentFeasibilityScore: 5 });

      const completed = await services.sessions.completeSession(NAV1, session.id, { overallFieldAuthenticity: 4 });
      expect(completed).toMatchObject({ status: 'completed', overallFieldAuthenticity: 4 });

      await expect(
        services.ratings.upsertTacticRating(NAV1, session.id, 1, { intentFeasibilityScore: 1 })
      ).rejects.toMatchObject({ code: 'INVALID_STATE' });

      const detail = await services.sessions.getSessionDetail(NAV1, session.id);
      expect(detail.format1).toHaveLength(1);
      expect(detail.format2).toHaveLength(1);
      expect(detail.format2[0]).toMatchObject({ index: 1, intentFeasibilityScore: 5 });

      const events = await services.audit.query(ADMIN, { targetId: session.id });
      expect(events.map((e) => e.eventType).sort()).toEqual(['session.completed', 'session.started']);
    });

    test('deleting a case through the catalog removes its sessions', async () => {
      const session = await services.sessions.startSession(NAV1, { caseId: cases[1].id });
      await services.cases.deleteCase(ADMIN, cases[1].id);

      await expect(services.sessions.getSession(ADMIN, session.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
      const events = await services.audit.query(ADMIN, { eventType: 'case.deleted' });
      expect(events.map((e) => e.targetId)).toEqual([cases[1].id]);
    });
  });
});
