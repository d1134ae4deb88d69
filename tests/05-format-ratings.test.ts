// =============================================================================
// CASE EVALUATION — Test Suite 05: Format Scorers
//
// Idempotent upserts by (session, index), ownership through the parent
// session, and write gating once the session is completed.
// =============================================================================

import { Services } from '../src/services';
import { MAX_RATING_INDEX } from '../src/services/validation';
import { EvaluationSession, SyntheticCase } from '../src/types/evaluation';
import { ADMIN, buildServices, FIXED_NOW, NAV1, NAV2, seedWorld, TIMELINE_FIELDS } from './helpers';

describe('Format Scorers', () => {
  let services: Services;
  let cases: SyntheticCase[];
  let session: EvaluationSession;

  beforeEach(async () => {
    services = buildServices();
    cases = await seedWorld(services, 2);
    session = await services.sessions.startSession(NAV1, { caseId: cases[0].id });
  });

  // ── Idempotence ───────────────────────────────────────────────────────

  describe('upsert', () => {
    test('writing the same tripleIndex twice leaves one rating with the latest value', async () => {
      const first = await services.ratings.upsertTacticRating(NAV1, session.id, 3, { intentFeasibilityScore: 2 });
      const second = await services.ratings.upsertTacticRating(NAV1, session.id, 3, { intentFeasibilityScore: 4 });

      expect(second.id).toBe(first.id);
      const ratings = await services.ratings.listRatings(NAV1, session.id, 'format_2');
      expect(ratings).toHaveLength(1);
      expect(ratings[0]).toMatchObject({ format: 'format_2', index: 3, intentFeasibilityScore: 4 });
    });

    test('the same index in different formats is independent', async () => {
      await services.ratings.upsertTimelineRating(NAV1, session.id, 0, TIMELINE_FIELDS);
      await services.ratings.upsertTacticRating(NAV1, session.id, 0, { intentFeasibilityScore: 1 });

      await expect(services.ratings.listRatings(NAV1, session.id, 'format_1')).resolves.toHaveLength(1);
      await expect(services.ratings.listRatings(NAV1, session.id, 'format_2')).resolves.toHaveLength(1);
      await expect(services.ratings.listRatings(NAV1, session.id, 'format_3')).resolves.toHaveLength(0);
    });

    test('free-text fields are stored verbatim', async () => {
      const rating = await services.ratings.upsertBoundaryRating(NAV1, session.id, 1, {
        pnCategory: '  Needs <review> & follow-up  ',
        aiIntendedCategory: '',
      });
      expect(rating).toMatchObject({ pnCategory: '  Needs <review> & follow-up  ', aiIntendedCategory: '' });
    });

    test('concurrent writes to one index leave exactly one rating', async () => {
      await Promise.all([1, 2, 3, 4, 5].map((score) =>
        services.ratings.upsertTacticRating(NAV1, session.id, 0, { intentFeasibilityScore: score })
      ));
      await expect(services.ratings.listRatings(NAV1, session.id, 'format_2')).resolves.toHaveLength(1);
    });
  });

  // ── Validation ────────────────────────────────────────────────────────

  describe('validation', () => {
    test.each([0, 6, 3.5])('tactic score %p is INVALID_ARGUMENT', async (score) => {
      await expect(
        services.ratings.upsertTacticRating(NAV1, session.id, 0, { intentFeasibilityScore: score })
      ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    });

    test.each([-1, 1.5, NaN])('index %p is INVALID_ARGUMENT', async (index) => {
      await expect(
        services.ratings.upsertRating(NAV1, session.id, 'format_2', index, { intentFeasibilityScore: 3 })
      ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    });

    test('index is bounded by the INT column range', async () => {
      await expect(
        services.ratings.upsertTacticRating(NAV1, session.id, MAX_RATING_INDEX + 1, { intentFeasibilityScore: 3 })
      ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT', message: 'Invalid rating index: index out of range' });

      const rating = await services.ratings.upsertTacticRating(NAV1, session.id, MAX_RATING_INDEX, {
        intentFeasibilityScore: 3,
      });
      expect(rating.index).toBe(2147483647);
    });

    test('bottleneckRealism must be a boolean', async () => {
      await expect(
        services.ratings.upsertRating(NAV1, session.id, 'format_1', 0, { ...TIMELINE_FIELDS, bottleneckRealism: 'yes' })
      ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    });

    test('boundary ratings need both labels', async () => {
      await expect(
        services.ratings.upsertRating(NAV1, session.id, 'format_3', 0, { pnCategory: 'escalate' })
      ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    });
  });

  // ── Ownership ─────────────────────────────────────────────────────────

  describe('ownership', () => {
    test("a navigator cannot rate under another navigator's session", async () => {
      await expect(
        services.ratings.upsertTacticRating(NAV2, session.id, 0, { intentFeasibilityScore: 3 })
      ).rejects.toMatchObject({ code: 'FORBIDDEN' });
      await expect(services.ratings.listRatings(NAV2, session.id, 'format_2')).rejects.toMatchObject({
        code: 'FORBIDDEN',
      });
    });

    test('an admin may rate under any session', async () => {
      const rating = await services.ratings.upsertTacticRating(ADMIN, session.id, 0, { intentFeasibilityScore: 3 });
      expect(rating.sessionId).toBe(session.id);
    });

    test('a missing session is FORBIDDEN to navigators and NOT_FOUND to admins', async () => {
      await expect(
        services.ratings.upsertTacticRating(NAV1, 'missing', 0, { intentFeasibilityScore: 3 })
      ).rejects.toMatchObject({ code: 'FORBIDDEN' });
      await expect(
        services.ratings.upsertTacticRating(ADMIN, 'missing', 0, { intentFeasibilityScore: 3 })
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });
      await expect(services.ratings.listRatings(ADMIN, 'missing', 'format_1')).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });
  });

  // ── Gating on Completion ──────────────────────────────────────────────

  describe('completed sessions', () => {
    beforeEach(async () => {
      await services.ratings.upsertTimelineRating(NAV1, session.id, 0, TIMELINE_FIELDS);
      await services.sessions.completeSession(NAV1, session.id);
    });

    test('reject new ratings with INVALID_STATE', async () => {
      await expect(
        services.ratings.upsertTimelineRating(NAV1, session.id, 1, TIMELINE_FIELDS)
      ).rejects.toMatchObject({ code: 'INVALID_STATE' });
    });

    test('reject overwrites and deletes, even from admins', async () => {
      await expect(
        services.ratings.upsertTimelineRating(ADMIN, session.id, 0, { ...TIMELINE_FIELDS, eddDelta: '0' })
      ).rejects.toMatchObject({ code: 'INVALID_STATE' });
      await expect(services.ratings.deleteRating(ADMIN, session.id, 'format_1', 0)).rejects.toMatchObject({
        code: 'INVALID_STATE',
      });
    });

    test('existing ratings stay readable', async () => {
      const ratings = await services.ratings.listRatings(NAV1, session.id, 'format_1');
      expect(ratings).toHaveLength(1);
      expect(ratings[0]).toMatchObject({ index: 0, eddDelta: '+1 day', bottleneckRealism: true });
    });
  });

  // ── Completion Racing Writes ──────────────────────────────────────────

  describe('completion racing a rating write', () => {
    test('the write lands before completion or is refused with INVALID_STATE', async () => {
      const [completion, write] = await Promise.allSettled([
        services.sessions.completeSession(NAV1, session.id),
        services.ratings.upsertTacticRating(NAV1, session.id, 0, { intentFeasibilityScore: 4 }),
      ]);

      expect(completion.status).toBe('fulfilled');
      const ratings = await services.ratings.listRatings(NAV1, session.id, 'format_2');
      if (write.status === 'fulfilled') {
        expect(ratings).toHaveLength(1);
        expect(ratings[0]).toMatchObject({ index: 0, intentFeasibilityScore: 4 });
      } else {
        expect(write.reason).toMatchObject({ code: 'INVALID_STATE' });
        expect(ratings).toEqual([]);
      }

      const after = await services.sessions.getSession(NAV1, session.id);
      expect(after.status).toBe('completed');
      expect(after.completedAt).toEqual(FIXED_NOW);
    });

    test('many writes racing completion never land after it', async () => {
      const writes = [0, 1, 2, 3].map((index) =>
        services.ratings.upsertTacticRating(NAV1, session.id, index, { intentFeasibilityScore: 2 })
      );
      const results = await Promise.allSettled([
        ...writes,
        services.sessions.completeSession(NAV1, session.id),
      ]);

      const landed = results.slice(0, 4).filter((r) => r.status === 'fulfilled').length;
      for (const result of results.slice(0, 4)) {
        if (result.status === 'rejected') {
          expect(result.reason).toMatchObject({ code: 'INVALID_STATE' });
        }
      }
      await expect(services.ratings.listRatings(NAV1, session.id, 'format_2')).resolves.toHaveLength(landed);

      const after = await services.sessions.getSession(NAV1, session.id);
      expect(after.status).toBe('completed');
      expect(after.completedAt).toEqual(FIXED_NOW);
    });
  });

  // ── Deletion & Cascade ────────────────────────────────────────────────

  describe('deletion', () => {
    test('deleteRating removes one index; a second delete is NOT_FOUND', async () => {
      await services.ratings.upsertTacticRating(NAV1, session.id, 0, { intentFeasibilityScore: 3 });
      await services.ratings.upsertTacticRating(NAV1, session.id, 1, { intentFeasibilityScore: 4 });

      await services.ratings.deleteRating(NAV1, session.id, 'format_2', 0);
      const remaining = await services.ratings.listRatings(NAV1, session.id, 'format_2');
      expect(remaining.map((r) => r.index)).toEqual([1]);

      await expect(services.ratings.deleteRating(NAV1, session.id, 'format_2', 0)).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });

    test('deleting the session removes its ratings', async () => {
      await services.ratings.upsertTimelineRating(NAV1, session.id, 0, TIMELINE_FIELDS);
      await services.ratings.upsertTacticRating(NAV1, session.id, 0, { intentFeasibilityScore: 3 });

      await services.sessions.deleteSession(ADMIN, session.id);

      await expect(services.store.listRatings(session.id, 'format_1')).resolves.toEqual([]);
      await expect(services.store.listRatings(session.id, 'format_2')).resolves.toEqual([]);
    });

    test('deleting the case cascades through sessions to ratings', async () => {
      await services.ratings.upsertTacticRating(NAV1, session.id, 0, { intentFeasibilityScore: 3 });

      await services.cases.deleteCase(ADMIN, cases[0].id);

      await expect(services.store.getSession(session.id)).resolves.toBeNull();
      await expect(services.store.listRatings(session.id, 'format_2')).resolves.toEqual([]);
    });

    test('deleting the navigator profile cascades to their sessions', async () => {
      await services.profiles.deleteProfile(ADMIN, NAV1);
      await expect(services.store.getSession(session.id)).resolves.toBeNull();
      await expect(services.store.listSessions({ caseId: cases[0].id })).resolves.toEqual([]);
    });
  });
});
