// =============================================================================
// CASE EVALUATION — PostgreSQL Record Store
//
// IEvaluationStore over a pg pool. Cross-entity rules are enforced by
// the schema (see ./migrate) and by row locks, never by a read in one
// round trip followed by a write in another:
//
//   Session uniqueness  : UNIQUE (case_id, navigator_id); 23505 → CONFLICT
//   Completion          : UPDATE … WHERE status = 'in_progress'
//   Rating writes       : SELECT … FOR SHARE on the session, then upsert,
//                          inside one transaction. Completion's UPDATE
//                          waits on the share lock, so a write either lands
//                          before completion or observes 'completed'.
// =============================================================================

import { Pool, PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { alreadyExists, conflict, notFound } from '../errors';
import { AuditEvent, AuditFilter, AuditTargetType } from '../types/audit';
import {
  EvaluationSession,
  JsonValue,
  NewEvaluationSession,
  NewProfile,
  NewSyntheticCase,
  Profile,
  ProfilePatch,
  RatingFormat,
  RatingInput,
  RatingRecord,
  SessionFilter,
  SessionStatus,
  SyntheticCase,
  SyntheticCasePatch,
} from '../types/evaluation';
import { Role } from '../types/roles';
import { CaseFilter, IEvaluationStore, OpenSessionWrite } from '../types/store';

// ── Row shapes ─────────────────────────────────────────────────────────

interface ProfileRow {
  id: string;
  role: Role;
  full_name: string;
  pin: string | null;
  created_at: Date;
}

interface CaseRow {
  id: string;
  batch_id: string | null;
  label: string | null;
  narrative_summary: string | null;
  format_1_state_log: JsonValue | null;
  format_2_triples: JsonValue | null;
  format_3_rl_scenario: JsonValue | null;
  created_at: Date;
}

interface SessionRow {
  id: string;
  case_id: string;
  case_label: string | null;
  navigator_id: string;
  navigator_name: string | null;
  status: SessionStatus;
  overall_field_authenticity: number | null;
  created_at: Date;
  completed_at: Date | null;
}

interface TimelineRow {
  id: string;
  session_id: string;
  event_index: number;
  clinical_impact: string;
  environmental_impact: string;
  home_service_adoption_impact: string;
  edd_delta: string;
  bottleneck_realism: boolean;
  updated_at: Date;
}

interface TacticRow {
  id: string;
  session_id: string;
  triple_index: number;
  intent_feasibility_score: number;
  updated_at: Date;
}

interface BoundaryRow {
  id: string;
  session_id: string;
  option_index: number;
  pn_category: string;
  ai_intended_category: string;
  updated_at: Date;
}

interface AuditRow {
  id: string;
  event_time: Date;
  event_type: string;
  description: string;
  actor_id: string;
  actor_role: Role | null;
  target_type: AuditTargetType;
  target_id: string;
  metadata: Record<string, unknown>;
  event_hash: string;
}

/** Table and key column per rating format */
const RATING_TABLES: Record<RatingFormat, { table: string; indexColumn: string }> = {
  format_1: { table: 'eval_format_1_timeline',   indexColumn: 'event_index' },
  format_2: { table: 'eval_format_2_tactics',    indexColumn: 'triple_index' },
  format_3: { table: 'eval_format_3_boundaries', indexColumn: 'option_index' },
};

// ── Row mapping ────────────────────────────────────────────────────────

const toProfile = (row: ProfileRow): Profile => ({
  id: row.id,
  role: row.role,
  fullName: row.full_name,
  pin: row.pin,
  createdAt: row.created_at,
});

const toCase = (row: CaseRow): SyntheticCase => ({
  id: row.id,
  batchId: row.batch_id,
  label: row.label,
  narrativeSummary: row.narrative_summary,
  format1StateLog: row.format_1_state_log,
  format2Triples: row.format_2_triples,
  format3RlScenario: row.format_3_rl_scenario,
  createdAt: row.created_at,
});

const toSession = (row: SessionRow): EvaluationSession => ({
  id: row.id,
  caseId: row.case_id,
  caseLabel: row.case_label,
  navigatorId: row.navigator_id,
  navigatorName: row.navigator_name,
  status: row.status,
  overallFieldAuthenticity: row.overall_field_authenticity,
  createdAt: row.created_at,
  completedAt: row.completed_at,
});

const toTimelineRating = (row: TimelineRow): RatingRecord => ({
  format: 'format_1',
  id: row.id,
  sessionId: row.session_id,
  index: row.event_index,
  clinicalImpact: row.clinical_impact,
  environmentalImpact: row.environmental_impact,
  homeServiceAdoptionImpact: row.home_service_adoption_impact,
  eddDelta: row.edd_delta,
  bottleneckRealism: row.bottleneck_realism,
  updatedAt: row.updated_at,
});

const toTacticRating = (row: TacticRow): RatingRecord => ({
  format: 'format_2',
  id: row.id,
  sessionId: row.session_id,
  index: row.triple_index,
  intentFeasibilityScore: row.intent_feasibility_score,
  updatedAt: row.updated_at,
});

const toBoundaryRating = (row: BoundaryRow): RatingRecord => ({
  format: 'format_3',
  id: row.id,
  sessionId: row.session_id,
  index: row.option_index,
  pnCategory: row.pn_category,
  aiIntendedCategory: row.ai_intended_category,
  updatedAt: row.updated_at,
});

const toAuditEvent = (row: AuditRow): AuditEvent => ({
  id: row.id,
  eventTime: row.event_time,
  eventType: row.event_type,
  description: row.description,
  actorId: row.actor_id,
  actorRole: row.actor_role,
  targetType: row.target_type,
  targetId: row.target_id,
  metadata: row.metadata,
  eventHash: row.event_hash,
});

/** JSONB parameters go over the wire as text; null stays SQL NULL. */
const jsonParam = (value: JsonValue | null): string | null =>
  value === null ? null : JSON.stringify(value);

function pgErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

const SESSION_COLUMNS = `id, case_id, case_label, navigator_id, navigator_name, status,
  overall_field_authenticity, created_at, completed_at`;

// ── Store ──────────────────────────────────────────────────────────────

export class PostgresEvaluationStore implements IEvaluationStore {
  readonly name = 'PostgreSQL store';

  constructor(private readonly pool: Pool) {}

  // ── Profiles ─────────────────────────────────────────────────────────

  async getProfile(id: string): Promise<Profile | null> {
    const result = await this.pool.query<ProfileRow>(
      `SELECT id, role, full_name, pin, created_at FROM profiles WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toProfile(result.rows[0]) : null;
  }

  async listProfiles(filter: { role?: Role } = {}): Promise<Profile[]> {
    const result = filter.role
      ? await this.pool.query<ProfileRow>(
          `SELECT id, role, full_name, pin, created_at FROM profiles
           WHERE role = $1 ORDER BY full_name, id`,
          [filter.role]
        )
      : await this.pool.query<ProfileRow>(
          `SELECT id, role, full_name, pin, created_at FROM profiles ORDER BY full_name, id`
        );
    return result.rows.map(toProfile);
  }

  async insertProfile(profile: NewProfile): Promise<Profile> {
    try {
      const result = await this.pool.query<ProfileRow>(
        `INSERT INTO profiles (id, role, full_name, pin)
         VALUES ($1, $2, $3, $4)
         RETURNING id, role, full_name, pin, created_at`,
        [profile.id, profile.role, profile.fullName, profile.pin]
      );
      return toProfile(result.rows[0]);
    } catch (err) {
      if (pgErrorCode(err) === UNIQUE_VIOLATION) {
        throw alreadyExists(`Profile ${profile.id} already exists`);
      }
      throw err;
    }
  }

  async updateProfile(id: string, patch: ProfilePatch): Promise<Profile | null> {
    const result = await this.pool.query<ProfileRow>(
      `UPDATE profiles
       SET role = COALESCE($2, role),
           full_name = COALESCE($3, full_name),
           pin = CASE WHEN $4::boolean THEN $5 ELSE pin END
       WHERE id = $1
       RETURNING id, role, full_name, pin, created_at`,
      [id, patch.role ?? null, patch.fullName ?? null, patch.pin !== undefined, patch.pin ?? null]
    );
    return result.rows.length > 0 ? toProfile(result.rows[0]) : null;
  }

  async deleteProfile(id: string): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM profiles WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  // ── Synthetic Cases ──────────────────────────────────────────────────

  async getCase(id: string): Promise<SyntheticCase | null> {
    const result = await this.pool.query<CaseRow>(`SELECT * FROM synthetic_cases WHERE id = $1`, [id]);
    return result.rows.length > 0 ? toCase(result.rows[0]) : null;
  }

  async listCases(filter: CaseFilter = {}): Promise<SyntheticCase[]> {
    const result = filter.batchId !== undefined
      ? await this.pool.query<CaseRow>(
          `SELECT * FROM synthetic_cases WHERE batch_id = $1 ORDER BY created_at, id`,
          [filter.batchId]
        )
      : await this.pool.query<CaseRow>(`SELECT * FROM synthetic_cases ORDER BY created_at, id`);
    return result.rows.map(toCase);
  }

  async countCases(): Promise<number> {
    const result = await this.pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM synthetic_cases`);
    return parseInt(result.rows[0].count, 10);
  }

  async insertCases(cases: NewSyntheticCase[]): Promise<SyntheticCase[]> {
    return this.withTransaction(async (client) => {
      const created: SyntheticCase[] = [];
      for (const c of cases) {
        const result = await client.query<CaseRow>(
          `INSERT INTO synthetic_cases
             (id, batch_id, label, narrative_summary,
              format_1_state_log, format_2_triples, format_3_rl_scenario)
           VALUES ($1, $2, $3, $4, $5::jsonb, $6::jsonb, $7::jsonb)
           RETURNING *`,
          [
            uuidv4(), c.batchId, c.label, c.narrativeSummary,
            jsonParam(c.format1StateLog), jsonParam(c.format2Triples), jsonParam(c.format3RlScenario),
          ]
        );
        created.push(toCase(result.rows[0]));
      }
      return created;
    });
  }

  async updateCase(id: string, patch: SyntheticCasePatch): Promise<SyntheticCase | null> {
    const assignments: string[] = [];
    const params: Array<string | null> = [id];

    const set = (column: string, value: string | null, cast = '') => {
      params.push(value);
      assignments.push(`${column} = $${params.length}${cast}`);
    };

    if (patch.batchId !== undefined) set('batch_id', patch.batchId);
    if (patch.label !== undefined) set('label', patch.label);
    if (patch.narrativeSummary !== undefined) set('narrative_summary', patch.narrativeSummary);
    if (patch.format1StateLog !== undefined) set('format_1_state_log', jsonParam(patch.format1StateLog), '::jsonb');
    if (patch.format2Triples !== undefined) set('format_2_triples', jsonParam(patch.format2Triples), '::jsonb');
    if (patch.format3RlScenario !== undefined) set('format_3_rl_scenario', jsonParam(patch.format3RlScenario), '::jsonb');

    if (assignments.length === 0) return this.getCase(id);

    const result = await this.pool.query<CaseRow>(
      `UPDATE synthetic_cases SET ${assignments.join(', ')} WHERE id = $1 RETURNING *`,
      params
    );
    return result.rows.length > 0 ? toCase(result.rows[0]) : null;
  }

  async deleteCase(id: string): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM synthetic_cases WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  // ── Evaluation Sessions ──────────────────────────────────────────────

  async getSession(id: string): Promise<EvaluationSession | null> {
    const result = await this.pool.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM evaluation_sessions WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toSession(result.rows[0]) : null;
  }

  async listSessions(filter: SessionFilter = {}): Promise<EvaluationSession[]> {
    const conditions: string[] = [];
    const params: string[] = [];

    if (filter.navigatorId) {
      params.push(filter.navigatorId);
      conditions.push(`navigator_id = $${params.length}`);
    }
    if (filter.caseId) {
      params.push(filter.caseId);
      conditions.push(`case_id = $${params.length}`);
    }
    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.pool.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM evaluation_sessions ${where} ORDER BY created_at, id`,
      params
    );
    return result.rows.map(toSession);
  }

  async insertSession(session: NewEvaluationSession): Promise<EvaluationSession> {
    try {
      const result = await this.pool.query<SessionRow>(
        `INSERT INTO evaluation_sessions
           (id, case_id, case_label, navigator_id, navigator_name, status)
         VALUES ($1, $2, $3, $4, $5, 'in_progress')
         RETURNING ${SESSION_COLUMNS}`,
        [uuidv4(), session.caseId, session.caseLabel, session.navigatorId, session.navigatorName]
      );
      return toSession(result.rows[0]);
    } catch (err) {
      const code = pgErrorCode(err);
      if (code === UNIQUE_VIOLATION) {
        throw conflict('A session already exists for this case and navigator');
      }
      if (code === FOREIGN_KEY_VIOLATION) {
        throw notFound('Case or navigator profile not found');
      }
      throw err;
    }
  }

  async setOverallScore(id: string, score: number): Promise<OpenSessionWrite<EvaluationSession>> {
    const result = await this.pool.query<SessionRow>(
      `UPDATE evaluation_sessions
       SET overall_field_authenticity = $2
       WHERE id = $1 AND status = 'in_progress'
       RETURNING ${SESSION_COLUMNS}`,
      [id, score]
    );
    return this.openWriteOutcome(id, result.rows);
  }

  async completeSession(
    id: string,
    completedAt: Date,
    overallFieldAuthenticity?: number
  ): Promise<OpenSessionWrite<EvaluationSession>> {
    const result = await this.pool.query<SessionRow>(
      `UPDATE evaluation_sessions
       SET status = 'completed',
           completed_at = $2,
           overall_field_authenticity = COALESCE($3, overall_field_authenticity)
       WHERE id = $1 AND status = 'in_progress'
       RETURNING ${SESSION_COLUMNS}`,
      [id, completedAt, overallFieldAuthenticity ?? null]
    );
    return this.openWriteOutcome(id, result.rows);
  }

  async deleteSession(id: string): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM evaluation_sessions WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  // ── Ratings ──────────────────────────────────────────────────────────

  async upsertRating(
    sessionId: string,
    index: number,
    input: RatingInput
  ): Promise<OpenSessionWrite<RatingRecord>> {
    return this.withOpenSession(sessionId, async (client) => {
      switch (input.format) {
        case 'format_1': {
          const result = await client.query<TimelineRow>(
            `INSERT INTO eval_format_1_timeline
               (id, session_id, event_index, clinical_impact, environmental_impact,
                home_service_adoption_impact, edd_delta, bottleneck_realism)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             ON CONFLICT (session_id, event_index) DO UPDATE SET
               clinical_impact = EXCLUDED.clinical_impact,
               environmental_impact = EXCLUDED.environmental_impact,
               home_service_adoption_impact = EXCLUDED.home_service_adoption_impact,
               edd_delta = EXCLUDED.edd_delta,
               bottleneck_realism = EXCLUDED.bottleneck_realism,
               updated_at = now()
             RETURNING *`,
            [
              uuidv4(), sessionId, index, input.clinicalImpact, input.environmentalImpact,
              input.homeServiceAdoptionImpact, input.eddDelta, input.bottleneckRealism,
            ]
          );
          return toTimelineRating(result.rows[0]);
        }
        case 'format_2': {
          const result = await client.query<TacticRow>(
            `INSERT INTO eval_format_2_tactics
               (id, session_id, triple_index, intent_feasibility_score)
             VALUES ($1, $2, $3, $4)
             ON CONFLICT (session_id, triple_index) DO UPDATE SET
               intent_feasibility_score = EXCLUDED.intent_feasibility_score,
               updated_at = now()
             RETURNING *`,
            [uuidv4(), sessionId, index, input.intentFeasibilityScore]
          );
          return toTacticRating(result.rows[0]);
        }
        case 'format_3': {
          const result = await client.query<BoundaryRow>(
            `INSERT INTO eval_format_3_boundaries
               (id, session_id, option_index, pn_category, ai_intended_category)
             VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (session_id, option_index) DO UPDATE SET
               pn_category = EXCLUDED.pn_category,
               ai_intended_category = EXCLUDED.ai_intended_category,
               updated_at = now()
             RETURNING *`,
            [uuidv4(), sessionId, index, input.pnCategory, input.aiIntendedCategory]
          );
          return toBoundaryRating(result.rows[0]);
        }
      }
    });
  }

  async listRatings(sessionId: string, format: RatingFormat): Promise<RatingRecord[]> {
    switch (format) {
      case 'format_1': {
        const result = await this.pool.query<TimelineRow>(
          `SELECT * FROM eval_format_1_timeline WHERE session_id = $1 ORDER BY event_index`,
          [sessionId]
        );
        return result.rows.map(toTimelineRating);
      }
      case 'format_2': {
        const result = await this.pool.query<TacticRow>(
          `SELECT * FROM eval_format_2_tactics WHERE session_id = $1 ORDER BY triple_index`,
          [sessionId]
        );
        return result.rows.map(toTacticRating);
      }
      case 'format_3': {
        const result = await this.pool.query<BoundaryRow>(
          `SELECT * FROM eval_format_3_boundaries WHERE session_id = $1 ORDER BY option_index`,
          [sessionId]
        );
        return result.rows.map(toBoundaryRating);
      }
    }
  }

  async deleteRating(
    sessionId: string,
    format: RatingFormat,
    index: number
  ): Promise<OpenSessionWrite<boolean>> {
    const { table, indexColumn } = RATING_TABLES[format];
    return this.withOpenSession(sessionId, async (client) => {
      const result = await client.query(
        `DELETE FROM ${table} WHERE session_id = $1 AND ${indexColumn} = $2`,
        [sessionId, index]
      );
      return (result.rowCount ?? 0) > 0;
    });
  }

  // ── Audit Trail ──────────────────────────────────────────────────────

  async appendAuditEvent(event: AuditEvent): Promise<void> {
    await this.pool.query(
      `INSERT INTO audit_trail
         (id, event_time, event_type, description, actor_id, actor_role,
          target_type, target_id, metadata, event_hash)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, $10)`,
      [
        event.id, event.eventTime, event.eventType, event.description,
        event.actorId, event.actorRole, event.targetType, event.targetId,
        JSON.stringify(event.metadata), event.eventHash,
      ]
    );
  }

  async queryAuditEvents(filter: AuditFilter): Promise<AuditEvent[]> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];
    let paramIndex = 1;

    if (filter.eventType) {
      conditions.push(`event_type = $${paramIndex++}`);
      params.push(filter.eventType);
    }
    if (filter.actorId) {
      conditions.push(`actor_id = $${paramIndex++}`);
      params.push(filter.actorId);
    }
    if (filter.targetType) {
      conditions.push(`target_type = $${paramIndex++}`);
      params.push(filter.targetType);
    }
    if (filter.targetId) {
      conditions.push(`target_id = $${paramIndex++}`);
      params.push(filter.targetId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit ?? 50, filter.offset ?? 0);

    const result = await this.pool.query<AuditRow>(
      `SELECT id, event_time, event_type, description, actor_id, actor_role,
              target_type, target_id, metadata, event_hash
       FROM audit_trail
       ${where}
       ORDER BY event_time DESC
       LIMIT $${paramIndex++} OFFSET $${paramIndex}`,
      params
    );
    return result.rows.map(toAuditEvent);
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  async isAvailable(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (err) {
      console.error('[DB] Health probe failed:', err instanceof Error ? err.message : err);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // ── Internals ────────────────────────────────────────────────────────

  private async withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const value = await work(client);
      await client.query('COMMIT');
      return value;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  /**
   * Run a write while holding a share lock on an open session. The
   * lock is released at commit, after the write is visible.
   */
  private async withOpenSession<T>(
    sessionId: string,
    write: (client: PoolClient) => Promise<T>
  ): Promise<OpenSessionWrite<T>> {
    return this.withTransaction(async (client): Promise<OpenSessionWrite<T>> => {
      const locked = await client.query<SessionRow>(
        `SELECT ${SESSION_COLUMNS} FROM evaluation_sessions WHERE id = $1 FOR SHARE`,
        [sessionId]
      );
      if (locked.rows.length === 0) return { outcome: 'session_missing' };

      const session = toSession(locked.rows[0]);
      if (session.status !== 'in_progress') return { outcome: 'closed', session };

      return { outcome: 'ok', value: await write(client) };
    });
  }

  private async openWriteOutcome(
    id: string,
    updated: SessionRow[]
  ): Promise<OpenSessionWrite<EvaluationSession>> {
    if (updated.length > 0) return { outcome: 'ok', value: toSession(updated[0]) };
    const current = await this.getSession(id);
    return current ? { outcome: 'closed', session: current } : { outcome: 'session_missing' };
  }
}
