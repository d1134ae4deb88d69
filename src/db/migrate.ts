// =============================================================================
// CASE EVALUATION — Schema Migration
//
// Six record sets related by foreign keys, plus the append-only audit
// trail. Safe to re-run: every statement is idempotent.
//
// SCHEMA_STATEMENTS is plain DDL. GUARD_STATEMENTS adds what needs a
// full server: the PIN pattern check and the audit immutability trigger.
//
// Usage:
//   npm run migrate
// =============================================================================

import { Pool } from 'pg';
import { createPool } from './pool';

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS profiles (
     id          TEXT PRIMARY KEY,
     role        TEXT NOT NULL CHECK (role IN ('admin', 'navigator')),
     full_name   TEXT NOT NULL CHECK (full_name <> ''),
     pin         TEXT,
     created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
   )`,

  `CREATE TABLE IF NOT EXISTS synthetic_cases (
     id                    TEXT PRIMARY KEY,
     batch_id              TEXT,
     label                 TEXT,
     narrative_summary     TEXT,
     format_1_state_log    JSONB,
     format_2_triples      JSONB,
     format_3_rl_scenario  JSONB,
     created_at            TIMESTAMPTZ NOT NULL DEFAULT now()
   )`,

  // One session per (case, navigator); completed_at set iff completed.
  `CREATE TABLE IF NOT EXISTS evaluation_sessions (
     id                          TEXT PRIMARY KEY,
     case_id                     TEXT NOT NULL REFERENCES synthetic_cases(id) ON DELETE CASCADE,
     case_label                  TEXT,
     navigator_id                TEXT NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
     navigator_name              TEXT,
     status                      TEXT NOT NULL DEFAULT 'in_progress'
                                 CHECK (status IN ('in_progress', 'completed')),
     overall_field_authenticity  INT CHECK (overall_field_authenticity IS NULL
                                   OR (overall_field_authenticity >= 1 AND overall_field_authenticity <= 5)),
     created_at                  TIMESTAMPTZ NOT NULL DEFAULT now(),
     completed_at                TIMESTAMPTZ,
     CONSTRAINT evaluation_sessions_case_navigator_key UNIQUE (case_id, navigator_id),
     CONSTRAINT evaluation_sessions_completion_check
       CHECK ((status = 'completed' AND completed_at IS NOT NULL)
           OR (status = 'in_progress' AND completed_at IS NULL))
   )`,

  `CREATE TABLE IF NOT EXISTS eval_format_1_timeline (
     id                            TEXT PRIMARY KEY,
     session_id                    TEXT NOT NULL REFERENCES evaluation_sessions(id) ON DELETE CASCADE,
     event_index                   INT NOT NULL CHECK (event_index >= 0),
     clinical_impact               TEXT NOT NULL,
     environmental_impact          TEXT NOT NULL,
     home_service_adoption_impact  TEXT NOT NULL,
     edd_delta                     TEXT NOT NULL,
     bottleneck_realism            BOOLEAN NOT NULL,
     updated_at                    TIMESTAMPTZ NOT NULL DEFAULT now(),
     UNIQUE (session_id, event_index)
   )`,

  `CREATE TABLE IF NOT EXISTS eval_format_2_tactics (
     id                        TEXT PRIMARY KEY,
     session_id                TEXT NOT NULL REFERENCES evaluation_sessions(id) ON DELETE CASCADE,
     triple_index              INT NOT NULL CHECK (triple_index >= 0),
     intent_feasibility_score  INT NOT NULL
                              CHECK (intent_feasibility_score >= 1 AND intent_feasibility_score <= 5),
     updated_at                TIMESTAMPTZ NOT NULL DEFAULT now(),
     UNIQUE (session_id, triple_index)
   )`,

  `CREATE TABLE IF NOT EXISTS eval_format_3_boundaries (
     id                    TEXT PRIMARY KEY,
     session_id            TEXT NOT NULL REFERENCES evaluation_sessions(id) ON DELETE CASCADE,
     option_index          INT NOT NULL CHECK (option_index >= 0),
     pn_category           TEXT NOT NULL,
     ai_intended_category  TEXT NOT NULL,
     updated_at            TIMESTAMPTZ NOT NULL DEFAULT now(),
     UNIQUE (session_id, option_index)
   )`,

  `CREATE TABLE IF NOT EXISTS audit_trail (
     id           TEXT PRIMARY KEY,
     event_time   TIMESTAMPTZ NOT NULL DEFAULT now(),
     event_type   TEXT NOT NULL,
     description  TEXT NOT NULL,
     actor_id     TEXT NOT NULL,
     actor_role   TEXT,
     target_type  TEXT NOT NULL,
     target_id    TEXT NOT NULL,
     metadata     JSONB NOT NULL DEFAULT '{}'::jsonb,
     event_hash   TEXT NOT NULL
   )`,

  `CREATE INDEX IF NOT EXISTS evaluation_sessions_navigator_idx ON evaluation_sessions (navigator_id)`,
  `CREATE INDEX IF NOT EXISTS audit_trail_event_time_idx ON audit_trail (event_time DESC)`,
];

export const GUARD_STATEMENTS: readonly string[] = [
  `ALTER TABLE profiles DROP CONSTRAINT IF EXISTS profiles_pin_format`,
  `ALTER TABLE profiles ADD CONSTRAINT profiles_pin_format CHECK (pin ~ '^[0-9]{4}$')`,

  // Append-only: reject UPDATE and DELETE on the audit trail.
  `CREATE OR REPLACE FUNCTION audit_trail_immutable() RETURNS trigger AS $$
   BEGIN
     RAISE EXCEPTION 'audit_trail is append-only';
   END;
   $$ LANGUAGE plpgsql`,
  `DROP TRIGGER IF EXISTS audit_trail_no_mutation ON audit_trail`,
  `CREATE TRIGGER audit_trail_no_mutation
     BEFORE UPDATE OR DELETE ON audit_trail
     FOR EACH ROW EXECUTE FUNCTION audit_trail_immutable()`,
];

export async function migrate(
  target: Pool,
  statements: readonly string[] = [...SCHEMA_STATEMENTS, ...GUARD_STATEMENTS]
): Promise<void> {
  const client = await target.connect();
  try {
    await client.query('BEGIN');
    for (const statement of statements) {
      await client.query(statement);
    }
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (require.main === module) {
  const pool = createPool();
  console.log('[DB] Running migrations...');
  migrate(pool)
    .then(async () => {
      console.log('[DB] Migrations complete.');
      await pool.end();
    })
    .catch((err: unknown) => {
      console.error('[DB] Migration failed:', err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
