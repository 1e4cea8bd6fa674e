/**
 * Migration Runner
 *
 * Creates the workflow tables if they do not exist yet. Idempotent: run it
 * at every startup or from a deploy step.
 *
 * Beyond what the Drizzle definitions describe, the DDL enforces the
 * workflow's integrity rules at the database level:
 *   - unique status name per organization
 *   - at most one default status per organization (partial unique index)
 *   - only an active status can be the default (check constraint)
 *   - at most one edge per ordered pair per organization
 *   - edges and tasks can only reference statuses of their own
 *     organization (composite foreign keys on (organization_id, id))
 *   - no status referenced anywhere can be deleted (no ON DELETE)
 *   - task_status_transitions rejects UPDATE and DELETE (trigger)
 *
 * Tables are created in dependency order; each step is a no-op when the
 * table is already there. Columns are never dropped or altered here.
 */

import { getDatabase } from "./connection.js";
import { CONSTRAINTS } from "./schema.js";

type SqlClient = ReturnType<typeof getDatabase>["sql"];

interface TableMigration {
  table: string;
  statements: string[];
}

const MIGRATIONS: TableMigration[] = [
  {
    table: "task_statuses",
    statements: [
      `CREATE TABLE task_statuses (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        organization_id TEXT NOT NULL,
        name VARCHAR(64) NOT NULL,
        display_name VARCHAR(128) NOT NULL,
        color VARCHAR(7),
        order_index INTEGER NOT NULL DEFAULT 0,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        is_default BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT ${CONSTRAINTS.statusName} UNIQUE (organization_id, name),
        CONSTRAINT task_statuses_org_id_key UNIQUE (organization_id, id),
        CONSTRAINT ${CONSTRAINTS.defaultIsActive} CHECK (NOT is_default OR is_active)
      )`,
      `CREATE UNIQUE INDEX ${CONSTRAINTS.oneDefault}
        ON task_statuses (organization_id) WHERE is_default`,
    ],
  },
  {
    table: "task_workflow_transitions",
    statements: [
      `CREATE TABLE task_workflow_transitions (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        organization_id TEXT NOT NULL,
        from_status_id UUID NOT NULL,
        to_status_id UUID NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT ${CONSTRAINTS.edgePair} UNIQUE (organization_id, from_status_id, to_status_id),
        FOREIGN KEY (organization_id, from_status_id) REFERENCES task_statuses (organization_id, id),
        FOREIGN KEY (organization_id, to_status_id) REFERENCES task_statuses (organization_id, id)
      )`,
    ],
  },
  {
    table: "tasks",
    statements: [
      `CREATE TABLE tasks (
        id TEXT PRIMARY KEY,
        organization_id TEXT NOT NULL,
        current_status_id UUID,
        version INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        FOREIGN KEY (organization_id, current_status_id) REFERENCES task_statuses (organization_id, id)
      )`,
      `CREATE INDEX idx_tasks_org_status ON tasks (organization_id, current_status_id)`,
    ],
  },
  {
    table: "task_status_transitions",
    statements: [
      `CREATE TABLE task_status_transitions (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        sequence BIGSERIAL NOT NULL,
        organization_id TEXT NOT NULL,
        task_id TEXT NOT NULL REFERENCES tasks (id),
        from_status_id UUID,
        to_status_id UUID NOT NULL,
        actor_id TEXT NOT NULL,
        changed_at TIMESTAMPTZ NOT NULL,
        note TEXT,
        FOREIGN KEY (organization_id, from_status_id) REFERENCES task_statuses (organization_id, id),
        FOREIGN KEY (organization_id, to_status_id) REFERENCES task_statuses (organization_id, id)
      )`,
      `CREATE INDEX idx_task_status_transitions_history
        ON task_status_transitions (task_id, changed_at, sequence)`,
      `CREATE OR REPLACE FUNCTION reject_task_status_transition_change() RETURNS trigger AS $$
        BEGIN
          RAISE EXCEPTION 'task_status_transitions is append-only';
        END;
      $$ LANGUAGE plpgsql`,
      `CREATE TRIGGER task_status_transitions_append_only
        BEFORE UPDATE OR DELETE ON task_status_transitions
        FOR EACH ROW EXECUTE FUNCTION reject_task_status_transition_change()`,
    ],
  },
];

/**
 * Checks whether a table exists in the public schema.
 */
async function tableExists(pgSql: SqlClient, tableName: string): Promise<boolean> {
  const rows = await pgSql.unsafe(
    `SELECT 1 FROM information_schema.tables WHERE table_schema = 'public' AND table_name = $1 LIMIT 1`,
    [tableName]
  );
  return rows.length > 0;
}

/**
 * Creates any missing workflow table, with its indexes and triggers.
 * Each table is created in its own transaction so a failure never leaves
 * a table without its constraints.
 *
 * @returns The names of the tables that were created
 */
export async function runWorkflowMigrations(): Promise<string[]> {
  const { sql: pgSql } = getDatabase();
  const created: string[] = [];

  for (const migration of MIGRATIONS) {
    if (await tableExists(pgSql, migration.table)) continue;

    await pgSql.begin(async (tx) => {
      for (const statement of migration.statements) {
        await tx.unsafe(statement);
      }
    });

    created.push(migration.table);
    console.log(`[migrate] Created workflow table: ${migration.table}`);
  }

  return created;
}
