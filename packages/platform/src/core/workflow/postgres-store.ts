/**
 * PostgreSQL Workflow Store
 *
 * WorkflowStore over Drizzle + postgres.js. Every unit of work is one
 * database transaction; the schema's constraints (see database/migrate.ts)
 * are the final word on uniqueness, and violations are translated into
 * engine errors here so callers never see driver error codes.
 *
 * Task concurrency is optimistic: compareAndSetStatus updates
 * `WHERE id = $1 AND version = $2`. Under READ COMMITTED a concurrent
 * writer blocks on the row, then finds the version moved and updates
 * nothing, which the executor treats as a lost race. The connection's
 * lock_timeout bounds that wait; running out of it is a lost race too.
 */

import { randomUUID } from "node:crypto";
import { and, asc, desc, eq, ne } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { Status, TransitionEdge } from "@statusflow/contracts";
import { getDatabase } from "../database/connection.js";
import {
  CONSTRAINTS,
  taskStatuses,
  taskStatusTransitions,
  taskWorkflowTransitions,
  tasks,
} from "../database/schema.js";
import {
  ConcurrentModificationError,
  DuplicateEdgeError,
  DuplicateNameError,
  DuplicateTaskError,
} from "./errors.js";
import { compactStatusPatch, type WorkflowStore, type WorkflowTransaction } from "./store.js";

type Tx = Parameters<Parameters<PostgresJsDatabase["transaction"]>[0]>[0];

/** SQLSTATE codes the store reacts to */
const UNIQUE_VIOLATION = "23505";
const CHECK_VIOLATION = "23514";
const LOCK_NOT_AVAILABLE = "55P03";
const SERIALIZATION_FAILURE = "40001";
const DEADLOCK_DETECTED = "40P01";

interface PgErrorInfo {
  code: string;
  constraint: string | null;
}

/**
 * Extracts the SQLSTATE and constraint name from a driver error, looking
 * through `cause` in case the ORM wrapped it.
 */
export function pgErrorInfo(error: unknown): PgErrorInfo | null {
  let current: unknown = error;
  for (let depth = 0; depth < 3; depth++) {
    if (typeof current !== "object" || current === null) return null;
    if ("code" in current && typeof current.code === "string" && /^[0-9A-Z]{5}$/.test(current.code)) {
      const constraint =
        "constraint_name" in current && typeof current.constraint_name === "string"
          ? current.constraint_name
          : null;
      return { code: current.code, constraint };
    }
    current = "cause" in current ? current.cause : null;
  }
  return null;
}

function isRetryableConflict(info: PgErrorInfo | null): boolean {
  return (
    info?.code === SERIALIZATION_FAILURE ||
    info?.code === DEADLOCK_DETECTED ||
    info?.code === LOCK_NOT_AVAILABLE
  );
}

function firstRow<T>(rows: T[], what: string): T {
  const row = rows[0];
  if (!row) throw new Error(`${what} returned no row`);
  return row;
}

function createTransaction(tx: Tx): WorkflowTransaction {
  return {
    statuses: {
      async findById(statusId) {
        const rows = await tx.select().from(taskStatuses).where(eq(taskStatuses.id, statusId)).limit(1);
        return rows[0] ?? null;
      },

      async findByName(organizationId, name) {
        const rows = await tx
          .select()
          .from(taskStatuses)
          .where(and(eq(taskStatuses.organizationId, organizationId), eq(taskStatuses.name, name)))
          .limit(1);
        return rows[0] ?? null;
      },

      async listByOrganization(organizationId) {
        return tx.select().from(taskStatuses).where(eq(taskStatuses.organizationId, organizationId));
      },

      async insert(status): Promise<Status> {
        try {
          const rows = await tx.insert(taskStatuses).values(status).returning();
          return firstRow(rows, "INSERT task_statuses");
        } catch (error) {
          const info = pgErrorInfo(error);
          if (info?.code === UNIQUE_VIOLATION && info.constraint === CONSTRAINTS.statusName) {
            throw new DuplicateNameError(status.organizationId, status.name);
          }
          if (info?.code === UNIQUE_VIOLATION && info.constraint === CONSTRAINTS.oneDefault) {
            throw new ConcurrentModificationError("Default status of organization", status.organizationId);
          }
          throw error;
        }
      },

      async update(statusId, patch): Promise<Status> {
        try {
          const rows = await tx
            .update(taskStatuses)
            .set({ ...compactStatusPatch(patch), updatedAt: new Date() })
            .where(eq(taskStatuses.id, statusId))
            .returning();
          return firstRow(rows, "UPDATE task_statuses");
        } catch (error) {
          const info = pgErrorInfo(error);
          if (info?.code === UNIQUE_VIOLATION && info.constraint === CONSTRAINTS.oneDefault) {
            throw new ConcurrentModificationError("Status", statusId);
          }
          // Deactivated by another writer while being made the default
          if (info?.code === CHECK_VIOLATION && info.constraint === CONSTRAINTS.defaultIsActive) {
            throw new ConcurrentModificationError("Status", statusId);
          }
          throw error;
        }
      },

      async clearDefault(organizationId, exceptStatusId) {
        const conditions = [
          eq(taskStatuses.organizationId, organizationId),
          eq(taskStatuses.isDefault, true),
        ];
        if (exceptStatusId) conditions.push(ne(taskStatuses.id, exceptStatusId));

        await tx
          .update(taskStatuses)
          .set({ isDefault: false, updatedAt: new Date() })
          .where(and(...conditions));
      },
    },

    edges: {
      async find(organizationId, fromStatusId, toStatusId) {
        const rows = await tx
          .select()
          .from(taskWorkflowTransitions)
          .where(
            and(
              eq(taskWorkflowTransitions.organizationId, organizationId),
              eq(taskWorkflowTransitions.fromStatusId, fromStatusId),
              eq(taskWorkflowTransitions.toStatusId, toStatusId)
            )
          )
          .limit(1);
        return rows[0] ?? null;
      },

      async listByOrganization(organizationId) {
        return tx
          .select()
          .from(taskWorkflowTransitions)
          .where(eq(taskWorkflowTransitions.organizationId, organizationId));
      },

      async insert(organizationId, fromStatusId, toStatusId): Promise<TransitionEdge> {
        try {
          const rows = await tx
            .insert(taskWorkflowTransitions)
            .values({ organizationId, fromStatusId, toStatusId })
            .returning();
          return firstRow(rows, "INSERT task_workflow_transitions");
        } catch (error) {
          const info = pgErrorInfo(error);
          if (info?.code === UNIQUE_VIOLATION && info.constraint === CONSTRAINTS.edgePair) {
            throw new DuplicateEdgeError(organizationId, fromStatusId, toStatusId);
          }
          throw error;
        }
      },

      async setActive(edgeId, isActive) {
        const rows = await tx
          .update(taskWorkflowTransitions)
          .set({ isActive, updatedAt: new Date() })
          .where(eq(taskWorkflowTransitions.id, edgeId))
          .returning();
        return firstRow(rows, "UPDATE task_workflow_transitions");
      },
    },

    tasks: {
      async findById(taskId) {
        const rows = await tx.select().from(tasks).where(eq(tasks.id, taskId)).limit(1);
        return rows[0] ?? null;
      },

      async listByStatus(organizationId, statusId) {
        return tx
          .select()
          .from(tasks)
          .where(and(eq(tasks.organizationId, organizationId), eq(tasks.currentStatusId, statusId)))
          .orderBy(asc(tasks.createdAt), asc(tasks.id));
      },

      async insert(task) {
        const id = task.id ?? randomUUID();
        try {
          const rows = await tx
            .insert(tasks)
            .values({ id, organizationId: task.organizationId, currentStatusId: task.currentStatusId })
            .returning();
          return firstRow(rows, "INSERT tasks");
        } catch (error) {
          const info = pgErrorInfo(error);
          if (info?.code === UNIQUE_VIOLATION && info.constraint === CONSTRAINTS.taskId) {
            throw new DuplicateTaskError(id);
          }
          throw error;
        }
      },

      async compareAndSetStatus(taskId, expectedVersion, toStatusId) {
        const rows = await tx
          .update(tasks)
          .set({ currentStatusId: toStatusId, version: expectedVersion + 1, updatedAt: new Date() })
          .where(and(eq(tasks.id, taskId), eq(tasks.version, expectedVersion)))
          .returning();
        return rows[0] ?? null;
      },
    },

    audit: {
      async append(record) {
        const rows = await tx.insert(taskStatusTransitions).values(record).returning();
        return firstRow(rows, "INSERT task_status_transitions");
      },

      async listByTask(taskId) {
        return tx
          .select()
          .from(taskStatusTransitions)
          .where(eq(taskStatusTransitions.taskId, taskId))
          .orderBy(asc(taskStatusTransitions.changedAt), asc(taskStatusTransitions.sequence));
      },

      async latestForTask(taskId) {
        const rows = await tx
          .select()
          .from(taskStatusTransitions)
          .where(eq(taskStatusTransitions.taskId, taskId))
          .orderBy(desc(taskStatusTransitions.changedAt), desc(taskStatusTransitions.sequence))
          .limit(1);
        return rows[0] ?? null;
      },
    },
  };
}

/**
 * Creates a WorkflowStore on the given Drizzle instance, or on the one
 * initDatabase() set up.
 */
export function createPostgresWorkflowStore(db?: PostgresJsDatabase): WorkflowStore {
  const database = db ?? getDatabase().db;

  return {
    name: "postgres",

    async transaction(work) {
      try {
        return await database.transaction((tx) => work(createTransaction(tx)));
      } catch (error) {
        if (isRetryableConflict(pgErrorInfo(error))) {
          throw new ConcurrentModificationError("Transaction", "serialization");
        }
        throw error;
      }
    },

    async close() {
      // The connection is shared; closeDatabase() owns its lifecycle.
    },
  };
}
