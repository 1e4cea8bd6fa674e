/**
 * In-Memory Workflow Store
 *
 * A WorkflowStore that keeps everything in process memory. Used by tests
 * and when no DATABASE_URL is configured.
 *
 * Transactions are snapshot-isolated: each one works on a private copy of
 * the committed state and records every write as a mutation. On commit the
 * mutations are replayed onto the then-current state, re-checking unique
 * constraints and task versions, so two transactions that raced each other
 * behave the way they would against PostgreSQL. Replay is synchronous, so
 * commits never interleave.
 */

import { randomUUID } from "node:crypto";
import type { AuditRecord, Status, TaskRecord, TransitionEdge } from "@statusflow/contracts";
import {
  ConcurrentModificationError,
  DuplicateEdgeError,
  DuplicateNameError,
  DuplicateTaskError,
} from "./errors.js";
import {
  compactStatusPatch,
  type NewAuditRecord,
  type NewStatus,
  type NewTask,
  type StatusPatch,
  type WorkflowStore,
  type WorkflowTransaction,
} from "./store.js";

interface MemoryState {
  statuses: Map<string, Status>;
  edges: Map<string, TransitionEdge>;
  tasks: Map<string, TaskRecord>;
  audit: AuditRecord[];
}

type Mutation =
  | { kind: "status.insert"; status: Status }
  | { kind: "status.update"; statusId: string; patch: StatusPatch; at: Date }
  | { kind: "status.clearDefault"; organizationId: string; exceptStatusId: string | null; at: Date }
  | { kind: "edge.insert"; edge: TransitionEdge }
  | { kind: "edge.setActive"; edgeId: string; isActive: boolean; at: Date }
  | { kind: "task.insert"; task: TaskRecord }
  | { kind: "task.setStatus"; taskId: string; expectedVersion: number; toStatusId: string; at: Date }
  | { kind: "audit.append"; record: AuditRecord };

function emptyState(): MemoryState {
  return { statuses: new Map(), edges: new Map(), tasks: new Map(), audit: [] };
}

/** Rows are replaced, never mutated, so copying the maps is enough. */
function cloneState(state: MemoryState): MemoryState {
  return {
    statuses: new Map(state.statuses),
    edges: new Map(state.edges),
    tasks: new Map(state.tasks),
    audit: [...state.audit],
  };
}

function mustGet<T>(map: Map<string, T>, id: string, label: string): T {
  const row = map.get(id);
  if (!row) throw new Error(`${label} ${id} does not exist`);
  return row;
}

/**
 * Applies one mutation, enforcing the same constraints the PostgreSQL
 * schema does. Used both inside a transaction and when replaying on commit.
 */
function applyMutation(state: MemoryState, mutation: Mutation): void {
  switch (mutation.kind) {
    case "status.insert": {
      const { status } = mutation;
      for (const existing of state.statuses.values()) {
        if (existing.organizationId === status.organizationId && existing.name === status.name) {
          throw new DuplicateNameError(status.organizationId, status.name);
        }
      }
      state.statuses.set(status.id, status);
      return;
    }

    case "status.update": {
      const current = mustGet(state.statuses, mutation.statusId, "Status");
      const next: Status = { ...current, ...mutation.patch, updatedAt: mutation.at };
      // Only an active status may be the default
      if (next.isDefault && !next.isActive) {
        throw new ConcurrentModificationError("Status", current.id);
      }
      state.statuses.set(current.id, next);
      return;
    }

    case "status.clearDefault": {
      for (const status of state.statuses.values()) {
        if (
          status.organizationId === mutation.organizationId &&
          status.isDefault &&
          status.id !== mutation.exceptStatusId
        ) {
          state.statuses.set(status.id, { ...status, isDefault: false, updatedAt: mutation.at });
        }
      }
      return;
    }

    case "edge.insert": {
      const { edge } = mutation;
      for (const existing of state.edges.values()) {
        if (
          existing.organizationId === edge.organizationId &&
          existing.fromStatusId === edge.fromStatusId &&
          existing.toStatusId === edge.toStatusId
        ) {
          throw new DuplicateEdgeError(edge.organizationId, edge.fromStatusId, edge.toStatusId);
        }
      }
      state.edges.set(edge.id, edge);
      return;
    }

    case "edge.setActive": {
      const current = mustGet(state.edges, mutation.edgeId, "Edge");
      state.edges.set(current.id, { ...current, isActive: mutation.isActive, updatedAt: mutation.at });
      return;
    }

    case "task.insert": {
      if (state.tasks.has(mutation.task.id)) {
        throw new DuplicateTaskError(mutation.task.id);
      }
      state.tasks.set(mutation.task.id, mutation.task);
      return;
    }

    case "task.setStatus": {
      const current = mustGet(state.tasks, mutation.taskId, "Task");
      if (current.version !== mutation.expectedVersion) {
        throw new ConcurrentModificationError("Task", mutation.taskId);
      }
      state.tasks.set(current.id, {
        ...current,
        currentStatusId: mutation.toStatusId,
        version: current.version + 1,
        updatedAt: mutation.at,
      });
      return;
    }

    case "audit.append": {
      state.audit.push(mutation.record);
      return;
    }
  }
}

/** Records in a task's history order: changedAt, then insertion sequence. */
function compareAuditRecords(a: AuditRecord, b: AuditRecord): number {
  return a.changedAt.getTime() - b.changedAt.getTime() || a.sequence - b.sequence;
}

export class InMemoryWorkflowStore implements WorkflowStore {
  readonly name = "memory";
  private state: MemoryState = emptyState();
  private nextSequence = 1;

  async transaction<T>(work: (tx: WorkflowTransaction) => Promise<T>): Promise<T> {
    const draft = cloneState(this.state);
    const mutations: Mutation[] = [];

    const write = (mutation: Mutation) => {
      applyMutation(draft, mutation);
      mutations.push(mutation);
    };

    const result = await work(this.createTransaction(draft, write));

    // Commit: replay onto whatever is committed now
    const next = cloneState(this.state);
    for (const mutation of mutations) {
      applyMutation(next, mutation);
    }
    this.state = next;

    return result;
  }

  async close(): Promise<void> {
    this.state = emptyState();
  }

  private createTransaction(
    draft: MemoryState,
    write: (mutation: Mutation) => void
  ): WorkflowTransaction {
    return {
      statuses: {
        async findById(statusId) {
          const status = draft.statuses.get(statusId);
          return status ? { ...status } : null;
        },

        async findByName(organizationId, name) {
          for (const status of draft.statuses.values()) {
            if (status.organizationId === organizationId && status.name === name) {
              return { ...status };
            }
          }
          return null;
        },

        async listByOrganization(organizationId) {
          return [...draft.statuses.values()]
            .filter((s) => s.organizationId === organizationId)
            .map((s) => ({ ...s }));
        },

        async insert(input: NewStatus) {
          const now = new Date();
          const status: Status = { ...input, id: randomUUID(), createdAt: now, updatedAt: now };
          write({ kind: "status.insert", status });
          return { ...status };
        },

        async update(statusId, patch) {
          write({ kind: "status.update", statusId, patch: compactStatusPatch(patch), at: new Date() });
          return { ...mustGet(draft.statuses, statusId, "Status") };
        },

        async clearDefault(organizationId, exceptStatusId) {
          write({ kind: "status.clearDefault", organizationId, exceptStatusId, at: new Date() });
        },
      },

      edges: {
        async find(organizationId, fromStatusId, toStatusId) {
          for (const edge of draft.edges.values()) {
            if (
              edge.organizationId === organizationId &&
              edge.fromStatusId === fromStatusId &&
              edge.toStatusId === toStatusId
            ) {
              return { ...edge };
            }
          }
          return null;
        },

        async listByOrganization(organizationId) {
          return [...draft.edges.values()]
            .filter((e) => e.organizationId === organizationId)
            .map((e) => ({ ...e }));
        },

        async insert(organizationId, fromStatusId, toStatusId) {
          const now = new Date();
          const edge: TransitionEdge = {
            id: randomUUID(),
            organizationId,
            fromStatusId,
            toStatusId,
            isActive: true,
            createdAt: now,
            updatedAt: now,
          };
          write({ kind: "edge.insert", edge });
          return { ...edge };
        },

        async setActive(edgeId, isActive) {
          write({ kind: "edge.setActive", edgeId, isActive, at: new Date() });
          return { ...mustGet(draft.edges, edgeId, "Edge") };
        },
      },

      tasks: {
        async findById(taskId) {
          const task = draft.tasks.get(taskId);
          return task ? { ...task } : null;
        },

        async listByStatus(organizationId, statusId) {
          return [...draft.tasks.values()]
            .filter((t) => t.organizationId === organizationId && t.currentStatusId === statusId)
            .sort(
              (a, b) =>
                a.createdAt.getTime() - b.createdAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
            )
            .map((t) => ({ ...t }));
        },

        async insert(input: NewTask) {
          const now = new Date();
          const task: TaskRecord = {
            id: input.id ?? randomUUID(),
            organizationId: input.organizationId,
            currentStatusId: input.currentStatusId,
            version: 0,
            createdAt: now,
            updatedAt: now,
          };
          write({ kind: "task.insert", task });
          return { ...task };
        },

        async compareAndSetStatus(taskId, expectedVersion, toStatusId) {
          const current = draft.tasks.get(taskId);
          if (!current || current.version !== expectedVersion) return null;
          write({ kind: "task.setStatus", taskId, expectedVersion, toStatusId, at: new Date() });
          return { ...mustGet(draft.tasks, taskId, "Task") };
        },
      },

      audit: {
        append: async (input: NewAuditRecord) => {
          const record: AuditRecord = { ...input, id: randomUUID(), sequence: this.nextSequence++ };
          write({ kind: "audit.append", record });
          return { ...record };
        },

        async listByTask(taskId) {
          return draft.audit
            .filter((r) => r.taskId === taskId)
            .sort(compareAuditRecords)
            .map((r) => ({ ...r }));
        },

        async latestForTask(taskId) {
          const records = draft.audit.filter((r) => r.taskId === taskId).sort(compareAuditRecords);
          const last = records[records.length - 1];
          return last ? { ...last } : null;
        },
      },
    };
  }
}
