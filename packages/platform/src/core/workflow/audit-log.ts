/**
 * Audit Log
 *
 * The append-only history of every realized status change. A record is
 * written exactly once, inside the same unit of work that moves the task,
 * and never updated or deleted afterwards.
 *
 * Per task, records are ordered by changedAt and then by insertion
 * sequence. Timestamps never go backwards within a task: a clock that
 * reads earlier than the task's last record is clamped to it.
 */

import type { AuditRecord } from "@statusflow/contracts";
import { TaskNotFoundError } from "./errors.js";
import type { NewAuditRecord, WorkflowStore, WorkflowTransaction } from "./store.js";
import { runUnitOfWork } from "./unit-of-work.js";

export interface HistoryOptions {
  /** Treat tasks of any other organization as not found */
  organizationId?: string;
}

export class AuditLog {
  constructor(private readonly store: WorkflowStore) {}

  /**
   * Appends a record inside the caller's unit of work. This is the only
   * way a record is ever written.
   */
  async append(tx: WorkflowTransaction, record: NewAuditRecord): Promise<AuditRecord> {
    const latest = await tx.audit.latestForTask(record.taskId);
    const changedAt =
      latest && latest.changedAt.getTime() > record.changedAt.getTime()
        ? new Date(latest.changedAt.getTime())
        : record.changedAt;

    return tx.audit.append({ ...record, changedAt });
  }

  /**
   * A task's full history, oldest first. Each record's fromStatusId is the
   * previous record's toStatusId.
   */
  async history(taskId: string, options: HistoryOptions = {}): Promise<AuditRecord[]> {
    return runUnitOfWork(this.store, async (tx) => {
      const task = await tx.tasks.findById(taskId);
      if (!task || (options.organizationId !== undefined && task.organizationId !== options.organizationId)) {
        throw new TaskNotFoundError(taskId);
      }
      return tx.audit.listByTask(taskId);
    });
  }

  /**
   * The status the log says the task is in: the target of its last
   * record, or null when it has never moved. Agrees with the task's
   * current status unless it was seeded and has not moved since.
   */
  async replay(taskId: string): Promise<string | null> {
    const records = await this.history(taskId);
    const last = records[records.length - 1];
    return last ? last.toStatusId : null;
  }
}
