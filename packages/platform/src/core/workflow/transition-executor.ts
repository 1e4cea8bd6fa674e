/**
 * Transition Executor
 *
 * Moves a task to a new status. One call is one unit of work:
 *
 *   1. Load the task (scoped to an organization if the caller asks)
 *   2. Load the target status within the task's organization; it must
 *      exist and be active
 *   3. Check the move against the graph: an active edge from the current
 *      status, or no current status at all
 *   4. Compare-and-swap the task's status on the version read in step 1
 *   5. Append the audit record
 *
 * 4 and 5 commit together or not at all. A lost race (another writer
 * moved the task in between) re-runs the whole unit of work, so the retry
 * is validated against wherever the task is now. After commit a
 * `task.status_changed` event is published; what subscribers do with it
 * cannot affect the transition.
 */

import type { AuditRecord, DomainEvent, Logger } from "@statusflow/contracts";
import type { AuditLog } from "./audit-log.js";
import {
  ConcurrentModificationError,
  IllegalTransitionError,
  InactiveStatusError,
  TaskNotFoundError,
  UnknownStatusError,
} from "./errors.js";
import { withConflictRetry } from "./retry.js";
import type { WorkflowStore, WorkflowTransaction } from "./store.js";
import { allowedTargets } from "./transition-graph.js";
import { runUnitOfWork } from "./unit-of-work.js";

export const TASK_STATUS_CHANGED = "task.status_changed";

export interface TransitionOptions {
  /** Free-text reason stored on the audit record */
  note?: string | null;
  /** Reject tasks that belong to any other organization */
  organizationId?: string;
  /** Aborting before commit leaves no trace */
  signal?: AbortSignal;
}

export interface TransitionExecutorOptions {
  store: WorkflowStore;
  audit: AuditLog;
  logger: Logger;
  maxRetries: number;
  retryDelayMs: number;
  emit: (event: DomainEvent) => Promise<void>;
  now?: () => Date;
}

export class TransitionExecutor {
  private readonly now: () => Date;

  constructor(private readonly options: TransitionExecutorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async applyTransition(
    taskId: string,
    toStatusId: string,
    actorId: string,
    options: TransitionOptions = {}
  ): Promise<AuditRecord> {
    const { store, logger, maxRetries, retryDelayMs } = this.options;
    const { signal } = options;

    const record = await withConflictRetry(
      () => runUnitOfWork(store, (tx) => this.transitionOnce(tx, taskId, toStatusId, actorId, options), signal),
      {
        maxRetries,
        delayMs: retryDelayMs,
        signal,
        onRetry: (attempt, error) => {
          logger.warn("Transition lost a race, retrying", {
            taskId,
            toStatusId,
            attempt,
            resource: error.resource,
          });
        },
      }
    );

    logger.info("Task status changed", {
      organizationId: record.organizationId,
      taskId,
      fromStatusId: record.fromStatusId,
      toStatusId: record.toStatusId,
      actorId,
      auditRecordId: record.id,
    });

    await this.publishChange(record);
    return record;
  }

  private async transitionOnce(
    tx: WorkflowTransaction,
    taskId: string,
    toStatusId: string,
    actorId: string,
    options: TransitionOptions
  ): Promise<AuditRecord> {
    options.signal?.throwIfAborted();

    const task = await tx.tasks.findById(taskId);
    if (!task || (options.organizationId !== undefined && task.organizationId !== options.organizationId)) {
      throw new TaskNotFoundError(taskId);
    }
    const organizationId = task.organizationId;

    const target = await tx.statuses.findById(toStatusId);
    if (!target || target.organizationId !== organizationId) {
      throw new UnknownStatusError(organizationId, toStatusId);
    }
    if (!target.isActive) {
      throw new InactiveStatusError(target.id, target.name);
    }

    const fromStatusId = task.currentStatusId;
    if (fromStatusId !== null) {
      const edge = await tx.edges.find(organizationId, fromStatusId, toStatusId);
      if (!edge?.isActive) {
        const [statuses, edges] = await Promise.all([
          tx.statuses.listByOrganization(organizationId),
          tx.edges.listByOrganization(organizationId),
        ]);
        throw new IllegalTransitionError(
          taskId,
          fromStatusId,
          toStatusId,
          allowedTargets(statuses, edges, fromStatusId).map((s) => s.id)
        );
      }
    }

    const moved = await tx.tasks.compareAndSetStatus(task.id, task.version, toStatusId);
    if (!moved) {
      throw new ConcurrentModificationError("Task", task.id);
    }

    const record = await this.options.audit.append(tx, {
      organizationId,
      taskId: task.id,
      fromStatusId,
      toStatusId,
      actorId,
      changedAt: this.now(),
      note: options.note ?? null,
    });

    // Last point at which an abort still rolls everything back
    options.signal?.throwIfAborted();
    return record;
  }

  private async publishChange(record: AuditRecord): Promise<void> {
    try {
      await this.options.emit({
        type: TASK_STATUS_CHANGED,
        payload: {
          organizationId: record.organizationId,
          taskId: record.taskId,
          fromStatusId: record.fromStatusId,
          toStatusId: record.toStatusId,
          actorId: record.actorId,
          auditRecordId: record.id,
          changedAt: record.changedAt.toISOString(),
          note: record.note,
        },
        timestamp: record.changedAt,
      });
    } catch (error) {
      // Committed already; the event is best-effort
      this.options.logger.warn("Failed to publish task.status_changed", {
        taskId: record.taskId,
        error,
      });
    }
  }
}
