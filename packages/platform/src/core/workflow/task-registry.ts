/**
 * Task Registry
 *
 * The engine's side of task creation. Tasks themselves live in the
 * surrounding system; the engine keeps the id, the organization, the
 * current status and a version counter.
 *
 * A new task is seeded with an explicit initial status or the
 * organization's default. Seeding is not a transition and writes no
 * audit record. Without either, the task starts with no status and its
 * first transition is recorded with fromStatusId = null.
 */

import type { Logger, TaskRecord } from "@statusflow/contracts";
import { DuplicateTaskError, InactiveStatusError, TaskNotFoundError } from "./errors.js";
import { requireStatus } from "./status-catalog.js";
import type { WorkflowStore } from "./store.js";
import { runUnitOfWork } from "./unit-of-work.js";

export interface CreateTaskOptions {
  /** Use this id instead of generating one */
  id?: string;
  /** Must be an active status of the organization */
  initialStatusId?: string;
}

export class TaskRegistry {
  constructor(
    private readonly store: WorkflowStore,
    private readonly logger: Logger
  ) {}

  async createTask(organizationId: string, options: CreateTaskOptions = {}): Promise<TaskRecord> {
    const task = await runUnitOfWork(this.store, async (tx) => {
      if (options.id !== undefined && (await tx.tasks.findById(options.id))) {
        throw new DuplicateTaskError(options.id);
      }

      let currentStatusId: string | null = null;

      if (options.initialStatusId !== undefined) {
        const status = await requireStatus(tx, organizationId, options.initialStatusId);
        if (!status.isActive) throw new InactiveStatusError(status.id, status.name);
        currentStatusId = status.id;
      } else {
        const statuses = await tx.statuses.listByOrganization(organizationId);
        currentStatusId = statuses.find((s) => s.isDefault && s.isActive)?.id ?? null;
      }

      return tx.tasks.insert({ id: options.id, organizationId, currentStatusId });
    });

    this.logger.info("Task registered", {
      organizationId,
      taskId: task.id,
      currentStatusId: task.currentStatusId,
    });
    return task;
  }

  /**
   * Tasks currently sitting in a status, oldest first. Works for inactive
   * statuses too, which is how callers find tasks left behind by a
   * deactivation.
   */
  async listByStatus(organizationId: string, statusId: string): Promise<TaskRecord[]> {
    return runUnitOfWork(this.store, async (tx) => {
      await requireStatus(tx, organizationId, statusId);
      return tx.tasks.listByStatus(organizationId, statusId);
    });
  }

  async getTask(taskId: string, organizationId?: string): Promise<TaskRecord> {
    return runUnitOfWork(this.store, async (tx) => {
      const task = await tx.tasks.findById(taskId);
      if (!task || (organizationId !== undefined && task.organizationId !== organizationId)) {
        throw new TaskNotFoundError(taskId);
      }
      return task;
    });
  }
}
