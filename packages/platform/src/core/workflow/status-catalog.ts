/**
 * Status Catalog
 *
 * Owns each organization's set of statuses. Statuses are never deleted:
 * deactivation takes a status out of circulation as a new target while
 * every task, edge and audit record that references it keeps resolving.
 *
 * Invariant: at most one status per organization has isDefault = true.
 * Making a status the default clears the flag everywhere else in the
 * same unit of work.
 */

import type { CreateStatusInput, Logger, Status, UpdateStatusInput } from "@statusflow/contracts";
import type { WorkflowCache } from "./cache.js";
import { DuplicateNameError, InactiveStatusError, UnknownStatusError } from "./errors.js";
import { compactStatusPatch, type StatusPatch, type WorkflowStore, type WorkflowTransaction } from "./store.js";
import { runUnitOfWork } from "./unit-of-work.js";

/** orderIndex ascending, then id, so equal indexes still list stably */
export function compareStatuses(a: Status, b: Status): number {
  return a.orderIndex - b.orderIndex || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

export function sortStatuses(statuses: Status[]): Status[] {
  return [...statuses].sort(compareStatuses);
}

/**
 * Loads a status and checks it belongs to the organization.
 * A status of another organization is reported as unknown.
 */
export async function requireStatus(
  tx: WorkflowTransaction,
  organizationId: string,
  statusId: string
): Promise<Status> {
  const status = await tx.statuses.findById(statusId);
  if (!status || status.organizationId !== organizationId) {
    throw new UnknownStatusError(organizationId, statusId);
  }
  return status;
}

/**
 * Inserts a status inside an existing unit of work. Shared with bulk
 * setup so both paths enforce the same rules.
 */
export async function insertStatus(
  tx: WorkflowTransaction,
  organizationId: string,
  input: CreateStatusInput
): Promise<Status> {
  if (await tx.statuses.findByName(organizationId, input.name)) {
    throw new DuplicateNameError(organizationId, input.name);
  }

  let orderIndex = input.orderIndex;
  if (orderIndex === undefined) {
    const existing = await tx.statuses.listByOrganization(organizationId);
    orderIndex = existing.reduce((max, s) => Math.max(max, s.orderIndex + 1), 0);
  }

  const isDefault = input.isDefault ?? false;
  if (isDefault) {
    await tx.statuses.clearDefault(organizationId, null);
  }

  return tx.statuses.insert({
    organizationId,
    name: input.name,
    displayName: input.displayName,
    color: input.color ?? null,
    orderIndex,
    isActive: true,
    isDefault,
  });
}

export class StatusCatalog {
  constructor(
    private readonly store: WorkflowStore,
    private readonly cache: WorkflowCache,
    private readonly logger: Logger
  ) {}

  /**
   * Creates a status. Without an orderIndex it is placed after every
   * existing status of the organization.
   */
  async createStatus(organizationId: string, input: CreateStatusInput): Promise<Status> {
    const status = await runUnitOfWork(this.store, (tx) => insertStatus(tx, organizationId, input));

    this.cache.invalidate(organizationId);
    this.logger.info("Status created", {
      organizationId,
      statusId: status.id,
      name: status.name,
      isDefault: status.isDefault,
    });
    return status;
  }

  /** Scoped lookup; a status of another organization is unknown. */
  async getStatus(organizationId: string, statusId: string): Promise<Status> {
    return runUnitOfWork(this.store, (tx) => requireStatus(tx, organizationId, statusId));
  }

  async getDefaultStatus(organizationId: string): Promise<Status | null> {
    const statuses = await this.loadAll(organizationId);
    return statuses.find((s) => s.isDefault && s.isActive) ?? null;
  }

  /**
   * Active statuses, ordered by orderIndex then id.
   */
  async listActive(organizationId: string): Promise<Status[]> {
    const statuses = await this.loadAll(organizationId);
    return sortStatuses(statuses.filter((s) => s.isActive));
  }

  /** Active and inactive, same ordering as listActive. */
  async listAll(organizationId: string): Promise<Status[]> {
    return sortStatuses(await this.loadAll(organizationId));
  }

  /**
   * Patches a status. `name` cannot change.
   *
   * Making it the default clears every other default. Deactivating the
   * default status leaves the organization without one, since an inactive
   * status cannot seed new tasks.
   */
  async updateStatus(
    organizationId: string,
    statusId: string,
    input: UpdateStatusInput
  ): Promise<Status> {
    const updated = await runUnitOfWork(this.store, async (tx) => {
      const current = await requireStatus(tx, organizationId, statusId);
      const patch: StatusPatch = compactStatusPatch(input);

      const willBeActive = patch.isActive ?? current.isActive;
      if (patch.isDefault === true && !willBeActive) {
        throw new InactiveStatusError(current.id, current.name);
      }
      if (!willBeActive && current.isDefault) {
        patch.isDefault = false;
      }
      if (patch.isDefault === true) {
        await tx.statuses.clearDefault(organizationId, current.id);
      }

      return tx.statuses.update(current.id, patch);
    });

    this.cache.invalidate(organizationId);
    this.logger.info("Status updated", {
      organizationId,
      statusId,
      fields: Object.keys(compactStatusPatch(input)),
    });
    return updated;
  }

  /**
   * Soft-disables a status. No cascade: tasks sitting in it stay there and
   * can still leave along its outgoing edges; it just stops being a target.
   * Idempotent. Pass `organizationId` to scope the lookup.
   */
  async deactivate(statusId: string, organizationId?: string): Promise<Status> {
    const status = await runUnitOfWork(this.store, async (tx) => {
      const current = await tx.statuses.findById(statusId);
      if (!current || (organizationId !== undefined && current.organizationId !== organizationId)) {
        throw new UnknownStatusError(organizationId ?? null, statusId);
      }
      if (!current.isActive) return current;

      return tx.statuses.update(current.id, { isActive: false, isDefault: false });
    });

    this.cache.invalidate(status.organizationId);
    this.logger.info("Status deactivated", { organizationId: status.organizationId, statusId });
    return status;
  }

  private loadAll(organizationId: string): Promise<Status[]> {
    return this.cache.getStatuses(organizationId, () =>
      runUnitOfWork(this.store, (tx) => tx.statuses.listByOrganization(organizationId))
    );
  }
}
