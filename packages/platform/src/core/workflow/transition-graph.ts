/**
 * Transition Graph
 *
 * Each organization's allow-list of status-to-status moves. A plain
 * directed graph: cycles, branches and self-loops are all fine, and only
 * direct edges are ever consulted (no reachability).
 *
 * There is at most one edge record per ordered pair. Deactivating keeps
 * the record; adding the pair again reactivates it.
 */

import type { Logger, Status, TransitionEdge } from "@statusflow/contracts";
import type { WorkflowCache } from "./cache.js";
import { CrossOrgReferenceError, DuplicateEdgeError } from "./errors.js";
import { sortStatuses } from "./status-catalog.js";
import type { WorkflowStore, WorkflowTransaction } from "./store.js";
import { runUnitOfWork } from "./unit-of-work.js";

export interface ListEdgesOptions {
  includeInactive?: boolean;
}

/** Creation order, then id */
export function sortEdges(edges: TransitionEdge[]): TransitionEdge[] {
  return [...edges].sort(
    (a, b) =>
      a.createdAt.getTime() - b.createdAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

/**
 * Ensures a status belongs to the organization that is about to reference
 * it. An id that exists nowhere does not belong to it either.
 */
async function requireOwnStatus(
  tx: WorkflowTransaction,
  organizationId: string,
  statusId: string
): Promise<Status> {
  const status = await tx.statuses.findById(statusId);
  if (!status || status.organizationId !== organizationId) {
    throw new CrossOrgReferenceError(organizationId, statusId);
  }
  return status;
}

/**
 * Adds or reactivates an edge inside an existing unit of work.
 * Shared with bulk setup.
 */
export async function insertEdge(
  tx: WorkflowTransaction,
  organizationId: string,
  fromStatusId: string,
  toStatusId: string
): Promise<TransitionEdge> {
  await requireOwnStatus(tx, organizationId, fromStatusId);
  await requireOwnStatus(tx, organizationId, toStatusId);

  const existing = await tx.edges.find(organizationId, fromStatusId, toStatusId);
  if (existing?.isActive) {
    throw new DuplicateEdgeError(organizationId, fromStatusId, toStatusId);
  }
  if (existing) {
    return tx.edges.setActive(existing.id, true);
  }
  return tx.edges.insert(organizationId, fromStatusId, toStatusId);
}

/**
 * The statuses a task in `fromStatusId` may move to: targets of active
 * edges that are themselves active. For a task with no status yet, every
 * active status.
 */
export function allowedTargets(
  statuses: Status[],
  edges: TransitionEdge[],
  fromStatusId: string | null
): Status[] {
  const active = statuses.filter((s) => s.isActive);
  if (fromStatusId === null) return sortStatuses(active);

  const targetIds = new Set(
    edges.filter((e) => e.isActive && e.fromStatusId === fromStatusId).map((e) => e.toStatusId)
  );
  return sortStatuses(active.filter((s) => targetIds.has(s.id)));
}

export class TransitionGraph {
  constructor(
    private readonly store: WorkflowStore,
    private readonly cache: WorkflowCache,
    private readonly logger: Logger
  ) {}

  /**
   * Allows moving from one status to another.
   * Re-adding a deactivated edge reactivates the same record.
   */
  async addEdge(organizationId: string, fromStatusId: string, toStatusId: string): Promise<TransitionEdge> {
    const edge = await runUnitOfWork(this.store, (tx) =>
      insertEdge(tx, organizationId, fromStatusId, toStatusId)
    );

    this.cache.invalidate(organizationId);
    this.logger.info("Transition added", { organizationId, edgeId: edge.id, fromStatusId, toStatusId });
    return edge;
  }

  /**
   * Idempotent. Returns the (now inactive) edge, or null if the pair was
   * never allowed.
   */
  async deactivateEdge(
    organizationId: string,
    fromStatusId: string,
    toStatusId: string
  ): Promise<TransitionEdge | null> {
    const edge = await runUnitOfWork(this.store, async (tx) => {
      const existing = await tx.edges.find(organizationId, fromStatusId, toStatusId);
      if (!existing || !existing.isActive) return existing;
      return tx.edges.setActive(existing.id, false);
    });

    if (edge) {
      this.cache.invalidate(organizationId);
      this.logger.info("Transition deactivated", { organizationId, edgeId: edge.id });
    }
    return edge;
  }

  /**
   * Whether a task may move between the two statuses. A task with no
   * status yet may enter any active status of its organization.
   */
  async isAllowed(organizationId: string, fromStatusId: string | null, toStatusId: string): Promise<boolean> {
    if (fromStatusId === null) {
      const statuses = await this.loadStatuses(organizationId);
      return statuses.some((s) => s.id === toStatusId && s.isActive);
    }

    const edges = await this.loadEdges(organizationId);
    return edges.some(
      (e) => e.isActive && e.fromStatusId === fromStatusId && e.toStatusId === toStatusId
    );
  }

  /** Active targets of active edges out of a status, ordered like listActive. */
  async listOutgoing(organizationId: string, fromStatusId: string): Promise<Status[]> {
    const [statuses, edges] = await Promise.all([
      this.loadStatuses(organizationId),
      this.loadEdges(organizationId),
    ]);
    return allowedTargets(statuses, edges, fromStatusId);
  }

  /** Active edges (or all of them), in creation order */
  async listEdges(organizationId: string, options: ListEdgesOptions = {}): Promise<TransitionEdge[]> {
    const edges = await this.loadEdges(organizationId);
    return sortEdges(edges.filter((e) => options.includeInactive || e.isActive));
  }

  private loadStatuses(organizationId: string): Promise<Status[]> {
    return this.cache.getStatuses(organizationId, () =>
      runUnitOfWork(this.store, (tx) => tx.statuses.listByOrganization(organizationId))
    );
  }

  private loadEdges(organizationId: string): Promise<TransitionEdge[]> {
    return this.cache.getEdges(organizationId, () =>
      runUnitOfWork(this.store, (tx) => tx.edges.listByOrganization(organizationId))
    );
  }
}
