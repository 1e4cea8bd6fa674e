/**
 * Workflow Read Cache
 *
 * Per-organization cache of statuses and edges for the read-only query
 * paths (listActive, listOutgoing, getDefaultStatus, getWorkflow).
 * Transitions never read through it: the executor validates against the
 * store inside its own unit of work.
 *
 * Entries expire after `ttlMs` and are dropped whenever the catalog or
 * graph of their organization is written. A load that started before an
 * invalidation does not repopulate the cache with what it read.
 */

import type { Status, TransitionEdge } from "@statusflow/contracts";

/** Callers get their own copy of every row; cached rows are never handed out. */
function copyRows<T extends object>(rows: T[]): T[] {
  return rows.map((row) => ({ ...row }));
}

interface CacheEntry<T> {
  data: T[];
  fetchedAt: number;
}

export class WorkflowCache {
  private statuses = new Map<string, CacheEntry<Status>>();
  private edges = new Map<string, CacheEntry<TransitionEdge>>();
  /** Bumped on every invalidation of an organization */
  private generations = new Map<string, number>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  getStatuses(organizationId: string, load: () => Promise<Status[]>): Promise<Status[]> {
    return this.readThrough(this.statuses, organizationId, load);
  }

  getEdges(organizationId: string, load: () => Promise<TransitionEdge[]>): Promise<TransitionEdge[]> {
    return this.readThrough(this.edges, organizationId, load);
  }

  /** Drops everything cached for one organization. */
  invalidate(organizationId: string): void {
    this.statuses.delete(organizationId);
    this.edges.delete(organizationId);
    this.generations.set(organizationId, this.generationOf(organizationId) + 1);
  }

  clear(): void {
    this.statuses.clear();
    this.edges.clear();
    this.generations.clear();
  }

  private generationOf(organizationId: string): number {
    return this.generations.get(organizationId) ?? 0;
  }

  private async readThrough<T extends object>(
    entries: Map<string, CacheEntry<T>>,
    organizationId: string,
    load: () => Promise<T[]>
  ): Promise<T[]> {
    if (!this.enabled) return load();

    const entry = entries.get(organizationId);
    if (entry && this.now() - entry.fetchedAt < this.ttlMs) {
      return copyRows(entry.data);
    }

    const generation = this.generationOf(organizationId);
    const fetchedAt = this.now();
    const data = await load();

    if (this.generationOf(organizationId) === generation) {
      entries.set(organizationId, { data: copyRows(data), fetchedAt });
    }
    return data;
  }
}
