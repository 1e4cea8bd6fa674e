/**
 * Workflow Store
 *
 * The persistence contract the engine runs on. A store hands out
 * transactions; everything done through one transaction commits together
 * or not at all.
 *
 * What a store must guarantee:
 *   - Atomic multi-row commit (task status update + audit insert)
 *   - Optimistic versioning on tasks: compareAndSetStatus only succeeds
 *     against the version that was read, and a lost race surfaces as
 *     ConcurrentModificationError by commit time at the latest
 *   - Unique (organization, status name), unique (organization, from, to)
 *     and at most one default status per organization, enforced at commit
 *     even against concurrent writers
 *
 * Implementations: PostgreSQL (postgres-store.ts) and in-memory
 * (memory-store.ts).
 */

import type { AuditRecord, Status, TaskRecord, TransitionEdge } from "@statusflow/contracts";

export interface NewStatus {
  organizationId: string;
  name: string;
  displayName: string;
  color: string | null;
  orderIndex: number;
  isActive: boolean;
  isDefault: boolean;
}

export type StatusPatch = Partial<
  Pick<Status, "displayName" | "color" | "orderIndex" | "isActive" | "isDefault">
>;

/** Drops undefined keys so applying a patch never blanks a field. */
export function compactStatusPatch(patch: StatusPatch): StatusPatch {
  const out: StatusPatch = {};
  if (patch.displayName !== undefined) out.displayName = patch.displayName;
  if (patch.color !== undefined) out.color = patch.color;
  if (patch.orderIndex !== undefined) out.orderIndex = patch.orderIndex;
  if (patch.isActive !== undefined) out.isActive = patch.isActive;
  if (patch.isDefault !== undefined) out.isDefault = patch.isDefault;
  return out;
}

export interface NewTask {
  /** Supplied by the surrounding system, or generated by the store */
  id?: string;
  organizationId: string;
  currentStatusId: string | null;
}

export interface NewAuditRecord {
  organizationId: string;
  taskId: string;
  fromStatusId: string | null;
  toStatusId: string;
  actorId: string;
  changedAt: Date;
  note: string | null;
}

export interface StatusRepository {
  findById(statusId: string): Promise<Status | null>;
  findByName(organizationId: string, name: string): Promise<Status | null>;
  /** Active and inactive, in no particular order */
  listByOrganization(organizationId: string): Promise<Status[]>;
  insert(status: NewStatus): Promise<Status>;
  update(statusId: string, patch: StatusPatch): Promise<Status>;
  /** Clears isDefault on every status of the organization except one */
  clearDefault(organizationId: string, exceptStatusId: string | null): Promise<void>;
}

export interface EdgeRepository {
  find(organizationId: string, fromStatusId: string, toStatusId: string): Promise<TransitionEdge | null>;
  /** Active and inactive, in no particular order */
  listByOrganization(organizationId: string): Promise<TransitionEdge[]>;
  insert(organizationId: string, fromStatusId: string, toStatusId: string): Promise<TransitionEdge>;
  setActive(edgeId: string, isActive: boolean): Promise<TransitionEdge>;
}

export interface TaskRepository {
  findById(taskId: string): Promise<TaskRecord | null>;
  insert(task: NewTask): Promise<TaskRecord>;
  /** Tasks of the organization currently in the status, by createdAt then id */
  listByStatus(organizationId: string, statusId: string): Promise<TaskRecord[]>;
  /**
   * Moves the task to a new status if its version still equals
   * `expectedVersion`, bumping the version. Returns the updated task, or
   * null when another writer got there first.
   */
  compareAndSetStatus(taskId: string, expectedVersion: number, toStatusId: string): Promise<TaskRecord | null>;
}

export interface AuditRepository {
  append(record: NewAuditRecord): Promise<AuditRecord>;
  /** Ordered by changedAt, then sequence */
  listByTask(taskId: string): Promise<AuditRecord[]>;
  latestForTask(taskId: string): Promise<AuditRecord | null>;
}

export interface WorkflowTransaction {
  statuses: StatusRepository;
  edges: EdgeRepository;
  tasks: TaskRepository;
  audit: AuditRepository;
}

export interface WorkflowStore {
  /** Store name (for logging) */
  readonly name: string;

  /**
   * Runs `work` in one unit of work. Resolves with its result after commit;
   * if `work` throws or the commit fails, nothing it did is kept.
   */
  transaction<T>(work: (tx: WorkflowTransaction) => Promise<T>): Promise<T>;

  /** Releases connections (graceful shutdown) */
  close(): Promise<void>;
}
