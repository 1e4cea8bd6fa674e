/**
 * Workflow Model
 *
 * Every organization authors its own task statuses and the allow-list of
 * moves between them. A task occupies one status at a time; each realized
 * move is written to the task's audit history.
 *
 * The edge set is a plain directed graph. Cycles (e.g. QA → In Progress)
 * and branches are valid workflows. Only direct edges are ever validated.
 */

/**
 * A named state a task can occupy, scoped to one organization.
 * Never hard-deleted: deactivation is the only way to retire a status.
 */
export interface Status {
  id: string;
  organizationId: string;

  /** Machine key, unique per organization (e.g. "in_progress") */
  name: string;

  /** Label shown to people (e.g. "In Progress") */
  displayName: string;

  /** Hex color for display, "#RRGGBB" */
  color: string | null;

  /** Display ordering only, never part of transition legality */
  orderIndex: number;

  isActive: boolean;

  /** At most one default status per organization */
  isDefault: boolean;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * An organization-authored permission to move a task from one status to
 * another. At most one edge exists per ordered pair; deactivating and
 * re-adding reuses the same record.
 */
export interface TransitionEdge {
  id: string;
  organizationId: string;
  fromStatusId: string;
  toStatusId: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * The engine's view of a task. Everything else about a task (title,
 * assignee, due date) belongs to the surrounding system.
 */
export interface TaskRecord {
  id: string;
  organizationId: string;

  /** Null until the task's first status assignment */
  currentStatusId: string | null;

  /** Optimistic concurrency counter, bumped on every status change */
  version: number;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * One realized status change. Immutable once written.
 */
export interface AuditRecord {
  id: string;

  /** Insertion order; breaks ties between equal timestamps */
  sequence: number;

  organizationId: string;
  taskId: string;

  /** Null only for a task's very first status assignment */
  fromStatusId: string | null;

  toStatusId: string;

  /** Who made the change, as supplied by the caller */
  actorId: string;

  changedAt: Date;
  note: string | null;
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface CreateStatusInput {
  name: string;
  displayName: string;
  color?: string | null;
  orderIndex?: number;
  isDefault?: boolean;
}

/** `name` is the status's identity within the organization and never changes. */
export interface UpdateStatusInput {
  displayName?: string;
  color?: string | null;
  orderIndex?: number;
  isActive?: boolean;
  isDefault?: boolean;
}

/** An edge inside a bulk definition, referencing statuses by name. */
export interface WorkflowEdgeDefinition {
  from: string;
  to: string;
}

/**
 * A complete workflow created in one request: statuses plus the edges
 * between them. Edges may reference statuses defined alongside them or
 * ones the organization already has.
 */
export interface WorkflowDefinition {
  /** Preset name, for logs and lookup (e.g. "softwareDelivery") */
  name: string;
  statuses: CreateStatusInput[];
  transitions: WorkflowEdgeDefinition[];
}

/** Snapshot of an organization's whole workflow configuration. */
export interface OrganizationWorkflow {
  organizationId: string;
  statuses: Status[];
  transitions: TransitionEdge[];
}

/**
 * Helper to declare a workflow preset with type checking.
 */
export function defineWorkflow(definition: WorkflowDefinition): WorkflowDefinition {
  return definition;
}
