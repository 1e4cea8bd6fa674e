/**
 * Workflow Errors
 *
 * Every failure the engine can report. Each class carries a stable `code`
 * and whether retrying the same call may succeed.
 *
 * Validation errors are deterministic for the same inputs and state.
 * Only ConcurrentModificationError and PersistenceError are retryable,
 * and only ConcurrentModificationError is retried by the engine itself.
 * Whatever is thrown, the unit of work that raised it has been rolled back.
 */

export type WorkflowErrorCode =
  | "DUPLICATE_NAME"
  | "DUPLICATE_EDGE"
  | "DUPLICATE_TASK"
  | "CROSS_ORG_REFERENCE"
  | "TASK_NOT_FOUND"
  | "UNKNOWN_STATUS"
  | "INACTIVE_STATUS"
  | "ILLEGAL_TRANSITION"
  | "INVALID_DEFINITION"
  | "CONCURRENT_MODIFICATION"
  | "PERSISTENCE";

export abstract class WorkflowEngineError extends Error {
  abstract readonly code: WorkflowErrorCode;

  /** Whether the same call may succeed if repeated */
  readonly retryable: boolean = false;
}

export class DuplicateNameError extends WorkflowEngineError {
  readonly code = "DUPLICATE_NAME";

  constructor(
    public readonly organizationId: string,
    public readonly statusName: string
  ) {
    super(`Status "${statusName}" already exists in organization ${organizationId}`);
    this.name = "DuplicateNameError";
  }
}

export class DuplicateEdgeError extends WorkflowEngineError {
  readonly code = "DUPLICATE_EDGE";

  constructor(
    public readonly organizationId: string,
    public readonly fromStatusId: string,
    public readonly toStatusId: string
  ) {
    super(`Transition ${fromStatusId} → ${toStatusId} already exists and is active`);
    this.name = "DuplicateEdgeError";
  }
}

/** A task with the caller-supplied id is already registered. */
export class DuplicateTaskError extends WorkflowEngineError {
  readonly code = "DUPLICATE_TASK";

  constructor(public readonly taskId: string) {
    super(`Task ${taskId} already exists`);
    this.name = "DuplicateTaskError";
  }
}

export class CrossOrgReferenceError extends WorkflowEngineError {
  readonly code = "CROSS_ORG_REFERENCE";

  constructor(
    public readonly organizationId: string,
    public readonly statusId: string
  ) {
    super(`Status ${statusId} does not belong to organization ${organizationId}`);
    this.name = "CrossOrgReferenceError";
  }
}

export class TaskNotFoundError extends WorkflowEngineError {
  readonly code = "TASK_NOT_FOUND";

  constructor(public readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = "TaskNotFoundError";
  }
}

export class UnknownStatusError extends WorkflowEngineError {
  readonly code = "UNKNOWN_STATUS";

  /** organizationId is null when the lookup was not scoped */
  constructor(
    public readonly organizationId: string | null,
    public readonly statusId: string
  ) {
    super(
      organizationId
        ? `Status ${statusId} not found in organization ${organizationId}`
        : `Status ${statusId} not found`
    );
    this.name = "UnknownStatusError";
  }
}

export class InactiveStatusError extends WorkflowEngineError {
  readonly code = "INACTIVE_STATUS";

  constructor(
    public readonly statusId: string,
    public readonly statusName: string
  ) {
    super(`Status "${statusName}" is inactive and cannot be used as a target`);
    this.name = "InactiveStatusError";
  }
}

/**
 * The requested move has no active edge from the task's current status.
 * Carries the ids the task could move to instead, for callers that want
 * to tell the user what is allowed.
 */
export class IllegalTransitionError extends WorkflowEngineError {
  readonly code = "ILLEGAL_TRANSITION";

  constructor(
    public readonly taskId: string,
    public readonly fromStatusId: string | null,
    public readonly toStatusId: string,
    public readonly allowedStatusIds: string[]
  ) {
    super(
      `Moving task ${taskId} from ${fromStatusId ?? "(none)"} to ${toStatusId} is not allowed. ` +
        `Allowed targets: [${allowedStatusIds.join(", ")}]`
    );
    this.name = "IllegalTransitionError";
  }
}

/** A bulk workflow definition is internally inconsistent. */
export class WorkflowDefinitionError extends WorkflowEngineError {
  readonly code = "INVALID_DEFINITION";

  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = "WorkflowDefinitionError";
  }
}

/** Another writer changed the row between read and commit. */
export class ConcurrentModificationError extends WorkflowEngineError {
  readonly code = "CONCURRENT_MODIFICATION";
  override readonly retryable = true;

  constructor(
    public readonly resource: string,
    public readonly resourceId: string
  ) {
    super(`${resource} ${resourceId} was modified concurrently`);
    this.name = "ConcurrentModificationError";
  }
}

/**
 * The store failed or timed out. Nothing is assumed about whether it is
 * reachable now; the unit of work did not commit.
 */
export class PersistenceError extends WorkflowEngineError {
  readonly code = "PERSISTENCE";
  override readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}
