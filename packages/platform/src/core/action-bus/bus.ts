/**
 * Action Bus
 *
 * The single entry point into the engine for whatever sits in front of
 * it: HTTP handlers, jobs, setup scripts. Every action goes through:
 *
 *   1. Lookup action by ID
 *   2. Validate input against the action's Zod schema
 *   3. Execute the action with the caller's context
 *   4. Log the result and classify any failure
 *
 * The bus performs no authentication or authorization. The Caller it is
 * handed is trusted: its tenantId scopes every lookup and its userId is
 * recorded as the actor.
 */

import type { ActionContext, Caller, DomainEvent } from "@statusflow/contracts";
import { getAction } from "./registry.js";
import { validateInput, ValidationError } from "./middleware/validation.js";
import { createLogger, logActionExecution } from "./middleware/logging.js";
import { publish } from "../event-bus/index.js";
import { captureException } from "../observability/index.js";
import {
  ConcurrentModificationError,
  CrossOrgReferenceError,
  DuplicateEdgeError,
  DuplicateNameError,
  DuplicateTaskError,
  IllegalTransitionError,
  InactiveStatusError,
  PersistenceError,
  TaskNotFoundError,
  UnknownStatusError,
  WorkflowDefinitionError,
  WorkflowEngineError,
} from "../workflow/errors.js";

/**
 * Error categories for structured error handling.
 * An HTTP layer would map these as:
 *   not_found   → 404
 *   validation  → 400
 *   conflict    → 409
 *   workflow    → 422
 *   unavailable → 503
 *   unknown     → 500
 */
export type ActionErrorType =
  | "not_found"
  | "validation"
  | "conflict"
  | "workflow"
  | "unavailable"
  | "unknown";

/**
 * The result of dispatching an action.
 * On failure, errorType identifies the category; details carries the
 * engine error's code and whatever the caller needs to react.
 */
export type ActionResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; error: string; errorType: ActionErrorType; details?: Record<string, unknown> };

type ActionFailure = Extract<ActionResult, { success: false }>;

function engineDetails(error: WorkflowEngineError, extra: Record<string, unknown> = {}) {
  return { code: error.code, retryable: error.retryable, ...extra };
}

/**
 * Maps a thrown error to the structured failure returned to callers.
 * Returns null for errors the bus does not recognize.
 */
export function classifyError(error: unknown): ActionFailure | null {
  if (error instanceof ValidationError) {
    return {
      success: false,
      error: error.message,
      errorType: "validation",
      details: { fieldErrors: error.fieldErrors },
    };
  }

  if (error instanceof WorkflowDefinitionError) {
    return {
      success: false,
      error: error.message,
      errorType: "validation",
      details: engineDetails(error, { issues: error.issues }),
    };
  }

  if (error instanceof TaskNotFoundError || error instanceof UnknownStatusError) {
    return { success: false, error: error.message, errorType: "not_found", details: engineDetails(error) };
  }

  if (
    error instanceof DuplicateNameError ||
    error instanceof DuplicateEdgeError ||
    error instanceof DuplicateTaskError ||
    error instanceof ConcurrentModificationError
  ) {
    return { success: false, error: error.message, errorType: "conflict", details: engineDetails(error) };
  }

  if (error instanceof IllegalTransitionError) {
    return {
      success: false,
      error: error.message,
      errorType: "workflow",
      details: engineDetails(error, {
        taskId: error.taskId,
        fromStatusId: error.fromStatusId,
        toStatusId: error.toStatusId,
        allowedStatusIds: error.allowedStatusIds,
      }),
    };
  }

  if (error instanceof InactiveStatusError || error instanceof CrossOrgReferenceError) {
    return { success: false, error: error.message, errorType: "workflow", details: engineDetails(error) };
  }

  if (error instanceof PersistenceError) {
    // The underlying driver message stays server-side
    return {
      success: false,
      error: "The workflow store is unavailable. Try again.",
      errorType: "unavailable",
      details: engineDetails(error),
    };
  }

  return null;
}

/**
 * Dispatches an action through the Action Bus pipeline.
 *
 * @param actionId - The action's unique ID (e.g., "task.transition")
 * @param input - The raw input data (will be validated)
 * @param caller - Who is executing this action
 */
export async function dispatch(
  actionId: string,
  input: unknown,
  caller: Caller
): Promise<ActionResult> {
  const startTime = performance.now();
  const logger = createLogger(`action:${actionId}`);

  const finish = (result: ActionResult): ActionResult => {
    logActionExecution({
      actionId,
      durationMs: Math.round(performance.now() - startTime),
      success: result.success,
      tenantId: caller.tenantId,
      ...(result.success ? {} : { errorType: result.errorType, error: result.error }),
    });
    return result;
  };

  const action = getAction(actionId);
  if (!action) {
    return finish({
      success: false,
      error: `Action "${actionId}" not found`,
      errorType: "not_found",
    });
  }

  const context: ActionContext = {
    caller,
    emit: async (event: DomainEvent) => {
      logger.debug("Domain event emitted", { eventType: event.type });
      await publish(event);
    },
    logger,
  };

  try {
    const validatedInput = validateInput(action, input);
    const data = await action.execute(validatedInput, context);
    return finish({ success: true, data });
  } catch (error) {
    const known = classifyError(error);
    if (known) {
      if (known.errorType === "unavailable" && error instanceof Error) {
        captureException(error, { actionId, userId: caller.userId, tenantId: caller.tenantId });
      }
      return finish(known);
    }

    // Unknown error: full details server-side, generic message to the caller
    logger.error("Action execution failed", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    if (error instanceof Error) {
      captureException(error, { actionId, userId: caller.userId, tenantId: caller.tenantId });
    }

    return finish({
      success: false,
      error: "An unexpected error occurred",
      errorType: "unknown",
    });
  }
}
