/**
 * Validation Middleware
 *
 * Validates action input against the action's Zod schema before the
 * action executes. If validation fails, the engine is never called.
 */

import type { ActionDefinition } from "@statusflow/contracts";

export interface FieldError {
  /** Dotted path into the input ("statuses.0.name"), empty for the root */
  field: string;
  message: string;
  code: string;
}

/**
 * Validates input against the action's inputSchema.
 * Returns the parsed (and possibly transformed) input on success.
 * Throws a ValidationError on failure.
 */
export function validateInput<TInput>(
  action: ActionDefinition<TInput, unknown>,
  input: unknown
): TInput {
  const result = action.inputSchema.safeParse(input);

  if (!result.success) {
    const fieldErrors = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));

    throw new ValidationError(
      `Validation failed for action "${action.id}"`,
      fieldErrors
    );
  }

  return result.data;
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly fieldErrors: FieldError[]
  ) {
    super(message);
    this.name = "ValidationError";
  }
}
