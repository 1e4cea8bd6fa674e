/**
 * Action Definition
 *
 * An Action is a single, well-defined operation the engine exposes:
 * create a status, add an edge, move a task, read its history.
 * Whatever sits in front of the engine (HTTP handlers, jobs, setup
 * scripts) reaches it by dispatching actions through the Action Bus.
 *
 * Every Action is:
 *   - Typed (input is validated with Zod before execute runs)
 *   - Described (callers can discover what it does)
 *   - Observable (the platform logs and times it)
 */

import type { z } from "zod";
import type { ActionContext } from "./context.js";

/**
 * The complete definition of an action.
 */
export interface ActionDefinition<TInput = unknown, TOutput = unknown> {
  /**
   * Unique identifier.
   * Convention: "entity.verb" (e.g. "status.create", "task.transition")
   */
  id: string;

  /** Human-readable name (e.g. "Move Task") */
  name: string;

  description: string;

  /** Validates raw input. Whatever it outputs is what execute receives. */
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  /**
   * Is this action safe to retry?
   * true = calling it twice with the same input leaves the same state.
   */
  idempotent: boolean;

  /** Read-only actions never change state */
  readOnly?: boolean;

  /** The business logic. No HTTP, no framework. */
  execute(input: TInput, context: ActionContext): Promise<TOutput>;
}

/**
 * Helper function to define an action with type checking.
 */
export function defineAction<TInput, TOutput>(
  definition: ActionDefinition<TInput, TOutput>
): ActionDefinition<TInput, TOutput> {
  return definition;
}
