/**
 * Action Context
 *
 * Provided by the platform to every action execution: who is calling,
 * a logger, and a way to emit domain events.
 *
 * The engine performs no authentication. Whoever builds the Caller
 * (an API layer, a job, a script) has already decided it may act.
 */

/** What kind of caller is executing an action */
export type CallerType = "human" | "system" | "integration";

/**
 * Identifies who or what is executing an action.
 */
export interface Caller {
  /** Recorded as the actor on every audit record this caller produces */
  userId: string;

  /** The organization every status, edge and task lookup is scoped to */
  tenantId: string;

  type: CallerType;
}

/**
 * Structured logger provided to actions and engine components.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * A domain event published after a unit of work commits.
 * Convention: "entity.verb_past_tense" (e.g. "task.status_changed").
 */
export interface DomainEvent {
  type: string;
  payload: Record<string, unknown>;
  timestamp?: Date;
}

/**
 * Reacts to published domain events.
 *
 * `eventType` matches exactly, by prefix ("task.*") or everything ("*").
 * Subscribers run after the emitting unit of work has committed; a
 * failing subscriber never undoes or fails it.
 *
 * @example
 * const onStatusChanged: EventSubscriber = {
 *   eventType: "task.status_changed",
 *   name: "RefreshBoardColumns",
 *   handler: async (event) => {
 *     await board.refresh(String(event.payload.taskId));
 *   },
 * };
 */
export interface EventSubscriber {
  eventType: string;
  name: string;
  handler: (event: DomainEvent) => Promise<void>;
}

/**
 * The context object passed to every action's execute function.
 */
export interface ActionContext {
  caller: Caller;

  /** Publish a domain event to registered subscribers */
  emit: (event: DomainEvent) => Promise<void>;

  logger: Logger;
}
