/**
 * Action Registry
 *
 * Central registry of the actions the engine exposes. The workflow
 * actions register here at startup; dispatch() looks them up by ID.
 */

import type { ActionDefinition } from "@statusflow/contracts";

/** All registered actions, keyed by action ID */
const actions = new Map<string, ActionDefinition>();

/**
 * Registers an action. Throws if an action with the same ID already exists.
 */
export function registerAction<TInput, TOutput>(action: ActionDefinition<TInput, TOutput>) {
  if (actions.has(action.id)) {
    throw new Error(
      `Action "${action.id}" is already registered. Action IDs must be unique.`
    );
  }
  actions.set(action.id, action);
}

export function registerActions(actionList: ActionDefinition[]) {
  for (const action of actionList) {
    registerAction(action);
  }
}

export function getAction(id: string): ActionDefinition | undefined {
  return actions.get(id);
}

export function getAllActions(): ActionDefinition[] {
  return Array.from(actions.values());
}

/**
 * Returns the actions of one resource ("status", "transition", "task",
 * "workflow"), matched on the "resource." prefix of their IDs.
 */
export function getActionsForResource(resource: string): ActionDefinition[] {
  const prefix = resource.toLowerCase() + ".";
  return Array.from(actions.values()).filter((a) =>
    a.id.toLowerCase().startsWith(prefix)
  );
}

/**
 * Clears all registered actions. Used for testing.
 */
export function clearActionRegistry() {
  actions.clear();
}
