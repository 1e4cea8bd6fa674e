/**
 * Domain Event Subscribers
 *
 * Reactions to events the engine and its actions publish. They run after
 * the unit of work that emitted the event has committed; a failing
 * subscriber never undoes or fails it.
 *
 * Registered at startup:
 *   subscribeAll(eventSubscribers);
 *
 * In a production app these would notify assignees, refresh boards or
 * feed reporting. Here they write structured log lines.
 */

import type { EventSubscriber } from "@statusflow/contracts";

function text(value: unknown): string {
  return typeof value === "string" ? value : "(none)";
}

/**
 * Listens for: "task.status_changed"
 */
const logTaskStatusChanged: EventSubscriber = {
  eventType: "task.status_changed",
  name: "LogTaskStatusChanged",
  async handler(event) {
    const { organizationId, taskId, fromStatusId, toStatusId, actorId } = event.payload;
    console.log(
      `[subscriber] Task ${text(taskId)} in ${text(organizationId)}: ` +
        `${text(fromStatusId)} → ${text(toStatusId)} by ${text(actorId)}`
    );
  },
};

/**
 * Listens for every status and transition event and logs configuration
 * changes, so an organization's workflow edits can be traced.
 */
const logWorkflowChanges: EventSubscriber = {
  eventType: "*",
  name: "LogWorkflowChanges",
  async handler(event) {
    const [resource] = event.type.split(".");
    if (resource !== "status" && resource !== "transition" && resource !== "workflow") return;

    console.log(`[workflow] ${event.type} in ${text(event.payload.organizationId)}`);
  },
};

export const eventSubscribers: EventSubscriber[] = [logTaskStatusChanged, logWorkflowChanges];
