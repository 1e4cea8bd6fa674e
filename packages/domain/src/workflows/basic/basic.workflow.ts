/**
 * Basic Workflow
 *
 * The smallest useful workflow: New → In Progress → Done, nothing
 * backwards. New tasks start in New.
 */

import { defineWorkflow } from "@statusflow/contracts";

export const BasicWorkflow = defineWorkflow({
  name: "basic",
  statuses: [
    { name: "new", displayName: "New", color: "#94A3B8", orderIndex: 1, isDefault: true },
    { name: "in_progress", displayName: "In Progress", color: "#3B82F6", orderIndex: 2 },
    { name: "done", displayName: "Done", color: "#10B981", orderIndex: 3 },
  ],
  transitions: [
    { from: "new", to: "in_progress" },
    { from: "in_progress", to: "done" },
  ],
});
