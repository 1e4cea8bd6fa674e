/**
 * Software Delivery Workflow
 *
 * Development work with review and QA gates. Review and QA can send a
 * task back to In Progress, and Done can be reopened.
 *
 *   new ──► in_progress ──► code_review ──► qa_testing ──► done
 *            ▲   │              │               │           │
 *            │   ▼              │               │           │
 *            │  new             │               │           │
 *            └──────────────────┴───────────────┴───────────┘
 */

import { defineWorkflow } from "@statusflow/contracts";

export const SoftwareDeliveryWorkflow = defineWorkflow({
  name: "softwareDelivery",
  statuses: [
    { name: "new", displayName: "New", color: "#94A3B8", orderIndex: 1, isDefault: true },
    { name: "in_progress", displayName: "In Progress", color: "#3B82F6", orderIndex: 2 },
    { name: "code_review", displayName: "Code Review", color: "#F59E0B", orderIndex: 3 },
    { name: "qa_testing", displayName: "QA Testing", color: "#8B5CF6", orderIndex: 4 },
    { name: "done", displayName: "Done", color: "#10B981", orderIndex: 5 },
  ],
  transitions: [
    { from: "new", to: "in_progress" },

    { from: "in_progress", to: "code_review" },
    { from: "in_progress", to: "new" },

    { from: "code_review", to: "qa_testing" },
    { from: "code_review", to: "in_progress" },

    { from: "qa_testing", to: "done" },
    { from: "qa_testing", to: "in_progress" },

    // Reopen
    { from: "done", to: "in_progress" },
  ],
});
