/**
 * @statusflow/domain
 *
 * Workflow presets organizations can be onboarded with, and the domain
 * event subscribers. The host application registers the subscribers and
 * hands a preset to the "workflow.setup" action.
 */

import type { WorkflowDefinition } from "@statusflow/contracts";
import { BasicWorkflow } from "./workflows/basic/basic.workflow.js";
import { SoftwareDeliveryWorkflow } from "./workflows/software-delivery/software-delivery.workflow.js";
export { eventSubscribers } from "./subscribers/index.js";
export { BasicWorkflow, SoftwareDeliveryWorkflow };

/** All presets, keyed by their name */
export const workflowPresets: Record<string, WorkflowDefinition> = {
  [BasicWorkflow.name]: BasicWorkflow,
  [SoftwareDeliveryWorkflow.name]: SoftwareDeliveryWorkflow,
};

/**
 * Looks up a preset by name.
 * Throws if there is none, listing the ones that exist.
 */
export function getWorkflowPreset(name: string): WorkflowDefinition {
  const preset = workflowPresets[name];
  if (!preset) {
    throw new Error(
      `Unknown workflow preset "${name}". Available: ${Object.keys(workflowPresets).join(", ")}`
    );
  }
  return preset;
}
