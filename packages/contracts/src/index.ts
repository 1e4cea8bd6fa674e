/**
 * @statusflow/contracts
 *
 * Public API: the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Workflow model
export type {
  Status,
  TransitionEdge,
  TaskRecord,
  AuditRecord,
  CreateStatusInput,
  UpdateStatusInput,
  WorkflowEdgeDefinition,
  WorkflowDefinition,
  OrganizationWorkflow,
} from "./workflow.js";
export { defineWorkflow } from "./workflow.js";

// Input schemas
export {
  STATUS_NAME_PATTERN,
  HEX_COLOR_PATTERN,
  idSchema,
  taskIdSchema,
  statusNameSchema,
  hexColorSchema,
  createStatusInputSchema,
  updateStatusInputSchema,
  workflowEdgeDefinitionSchema,
  workflowDefinitionSchema,
  transitionRequestSchema,
} from "./schemas.js";

// Actions
export type { ActionDefinition } from "./action.js";
export { defineAction } from "./action.js";

// Context (provided by platform to actions)
export type {
  ActionContext,
  Caller,
  CallerType,
  Logger,
  DomainEvent,
  EventSubscriber,
} from "./context.js";
