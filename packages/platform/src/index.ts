/**
 * @statusflow/platform
 *
 * The workflow engine and everything it runs on: configuration, the
 * PostgreSQL and in-memory stores, the Action Bus, the event bus and
 * observability.
 */

// Config
export { loadConfig, type AppConfig, type StoreKind } from "./core/config/index.js";

// Database
export { initDatabase, getDatabase, closeDatabase } from "./core/database/connection.js";
export { runWorkflowMigrations } from "./core/database/migrate.js";
export {
  taskStatuses,
  taskWorkflowTransitions,
  tasks,
  taskStatusTransitions,
} from "./core/database/schema.js";

// Workflow engine
export {
  createWorkflowEngine,
  startWorkflowEngine,
  type WorkflowEngine,
  type CreateWorkflowEngineOptions,
} from "./core/workflow/engine.js";
export { StatusCatalog, compareStatuses, sortStatuses } from "./core/workflow/status-catalog.js";
export { TransitionGraph, allowedTargets, type ListEdgesOptions } from "./core/workflow/transition-graph.js";
export {
  TransitionExecutor,
  TASK_STATUS_CHANGED,
  type TransitionOptions,
} from "./core/workflow/transition-executor.js";
export { AuditLog, type HistoryOptions } from "./core/workflow/audit-log.js";
export { TaskRegistry, type CreateTaskOptions } from "./core/workflow/task-registry.js";
export { WorkflowSetup, checkDefinition } from "./core/workflow/workflow-setup.js";
export { WorkflowCache } from "./core/workflow/cache.js";
export { createWorkflowActions } from "./core/workflow/actions.js";

// Stores
export type {
  WorkflowStore,
  WorkflowTransaction,
  StatusRepository,
  EdgeRepository,
  TaskRepository,
  AuditRepository,
  NewStatus,
  NewTask,
  NewAuditRecord,
  StatusPatch,
} from "./core/workflow/store.js";
export { InMemoryWorkflowStore } from "./core/workflow/memory-store.js";
export { createPostgresWorkflowStore } from "./core/workflow/postgres-store.js";

// Errors
export {
  WorkflowEngineError,
  DuplicateNameError,
  DuplicateEdgeError,
  DuplicateTaskError,
  CrossOrgReferenceError,
  TaskNotFoundError,
  UnknownStatusError,
  InactiveStatusError,
  IllegalTransitionError,
  WorkflowDefinitionError,
  ConcurrentModificationError,
  PersistenceError,
  type WorkflowErrorCode,
} from "./core/workflow/errors.js";

// Action Bus
export { dispatch, classifyError, type ActionResult, type ActionErrorType } from "./core/action-bus/bus.js";
export {
  registerAction,
  registerActions,
  getAction,
  getAllActions,
  getActionsForResource,
  clearActionRegistry,
} from "./core/action-bus/registry.js";
export { ValidationError, type FieldError } from "./core/action-bus/middleware/validation.js";
export { createLogger } from "./core/action-bus/middleware/logging.js";

// Event Bus
export {
  subscribe,
  subscribeAll,
  publish,
  matchesEventType,
  getSubscriberCount,
  clearSubscribers,
} from "./core/event-bus/index.js";

// Observability
export {
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";
