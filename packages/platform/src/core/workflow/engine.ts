/**
 * Workflow Engine
 *
 * Wires the components together over one store and one read cache:
 *
 *   catalog   Status Catalog
 *   graph     Transition Graph
 *   executor  Transition Executor
 *   audit     Audit Log
 *   tasks     Task Registry
 *   setup     bulk Workflow Setup
 *
 * Usage:
 *   const engine = await startWorkflowEngine();        // from the environment
 *   const engine = createWorkflowEngine({ store });    // tests, embedding
 */

import type { DomainEvent, Logger } from "@statusflow/contracts";
import { loadConfig, type AppConfig } from "../config/index.js";
import { closeDatabase, initDatabase } from "../database/connection.js";
import { runWorkflowMigrations } from "../database/migrate.js";
import { createLogger } from "../action-bus/middleware/logging.js";
import { publish } from "../event-bus/index.js";
import { AuditLog } from "./audit-log.js";
import { WorkflowCache } from "./cache.js";
import { InMemoryWorkflowStore } from "./memory-store.js";
import { createPostgresWorkflowStore } from "./postgres-store.js";
import { StatusCatalog } from "./status-catalog.js";
import type { WorkflowStore } from "./store.js";
import { TaskRegistry } from "./task-registry.js";
import { TransitionExecutor } from "./transition-executor.js";
import { TransitionGraph } from "./transition-graph.js";
import { WorkflowSetup } from "./workflow-setup.js";

export interface WorkflowEngine {
  readonly config: AppConfig;
  readonly store: WorkflowStore;
  readonly cache: WorkflowCache;
  readonly catalog: StatusCatalog;
  readonly graph: TransitionGraph;
  readonly executor: TransitionExecutor;
  readonly audit: AuditLog;
  readonly tasks: TaskRegistry;
  readonly setup: WorkflowSetup;
  /** Releases the store (and the database connection, if the engine opened it) */
  close(): Promise<void>;
}

export interface CreateWorkflowEngineOptions {
  config?: AppConfig;
  /** Defaults to an in-memory store */
  store?: WorkflowStore;
  logger?: Logger;
  /** Where domain events go; defaults to the event bus */
  emit?: (event: DomainEvent) => Promise<void>;
  /** Clock for audit timestamps */
  now?: () => Date;
  /** Extra cleanup to run on close() */
  onClose?: () => Promise<void>;
}

export function createWorkflowEngine(options: CreateWorkflowEngineOptions = {}): WorkflowEngine {
  const config = options.config ?? loadConfig({});
  const store = options.store ?? new InMemoryWorkflowStore();
  const logger = options.logger ?? createLogger("workflow");
  const cache = new WorkflowCache(config.workflow.cacheTtlMs);
  const audit = new AuditLog(store);

  return {
    config,
    store,
    cache,
    audit,
    catalog: new StatusCatalog(store, cache, logger),
    graph: new TransitionGraph(store, cache, logger),
    executor: new TransitionExecutor({
      store,
      audit,
      logger,
      maxRetries: config.workflow.maxRetries,
      retryDelayMs: config.workflow.retryDelayMs,
      emit: options.emit ?? publish,
      now: options.now,
    }),
    tasks: new TaskRegistry(store, logger),
    setup: new WorkflowSetup(store, cache, logger),
    async close() {
      cache.clear();
      await store.close();
      await options.onClose?.();
    },
  };
}

/**
 * Builds the engine the configuration asks for. For the PostgreSQL store
 * this opens the connection and creates any missing tables first.
 */
export async function startWorkflowEngine(config: AppConfig = loadConfig()): Promise<WorkflowEngine> {
  const logger = createLogger("workflow");

  if (config.store === "memory") {
    logger.info("Workflow engine started", { store: "memory" });
    return createWorkflowEngine({ config, logger });
  }

  initDatabase(config);
  try {
    const created = await runWorkflowMigrations();
    logger.info("Workflow engine started", { store: "postgres", createdTables: created });
  } catch (error) {
    await closeDatabase();
    throw error;
  }

  return createWorkflowEngine({
    config,
    logger,
    store: createPostgresWorkflowStore(),
    onClose: closeDatabase,
  });
}
