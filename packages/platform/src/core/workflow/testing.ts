/**
 * Test fixtures shared by the engine's test suites: a quiet engine on a
 * fresh in-memory store, and the three-status workflow most tests use.
 */

import type { DomainEvent, Logger, Status } from "@statusflow/contracts";
import { loadConfig } from "../config/index.js";
import { createWorkflowEngine, type CreateWorkflowEngineOptions, type WorkflowEngine } from "./engine.js";
import { InMemoryWorkflowStore } from "./memory-store.js";

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};

export interface TestEngine extends WorkflowEngine {
  /** Everything the executor published */
  events: DomainEvent[];
}

export function createTestEngine(options: CreateWorkflowEngineOptions = {}): TestEngine {
  const events: DomainEvent[] = [];
  const engine = createWorkflowEngine({
    config: loadConfig({ WORKFLOW_RETRY_DELAY_MS: "0", WORKFLOW_CACHE_TTL_MS: "0" }),
    store: new InMemoryWorkflowStore(),
    logger: silentLogger,
    emit: async (event) => {
      events.push(event);
    },
    ...options,
  });
  return { ...engine, events };
}

export interface BasicWorkflow {
  todo: Status;
  doing: Status;
  done: Status;
}

/**
 * New (default) → In Progress → Done, built through the catalog and graph
 * one call at a time.
 */
export async function createBasicWorkflow(engine: WorkflowEngine, organizationId: string): Promise<BasicWorkflow> {
  const todo = await engine.catalog.createStatus(organizationId, {
    name: "new",
    displayName: "New",
    isDefault: true,
  });
  const doing = await engine.catalog.createStatus(organizationId, {
    name: "in_progress",
    displayName: "In Progress",
  });
  const done = await engine.catalog.createStatus(organizationId, {
    name: "done",
    displayName: "Done",
  });

  await engine.graph.addEdge(organizationId, todo.id, doing.id);
  await engine.graph.addEdge(organizationId, doing.id, done.id);

  return { todo, doing, done };
}
