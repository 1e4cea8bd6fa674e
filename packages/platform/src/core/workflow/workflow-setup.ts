/**
 * Workflow Setup
 *
 * Creates a whole workflow (statuses plus the edges between them) in one
 * unit of work, the way an organization is onboarded from a preset. Edges
 * reference statuses by name: ones defined alongside them, or ones the
 * organization already has.
 *
 * All or nothing: a definition that is inconsistent in itself is rejected
 * before the store is touched, and a conflict with existing data rolls
 * back everything created so far.
 */

import {
  workflowDefinitionSchema,
  type Logger,
  type OrganizationWorkflow,
  type Status,
  type WorkflowDefinition,
} from "@statusflow/contracts";
import type { WorkflowCache } from "./cache.js";
import { WorkflowDefinitionError } from "./errors.js";
import { insertStatus, sortStatuses } from "./status-catalog.js";
import type { WorkflowStore, WorkflowTransaction } from "./store.js";
import { insertEdge, sortEdges } from "./transition-graph.js";
import { runUnitOfWork } from "./unit-of-work.js";

/**
 * Problems a definition has regardless of what the organization already
 * contains. Returns an empty list for a consistent definition.
 */
export function checkDefinition(definition: WorkflowDefinition): string[] {
  const parsed = workflowDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    return parsed.error.issues.map((issue) => `${issue.path.join(".") || "definition"}: ${issue.message}`);
  }

  const issues: string[] = [];
  const seen = new Set<string>();
  for (const status of definition.statuses) {
    if (seen.has(status.name)) issues.push(`Status "${status.name}" is defined more than once`);
    seen.add(status.name);
  }

  const defaults = definition.statuses.filter((s) => s.isDefault).map((s) => s.name);
  if (defaults.length > 1) {
    issues.push(`Only one default status is allowed, got ${defaults.join(", ")}`);
  }

  const pairs = new Set<string>();
  for (const edge of definition.transitions) {
    const key = `${edge.from}->${edge.to}`;
    if (pairs.has(key)) issues.push(`Transition ${edge.from} -> ${edge.to} is defined more than once`);
    pairs.add(key);
  }

  return issues;
}

async function snapshot(tx: WorkflowTransaction, organizationId: string): Promise<OrganizationWorkflow> {
  const [statuses, edges] = await Promise.all([
    tx.statuses.listByOrganization(organizationId),
    tx.edges.listByOrganization(organizationId),
  ]);
  return {
    organizationId,
    statuses: sortStatuses(statuses),
    transitions: sortEdges(edges.filter((e) => e.isActive)),
  };
}

export class WorkflowSetup {
  constructor(
    private readonly store: WorkflowStore,
    private readonly cache: WorkflowCache,
    private readonly logger: Logger
  ) {}

  async setupWorkflow(organizationId: string, definition: WorkflowDefinition): Promise<OrganizationWorkflow> {
    const issues = checkDefinition(definition);
    if (issues.length > 0) {
      throw new WorkflowDefinitionError(`Workflow "${definition.name}" is invalid`, issues);
    }

    const workflow = await runUnitOfWork(this.store, async (tx) => {
      const byName = new Map<string, Status>();
      for (const input of definition.statuses) {
        byName.set(input.name, await insertStatus(tx, organizationId, input));
      }

      const unresolved: string[] = [];
      for (const edge of definition.transitions) {
        for (const name of [edge.from, edge.to]) {
          if (byName.has(name)) continue;
          const existing = await tx.statuses.findByName(organizationId, name);
          if (existing) byName.set(name, existing);
          else unresolved.push(name);
        }
      }
      if (unresolved.length > 0) {
        throw new WorkflowDefinitionError(
          `Workflow "${definition.name}" references unknown statuses`,
          [...new Set(unresolved)].map((name) => `Unknown status "${name}"`)
        );
      }

      for (const edge of definition.transitions) {
        const from = byName.get(edge.from);
        const to = byName.get(edge.to);
        if (from && to) await insertEdge(tx, organizationId, from.id, to.id);
      }

      return snapshot(tx, organizationId);
    });

    this.cache.invalidate(organizationId);
    this.logger.info("Workflow set up", {
      organizationId,
      workflow: definition.name,
      statuses: definition.statuses.length,
      transitions: definition.transitions.length,
    });
    return workflow;
  }

  /** Every status (active or not) and every active edge of the organization. */
  async getWorkflow(organizationId: string): Promise<OrganizationWorkflow> {
    return runUnitOfWork(this.store, (tx) => snapshot(tx, organizationId));
  }
}
