/**
 * Workflow Setup: Test Suite
 *
 *   - a definition is applied whole or not at all
 *   - inconsistent definitions never reach the store
 */

import { describe, it, expect, beforeEach } from "vitest";
import { defineWorkflow, type WorkflowDefinition } from "@statusflow/contracts";
import { createTestEngine, type TestEngine } from "./testing.js";
import { DuplicateNameError, WorkflowDefinitionError } from "./errors.js";
import { checkDefinition } from "./workflow-setup.js";

const ORG = "org-1";

const review = defineWorkflow({
  name: "review",
  statuses: [
    { name: "draft", displayName: "Draft", isDefault: true, orderIndex: 0 },
    { name: "in_review", displayName: "In Review", color: "#F59E0B", orderIndex: 1 },
    { name: "approved", displayName: "Approved", color: "#10B981", orderIndex: 2 },
  ],
  transitions: [
    { from: "draft", to: "in_review" },
    { from: "in_review", to: "approved" },
    { from: "in_review", to: "draft" },
  ],
});

let engine: TestEngine;

beforeEach(() => {
  engine = createTestEngine();
});

describe("checkDefinition", () => {
  it("accepts a consistent definition", () => {
    expect(checkDefinition(review)).toEqual([]);
  });

  it("reports schema problems with their path", () => {
    const broken: WorkflowDefinition = {
      name: "broken",
      statuses: [{ name: "In Review", displayName: "In Review" }],
      transitions: [],
    };

    expect(checkDefinition(broken)).toEqual([
      "statuses.0.name: Status name must be lowercase snake_case",
    ]);
  });

  it("reports repeated names, defaults and transitions", () => {
    const repeated: WorkflowDefinition = {
      name: "repeated",
      statuses: [
        { name: "a", displayName: "A", isDefault: true },
        { name: "a", displayName: "A again" },
        { name: "b", displayName: "B", isDefault: true },
      ],
      transitions: [
        { from: "a", to: "b" },
        { from: "a", to: "b" },
      ],
    };

    expect(checkDefinition(repeated)).toEqual([
      'Status "a" is defined more than once',
      "Only one default status is allowed, got a, b",
      "Transition a -> b is defined more than once",
    ]);
  });
});

describe("setupWorkflow", () => {
  it("creates every status and transition", async () => {
    const workflow = await engine.setup.setupWorkflow(ORG, review);

    expect(workflow.statuses.map((s) => s.name)).toEqual(["draft", "in_review", "approved"]);
    expect(workflow.transitions).toHaveLength(3);
    expect((await engine.catalog.getDefaultStatus(ORG))?.name).toBe("draft");
  });

  it("produces a workflow tasks can move through", async () => {
    const workflow = await engine.setup.setupWorkflow(ORG, review);
    const byName = new Map(workflow.statuses.map((s) => [s.name, s.id]));
    const task = await engine.tasks.createTask(ORG);

    await engine.executor.applyTransition(task.id, byName.get("in_review") ?? "", "user-1");
    await engine.executor.applyTransition(task.id, byName.get("draft") ?? "", "user-1");

    expect((await engine.tasks.getTask(task.id)).currentStatusId).toBe(byName.get("draft"));
  });

  it("rejects an inconsistent definition before touching the store", async () => {
    const error = await engine.setup
      .setupWorkflow(ORG, { ...review, statuses: [...review.statuses, review.statuses[0]] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WorkflowDefinitionError);
    if (error instanceof WorkflowDefinitionError) {
      expect(error.message).toBe('Workflow "review" is invalid');
      expect(error.issues).toContain('Status "draft" is defined more than once');
    }
    expect(await engine.catalog.listAll(ORG)).toEqual([]);
  });

  it("rolls back every status when a transition names an unknown status", async () => {
    const error = await engine.setup
      .setupWorkflow(ORG, { ...review, transitions: [...review.transitions, { from: "approved", to: "shipped" }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WorkflowDefinitionError);
    if (error instanceof WorkflowDefinitionError) {
      expect(error.issues).toEqual(['Unknown status "shipped"']);
    }
    expect(await engine.catalog.listAll(ORG)).toEqual([]);
    expect(await engine.graph.listEdges(ORG, { includeInactive: true })).toEqual([]);
  });

  it("rolls back when a name collides with an existing status", async () => {
    await engine.catalog.createStatus(ORG, { name: "approved", displayName: "Approved" });

    await expect(engine.setup.setupWorkflow(ORG, review)).rejects.toBeInstanceOf(DuplicateNameError);

    expect((await engine.catalog.listAll(ORG)).map((s) => s.name)).toEqual(["approved"]);
  });

  it("connects new statuses to ones the organization already has", async () => {
    const archived = await engine.catalog.createStatus(ORG, { name: "archived", displayName: "Archived" });

    const workflow = await engine.setup.setupWorkflow(ORG, {
      ...review,
      transitions: [...review.transitions, { from: "approved", to: "archived" }],
    });

    expect(workflow.transitions.some((e) => e.toStatusId === archived.id)).toBe(true);
  });

  it("moves the default away from an existing default status", async () => {
    await engine.catalog.createStatus(ORG, { name: "backlog", displayName: "Backlog", isDefault: true });

    await engine.setup.setupWorkflow(ORG, review);

    const defaults = (await engine.catalog.listAll(ORG)).filter((s) => s.isDefault);
    expect(defaults.map((s) => s.name)).toEqual(["draft"]);
  });
});

describe("getWorkflow", () => {
  it("includes inactive statuses but only active transitions", async () => {
    const workflow = await engine.setup.setupWorkflow(ORG, review);
    const [draft, inReview, approved] = workflow.statuses;
    await engine.catalog.deactivate(approved.id);
    await engine.graph.deactivateEdge(ORG, inReview.id, draft.id);

    const current = await engine.setup.getWorkflow(ORG);

    expect(current.statuses).toHaveLength(3);
    expect(current.statuses.find((s) => s.id === approved.id)?.isActive).toBe(false);
    expect(current.transitions).toHaveLength(2);
  });

  it("is empty for an organization with nothing configured", async () => {
    expect(await engine.setup.getWorkflow("org-9")).toEqual({
      organizationId: "org-9",
      statuses: [],
      transitions: [],
    });
  });
});
