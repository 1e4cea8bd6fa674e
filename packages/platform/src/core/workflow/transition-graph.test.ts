/**
 * Transition Graph: Test Suite
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Status } from "@statusflow/contracts";
import { loadConfig } from "../config/index.js";
import { createTestEngine, type TestEngine } from "./testing.js";
import { CrossOrgReferenceError, DuplicateEdgeError } from "./errors.js";

const ORG = "org-1";
const OTHER_ORG = "org-2";

let engine: TestEngine;
let todo: Status;
let doing: Status;
let done: Status;

beforeEach(async () => {
  engine = createTestEngine();
  todo = await engine.catalog.createStatus(ORG, { name: "new", displayName: "New" });
  doing = await engine.catalog.createStatus(ORG, { name: "in_progress", displayName: "In Progress" });
  done = await engine.catalog.createStatus(ORG, { name: "done", displayName: "Done" });
});

describe("addEdge", () => {
  it("creates an active edge", async () => {
    const edge = await engine.graph.addEdge(ORG, todo.id, doing.id);

    expect(edge).toMatchObject({
      organizationId: ORG,
      fromStatusId: todo.id,
      toStatusId: doing.id,
      isActive: true,
    });
  });

  it("rejects adding the same active edge twice and keeps one record", async () => {
    await engine.graph.addEdge(ORG, todo.id, doing.id);

    await expect(engine.graph.addEdge(ORG, todo.id, doing.id)).rejects.toBeInstanceOf(DuplicateEdgeError);
    expect(await engine.graph.listEdges(ORG, { includeInactive: true })).toHaveLength(1);
  });

  it("reactivates a deactivated edge instead of adding another", async () => {
    const original = await engine.graph.addEdge(ORG, todo.id, doing.id);
    await engine.graph.deactivateEdge(ORG, todo.id, doing.id);

    const again = await engine.graph.addEdge(ORG, todo.id, doing.id);

    expect(again.id).toBe(original.id);
    expect(again.isActive).toBe(true);
    expect(await engine.graph.listEdges(ORG, { includeInactive: true })).toHaveLength(1);
  });

  it("allows an explicit self-loop", async () => {
    const loop = await engine.graph.addEdge(ORG, doing.id, doing.id);

    expect(loop.fromStatusId).toBe(loop.toStatusId);
    expect(await engine.graph.isAllowed(ORG, doing.id, doing.id)).toBe(true);
  });

  it("rejects a status of another organization", async () => {
    const foreign = await engine.catalog.createStatus(OTHER_ORG, { name: "new", displayName: "New" });

    await expect(engine.graph.addEdge(ORG, todo.id, foreign.id)).rejects.toBeInstanceOf(CrossOrgReferenceError);
    await expect(engine.graph.addEdge(ORG, foreign.id, todo.id)).rejects.toBeInstanceOf(CrossOrgReferenceError);
    expect(await engine.graph.listEdges(ORG)).toEqual([]);
  });

  it("rejects a status that does not exist as not belonging to the organization", async () => {
    const error = await engine.graph
      .addEdge(ORG, todo.id, "00000000-0000-4000-8000-000000000000")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CrossOrgReferenceError);
    expect(error).toMatchObject({ organizationId: ORG, statusId: "00000000-0000-4000-8000-000000000000" });
  });
});

describe("deactivateEdge", () => {
  it("returns the deactivated edge", async () => {
    await engine.graph.addEdge(ORG, todo.id, doing.id);

    const edge = await engine.graph.deactivateEdge(ORG, todo.id, doing.id);

    expect(edge?.isActive).toBe(false);
    expect(await engine.graph.isAllowed(ORG, todo.id, doing.id)).toBe(false);
  });

  it("is idempotent", async () => {
    await engine.graph.addEdge(ORG, todo.id, doing.id);
    await engine.graph.deactivateEdge(ORG, todo.id, doing.id);

    const again = await engine.graph.deactivateEdge(ORG, todo.id, doing.id);

    expect(again?.isActive).toBe(false);
  });

  it("returns null for a pair that was never allowed", async () => {
    expect(await engine.graph.deactivateEdge(ORG, todo.id, done.id)).toBeNull();
  });
});

describe("isAllowed", () => {
  beforeEach(async () => {
    await engine.graph.addEdge(ORG, todo.id, doing.id);
    await engine.graph.addEdge(ORG, doing.id, done.id);
  });

  it("allows direct edges only", async () => {
    expect(await engine.graph.isAllowed(ORG, todo.id, doing.id)).toBe(true);
    expect(await engine.graph.isAllowed(ORG, doing.id, done.id)).toBe(true);
    expect(await engine.graph.isAllowed(ORG, todo.id, done.id)).toBe(false);
  });

  it("is directional", async () => {
    expect(await engine.graph.isAllowed(ORG, doing.id, todo.id)).toBe(false);
  });

  it("needs an explicit self-loop", async () => {
    expect(await engine.graph.isAllowed(ORG, doing.id, doing.id)).toBe(false);
  });

  it("lets a task with no status enter any active status", async () => {
    expect(await engine.graph.isAllowed(ORG, null, done.id)).toBe(true);

    await engine.catalog.deactivate(done.id);
    expect(await engine.graph.isAllowed(ORG, null, done.id)).toBe(false);
  });

  it("does not let a task with no status enter another organization's status", async () => {
    const foreign = await engine.catalog.createStatus(OTHER_ORG, { name: "new", displayName: "New" });

    expect(await engine.graph.isAllowed(ORG, null, foreign.id)).toBe(false);
  });

  it("never sees another organization's edges", async () => {
    expect(await engine.graph.isAllowed(OTHER_ORG, todo.id, doing.id)).toBe(false);
  });
});

describe("listOutgoing", () => {
  it("lists active targets ordered like listActive", async () => {
    await engine.graph.addEdge(ORG, doing.id, done.id);
    await engine.graph.addEdge(ORG, doing.id, todo.id);

    const targets = await engine.graph.listOutgoing(ORG, doing.id);

    expect(targets.map((s) => s.name)).toEqual(["new", "done"]);
  });

  it("skips deactivated edges and inactive targets", async () => {
    await engine.graph.addEdge(ORG, doing.id, done.id);
    await engine.graph.addEdge(ORG, doing.id, todo.id);
    await engine.graph.deactivateEdge(ORG, doing.id, todo.id);
    await engine.catalog.deactivate(done.id);

    expect(await engine.graph.listOutgoing(ORG, doing.id)).toEqual([]);
  });
});

describe("listEdges", () => {
  it("hides inactive edges unless asked", async () => {
    await engine.graph.addEdge(ORG, todo.id, doing.id);
    await engine.graph.addEdge(ORG, doing.id, done.id);
    await engine.graph.deactivateEdge(ORG, todo.id, doing.id);

    const active = await engine.graph.listEdges(ORG);
    const all = await engine.graph.listEdges(ORG, { includeInactive: true });

    expect(active.map((e) => e.toStatusId)).toEqual([done.id]);
    expect(all).toHaveLength(2);
  });
});

describe("with the read cache enabled", () => {
  it("sees writes made through the graph immediately", async () => {
    const cachedEngine = createTestEngine({ config: loadConfig({ WORKFLOW_CACHE_TTL_MS: "60000" }) });
    expect(cachedEngine.cache.enabled).toBe(true);

    const a = await cachedEngine.catalog.createStatus(ORG, { name: "a", displayName: "A" });
    const b = await cachedEngine.catalog.createStatus(ORG, { name: "b", displayName: "B" });

    expect(await cachedEngine.graph.isAllowed(ORG, a.id, b.id)).toBe(false);
    await cachedEngine.graph.addEdge(ORG, a.id, b.id);
    expect(await cachedEngine.graph.isAllowed(ORG, a.id, b.id)).toBe(true);
  });
});
