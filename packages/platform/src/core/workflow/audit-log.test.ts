/**
 * Audit Log: Test Suite
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createBasicWorkflow, createTestEngine, type BasicWorkflow, type TestEngine } from "./testing.js";
import { TaskNotFoundError } from "./errors.js";

const ORG = "org-1";

let engine: TestEngine;
let flow: BasicWorkflow;

beforeEach(async () => {
  engine = createTestEngine();
  flow = await createBasicWorkflow(engine, ORG);
  await engine.graph.addEdge(ORG, flow.done.id, flow.doing.id);
});

describe("history", () => {
  it("is empty for a task that never moved", async () => {
    const task = await engine.tasks.createTask(ORG);

    expect(await engine.audit.history(task.id)).toEqual([]);
  });

  it("chains every record onto the previous one", async () => {
    const task = await engine.tasks.createTask(ORG);
    for (const target of [flow.doing, flow.done, flow.doing, flow.done]) {
      await engine.executor.applyTransition(task.id, target.id, "user-1");
    }

    const history = await engine.audit.history(task.id);

    expect(history).toHaveLength(4);
    expect(history[0].fromStatusId).toBe(flow.todo.id);
    for (let i = 1; i < history.length; i++) {
      expect(history[i].fromStatusId).toBe(history[i - 1].toStatusId);
    }
  });

  it("orders records with equal timestamps by insertion", async () => {
    const at = new Date("2024-06-01T12:00:00Z");
    const frozen = createTestEngine({ now: () => at });
    const own = await createBasicWorkflow(frozen, ORG);
    const task = await frozen.tasks.createTask(ORG);

    await frozen.executor.applyTransition(task.id, own.doing.id, "user-1");
    await frozen.executor.applyTransition(task.id, own.done.id, "user-2");

    const history = await frozen.audit.history(task.id);
    expect(history.map((r) => r.actorId)).toEqual(["user-1", "user-2"]);
    expect(history[0].sequence).toBeLessThan(history[1].sequence);
  });

  it("keeps each task's history separate", async () => {
    const first = await engine.tasks.createTask(ORG);
    const second = await engine.tasks.createTask(ORG);

    await engine.executor.applyTransition(first.id, flow.doing.id, "user-1");

    expect(await engine.audit.history(second.id)).toEqual([]);
  });

  it("rejects an unknown task", async () => {
    await expect(engine.audit.history("missing")).rejects.toBeInstanceOf(TaskNotFoundError);
  });

  it("rejects a task of another organization when scoped", async () => {
    const task = await engine.tasks.createTask(ORG);

    await expect(
      engine.audit.history(task.id, { organizationId: "org-2" })
    ).rejects.toBeInstanceOf(TaskNotFoundError);
  });
});

describe("replay", () => {
  it("is null before the first transition", async () => {
    const task = await engine.tasks.createTask(ORG);

    expect(await engine.audit.replay(task.id)).toBeNull();
  });

  it("agrees with the task's current status after it moves", async () => {
    const task = await engine.tasks.createTask(ORG);
    await engine.executor.applyTransition(task.id, flow.doing.id, "user-1");
    await engine.executor.applyTransition(task.id, flow.done.id, "user-1");

    const current = await engine.tasks.getTask(task.id);
    expect(await engine.audit.replay(task.id)).toBe(current.currentStatusId);
  });
});
