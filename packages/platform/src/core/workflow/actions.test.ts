/**
 * Workflow Actions: Test Suite
 *
 * The engine driven through the Action Bus, the way a request handler
 * would use it.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Caller, Status, TaskRecord } from "@statusflow/contracts";
import { dispatch } from "../action-bus/bus.js";
import { clearActionRegistry, getActionsForResource, registerActions } from "../action-bus/registry.js";
import { clearSubscribers } from "../event-bus/index.js";
import { createWorkflowActions } from "./actions.js";
import { createTestEngine, type TestEngine } from "./testing.js";

const ALICE: Caller = { userId: "alice", tenantId: "org-1", type: "human" };
const MALLORY: Caller = { userId: "mallory", tenantId: "org-2", type: "human" };

let engine: TestEngine;

beforeEach(() => {
  clearActionRegistry();
  clearSubscribers();
  engine = createTestEngine();
  registerActions(createWorkflowActions(engine));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "debug").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

async function setUp(caller: Caller): Promise<Map<string, string>> {
  const result = await dispatch(
    "workflow.setup",
    {
      name: "basic",
      statuses: [
        { name: "new", displayName: "New", isDefault: true },
        { name: "in_progress", displayName: "In Progress" },
        { name: "done", displayName: "Done" },
      ],
      transitions: [
        { from: "new", to: "in_progress" },
        { from: "in_progress", to: "done" },
      ],
    },
    caller
  );
  if (!result.success) throw new Error(result.error);
  const workflow = await engine.setup.getWorkflow(caller.tenantId);
  return new Map(workflow.statuses.map((s) => [s.name, s.id]));
}

function idOf(ids: Map<string, string>, name: string): string {
  const id = ids.get(name);
  if (!id) throw new Error(`no status ${name}`);
  return id;
}

describe("workflow actions", () => {
  it("registers actions for every resource", () => {
    expect(getActionsForResource("status").map((a) => a.id)).toEqual([
      "status.create",
      "status.update",
      "status.deactivate",
      "status.listActive",
      "status.getDefault",
    ]);
    expect(getActionsForResource("transition")).toHaveLength(3);
    expect(getActionsForResource("task")).toHaveLength(4);
    expect(getActionsForResource("workflow")).toHaveLength(2);
  });

  it("moves a task along the workflow and records the caller as actor", async () => {
    const ids = await setUp(ALICE);
    const created = await dispatch("task.create", { id: "TASK-1" }, ALICE);
    expect(created.success).toBe(true);

    const moved = await dispatch(
      "task.transition",
      { taskId: "TASK-1", toStatusId: idOf(ids, "in_progress"), note: "Starting" },
      ALICE
    );

    expect(moved).toMatchObject({ success: true, data: { actorId: "alice", note: "Starting" } });
    const history = await dispatch("task.history", { taskId: "TASK-1" }, ALICE);
    expect(history.success && Array.isArray(history.data) && history.data.length).toBe(1);
  });

  it("reports an illegal move as a workflow failure", async () => {
    const ids = await setUp(ALICE);
    await dispatch("task.create", { id: "TASK-1" }, ALICE);

    const result = await dispatch("task.transition", { taskId: "TASK-1", toStatusId: idOf(ids, "done") }, ALICE);

    expect(result).toMatchObject({
      success: false,
      errorType: "workflow",
      details: { code: "ILLEGAL_TRANSITION", allowedStatusIds: [idOf(ids, "in_progress")] },
    });
  });

  it("scopes every lookup to the caller's organization", async () => {
    const ids = await setUp(ALICE);
    await dispatch("task.create", { id: "TASK-1" }, ALICE);

    const move = await dispatch("task.transition", { taskId: "TASK-1", toStatusId: idOf(ids, "in_progress") }, MALLORY);
    const history = await dispatch("task.history", { taskId: "TASK-1" }, MALLORY);
    const deactivate = await dispatch("status.deactivate", { statusId: idOf(ids, "done") }, MALLORY);

    expect(move).toMatchObject({ success: false, errorType: "not_found" });
    expect(history).toMatchObject({ success: false, errorType: "not_found" });
    expect(deactivate).toMatchObject({ success: false, errorType: "not_found" });
    expect((await engine.catalog.getStatus("org-1", idOf(ids, "done"))).isActive).toBe(true);
  });

  it("rejects malformed input before reaching the engine", async () => {
    const result = await dispatch("transition.add", { fromStatusId: "new", toStatusId: "done" }, ALICE);

    expect(result).toMatchObject({ success: false, errorType: "validation" });
  });

  it("reports a duplicate status name as a conflict", async () => {
    await setUp(ALICE);

    const result = await dispatch("status.create", { name: "done", displayName: "Done again" }, ALICE);

    expect(result).toMatchObject({ success: false, errorType: "conflict", details: { code: "DUPLICATE_NAME" } });
  });

  it("reports a reused task id as a conflict that retrying cannot fix", async () => {
    await setUp(ALICE);
    await dispatch("task.create", { id: "TASK-1" }, ALICE);

    const result = await dispatch("task.create", { id: "TASK-1" }, ALICE);

    expect(result).toEqual({
      success: false,
      error: "Task TASK-1 already exists",
      errorType: "conflict",
      details: { code: "DUPLICATE_TASK", retryable: false },
    });
  });

  it("lists the tasks in a status for the caller's organization only", async () => {
    const ids = await setUp(ALICE);
    await dispatch("task.create", { id: "TASK-1" }, ALICE);
    await dispatch("task.create", { id: "TASK-2", initialStatusId: idOf(ids, "in_progress") }, ALICE);

    const mine = await dispatch("task.listByStatus", { statusId: idOf(ids, "new") }, ALICE);
    const theirs = await dispatch("task.listByStatus", { statusId: idOf(ids, "new") }, MALLORY);

    expect(mine.success && (mine.data as TaskRecord[]).map((t) => t.id)).toEqual(["TASK-1"]);
    expect(theirs).toMatchObject({ success: false, errorType: "not_found" });
  });

  it("lists active statuses and outgoing targets", async () => {
    const ids = await setUp(ALICE);

    const active = await dispatch("status.listActive", {}, ALICE);
    const next = await dispatch("transition.listOutgoing", { fromStatusId: idOf(ids, "new") }, ALICE);

    expect(active.success && (active.data as Status[]).map((s) => s.name)).toEqual(["new", "in_progress", "done"]);
    expect(next.success && (next.data as Status[]).map((s) => s.name)).toEqual(["in_progress"]);
  });

  it("starts a new task in the default status", async () => {
    const ids = await setUp(ALICE);

    const result = await dispatch("task.create", {}, ALICE);

    expect(result.success && (result.data as TaskRecord).currentStatusId).toBe(idOf(ids, "new"));
  });

  it("returns null when deactivating a transition that never existed", async () => {
    const ids = await setUp(ALICE);

    const result = await dispatch(
      "transition.deactivate",
      { fromStatusId: idOf(ids, "done"), toStatusId: idOf(ids, "new") },
      ALICE
    );

    expect(result).toEqual({ success: true, data: null });
  });

  it("reports an invalid workflow definition with its issues", async () => {
    const result = await dispatch(
      "workflow.setup",
      {
        name: "broken",
        statuses: [{ name: "new", displayName: "New" }],
        transitions: [{ from: "new", to: "missing" }],
      },
      ALICE
    );

    expect(result).toMatchObject({
      success: false,
      errorType: "validation",
      details: { code: "INVALID_DEFINITION", issues: ['Unknown status "missing"'] },
    });
    expect((await engine.setup.getWorkflow("org-1")).statuses).toEqual([]);
  });

  it("changes the default through status.update", async () => {
    const ids = await setUp(ALICE);

    const result = await dispatch(
      "status.update",
      { statusId: idOf(ids, "in_progress"), patch: { isDefault: true } },
      ALICE
    );
    const current = await dispatch("status.getDefault", {}, ALICE);

    expect(result.success).toBe(true);
    expect(current.success && (current.data as Status).name).toBe("in_progress");
  });
});
