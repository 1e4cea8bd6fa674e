/**
 * Workflow Actions
 *
 * The engine's operations as Action Bus actions. Every action is scoped
 * to the caller's organization (Caller.tenantId); transitions record the
 * caller's userId as the actor.
 *
 * Register once at startup:
 *   registerActions(createWorkflowActions(engine));
 *   await dispatch("task.transition", { taskId, toStatusId }, caller);
 */

import { z } from "zod";
import {
  createStatusInputSchema,
  defineAction,
  idSchema,
  taskIdSchema,
  transitionRequestSchema,
  updateStatusInputSchema,
  workflowDefinitionSchema,
  type ActionDefinition,
} from "@statusflow/contracts";
import type { WorkflowEngine } from "./engine.js";

const noInput = z.object({});

const edgeInput = z.object({
  fromStatusId: idSchema,
  toStatusId: idSchema,
});

export function createWorkflowActions(engine: WorkflowEngine): ActionDefinition[] {
  const { catalog, graph, executor, audit, tasks, setup } = engine;

  return [
    // -----------------------------------------------------------------------
    // Status Catalog
    // -----------------------------------------------------------------------
    defineAction({
      id: "status.create",
      name: "Create Status",
      description: "Adds a status to the organization's catalog",
      inputSchema: createStatusInputSchema,
      idempotent: false,
      async execute(input, { caller, emit }) {
        const status = await catalog.createStatus(caller.tenantId, input);
        await emit({
          type: "status.created",
          payload: { organizationId: caller.tenantId, statusId: status.id, name: status.name },
        });
        return status;
      },
    }),

    defineAction({
      id: "status.update",
      name: "Update Status",
      description: "Changes a status's label, color, ordering, active flag or default flag",
      inputSchema: z.object({ statusId: idSchema, patch: updateStatusInputSchema }),
      idempotent: true,
      async execute({ statusId, patch }, { caller, emit }) {
        const status = await catalog.updateStatus(caller.tenantId, statusId, patch);
        await emit({
          type: "status.updated",
          payload: { organizationId: caller.tenantId, statusId, fields: Object.keys(patch) },
        });
        return status;
      },
    }),

    defineAction({
      id: "status.deactivate",
      name: "Deactivate Status",
      description: "Stops a status from being used as a new target; tasks already in it stay",
      inputSchema: z.object({ statusId: idSchema }),
      idempotent: true,
      async execute({ statusId }, { caller, emit }) {
        const status = await catalog.deactivate(statusId, caller.tenantId);
        await emit({
          type: "status.deactivated",
          payload: { organizationId: caller.tenantId, statusId },
        });
        return status;
      },
    }),

    defineAction({
      id: "status.listActive",
      name: "List Active Statuses",
      description: "Active statuses of the organization in display order",
      inputSchema: noInput,
      idempotent: true,
      readOnly: true,
      async execute(_input, { caller }) {
        return catalog.listActive(caller.tenantId);
      },
    }),

    defineAction({
      id: "status.getDefault",
      name: "Get Default Status",
      description: "The status new tasks start in, or null",
      inputSchema: noInput,
      idempotent: true,
      readOnly: true,
      async execute(_input, { caller }) {
        return catalog.getDefaultStatus(caller.tenantId);
      },
    }),

    // -----------------------------------------------------------------------
    // Transition Graph
    // -----------------------------------------------------------------------
    defineAction({
      id: "transition.add",
      name: "Allow Transition",
      description: "Allows tasks to move from one status to another",
      inputSchema: edgeInput,
      idempotent: false,
      async execute({ fromStatusId, toStatusId }, { caller, emit }) {
        const edge = await graph.addEdge(caller.tenantId, fromStatusId, toStatusId);
        await emit({
          type: "transition.added",
          payload: { organizationId: caller.tenantId, edgeId: edge.id, fromStatusId, toStatusId },
        });
        return edge;
      },
    }),

    defineAction({
      id: "transition.deactivate",
      name: "Disallow Transition",
      description: "Stops allowing a move; returns null if it was never allowed",
      inputSchema: edgeInput,
      idempotent: true,
      async execute({ fromStatusId, toStatusId }, { caller, emit }) {
        const edge = await graph.deactivateEdge(caller.tenantId, fromStatusId, toStatusId);
        if (edge) {
          await emit({
            type: "transition.deactivated",
            payload: { organizationId: caller.tenantId, edgeId: edge.id, fromStatusId, toStatusId },
          });
        }
        return edge;
      },
    }),

    defineAction({
      id: "transition.listOutgoing",
      name: "List Next Statuses",
      description: "Statuses a task in the given status may move to",
      inputSchema: z.object({ fromStatusId: idSchema }),
      idempotent: true,
      readOnly: true,
      async execute({ fromStatusId }, { caller }) {
        return graph.listOutgoing(caller.tenantId, fromStatusId);
      },
    }),

    // -----------------------------------------------------------------------
    // Tasks
    // -----------------------------------------------------------------------
    defineAction({
      id: "task.create",
      name: "Register Task",
      description: "Registers a task with the engine at its initial or default status",
      inputSchema: z.object({
        id: taskIdSchema.optional(),
        initialStatusId: idSchema.optional(),
      }),
      idempotent: false,
      async execute(input, { caller, emit }) {
        const task = await tasks.createTask(caller.tenantId, input);
        await emit({
          type: "task.created",
          payload: { organizationId: caller.tenantId, taskId: task.id, statusId: task.currentStatusId },
        });
        return task;
      },
    }),

    defineAction({
      id: "task.transition",
      name: "Move Task",
      description: "Moves a task to another status if the workflow allows it, recording who did it",
      inputSchema: transitionRequestSchema,
      idempotent: false,
      async execute({ taskId, toStatusId, note }, { caller }) {
        // The executor publishes task.status_changed itself once committed
        return executor.applyTransition(taskId, toStatusId, caller.userId, {
          note,
          organizationId: caller.tenantId,
        });
      },
    }),

    defineAction({
      id: "task.history",
      name: "Task History",
      description: "Every status change of a task, oldest first",
      inputSchema: z.object({ taskId: taskIdSchema }),
      idempotent: true,
      readOnly: true,
      async execute({ taskId }, { caller }) {
        return audit.history(taskId, { organizationId: caller.tenantId });
      },
    }),

    defineAction({
      id: "task.listByStatus",
      name: "Tasks In Status",
      description: "Tasks currently in the given status, oldest first",
      inputSchema: z.object({ statusId: idSchema }),
      idempotent: true,
      readOnly: true,
      async execute({ statusId }, { caller }) {
        return tasks.listByStatus(caller.tenantId, statusId);
      },
    }),

    // -----------------------------------------------------------------------
    // Bulk setup
    // -----------------------------------------------------------------------
    defineAction({
      id: "workflow.setup",
      name: "Set Up Workflow",
      description: "Creates statuses and transitions from one definition, all or nothing",
      inputSchema: workflowDefinitionSchema,
      idempotent: false,
      async execute(definition, { caller, emit }) {
        const workflow = await setup.setupWorkflow(caller.tenantId, definition);
        await emit({
          type: "workflow.set_up",
          payload: { organizationId: caller.tenantId, workflow: definition.name },
        });
        return workflow;
      },
    }),

    defineAction({
      id: "workflow.get",
      name: "Get Workflow",
      description: "All statuses and active transitions of the organization",
      inputSchema: noInput,
      idempotent: true,
      readOnly: true,
      async execute(_input, { caller }) {
        return setup.getWorkflow(caller.tenantId);
      },
    }),
  ];
}
