/**
 * Workflow Input Schemas
 *
 * Zod schemas for everything a caller can send into the engine.
 * The action layer validates with these before any business logic runs;
 * the bulk setup path validates whole definitions with them up front.
 */

import { z } from "zod";

/** Status machine keys: lowercase snake_case ("in_progress", "qa_testing") */
export const STATUS_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

/** "#RRGGBB" */
export const HEX_COLOR_PATTERN = /^#[0-9A-Fa-f]{6}$/;

/** Status, edge and audit ids are generated by the engine */
export const idSchema = z.string().uuid();

/** Task ids belong to the surrounding system and are opaque here */
export const taskIdSchema = z.string().min(1).max(128);

export const statusNameSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(STATUS_NAME_PATTERN, "Status name must be lowercase snake_case");

export const hexColorSchema = z
  .string()
  .regex(HEX_COLOR_PATTERN, "Color must be a hex string like #3B82F6");

export const createStatusInputSchema = z.object({
  name: statusNameSchema,
  displayName: z.string().trim().min(1).max(128),
  color: hexColorSchema.nullable().optional(),
  orderIndex: z.number().int().optional(),
  isDefault: z.boolean().optional(),
});

export const updateStatusInputSchema = z
  .object({
    displayName: z.string().trim().min(1).max(128).optional(),
    color: hexColorSchema.nullable().optional(),
    orderIndex: z.number().int().optional(),
    isActive: z.boolean().optional(),
    isDefault: z.boolean().optional(),
  })
  .refine((patch) => Object.values(patch).some((v) => v !== undefined), {
    message: "At least one field must be provided",
  });

export const workflowEdgeDefinitionSchema = z.object({
  from: statusNameSchema,
  to: statusNameSchema,
});

export const workflowDefinitionSchema = z.object({
  name: z.string().min(1),
  statuses: z.array(createStatusInputSchema),
  transitions: z.array(workflowEdgeDefinitionSchema),
});

export const transitionRequestSchema = z.object({
  taskId: taskIdSchema,
  toStatusId: idSchema,
  note: z.string().max(2000).optional(),
});
