/**
 * Workflow Tables
 *
 * Drizzle definitions for the four tables the engine owns. Queries go
 * through these; the DDL itself (including the constraints Drizzle does
 * not need to know about) lives in migrate.ts.
 *
 *   task_statuses              Status Catalog
 *   task_workflow_transitions  Transition Graph
 *   tasks                      the engine's projection of each task
 *   task_status_transitions    Audit Log (append-only)
 */

import {
  pgTable,
  uuid,
  text,
  varchar,
  boolean,
  integer,
  bigserial,
  timestamp,
} from "drizzle-orm/pg-core";

export const taskStatuses = pgTable("task_statuses", {
  id: uuid("id").primaryKey().defaultRandom(),
  organizationId: text("organization_id").notNull(),
  name: varchar("name", { length: 64 }).notNull(),
  displayName: varchar("display_name", { length: 128 }).notNull(),
  color: varchar("color", { length: 7 }),
  orderIndex: integer("order_index").notNull().default(0),
  isActive: boolean("is_active").notNull().default(true),
  isDefault: boolean("is_default").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const taskWorkflowTransitions = pgTable("task_workflow_transitions", {
  id: uuid("id").primaryKey().defaultRandom(),
  organizationId: text("organization_id").notNull(),
  fromStatusId: uuid("from_status_id").notNull(),
  toStatusId: uuid("to_status_id").notNull(),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const tasks = pgTable("tasks", {
  id: text("id").primaryKey(),
  organizationId: text("organization_id").notNull(),
  currentStatusId: uuid("current_status_id"),
  version: integer("version").notNull().default(0),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const taskStatusTransitions = pgTable("task_status_transitions", {
  id: uuid("id").primaryKey().defaultRandom(),
  sequence: bigserial("sequence", { mode: "number" }).notNull(),
  organizationId: text("organization_id").notNull(),
  taskId: text("task_id").notNull(),
  fromStatusId: uuid("from_status_id"),
  toStatusId: uuid("to_status_id").notNull(),
  actorId: text("actor_id").notNull(),
  changedAt: timestamp("changed_at", { withTimezone: true }).notNull(),
  note: text("note"),
});

/** Constraint names the store translates into engine errors */
export const CONSTRAINTS = {
  statusName: "task_statuses_org_name_key",
  oneDefault: "task_statuses_one_default_per_org",
  edgePair: "task_workflow_transitions_org_pair_key",
  taskId: "tasks_pkey",
  defaultIsActive: "task_statuses_default_is_active",
} as const;
