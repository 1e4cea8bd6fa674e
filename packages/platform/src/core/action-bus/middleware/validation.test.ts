/**
 * Validation Middleware: Test Suite
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { defineAction, transitionRequestSchema } from "@statusflow/contracts";
import { validateInput, ValidationError } from "./validation.js";

const transition = defineAction({
  id: "task.transition",
  name: "Move Task",
  description: "test",
  inputSchema: transitionRequestSchema,
  idempotent: false,
  async execute(input) {
    return input;
  },
});

describe("validateInput", () => {
  it("returns the parsed input", () => {
    const input = { taskId: "TASK-7", toStatusId: "6f1c1d4e-2b7a-4c55-9d2f-0a8e5b3c7d10" };

    expect(validateInput(transition, input)).toEqual(input);
  });

  it("returns what the schema transforms", () => {
    const trimmed = defineAction({
      id: "status.rename",
      name: "Rename",
      description: "test",
      inputSchema: z.object({ displayName: z.string().trim() }),
      idempotent: true,
      async execute(input) {
        return input;
      },
    });

    expect(validateInput(trimmed, { displayName: "  Done " })).toEqual({ displayName: "Done" });
  });

  it("throws a ValidationError naming the action", () => {
    expect(() => validateInput(transition, {})).toThrow('Validation failed for action "task.transition"');
  });

  it("reports every failing field by its path", () => {
    try {
      validateInput(transition, { taskId: "", toStatusId: "done" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.fieldErrors.map((e) => e.field)).toEqual(["taskId", "toStatusId"]);
        expect(error.fieldErrors[1].code).toBe("invalid_string");
      }
    }
  });
});
