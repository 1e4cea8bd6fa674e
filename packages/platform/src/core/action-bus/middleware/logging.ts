/**
 * Logging Middleware
 *
 * Structured JSON logging for the action bus and engine components.
 * One line per entry on the console; warnings and errors are also
 * forwarded to the observability provider.
 */

import type { Logger } from "@statusflow/contracts";
import { captureMessage } from "../../observability/index.js";

type LogData = Record<string, unknown>;

/** Errors do not survive JSON.stringify; flatten them first. */
function serializable(data: LogData | undefined): LogData {
  if (!data) return {};
  const out: LogData = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] =
      value instanceof Error
        ? { name: value.name, message: value.message }
        : value instanceof Date
          ? value.toISOString()
          : value;
  }
  return out;
}

/**
 * Creates a structured logger.
 * Every entry carries the `context` it was created with.
 */
export function createLogger(context: string): Logger {
  const line = (level: string, message: string, data?: LogData) =>
    JSON.stringify({ level, context, message, ...serializable(data) });

  return {
    info(message, data) {
      console.log(line("info", message, data));
    },
    warn(message, data) {
      console.warn(line("warn", message, data));
      captureMessage(`[${context}] ${message}`, "warning", serializable(data));
    },
    error(message, data) {
      console.error(line("error", message, data));
      captureMessage(`[${context}] ${message}`, "error", serializable(data));
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(line("debug", message, data));
      }
    },
  };
}

export interface ActionExecutionEntry {
  actionId: string;
  durationMs: number;
  success: boolean;
  /** Organization the action ran for */
  tenantId: string;
  errorType?: string;
  error?: string;
}

/**
 * Logs one action execution with its duration and outcome.
 */
export function logActionExecution(entry: ActionExecutionEntry): void {
  const line = JSON.stringify({
    level: entry.success ? "info" : "error",
    context: "action-bus",
    event: "action.executed",
    ...entry,
  });

  if (entry.success) {
    console.log(line);
  } else {
    console.error(line);
  }
}
