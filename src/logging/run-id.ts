/**
 * Run and request identifiers.
 *
 * A run ID tags every log line of one process (one CLI invocation);
 * a request ID tags a single transformation within that run.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/**
 * Generate a request ID for one transformation (e.g., "req-9f86d081").
 */
export function generateRequestId(): string {
  return `req-${randomBytes(4).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this process.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
