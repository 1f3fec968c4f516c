/**
 * Helpers shared by the command-line tools.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import {
  UnsupportedFormatError,
  parseFormat,
  requireAvailable,
  type AvailableFormat,
} from "../formats/index.js";
import { InputError } from "../service/index.js";

export const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export type Color = keyof typeof COLORS;

let useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

export function setColors(enabled: boolean): void {
  useColors = enabled;
}

export function c(color: Color, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/** Parameter flags common to both tools. */
export interface ParameterFlags {
  tone?: string;
  audience?: string;
  length?: string;
  slides?: string;
}

/**
 * Turn CLI flags into parameter overrides. Flags that were not given are
 * left out so the format's defaults apply; numeric flags are passed as
 * numbers (NaN for garbage, which the parameter schema rejects).
 */
export function buildParameterOverrides(flags: ParameterFlags): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (flags.tone !== undefined) overrides.tone = flags.tone;
  if (flags.audience !== undefined) overrides.audience = flags.audience;
  if (flags.length !== undefined) overrides.length = Number(flags.length);
  if (flags.slides !== undefined) overrides.numSlides = Number(flags.slides);
  return overrides;
}

export { InputError };

/**
 * Parse a --format value and require that it can be generated, so a
 * coming-soon format is reported before anything else is set up.
 *
 * @throws UnsupportedFormatError for unknown or coming-soon formats
 */
export function resolveRequestedFormat(input: string): AvailableFormat {
  return requireAvailable(parseFormat(input));
}

/** Exit code for a failed run: 2 for a coming-soon format, else 1. */
export function exitCodeFor(err: unknown): number {
  return err instanceof UnsupportedFormatError && err.comingSoon ? 2 : 1;
}

/**
 * Read the content to transform from --text, --input or stdin (in that
 * order of precedence). Returns the text unmodified.
 */
export async function readContent(options: {
  text?: string;
  input?: string;
  stdin?: NodeJS.ReadableStream & { isTTY?: boolean };
}): Promise<string> {
  if (options.text !== undefined) {
    return options.text;
  }

  if (options.input !== undefined) {
    const fullPath = resolve(options.input);
    if (!existsSync(fullPath)) {
      throw new InputError(`Input file not found: ${fullPath}`);
    }
    try {
      return readFileSync(fullPath, "utf-8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InputError(`Cannot read input file ${fullPath}: ${reason}`);
    }
  }

  const stdin = options.stdin ?? process.stdin;
  if (stdin.isTTY) {
    throw new InputError("No content given. Use --text, --input <file>, or pipe text on stdin.");
  }

  // Decode once at the end: a multi-byte character may span two chunks
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}
