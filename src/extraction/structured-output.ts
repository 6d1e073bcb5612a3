/**
 * Structured output parsing
 *
 * Model replies are free text. These helpers locate the JSON payload in a
 * reply, repair the common ways models mangle it, and parse it.
 */

import { ExtractionError } from "../errors.js";

export type StructuredValue = Record<string, unknown> | unknown[];

const FENCE_PATTERN = /```(?:json|JSON)?[ \t]*\r?\n?([\s\S]*?)```/;

const CLOSING: Record<string, string> = { "{": "}", "[": "]" };

// =============================================================================
// Locate
// =============================================================================

/**
 * Scan from `start` (an opening bracket) to its matching close, ignoring
 * brackets inside quoted strings. Returns -1 when the span never closes.
 */
function findMatchingClose(text: string, start: number): number {
  const stack: string[] = [];
  let quote: string | undefined;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];

    if (quote) {
      if (ch === "\\") {
        i += 1;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }

    if (ch === "\"" || ch === "'") {
      quote = ch;
    } else if (ch === "{" || ch === "[") {
      stack.push(CLOSING[ch]);
    } else if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i;
    }
  }

  return -1;
}

/**
 * Find the candidate JSON text inside a model reply.
 *
 * A fenced block wins; then the first balanced top-level object or array;
 * then, when brackets do not balance, first opener to last matching closer.
 */
export function locateStructuredText(text: string): string {
  const fenced = FENCE_PATTERN.exec(text);
  if (fenced) {
    return fenced[1].trim();
  }

  const start = text.search(/[{[]/);
  if (start === -1) {
    return text.trim();
  }

  const end = findMatchingClose(text, start);
  if (end !== -1) {
    return text.slice(start, end + 1);
  }

  const lastClose = text.lastIndexOf(CLOSING[text[start]]);
  if (lastClose > start) {
    return text.slice(start, lastClose + 1);
  }

  return text.trim();
}

// =============================================================================
// Repair
// =============================================================================

/**
 * Best-effort fix-ups for almost-JSON. Lossy: an apostrophe inside a value
 * becomes a double quote, so this only runs after a strict parse failed.
 */
export function repairStructuredText(text: string): string {
  return text
    .replace(/[“”]/g, "\"")
    .replace(/[‘’]/g, "'")
    .replace(/'/g, "\"")
    .replace(/([{,])\s*([a-zA-Z0-9_]+)\s*:/g, "$1\"$2\":")
    .replace(/,\s*([}\]])/g, "$1");
}

// =============================================================================
// Parse
// =============================================================================

function isStructured(value: unknown): value is StructuredValue {
  return typeof value === "object" && value !== null;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Parse a model reply into an object or array.
 *
 * Strict parse first, then exactly one repaired attempt. Throws
 * {@link ExtractionError} with kind `malformed_output` otherwise.
 */
export function parseStructuredOutput(text: string): StructuredValue {
  const candidate = locateStructuredText(text);

  let parsed = tryParse(candidate);
  if (!parsed.ok) {
    parsed = tryParse(repairStructuredText(candidate));
  }

  if (!parsed.ok) {
    throw new ExtractionError(`Could not parse structured output: ${parsed.message}`, "malformed_output");
  }
  if (!isStructured(parsed.value)) {
    throw new ExtractionError(
      `Expected a JSON object or array, received ${parsed.value === null ? "null" : typeof parsed.value}`,
      "malformed_output",
    );
  }

  return parsed.value;
}
