/**
 * Error taxonomy for the agent.
 *
 * Each component boundary converts these into envelopes; none of them is
 * meant to reach the caller as a thrown exception.
 */

import type { RoutingDecision } from "./types.js";

export type ExtractionErrorKind = "oracle_failure" | "malformed_output";

export class ExtractionError extends Error {
  constructor(
    message: string,
    public kind: ExtractionErrorKind,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

export class ValidationError extends Error {
  constructor(message: string, public errors: string[]) {
    super(message);
    this.name = "ValidationError";
  }
}

export class RoutingAmbiguityError extends Error {
  constructor(public decision: RoutingDecision) {
    super(`Could not determine an AWS service for the prompt (confidence ${decision.confidence})`);
    this.name = "RoutingAmbiguityError";
  }
}

export class ProviderError extends Error {
  constructor(message: string, public operation: string, public cause?: unknown) {
    super(message);
    this.name = "ProviderError";
  }
}

export class MissingTargetError extends Error {
  constructor(public action: string) {
    super("Instance ID is required for lifecycle operations");
    this.name = "MissingTargetError";
  }
}

export class OracleTimeoutError extends Error {
  constructor(public label: string, public timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "OracleTimeoutError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public issues: string[]) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
