/**
 * Helpers shared by the resource agents
 */

import { ProviderError, ValidationError, formatErrorMessage } from "../errors.js";
import type { AgentLogger } from "../logging/index.js";
import {
  errorEnvelope,
  executionFailure,
  type ExecutionResult,
  type OperationEnvelope,
  type OperationType,
  type ParameterSet,
  type ServiceName,
  type ValidationResult,
} from "../types.js";

/**
 * Turn a validation verdict into the envelope handed back to the caller.
 * Invalid configurations become error envelopes; everything else needs
 * confirmation before it runs.
 */
export function toOperationEnvelope(
  validation: ValidationResult,
  details: { service: ServiceName; operationType: OperationType; parameters: ParameterSet; message: string },
): OperationEnvelope {
  if (validation.status === "invalid") {
    const err = new ValidationError("Invalid configuration", validation.errors);
    return errorEnvelope(err.message, { errors: err.errors, warnings: validation.warnings });
  }

  return {
    status: "success",
    message: details.message,
    service: details.service,
    operationType: details.operationType,
    parameters: Object.freeze(details.parameters),
    validation,
    requiresConfirmation: true,
  };
}

/**
 * Run a provider call, wrapping whatever it throws in a ProviderError
 */
export async function callProvider<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof ProviderError) throw err;
    throw new ProviderError(formatErrorMessage(err), operation, err);
  }
}

export function executionError(prefix: string, err: unknown, logger: AgentLogger): ExecutionResult {
  const message = formatErrorMessage(err);
  logger.error(`${prefix}: ${message}`, err instanceof ProviderError ? { operation: err.operation } : undefined);
  return executionFailure(`${prefix}: ${message}`, message);
}
