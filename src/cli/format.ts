/**
 * Human-readable rendering of envelopes and results for the terminal
 */

import type {
  ConfirmationEnvelope,
  ExecutionResult,
  OperationEnvelope,
  RoutingDecision,
  ValidationResult,
} from "../types.js";

function bulletList(title: string, items: readonly string[]): string[] {
  if (items.length === 0) return [];
  return [`${title}:`, ...items.map((item) => `  - ${item}`)];
}

export function formatDecision(decision: RoutingDecision): string {
  const lifecycle = decision.isLifecycle ? " (lifecycle)" : "";
  return `${decision.service} ${decision.operationType}${lifecycle} confidence=${decision.confidence} via ${decision.source}`;
}

function formatValidation(validation: ValidationResult): string[] {
  const lines = [`Validation: ${validation.status}`];
  const cost = validation.costEstimation;
  if (cost) {
    lines.push(`Estimated monthly cost: ${cost.estimatedMonthlyCost} (${cost.estimatedCostRange.low} - ${cost.estimatedCostRange.high})`);
  }
  lines.push(...bulletList("Warnings", validation.warnings));
  lines.push(...bulletList("Suggestions", validation.optimizationSuggestions));
  return lines;
}

export function formatEnvelope(envelope: OperationEnvelope): string {
  const lines: string[] = [];
  if (envelope.routingInfo) {
    lines.push(`Route: ${formatDecision(envelope.routingInfo)}`);
  }

  if (envelope.status === "error") {
    lines.push(`Error: ${envelope.message}`);
    if (envelope.error) lines.push(`  ${envelope.error}`);
    lines.push(...bulletList("Errors", envelope.errors ?? []));
    lines.push(...bulletList("Warnings", envelope.warnings ?? []));
    return lines.join("\n");
  }

  lines.push(envelope.message);
  lines.push(`Operation: ${envelope.service} ${envelope.operationType}`);
  lines.push(`Parameters: ${JSON.stringify(envelope.parameters, null, 2)}`);
  lines.push(...formatValidation(envelope.validation));
  return lines.join("\n");
}

export function formatOutcome(outcome: ExecutionResult | ConfirmationEnvelope): string {
  if (outcome.status === "confirmation_required") {
    return `${outcome.message}. Re-run with --yes to execute.`;
  }
  const lines = [outcome.status === "success" ? outcome.message : `Error: ${outcome.message}`];
  if (outcome.result) {
    lines.push(JSON.stringify(outcome.result, null, 2));
  }
  return lines.join("\n");
}
