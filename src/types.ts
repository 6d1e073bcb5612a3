/**
 * Shared data model for the prompt-to-operation pipeline.
 *
 * Everything in here is plain data: routing decisions, parameter sets,
 * validation verdicts and the envelopes handed back to callers.
 */

import type { OracleCallOptions } from "./oracle/types.js";

/** Per-call options handed from the orchestrator down to every layer */
export interface RequestOptions extends OracleCallOptions {
  requestId?: string;
}

// =============================================================================
// Routing
// =============================================================================

export const OPERATION_TYPES = ["create", "read", "update", "delete", "lifecycle"] as const;

export type OperationType = (typeof OPERATION_TYPES)[number];

export const KNOWN_SERVICES = ["ec2", "s3", "rds", "lambda", "vpc"] as const;

export type KnownService = (typeof KNOWN_SERVICES)[number];

/**
 * Service tag. The oracle may name services we have no keyword table for,
 * so anything outside the known set is kept verbatim for diagnostics.
 */
export type ServiceName = KnownService | "unknown" | (string & {});

export type RoutingSource = "oracle" | "rules";

export interface RoutingDecision {
  service: ServiceName;
  operationType: OperationType;
  isLifecycle: boolean;
  /** Advisory signal in [0, 1]; not a calibrated probability */
  confidence: number;
  source: RoutingSource;
}

export function isOperationType(value: unknown): value is OperationType {
  return OPERATION_TYPES.some((type) => type === value);
}

// =============================================================================
// Parameters
// =============================================================================

export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue };

export type ParameterSet = Record<string, ParameterValue>;

export function isParameterRecord(value: unknown): value is Record<string, ParameterValue> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow a parsed JSON value into a parameter value. Returns undefined for
 * anything JSON cannot carry.
 */
export function toParameterValue(value: unknown): ParameterValue | undefined {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: ParameterValue[] = [];
    for (const item of value) {
      const converted = toParameterValue(item);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }
  if (typeof value === "object") {
    return toParameterSet(value);
  }
  return undefined;
}

export function toParameterSet(record: object): ParameterSet {
  const result: ParameterSet = {};
  for (const [key, raw] of Object.entries(record)) {
    const converted = toParameterValue(raw);
    if (converted !== undefined) result[key] = converted;
  }
  return result;
}

// =============================================================================
// Results
// =============================================================================

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

// =============================================================================
// Validation
// =============================================================================

export type ValidationStatus = "invalid" | "valid" | "warning";

export type CostTier = "low" | "medium" | "high" | "unknown";

export interface CostBreakdownItem {
  component: string;
  description: string;
  estimatedCost: string;
}

export interface CostEstimation {
  estimatedMonthlyCost: CostTier | (string & {});
  estimatedCostRange: {
    low: string;
    high: string;
  };
  costBreakdown: CostBreakdownItem[];
  costSavingRecommendations: string[];
}

export interface ValidationResult {
  status: ValidationStatus;
  message: string;
  errors: string[];
  warnings: string[];
  /** Absent only when basic validation failed */
  costEstimation?: CostEstimation;
  optimizationSuggestions: string[];
}

// =============================================================================
// Envelopes
// =============================================================================

export interface SuccessEnvelope {
  status: "success";
  message: string;
  service: ServiceName;
  operationType: OperationType;
  parameters: Readonly<ParameterSet>;
  validation: ValidationResult;
  requiresConfirmation: boolean;
  routingInfo?: RoutingDecision;
}

export interface ErrorEnvelope {
  status: "error";
  message: string;
  errors?: string[];
  warnings?: string[];
  error?: string;
  routingInfo?: RoutingDecision;
}

export interface ConfirmationEnvelope {
  status: "confirmation_required";
  message: string;
  operation: SuccessEnvelope;
}

export type OperationEnvelope = SuccessEnvelope | ErrorEnvelope;

export interface ExecutionResult {
  status: "success" | "error";
  message: string;
  result?: Record<string, unknown>;
  error?: string;
}

/**
 * Create an error envelope
 */
export function errorEnvelope(message: string, extra: Omit<ErrorEnvelope, "status" | "message"> = {}): ErrorEnvelope {
  return { status: "error", message, ...extra };
}

/**
 * Create a failed execution result
 */
export function executionFailure(message: string, error?: string): ExecutionResult {
  return error === undefined ? { status: "error", message } : { status: "error", message, error };
}
