import type { OperationType, ParameterSet, ParameterValue } from "../types.js";

/**
 * Fills defaults and translates descriptive fields into concrete ones.
 *
 * Implementations return a new set, never touch the input, and never
 * overwrite a field that is already present. Resolving a complete set is
 * a no-op.
 */
export interface ParameterResolver {
  resolve(parameters: Readonly<ParameterSet>, operationType: OperationType, prompt: string): ParameterSet;
}

export function isPresent(value: ParameterValue | undefined): boolean {
  return value !== undefined && value !== null && value !== "";
}

export function stringValue(value: ParameterValue | undefined): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}
