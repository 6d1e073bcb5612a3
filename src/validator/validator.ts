/**
 * Configuration Validator
 *
 * basic → (stop when invalid) → security → cost → optimization → verdict.
 */

import { forRequest, type AgentLogger } from "../logging/index.js";
import type { TextOracle } from "../oracle/index.js";
import type { OperationType, ParameterSet, RequestOptions, ServiceName, ValidationResult } from "../types.js";
import { CostEstimator } from "./cost.js";
import { basicValidation, optimizationSuggestions, securityWarnings } from "./rules.js";

export interface ConfigurationValidatorDeps {
  oracle: TextOracle;
  logger: AgentLogger;
}

export class ConfigurationValidator {
  private logger: AgentLogger;
  private costEstimator: CostEstimator;

  constructor(deps: ConfigurationValidatorDeps) {
    this.logger = deps.logger.child("validator");
    this.costEstimator = new CostEstimator(deps.oracle, this.logger.child("cost"));
  }

  async validate(
    service: ServiceName,
    operationType: OperationType,
    parameters: Readonly<ParameterSet>,
    options?: RequestOptions,
  ): Promise<ValidationResult> {
    const logger = forRequest(this.logger, options?.requestId);
    logger.info(`Validating ${service} ${operationType} configuration`);

    const errors = basicValidation(service, operationType, parameters);
    if (errors.length > 0) {
      logger.warn("Basic validation failed", { errors });
      return {
        status: "invalid",
        message: "Configuration validation failed",
        errors,
        warnings: [],
        optimizationSuggestions: [],
      };
    }

    const warnings = securityWarnings(service, operationType, parameters);
    const costEstimation = await this.costEstimator.estimate(service, operationType, parameters, options);
    const suggestions = optimizationSuggestions(service, operationType, parameters);

    return {
      status: warnings.length > 0 ? "warning" : "valid",
      message: "Configuration validation completed",
      errors: [],
      warnings,
      costEstimation,
      optimizationSuggestions: suggestions,
    };
  }
}
