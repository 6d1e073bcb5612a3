/**
 * Oracle-backed cost estimation. Advisory, and never fails: any problem
 * yields the "unknown" estimate.
 */

import { z } from "zod";

import { formatErrorMessage } from "../errors.js";
import { parseStructuredOutput } from "../extraction/structured-output.js";
import { forRequest, type AgentLogger } from "../logging/index.js";
import type { TextOracle } from "../oracle/index.js";
import type { CostEstimation, OperationType, ParameterSet, RequestOptions, ServiceName } from "../types.js";

const COST_INSTRUCTION = `You are an AWS cost estimation expert. Estimate the monthly cost of the AWS resource described by the configuration.

Respond with one JSON object:
{
  "estimated_monthly_cost": "low | medium | high",
  "estimated_cost_range": { "low": "$X", "high": "$Y" },
  "cost_breakdown": [{ "component": "name", "description": "what is billed", "estimated_cost": "$Z" }],
  "cost_saving_recommendations": ["..."]
}`;

const costSchema = z.object({
  estimated_monthly_cost: z.string(),
  estimated_cost_range: z
    .object({ low: z.coerce.string(), high: z.coerce.string() })
    .default({ low: "unknown", high: "unknown" }),
  cost_breakdown: z
    .array(
      z.object({
        component: z.string(),
        description: z.string().default(""),
        estimated_cost: z.coerce.string().default("unknown"),
      }),
    )
    .default([]),
  cost_saving_recommendations: z.array(z.string()).default([]),
});

export const UNKNOWN_COST_RECOMMENDATION = "Unable to estimate cost due to an error";

export function unknownCostEstimation(): CostEstimation {
  return {
    estimatedMonthlyCost: "unknown",
    estimatedCostRange: { low: "unknown", high: "unknown" },
    costBreakdown: [],
    costSavingRecommendations: [UNKNOWN_COST_RECOMMENDATION],
  };
}

function normalizeTier(value: string): string {
  const tier = value.trim().toLowerCase();
  return tier === "low" || tier === "medium" || tier === "high" ? tier : value.trim();
}

export class CostEstimator {
  constructor(
    private oracle: TextOracle,
    private logger: AgentLogger,
  ) {}

  async estimate(
    service: ServiceName,
    operationType: OperationType,
    parameters: Readonly<ParameterSet>,
    options?: RequestOptions,
  ): Promise<CostEstimation> {
    const userText = [
      `Service: ${service}`,
      `Operation: ${operationType}`,
      `Configuration: ${JSON.stringify(parameters, null, 2)}`,
    ].join("\n");

    try {
      const reply = await this.oracle.complete(COST_INSTRUCTION, userText, options);
      const parsed = costSchema.parse(parseStructuredOutput(reply));

      return {
        estimatedMonthlyCost: normalizeTier(parsed.estimated_monthly_cost),
        estimatedCostRange: parsed.estimated_cost_range,
        costBreakdown: parsed.cost_breakdown.map((item) => ({
          component: item.component,
          description: item.description,
          estimatedCost: item.estimated_cost,
        })),
        costSavingRecommendations: parsed.cost_saving_recommendations,
      };
    } catch (err) {
      forRequest(this.logger, options?.requestId).error("Cost estimation failed", { error: formatErrorMessage(err) });
      return unknownCostEstimation();
    }
  }
}
