/**
 * Service Router
 *
 * Classifies a prompt by AWS service and operation type, hands it to the
 * matching resource agent and dispatches confirmed envelopes back to it.
 */

import { z } from "zod";

import type { ResourceAgent } from "../agents/types.js";
import { RoutingAmbiguityError, formatErrorMessage } from "../errors.js";
import { parseStructuredOutput } from "../extraction/structured-output.js";
import { forRequest, type AgentLogger } from "../logging/index.js";
import type { TextOracle } from "../oracle/index.js";
import {
  errorEnvelope,
  executionFailure,
  isOperationType,
  type ExecutionResult,
  type OperationEnvelope,
  type RequestOptions,
  type RoutingDecision,
  type SuccessEnvelope,
} from "../types.js";
import { classifyByRules } from "./rules.js";

const ROUTING_INSTRUCTION = `You are an AWS DevOps routing assistant. Analyze the user's request and determine:
1. Which AWS service they want to interact with (EC2, S3, RDS, Lambda, VPC, etc.)
2. What operation they want to perform (create, read, update, delete, lifecycle)
3. Whether it is an EC2 lifecycle operation (start, stop, reboot, terminate)

Respond with one JSON object:
{
  "service": "service_name",
  "operation_type": "operation_type",
  "is_lifecycle": true/false,
  "confidence": 0.0-1.0
}`;

export const DEFAULT_ORACLE_CONFIDENCE = 0.9;

const routingReplySchema = z.object({
  service: z.string().trim().min(1),
  operation_type: z.string().optional(),
  is_lifecycle: z.union([z.boolean(), z.string()]).optional(),
  confidence: z.union([z.number(), z.string()]).optional(),
});

function toConfidence(value: number | string | undefined): number {
  const parsed = typeof value === "string" ? Number.parseFloat(value) : value;
  if (parsed === undefined || !Number.isFinite(parsed)) return DEFAULT_ORACLE_CONFIDENCE;
  return Math.min(1, Math.max(0, parsed));
}

/**
 * Normalize an oracle routing reply. Throws when the reply names no service.
 */
export function normalizeRoutingReply(reply: unknown): RoutingDecision {
  const parsed = routingReplySchema.parse(reply);
  const operationType = parsed.operation_type?.trim().toLowerCase();
  const lifecycle = parsed.is_lifecycle;

  return {
    service: parsed.service.toLowerCase(),
    operationType: isOperationType(operationType) ? operationType : "read",
    isLifecycle: lifecycle === true || (typeof lifecycle === "string" && lifecycle.trim().toLowerCase() === "true"),
    confidence: toConfidence(parsed.confidence),
    source: "oracle",
  };
}

export interface RouterAgents {
  ec2: ResourceAgent;
  ec2Lifecycle: ResourceAgent;
}

export interface ServiceRouterDeps {
  oracle: TextOracle;
  logger: AgentLogger;
  agents: RouterAgents;
}

export class ServiceRouter {
  private oracle: TextOracle;
  private logger: AgentLogger;
  private agents: RouterAgents;

  constructor(deps: ServiceRouterDeps) {
    this.oracle = deps.oracle;
    this.logger = deps.logger.child("router");
    this.agents = deps.agents;
  }

  /**
   * Oracle classification, falling back to keyword rules on any failure
   */
  async classify(prompt: string, options?: RequestOptions): Promise<RoutingDecision> {
    try {
      const reply = await this.oracle.complete(ROUTING_INSTRUCTION, prompt, options);
      return normalizeRoutingReply(parseStructuredOutput(reply));
    } catch (err) {
      forRequest(this.logger, options?.requestId).warn("Oracle routing failed, using keyword rules", {
        error: formatErrorMessage(err),
      });
      return classifyByRules(prompt);
    }
  }

  selectAgent(decision: RoutingDecision): ResourceAgent | undefined {
    if (decision.service !== "ec2") return undefined;
    return decision.isLifecycle || decision.operationType === "lifecycle" ? this.agents.ec2Lifecycle : this.agents.ec2;
  }

  async route(prompt: string, options?: RequestOptions): Promise<OperationEnvelope> {
    const logger = forRequest(this.logger, options?.requestId);
    const decision = await this.classify(prompt, options);
    const { service, operationType, isLifecycle, confidence, source } = decision;
    logger.info(
      `Routing determined: service=${service}, operation=${operationType}, lifecycle=${isLifecycle}, confidence=${confidence} (${source})`,
    );

    const agent = this.selectAgent(decision);
    if (!agent) {
      const extra =
        service === "unknown"
          ? { routingInfo: decision, error: new RoutingAmbiguityError(decision).message }
          : { routingInfo: decision };
      return errorEnvelope(`No agent available for service: ${service}`, extra);
    }

    try {
      const envelope = await agent.processPrompt(prompt, operationType, options);
      return { ...envelope, routingInfo: decision };
    } catch (err) {
      const message = formatErrorMessage(err);
      logger.error(`Error processing prompt with ${agent.kind} agent: ${message}`);
      return errorEnvelope(`Error processing prompt with ${service} agent: ${message}`, {
        routingInfo: decision,
        error: message,
      });
    }
  }

  /**
   * Dispatch a confirmed envelope. Lifecycle envelopes go to the lifecycle
   * agent, everything else for ec2 to the create agent.
   */
  async execute(envelope: SuccessEnvelope, options?: RequestOptions): Promise<ExecutionResult> {
    const { service, operationType } = envelope;
    if (service !== "ec2") {
      return executionFailure(`No agent available for service: ${service}`);
    }

    const agent = operationType === "lifecycle" ? this.agents.ec2Lifecycle : this.agents.ec2;
    try {
      return await agent.execute(envelope, options);
    } catch (err) {
      const message = formatErrorMessage(err);
      forRequest(this.logger, options?.requestId).error(`Error executing operation with ${agent.kind} agent: ${message}`);
      return executionFailure(`Error executing operation with ${service} agent: ${message}`, message);
    }
  }
}
