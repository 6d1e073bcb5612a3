/**
 * Orchestrator
 *
 * Entry point for callers: prompt in, envelope out; confirmed envelope in,
 * execution result out. Nothing thrown below this layer reaches the caller.
 */

import { randomUUID } from "node:crypto";

import { Ec2CreateAgent } from "./agents/ec2-create.js";
import { Ec2LifecycleAgent } from "./agents/ec2-lifecycle.js";
import type { AgentContext } from "./context.js";
import { formatErrorMessage } from "./errors.js";
import { forRequest, type AgentLogger } from "./logging/index.js";
import { ServiceRouter } from "./router/router.js";
import {
  errorEnvelope,
  executionFailure,
  type ConfirmationEnvelope,
  type ExecutionResult,
  type OperationEnvelope,
  type RequestOptions,
  type RoutingDecision,
  type SuccessEnvelope,
} from "./types.js";

export interface ExecuteOptions {
  confirmed?: boolean;
  /** Ties execution log lines to an earlier request; a fresh id otherwise */
  requestId?: string;
}

export class Orchestrator {
  private logger: AgentLogger;
  readonly router: ServiceRouter;

  constructor(context: AgentContext, router?: ServiceRouter) {
    this.logger = context.logger.child("orchestrator");
    this.router =
      router ??
      new ServiceRouter({
        oracle: context.oracle,
        logger: context.logger,
        agents: { ec2: new Ec2CreateAgent(context), ec2Lifecycle: new Ec2LifecycleAgent(context) },
      });
  }

  async classify(prompt: string, options?: RequestOptions): Promise<RoutingDecision> {
    return this.router.classify(prompt, options);
  }

  /**
   * Every log line written while handling the prompt, down to the agents,
   * carries the same request id.
   */
  async processPrompt(prompt: string, options?: RequestOptions): Promise<OperationEnvelope> {
    const requestId = options?.requestId ?? randomUUID();
    const logger = forRequest(this.logger, requestId);
    logger.info("Processing prompt", { length: prompt.length });

    try {
      const envelope = await this.router.route(prompt, { ...options, requestId });
      logger.info(`Prompt processed: ${envelope.status}`);
      return envelope;
    } catch (err) {
      const message = formatErrorMessage(err);
      logger.error(`Error processing prompt: ${message}`);
      return errorEnvelope(`Error processing prompt: ${message}`, { error: message });
    }
  }

  confirmOperation(envelope: SuccessEnvelope): ConfirmationEnvelope {
    return {
      status: "confirmation_required",
      message: `Please confirm the ${envelope.service} ${envelope.operationType} operation before it is executed`,
      operation: envelope,
    };
  }

  /**
   * Execute an envelope. One that requires confirmation only runs with
   * `confirmed: true`; otherwise the confirmation request comes back.
   */
  async executeOperation(
    envelope: OperationEnvelope,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult | ConfirmationEnvelope> {
    if (envelope.status !== "success") {
      return executionFailure("Cannot execute an operation that failed to process", envelope.message);
    }
    if (envelope.requiresConfirmation && options.confirmed !== true) {
      return this.confirmOperation(envelope);
    }

    const requestId = options.requestId ?? randomUUID();
    const logger = forRequest(this.logger, requestId);
    logger.info(`Executing ${envelope.service} ${envelope.operationType} operation`);
    try {
      return await this.router.execute(envelope, { requestId });
    } catch (err) {
      const message = formatErrorMessage(err);
      logger.error(`Error executing operation: ${message}`);
      return executionFailure(`Error executing operation: ${message}`, message);
    }
  }
}
