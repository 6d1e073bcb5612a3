/**
 * EC2 Lifecycle Agent
 *
 * start / stop / reboot / terminate for a single existing instance.
 */

import type { AgentContext } from "../context.js";
import type { Ec2Provider } from "../ec2/types.js";
import { MissingTargetError } from "../errors.js";
import { IntentExtractor } from "../extraction/extractor.js";
import { forRequest, type AgentLogger } from "../logging/index.js";
import { Ec2LifecycleResolver, normalizeAction, resolveInstanceTarget, type LifecycleAction } from "../resolver/ec2-lifecycle.js";
import { stringValue } from "../resolver/types.js";
import {
  errorEnvelope,
  executionFailure,
  type ExecutionResult,
  type OperationEnvelope,
  type OperationType,
  type RequestOptions,
  type SuccessEnvelope,
} from "../types.js";
import { ConfigurationValidator } from "../validator/validator.js";
import { callProvider, executionError, toOperationEnvelope } from "./shared.js";
import type { ResourceAgent } from "./types.js";

export class Ec2LifecycleAgent implements ResourceAgent {
  readonly kind = "ec2-lifecycle";

  private logger: AgentLogger;
  private provider: Ec2Provider;
  private extractor: IntentExtractor;
  private resolver = new Ec2LifecycleResolver();
  private validator: ConfigurationValidator;

  constructor(context: AgentContext) {
    this.logger = context.logger.child("ec2-lifecycle-agent");
    this.provider = context.provider;
    this.extractor = new IntentExtractor({
      oracle: context.oracle,
      schemaStore: context.schemaStore,
      logger: this.logger,
    });
    this.validator = new ConfigurationValidator({ oracle: context.oracle, logger: this.logger });
  }

  /**
   * The routed operation type is ignored: lifecycle prompts are always
   * extracted and validated as `lifecycle`.
   */
  async processPrompt(prompt: string, _operationType?: OperationType, options?: RequestOptions): Promise<OperationEnvelope> {
    const logger = forRequest(this.logger, options?.requestId);
    logger.info("Processing EC2 lifecycle prompt");

    const extracted = await this.extractor.extract(prompt, "ec2", "lifecycle", options);
    if (!extracted.ok) {
      return errorEnvelope(`Failed to extract parameters: ${extracted.error.message}`, { error: extracted.error.kind });
    }

    const resolved = this.resolver.resolve(extracted.value, "lifecycle", prompt);
    const parameters = await resolveInstanceTarget(resolved, this.provider, logger);

    const validation = await this.validator.validate("ec2", "lifecycle", parameters, options);
    return toOperationEnvelope(validation, {
      service: "ec2",
      operationType: "lifecycle",
      parameters,
      message: "EC2 lifecycle operation parsed and validated",
    });
  }

  async execute(envelope: SuccessEnvelope, options?: RequestOptions): Promise<ExecutionResult> {
    const { parameters } = envelope;
    const logger = forRequest(this.logger, options?.requestId);
    const action = normalizeAction(parameters.Action);
    const instanceId = stringValue(parameters.InstanceId);

    if (!instanceId) {
      const err = new MissingTargetError(action);
      logger.warn(err.message, { action });
      return executionFailure(err.message);
    }

    try {
      const result = await this.runAction(action, instanceId, parameters.Force === true);
      logger.info(`Instance ${instanceId} ${action} requested`);
      return {
        status: "success",
        message: `EC2 instance ${action} operation completed successfully`,
        result: { action, ...result },
      };
    } catch (err) {
      return executionError("Failed to execute EC2 lifecycle operation", err, logger);
    }
  }

  private async runAction(action: LifecycleAction, instanceId: string, force: boolean): Promise<Record<string, unknown>> {
    switch (action) {
      case "start":
        return { ...(await callProvider("StartInstances", () => this.provider.start(instanceId))) };
      case "stop":
        return { ...(await callProvider("StopInstances", () => this.provider.stop(instanceId, force))) };
      case "terminate":
        return { ...(await callProvider("TerminateInstances", () => this.provider.terminate(instanceId))) };
      case "reboot": {
        await callProvider("RebootInstances", () => this.provider.reboot(instanceId));
        const instance = await callProvider("DescribeInstances", () => this.provider.describe(instanceId));
        return { instanceId, currentState: instance?.state };
      }
    }
  }
}
