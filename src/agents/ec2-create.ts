/**
 * EC2 Agent
 *
 * Turns a prompt into a validated instance launch (or describe) envelope,
 * and executes confirmed envelopes through the EC2 provider.
 */

import type { AgentConfig } from "../config/config.js";
import type { AgentContext } from "../context.js";
import type { Ec2Provider } from "../ec2/types.js";
import { IntentExtractor } from "../extraction/extractor.js";
import { forRequest, type AgentLogger } from "../logging/index.js";
import { Ec2CreateResolver, resolveImageFromProvider } from "../resolver/ec2-create.js";
import { stringValue, type ParameterResolver } from "../resolver/types.js";
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
import { toCreateInstancesRequest } from "./ec2-request.js";
import { callProvider, executionError, toOperationEnvelope } from "./shared.js";
import type { ResourceAgent } from "./types.js";

export class Ec2CreateAgent implements ResourceAgent {
  readonly kind = "ec2";

  private config: AgentConfig;
  private logger: AgentLogger;
  private provider: Ec2Provider;
  private extractor: IntentExtractor;
  private resolver: ParameterResolver = new Ec2CreateResolver();
  private validator: ConfigurationValidator;

  constructor(context: AgentContext) {
    this.config = context.config;
    this.logger = context.logger.child("ec2-agent");
    this.provider = context.provider;
    this.extractor = new IntentExtractor({
      oracle: context.oracle,
      schemaStore: context.schemaStore,
      logger: this.logger,
    });
    this.validator = new ConfigurationValidator({ oracle: context.oracle, logger: this.logger });
  }

  async processPrompt(
    prompt: string,
    operationType: OperationType = "create",
    options?: RequestOptions,
  ): Promise<OperationEnvelope> {
    const logger = forRequest(this.logger, options?.requestId);
    logger.info(`Processing EC2 ${operationType} prompt`);

    const extracted = await this.extractor.extract(prompt, "ec2", operationType, options);
    if (!extracted.ok) {
      return errorEnvelope(`Failed to extract parameters: ${extracted.error.message}`, { error: extracted.error.kind });
    }

    let parameters = extracted.value;
    if (operationType === "create" && this.config.hasAwsCredentials) {
      parameters = await resolveImageFromProvider(parameters, this.provider, logger);
    }
    parameters = this.resolver.resolve(parameters, operationType, prompt);

    const validation = await this.validator.validate("ec2", operationType, parameters, options);
    return toOperationEnvelope(validation, {
      service: "ec2",
      operationType,
      parameters,
      message: "EC2 configuration parsed and validated",
    });
  }

  async execute(envelope: SuccessEnvelope, options?: RequestOptions): Promise<ExecutionResult> {
    const { operationType, parameters } = envelope;
    const logger = forRequest(this.logger, options?.requestId);

    try {
      switch (operationType) {
        case "create":
          return await this.launch(envelope, logger);
        case "read": {
          const instanceId = stringValue(parameters.InstanceId);
          if (!instanceId) {
            return executionFailure("Instance ID is required to describe an instance");
          }
          const instance = await callProvider("DescribeInstances", () => this.provider.describe(instanceId));
          if (!instance) {
            return executionFailure(`Instance ${instanceId} not found`);
          }
          return { status: "success", message: "EC2 instance described successfully", result: { instance } };
        }
        default:
          return executionFailure(`Unsupported operation type: ${operationType}`);
      }
    } catch (err) {
      return executionError("Failed to execute EC2 operation", err, logger);
    }
  }

  private async launch(envelope: SuccessEnvelope, logger: AgentLogger): Promise<ExecutionResult> {
    const request = toCreateInstancesRequest(envelope.parameters);
    const created = await callProvider("RunInstances", () => this.provider.create(request));

    logger.info(`Launched ${created.instanceIds.join(", ")}`);
    return {
      status: "success",
      message: "EC2 instance created successfully",
      result: { instanceIds: created.instanceIds, instances: created.instances },
    };
  }
}
