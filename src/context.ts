/**
 * Agent context
 *
 * The shared collaborators every component receives: configuration, the
 * root logger, the oracle, the schema store and the EC2 provider. Built once
 * per process.
 */

import type { AgentConfig } from "./config/config.js";
import { AwsEc2Provider } from "./ec2/provider.js";
import type { Ec2Provider } from "./ec2/types.js";
import { SchemaStore } from "./extraction/schema-store.js";
import { createAgentLogger, type AgentLogger, type LogTransport } from "./logging/index.js";
import { BedrockTextOracle, TimeoutBoundOracle, type TextOracle } from "./oracle/index.js";

export interface AgentContext {
  config: AgentConfig;
  logger: AgentLogger;
  oracle: TextOracle;
  schemaStore: SchemaStore;
  provider: Ec2Provider;
}

export interface AgentContextOverrides {
  logger?: AgentLogger;
  transports?: LogTransport[];
  /** Used as is; callers wanting a timeout wrap it themselves */
  oracle?: TextOracle;
  schemaStore?: SchemaStore;
  provider?: Ec2Provider;
}

export function createAgentContext(config: AgentConfig, overrides: AgentContextOverrides = {}): AgentContext {
  const logger =
    overrides.logger ??
    createAgentLogger("aws-ops", {
      level: config.verbose ? "debug" : config.logLevel,
      transports: overrides.transports,
    });

  if (!config.hasAwsCredentials) {
    logger.warn("No AWS credentials found in the environment; SDK calls will rely on the default provider chain");
  }

  const oracle =
    overrides.oracle ??
    new TimeoutBoundOracle(new BedrockTextOracle(config, logger.child("oracle")), config.timeoutMs);

  const schemaStore =
    overrides.schemaStore ?? new SchemaStore({ schemaDir: config.schemaDir, logger: logger.child("schemas") });

  const provider =
    overrides.provider ??
    new AwsEc2Provider({ region: config.region, maxRetries: config.maxRetries, logger });

  logger.debug("Agent context ready", { region: config.region, modelId: config.modelId });

  return { config, logger, oracle, schemaStore, provider };
}
