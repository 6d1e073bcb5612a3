/**
 * Public API: natural-language AWS operations.
 */

export * from "./types.js";
export * from "./errors.js";
export { loadAgentConfig, agentConfigSchema, type AgentConfig } from "./config/config.js";
export { createAgentContext, type AgentContext, type AgentContextOverrides } from "./context.js";
export { Orchestrator, type ExecuteOptions } from "./orchestrator.js";
export * from "./logging/index.js";
export * from "./oracle/index.js";
export { ServiceRouter, classifyByRules, normalizeRoutingReply, type RouterAgents } from "./router/index.js";
export { Ec2CreateAgent, Ec2LifecycleAgent, type AgentKind, type ResourceAgent } from "./agents/index.js";
export { IntentExtractor, type BusinessSpecification } from "./extraction/extractor.js";
export { SchemaStore, checkAgainstSchema, fromJsonSchema } from "./extraction/schema-store.js";
export { parseStructuredOutput, locateStructuredText, repairStructuredText } from "./extraction/structured-output.js";
export { Ec2CreateResolver, resolveImageFromProvider } from "./resolver/ec2-create.js";
export { Ec2LifecycleResolver, normalizeAction, resolveInstanceTarget } from "./resolver/ec2-lifecycle.js";
export type { ParameterResolver } from "./resolver/types.js";
export { ConfigurationValidator } from "./validator/validator.js";
export { CostEstimator } from "./validator/cost.js";
export { AwsEc2Provider } from "./ec2/provider.js";
export type * from "./ec2/types.js";
export { createAWSRetryRunner, type RetryConfig, type RetryRunner } from "./retry.js";
export { VERSION } from "./version.js";
