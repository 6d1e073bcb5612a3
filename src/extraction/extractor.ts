/**
 * Intent Extractor
 *
 * Turns a natural-language request into a raw parameter set for one
 * service/operation pair by asking the oracle for JSON. The result is
 * unvalidated: resolvers fill gaps and the validator judges it.
 */

import { z } from "zod";

import { ExtractionError, formatErrorMessage } from "../errors.js";
import { forRequest, type AgentLogger } from "../logging/index.js";
import type { TextOracle } from "../oracle/index.js";
import {
  toParameterSet,
  type CostTier,
  type OperationType,
  type ParameterSet,
  type RequestOptions,
  type Result,
  type ServiceName,
} from "../types.js";
import { checkAgainstSchema, type SchemaStore } from "./schema-store.js";
import { parseStructuredOutput, type StructuredValue } from "./structured-output.js";

// =============================================================================
// Instructions
// =============================================================================

const SERVICE_HINTS: Record<string, string> = {
  "ec2/create": [
    "For EC2 instance creation, extract:",
    "- InstanceType (e.g. t3.micro), or InstanceTypeDescription when only a size or workload is described",
    "- ImageId (AMI id), or ImageDescription naming the operating system",
    "- KeyName, SecurityGroupIds and SubnetId when mentioned",
    "- Tags as an object of name to value",
    "- UserData when a startup script is mentioned",
  ].join("\n"),
  "ec2/lifecycle": [
    "For EC2 lifecycle operations, extract:",
    "- Action: one of start, stop, reboot, terminate",
    "- InstanceId, or InstanceName / InstanceDescription when no id is given",
    "- Force when the user asks to force a stop",
  ].join("\n"),
  "s3/create": [
    "For S3 bucket creation, extract:",
    "- BucketName and Region",
    "- ACL when mentioned",
    "- Versioning and encryption settings",
  ].join("\n"),
};

const BUSINESS_INSTRUCTION = `You are an AWS solutions architect. Translate the business requirements into AWS technical specifications.

Respond with one JSON object:
{
  "services": [{ "name": "service", "purpose": "why it is needed", "configuration": { "Param": "value" } }],
  "connections": [{ "from": "service1", "to": "service2", "type": "connection type" }],
  "estimated_cost": "low | medium | high",
  "security_considerations": ["..."]
}`;

const AMBIGUITY_INSTRUCTION = `You are an AWS operations assistant. Given a request and the parameters extracted from it so far, list the questions that must be answered before the request can be carried out.

Respond with a JSON array of question strings. Leave out anything that can reasonably be inferred or is not essential. Respond with [] when nothing is missing.`;

// =============================================================================
// Business specification
// =============================================================================

const businessSpecSchema = z.object({
  services: z
    .array(
      z.object({
        name: z.string(),
        purpose: z.string().default(""),
        configuration: z.record(z.unknown()).default({}),
      }),
    )
    .default([]),
  connections: z
    .array(z.object({ from: z.string(), to: z.string(), type: z.string().default("") }))
    .default([]),
  estimated_cost: z.string().default("unknown"),
  security_considerations: z.array(z.string()).default([]),
});

export interface BusinessService {
  name: string;
  purpose: string;
  configuration: ParameterSet;
}

export interface ServiceConnection {
  from: string;
  to: string;
  type: string;
}

export interface BusinessSpecification {
  services: BusinessService[];
  connections: ServiceConnection[];
  estimatedCost: CostTier;
  securityConsiderations: string[];
}

function toCostTier(value: string): CostTier {
  const tier = value.trim().toLowerCase();
  return tier === "low" || tier === "medium" || tier === "high" ? tier : "unknown";
}

// =============================================================================
// Extractor
// =============================================================================

export interface IntentExtractorDeps {
  oracle: TextOracle;
  schemaStore: SchemaStore;
  logger: AgentLogger;
}

export class IntentExtractor {
  private oracle: TextOracle;
  private schemaStore: SchemaStore;
  private logger: AgentLogger;

  constructor(deps: IntentExtractorDeps) {
    this.oracle = deps.oracle;
    this.schemaStore = deps.schemaStore;
    this.logger = deps.logger.child("extractor");
  }

  /**
   * System instruction for one service/operation pair, with the parameter
   * schema embedded when one is known
   */
  async buildInstruction(service: ServiceName, operationType: OperationType): Promise<string> {
    const label = `${service.toUpperCase()} ${operationType}`;
    const sections = [
      `You extract parameters for AWS ${label} operations.`,
      `Given a user's request, extract every relevant parameter for a ${label} operation and respond with a single JSON object of those parameters.`,
    ];

    const schema = await this.schemaStore.load(service, operationType);
    if (schema) {
      sections.push(`The parameters should conform to this schema:\n${JSON.stringify(schema, null, 2)}`);
    }

    const hint = SERVICE_HINTS[`${service}/${operationType}`];
    if (hint) {
      sections.push(hint);
    }

    return sections.join("\n\n");
  }

  async extract(
    prompt: string,
    service: ServiceName,
    operationType: OperationType,
    options?: RequestOptions,
  ): Promise<Result<ParameterSet, ExtractionError>> {
    const logger = forRequest(this.logger, options?.requestId);
    logger.info(`Extracting parameters for ${service} ${operationType}`);

    const instruction = await this.buildInstruction(service, operationType);
    const parsed = await this.ask(instruction, prompt, options);
    if (!parsed.ok) {
      return parsed;
    }
    if (Array.isArray(parsed.value)) {
      return {
        ok: false,
        error: new ExtractionError("Expected a JSON object of parameters, received an array", "malformed_output"),
      };
    }

    const parameters = toParameterSet(parsed.value);

    const schema = await this.schemaStore.load(service, operationType);
    if (schema) {
      const problems = checkAgainstSchema(schema, parameters);
      if (problems.length > 0) {
        // Advisory only; the validator makes the real call.
        logger.warn("Extracted parameters do not match schema", { errors: problems });
      }
    }

    logger.debug("Extracted parameters", { parameters });
    return { ok: true, value: parameters };
  }

  /**
   * Translate business requirements into a suggested service layout
   */
  async translateBusinessRequirements(
    prompt: string,
    options?: RequestOptions,
  ): Promise<Result<BusinessSpecification, ExtractionError>> {
    const logger = forRequest(this.logger, options?.requestId);
    logger.info("Translating business requirements");

    const parsed = await this.ask(BUSINESS_INSTRUCTION, prompt, options);
    if (!parsed.ok) {
      return parsed;
    }

    const spec = businessSpecSchema.safeParse(parsed.value);
    if (!spec.success) {
      const detail = spec.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      return { ok: false, error: new ExtractionError(`Unexpected specification shape: ${detail}`, "malformed_output") };
    }

    return {
      ok: true,
      value: {
        services: spec.data.services.map((s) => ({
          name: s.name,
          purpose: s.purpose,
          configuration: toParameterSet(s.configuration),
        })),
        connections: spec.data.connections,
        estimatedCost: toCostTier(spec.data.estimated_cost),
        securityConsiderations: spec.data.security_considerations,
      },
    };
  }

  /**
   * Clarifying questions for information the request leaves open.
   * Never fails: problems come back as a single explanatory entry.
   */
  async identifyAmbiguities(prompt: string, parameters: ParameterSet, options?: RequestOptions): Promise<string[]> {
    const logger = forRequest(this.logger, options?.requestId);
    logger.info("Identifying ambiguities");

    const userText = `User prompt: ${prompt}\n\nExtracted parameters: ${JSON.stringify(parameters, null, 2)}`;
    const parsed = await this.ask(AMBIGUITY_INSTRUCTION, userText, options);
    if (!parsed.ok) {
      return [`Could not identify ambiguities: ${parsed.error.message}`];
    }

    const items = Array.isArray(parsed.value) ? parsed.value : [parsed.value];
    return items.map((item) => (typeof item === "string" ? item : JSON.stringify(item)));
  }

  private async ask(
    instruction: string,
    userText: string,
    options?: RequestOptions,
  ): Promise<Result<StructuredValue, ExtractionError>> {
    const logger = forRequest(this.logger, options?.requestId);
    let reply: string;
    try {
      reply = await this.oracle.complete(instruction, userText, options);
    } catch (err) {
      logger.error("Oracle call failed", { error: formatErrorMessage(err) });
      return { ok: false, error: new ExtractionError(formatErrorMessage(err), "oracle_failure", err) };
    }

    try {
      return { ok: true, value: parseStructuredOutput(reply) };
    } catch (err) {
      logger.error("Could not parse oracle reply", { error: formatErrorMessage(err) });
      const error = err instanceof ExtractionError ? err : new ExtractionError(formatErrorMessage(err), "malformed_output", err);
      return { ok: false, error };
    }
  }
}
