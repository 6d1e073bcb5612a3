/**
 * Agent configuration
 *
 * Read once from the environment at startup, validated with zod and frozen.
 * Components receive the resulting record through the agent context and
 * never read the environment themselves.
 */

import { z } from "zod";
import { ConfigurationError } from "../errors.js";

// =============================================================================
// Schema
// =============================================================================

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, received "${value}"` });
      return z.NEVER;
    });

const envNumber = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, received "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

export const agentConfigSchema = z.object({
  region: z.string().min(1),
  modelId: z.string().min(1),
  temperature: z.number().min(0).max(1),
  maxTokens: z.number().int().positive(),
  confirmationRequired: z.boolean(),
  schemaDir: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().min(1).max(10),
  logLevel: logLevelSchema,
  verbose: z.boolean(),
  hasAwsCredentials: z.boolean(),
});

export type AgentConfig = Readonly<z.infer<typeof agentConfigSchema>>;

const envSchema = z.object({
  AWS_REGION: z.string().optional(),
  AWS_DEFAULT_REGION: z.string().optional(),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_PROFILE: z.string().optional(),
  DEFAULT_MODEL: z.string().optional(),
  TEMPERATURE: envNumber(0),
  MAX_TOKENS: envNumber(2048),
  CONFIRMATION_REQUIRED: envBoolean(true),
  SCHEMA_DIR: z.string().optional(),
  TIMEOUT: envNumber(60),
  MAX_RETRIES: envNumber(3),
  LOG_LEVEL: z.string().optional(),
  VERBOSE: envBoolean(false),
});

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_MODEL_ID = "amazon.nova-lite-v1:0";

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Build the agent configuration from environment variables.
 *
 * `overrides` win over the environment and are validated the same way.
 * Throws {@link ConfigurationError} listing every invalid field.
 */
export function loadAgentConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<AgentConfig> = {},
): AgentConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    const issues = formatIssues(parsedEnv.error);
    throw new ConfigurationError(`Invalid agent configuration: ${issues.join("; ")}`, issues);
  }
  const e = parsedEnv.data;

  const candidate = {
    region: e.AWS_REGION || e.AWS_DEFAULT_REGION || DEFAULT_REGION,
    modelId: e.DEFAULT_MODEL || DEFAULT_MODEL_ID,
    temperature: e.TEMPERATURE,
    maxTokens: e.MAX_TOKENS,
    confirmationRequired: e.CONFIRMATION_REQUIRED,
    schemaDir: e.SCHEMA_DIR || undefined,
    timeoutMs: Math.round(e.TIMEOUT * 1000),
    maxRetries: e.MAX_RETRIES,
    logLevel: e.LOG_LEVEL ? e.LOG_LEVEL.toLowerCase() : "info",
    verbose: e.VERBOSE,
    hasAwsCredentials: Boolean(e.AWS_PROFILE || (e.AWS_ACCESS_KEY_ID && e.AWS_SECRET_ACCESS_KEY)),
    ...overrides,
  };

  const parsed = agentConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid agent configuration: ${issues.join("; ")}`, issues);
  }

  return Object.freeze(parsed.data);
}
