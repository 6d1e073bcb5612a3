import { describe, it, expect } from "vitest";
import { loadAgentConfig, DEFAULT_MODEL_ID } from "./config.js";
import { ConfigurationError } from "../errors.js";

describe("loadAgentConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const config = loadAgentConfig({});

    expect(config).toEqual({
      region: "us-east-1",
      modelId: DEFAULT_MODEL_ID,
      temperature: 0,
      maxTokens: 2048,
      confirmationRequired: true,
      schemaDir: undefined,
      timeoutMs: 60_000,
      maxRetries: 3,
      logLevel: "info",
      verbose: false,
      hasAwsCredentials: false,
    });
  });

  it("should read values from the environment", () => {
    const config = loadAgentConfig({
      AWS_DEFAULT_REGION: "eu-west-1",
      DEFAULT_MODEL: "test-model",
      TEMPERATURE: "0.2",
      CONFIRMATION_REQUIRED: "False",
      SCHEMA_DIR: "/etc/agent/schemas",
      TIMEOUT: "5",
      MAX_RETRIES: "5",
      LOG_LEVEL: "DEBUG",
      VERBOSE: "yes",
      AWS_ACCESS_KEY_ID: "test-key-id",
      AWS_SECRET_ACCESS_KEY: "test-secret",
    });

    expect(config.region).toBe("eu-west-1");
    expect(config.modelId).toBe("test-model");
    expect(config.temperature).toBe(0.2);
    expect(config.confirmationRequired).toBe(false);
    expect(config.schemaDir).toBe("/etc/agent/schemas");
    expect(config.timeoutMs).toBe(5000);
    expect(config.maxRetries).toBe(5);
    expect(config.logLevel).toBe("debug");
    expect(config.verbose).toBe(true);
    expect(config.hasAwsCredentials).toBe(true);
  });

  it("should prefer AWS_REGION over AWS_DEFAULT_REGION", () => {
    const config = loadAgentConfig({ AWS_REGION: "us-west-2", AWS_DEFAULT_REGION: "eu-west-1" });
    expect(config.region).toBe("us-west-2");
  });

  it("should let overrides win over the environment", () => {
    const config = loadAgentConfig({ TEMPERATURE: "0.5" }, { temperature: 0.1, region: "ap-south-1" });
    expect(config.temperature).toBe(0.1);
    expect(config.region).toBe("ap-south-1");
  });

  it("should return a frozen record", () => {
    const config = loadAgentConfig({});
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("should report every invalid field", () => {
    let caught: unknown;
    try {
      loadAgentConfig({ TEMPERATURE: "hot", CONFIRMATION_REQUIRED: "maybe" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.issues : [];
    expect(issues).toEqual([
      'TEMPERATURE: expected a number, received "hot"',
      'CONFIRMATION_REQUIRED: expected a boolean, received "maybe"',
    ]);
  });

  it("should reject out-of-range values after parsing", () => {
    expect(() => loadAgentConfig({ TEMPERATURE: "3" })).toThrow(ConfigurationError);
    expect(() => loadAgentConfig({ LOG_LEVEL: "chatty" })).toThrow(ConfigurationError);
  });
});
