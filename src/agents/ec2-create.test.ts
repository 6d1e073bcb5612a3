import { describe, it, expect } from "vitest";
import { Ec2CreateAgent } from "./ec2-create.js";
import { createTestContext } from "../test-utils.js";
import type { OperationType, ParameterSet, SuccessEnvelope } from "../types.js";

const COST_REPLY = JSON.stringify({
  estimated_monthly_cost: "low",
  estimated_cost_range: { low: "$5", high: "$10" },
  cost_breakdown: [],
  cost_saving_recommendations: [],
});

function makeEnvelope(operationType: OperationType, parameters: ParameterSet): SuccessEnvelope {
  return {
    status: "success",
    message: "EC2 configuration parsed and validated",
    service: "ec2",
    operationType,
    parameters,
    validation: { status: "valid", message: "Configuration validation completed", errors: [], warnings: [], optimizationSuggestions: [] },
    requiresConfirmation: true,
  };
}

describe("Ec2CreateAgent", () => {
  describe("processPrompt", () => {
    it("returns a success envelope that requires confirmation", async () => {
      const { context } = createTestContext({
        replies: ["{\"InstanceType\": \"t2.micro\", \"ImageId\": \"ami-12345678\"}", COST_REPLY],
      });
      const agent = new Ec2CreateAgent(context);

      const envelope = await agent.processPrompt("Create an EC2 instance with t2.micro", "create");

      expect(envelope.status).toBe("success");
      if (envelope.status !== "success") return;
      expect(envelope.parameters).toEqual({ InstanceType: "t2.micro", ImageId: "ami-12345678", MinCount: 1, MaxCount: 1 });
      expect(envelope.requiresConfirmation).toBe(true);
      expect(envelope.validation.status).toBe("warning");
      expect(envelope.validation.costEstimation?.estimatedMonthlyCost).toBe("low");
    });

    it("resolves descriptions from the pinned tables without credentials", async () => {
      const { context, provider } = createTestContext({
        replies: [
          "{\"InstanceTypeDescription\": \"small general purpose\", \"ImageDescription\": \"Ubuntu 20.04\"}",
          COST_REPLY,
        ],
      });
      const agent = new Ec2CreateAgent(context);

      const envelope = await agent.processPrompt("Launch a small Ubuntu server", "create");

      if (envelope.status !== "success") throw new Error(envelope.message);
      expect(envelope.parameters.InstanceType).toBe("t3.micro");
      expect(envelope.parameters.ImageId).toBe("ami-0dba2cb6798deb6d8");
      expect(provider.calls).toEqual([]);
    });

    it("looks the image up through the provider when credentials exist", async () => {
      const { context, provider } = createTestContext({
        replies: ["{\"InstanceType\": \"t3.micro\", \"ImageDescription\": \"Ubuntu 20.04\"}", COST_REPLY],
        config: { hasAwsCredentials: true },
      });
      const agent = new Ec2CreateAgent(context);

      const envelope = await agent.processPrompt("Launch an Ubuntu server", "create");

      if (envelope.status !== "success") throw new Error(envelope.message);
      expect(envelope.parameters.ImageId).toBe("ami-0fake0000000000001");
      expect(provider.calls).toEqual(["findImage:Ubuntu 20.04"]);
    });

    it("returns an error envelope when extraction fails", async () => {
      const { context } = createTestContext({ replies: [new Error("model unavailable")] });
      const agent = new Ec2CreateAgent(context);

      const envelope = await agent.processPrompt("Create an instance", "create");

      expect(envelope).toEqual({
        status: "error",
        message: "Failed to extract parameters: model unavailable",
        error: "oracle_failure",
      });
    });

    it("returns every basic error for an invalid configuration", async () => {
      const { context, oracle } = createTestContext({ replies: ["{\"ImageId\": \"ami-12345678\"}"] });
      const agent = new Ec2CreateAgent(context);

      const envelope = await agent.processPrompt("Create an instance from ami-12345678", "create");

      expect(envelope).toEqual({
        status: "error",
        message: "Invalid configuration",
        errors: ["Required parameter 'InstanceType' is missing"],
        warnings: [],
      });
      expect(oracle.calls).toHaveLength(1);
    });
  });

  describe("execute", () => {
    it("launches the instance with its tags in one call", async () => {
      const { context, provider } = createTestContext();
      const agent = new Ec2CreateAgent(context);

      const result = await agent.execute(
        makeEnvelope("create", {
          InstanceType: "t3.micro",
          ImageId: "ami-12345678",
          MinCount: 1,
          MaxCount: 1,
          Tags: [{ Key: "Name", Value: "web" }],
        }),
      );

      expect(result.status).toBe("success");
      expect(result.message).toBe("EC2 instance created successfully");
      expect(result.result?.instanceIds).toEqual(["i-00000000000000001"]);
      expect(provider.calls).toEqual(["create:t3.micro"]);
      expect(provider.instances.get("i-00000000000000001")?.tags).toEqual({ Name: "web" });
    });

    it("converts a tag mapping for the launch request", async () => {
      const { context, provider } = createTestContext();
      const agent = new Ec2CreateAgent(context);

      await agent.execute(
        makeEnvelope("create", { InstanceType: "t3.micro", ImageId: "ami-12345678", Tags: { Name: "web", Team: "ops" } }),
      );

      expect(provider.instances.get("i-00000000000000001")?.tags).toEqual({ Name: "web", Team: "ops" });
    });

    it("launches untagged instances when there are no tags", async () => {
      const { context, provider } = createTestContext();
      const agent = new Ec2CreateAgent(context);

      await agent.execute(makeEnvelope("create", { InstanceType: "t3.micro", ImageId: "ami-12345678", MinCount: 1, MaxCount: 2 }));

      expect(provider.calls).toEqual(["create:t3.micro"]);
      expect(provider.instances.size).toBe(2);
    });

    it("describes an instance for read operations", async () => {
      const { context, provider } = createTestContext({
        instances: [{ instanceId: "i-0123456789abcdef0", state: "running", tags: { Name: "web" } }],
      });
      const agent = new Ec2CreateAgent(context);

      const result = await agent.execute(makeEnvelope("read", { InstanceId: "i-0123456789abcdef0" }));

      expect(result).toEqual({
        status: "success",
        message: "EC2 instance described successfully",
        result: { instance: { instanceId: "i-0123456789abcdef0", state: "running", tags: { Name: "web" } } },
      });
      expect(provider.calls).toEqual(["describe:i-0123456789abcdef0"]);
    });

    it("rejects unsupported operation types", async () => {
      const { context, provider } = createTestContext();
      const agent = new Ec2CreateAgent(context);

      const result = await agent.execute(makeEnvelope("delete", { InstanceId: "i-0123456789abcdef0" }));

      expect(result).toEqual({ status: "error", message: "Unsupported operation type: delete" });
      expect(provider.calls).toEqual([]);
    });

    it("wraps provider failures", async () => {
      const { context, provider } = createTestContext();
      provider.failWith = new Error("UnauthorizedOperation");
      const agent = new Ec2CreateAgent(context);

      const result = await agent.execute(makeEnvelope("create", { InstanceType: "t3.micro", ImageId: "ami-12345678" }));

      expect(result).toEqual({
        status: "error",
        message: "Failed to execute EC2 operation: UnauthorizedOperation",
        error: "UnauthorizedOperation",
      });
    });
  });
});
