import { describe, it, expect } from "vitest";
import { Ec2LifecycleResolver, normalizeAction, resolveInstanceTarget } from "./ec2-lifecycle.js";
import { FakeEc2Provider, createTestLogger } from "../test-utils.js";

describe("normalizeAction", () => {
  it.each([
    ["start", "start"],
    ["STOP", "stop"],
    [" reboot ", "reboot"],
    ["terminate", "terminate"],
    ["launch", "start"],
    ["run", "start"],
    ["shutdown", "stop"],
    ["halt", "stop"],
    ["pause", "stop"],
    ["restart", "reboot"],
    ["delete", "terminate"],
    ["remove", "terminate"],
    ["destroy", "terminate"],
    ["hibernate", "stop"],
    ["", "stop"],
  ])("normalizes %j to %s", (input, expected) => {
    expect(normalizeAction(input)).toBe(expected);
  });

  it("defaults a missing or non-string action to stop", () => {
    expect(normalizeAction(undefined)).toBe("stop");
    expect(normalizeAction(3)).toBe("stop");
  });
});

describe("Ec2LifecycleResolver", () => {
  const resolver = new Ec2LifecycleResolver();

  it("pulls the instance id out of the prompt", () => {
    const resolved = resolver.resolve(
      { Action: "Stop" },
      "lifecycle",
      "Stop the EC2 instance with ID i-1234567890abcdef0",
    );

    expect(resolved).toEqual({ Action: "stop", InstanceId: "i-1234567890abcdef0", Force: false });
  });

  it("keeps an extracted instance id and force flag", () => {
    const resolved = resolver.resolve(
      { Action: "halt", InstanceId: "i-0aaaaaaaaaaaaaaaa", Force: true },
      "lifecycle",
      "halt i-0bbbbbbbbbbbbbbbb",
    );

    expect(resolved).toEqual({ Action: "stop", InstanceId: "i-0aaaaaaaaaaaaaaaa", Force: true });
  });

  it("leaves InstanceId absent when the prompt has none", () => {
    const resolved = resolver.resolve({ Action: "start", InstanceName: "web-1" }, "lifecycle", "start web-1");
    expect(resolved).toEqual({ Action: "start", InstanceName: "web-1", Force: false });
  });

  it("is idempotent", () => {
    const once = resolver.resolve({ Action: "restart" }, "lifecycle", "restart i-1234567890abcdef0");
    expect(resolver.resolve(once, "lifecycle", "restart i-1234567890abcdef0")).toEqual(once);
  });
});

describe("resolveInstanceTarget", () => {
  const tagged = {
    instanceId: "i-0123456789abcdef0",
    state: "running",
    tags: { Name: "web-1" },
  };

  it("finds the instance by its Name tag", async () => {
    const provider = new FakeEc2Provider([tagged]);
    const { logger } = createTestLogger();

    const resolved = await resolveInstanceTarget({ Action: "stop", InstanceName: "web-1" }, provider, logger);

    expect(resolved.InstanceId).toBe("i-0123456789abcdef0");
    expect(provider.calls).toEqual(["findByTag:web-1"]);
  });

  it("falls back to the description", async () => {
    const provider = new FakeEc2Provider([tagged]);
    const { logger } = createTestLogger();

    const resolved = await resolveInstanceTarget({ InstanceDescription: "web-1" }, provider, logger);

    expect(resolved.InstanceId).toBe("i-0123456789abcdef0");
  });

  it("does not call the provider when the id is known", async () => {
    const provider = new FakeEc2Provider([tagged]);
    const { logger } = createTestLogger();

    await resolveInstanceTarget({ InstanceId: "i-0aaaaaaaaaaaaaaaa", InstanceName: "web-1" }, provider, logger);

    expect(provider.calls).toEqual([]);
  });

  it("leaves the set unchanged when nothing matches", async () => {
    const provider = new FakeEc2Provider([tagged]);
    const { logger } = createTestLogger();

    const resolved = await resolveInstanceTarget({ InstanceName: "db-1" }, provider, logger);

    expect(resolved).toEqual({ InstanceName: "db-1" });
  });

  it("logs provider failures and leaves the set unchanged", async () => {
    const provider = new FakeEc2Provider();
    provider.failWith = new Error("UnauthorizedOperation");
    const { logger, memory } = createTestLogger();

    const resolved = await resolveInstanceTarget({ InstanceName: "web-1" }, provider, logger);

    expect(resolved).toEqual({ InstanceName: "web-1" });
    expect(memory.messages("warn")).toEqual(['Instance lookup for "web-1" failed']);
  });
});
