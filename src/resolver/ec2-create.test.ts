import { describe, it, expect } from "vitest";
import {
  Ec2CreateResolver,
  resolveInstanceType,
  resolveImageId,
  resolveImageFromProvider,
} from "./ec2-create.js";
import type { ParameterResolver } from "./types.js";
import { FakeEc2Provider, createTestLogger } from "../test-utils.js";

describe("resolveInstanceType", () => {
  it.each([
    ["small general purpose", "t3.micro"],
    ["micro compute box", "t3.micro"],
    ["small with lots of memory", "r5.large"],
    ["medium cpu heavy", "c5.large"],
    ["medium ram", "r5.large"],
    ["medium", "t3.medium"],
    ["large compute", "c5.xlarge"],
    ["LARGE memory", "r5.xlarge"],
    ["large web server", "m5.large"],
    ["something beefy", "t3.micro"],
  ])("maps %s to %s", (description, expected) => {
    expect(resolveInstanceType(description)).toBe(expected);
  });
});

describe("resolveImageId", () => {
  it.each([
    ["Amazon Linux 2", "ami-0c55b159cbfafe1f0"],
    ["ubuntu focal", "ami-0dba2cb6798deb6d8"],
    ["Windows Server", "ami-0ab193018fec6aea5"],
    ["Red Hat Enterprise", "ami-0520e698dd500b1d1"],
    ["debian", "ami-0c55b159cbfafe1f0"],
    ["Ubuntu Linux hosted on Amazon", "ami-0dba2cb6798deb6d8"],
    ["rhel 8", "ami-0520e698dd500b1d1"],
  ])("maps %s to %s", (description, expected) => {
    expect(resolveImageId(description)).toBe(expected);
  });
});

describe("Ec2CreateResolver", () => {
  const resolver: ParameterResolver = new Ec2CreateResolver();

  it("fills counts, instance type and image from descriptions", () => {
    const resolved = resolver.resolve(
      { InstanceTypeDescription: "medium compute", ImageDescription: "ubuntu" },
      "create",
      "prompt",
    );

    expect(resolved).toEqual({
      InstanceTypeDescription: "medium compute",
      ImageDescription: "ubuntu",
      MinCount: 1,
      MaxCount: 1,
      InstanceType: "c5.large",
      ImageId: "ami-0dba2cb6798deb6d8",
    });
  });

  it("never overwrites present fields", () => {
    const resolved = resolver.resolve(
      { InstanceType: "t2.micro", InstanceTypeDescription: "large", ImageId: "ami-12345678", ImageDescription: "windows", MinCount: 2 },
      "create",
      "prompt",
    );

    expect(resolved.InstanceType).toBe("t2.micro");
    expect(resolved.ImageId).toBe("ami-12345678");
    expect(resolved.MinCount).toBe(2);
  });

  it("converts a tag mapping into Key/Value pairs", () => {
    const resolved = resolver.resolve({ Tags: { Name: "web-1", Tier: 2 } }, "create", "prompt");
    expect(resolved.Tags).toEqual([
      { Key: "Name", Value: "web-1" },
      { Key: "Tier", Value: "2" },
    ]);
  });

  it("does not mutate its input", () => {
    const input = { Tags: { Name: "web-1" } };
    resolver.resolve(input, "create", "prompt");
    expect(input).toEqual({ Tags: { Name: "web-1" } });
  });

  it("is idempotent", () => {
    const once = resolver.resolve({ InstanceTypeDescription: "small", ImageDescription: "rhel", Tags: { Env: "dev" } }, "create", "p");
    expect(resolver.resolve(once, "create", "p")).toEqual(once);
  });

  it("leaves a complete set unchanged", () => {
    const complete = {
      InstanceType: "t2.micro",
      ImageId: "ami-12345678",
      MinCount: 1,
      MaxCount: 1,
      Tags: [{ Key: "Name", Value: "web-1" }],
    };
    expect(resolver.resolve(complete, "create", "p")).toEqual(complete);
  });

  it("only acts on create operations", () => {
    expect(resolver.resolve({ InstanceId: "i-0123456789abcdef0" }, "read", "p")).toEqual({
      InstanceId: "i-0123456789abcdef0",
    });
  });
});

describe("resolveImageFromProvider", () => {
  it("asks the provider for the newest image", async () => {
    const provider = new FakeEc2Provider();
    const { logger } = createTestLogger();

    const resolved = await resolveImageFromProvider({ ImageDescription: "ubuntu" }, provider, logger);

    expect(resolved).toEqual({ ImageDescription: "ubuntu", ImageId: "ami-0fake0000000000001" });
    expect(provider.calls).toEqual(["findImage:ubuntu"]);
  });

  it("keeps an explicit image id", async () => {
    const provider = new FakeEc2Provider();
    const { logger } = createTestLogger();

    const resolved = await resolveImageFromProvider({ ImageId: "ami-12345678", ImageDescription: "ubuntu" }, provider, logger);

    expect(resolved.ImageId).toBe("ami-12345678");
    expect(provider.calls).toEqual([]);
  });

  it("leaves the set unchanged when the lookup fails", async () => {
    const provider = new FakeEc2Provider();
    provider.failWith = new Error("AccessDenied");
    const { logger, memory } = createTestLogger();

    const resolved = await resolveImageFromProvider({ ImageDescription: "ubuntu" }, provider, logger);

    expect(resolved).toEqual({ ImageDescription: "ubuntu" });
    expect(memory.messages("warn")).toEqual(['Image lookup for "ubuntu" failed']);
  });

  it("leaves the set unchanged when no image is published", async () => {
    const provider = new FakeEc2Provider();
    provider.publishedImageId = undefined;
    const { logger } = createTestLogger();

    const resolved = await resolveImageFromProvider({ ImageDescription: "ubuntu" }, provider, logger);

    expect(resolved).toEqual({ ImageDescription: "ubuntu" });
  });

  it("hands a throttled lookup over to the pinned image of the requested family", async () => {
    const provider = new FakeEc2Provider();
    provider.failWith = new Error("RequestLimitExceeded");
    const { logger } = createTestLogger();

    const looked = await resolveImageFromProvider({ ImageDescription: "Windows Server 2019" }, provider, logger);
    const resolved = new Ec2CreateResolver().resolve(looked, "create");

    expect(resolved.ImageId).toBe("ami-0ab193018fec6aea5");
  });
});
