import { describe, it, expect } from "vitest";
import { classifyByRules, identifyOperationType, identifyService, isLifecycleRequest } from "./rules.js";

describe("classifyByRules", () => {
  it("routes an instance launch to ec2 create", () => {
    expect(classifyByRules("Create an EC2 instance with t2.micro")).toEqual({
      service: "ec2",
      operationType: "create",
      isLifecycle: false,
      confidence: 0.5,
      source: "rules",
    });
  });

  it("routes a stop by instance id to the lifecycle path", () => {
    expect(classifyByRules("Stop the EC2 instance with ID i-1234567890abcdef0")).toEqual({
      service: "ec2",
      operationType: "lifecycle",
      isLifecycle: true,
      confidence: 0.5,
      source: "rules",
    });
  });

  it("falls back to unknown/read", () => {
    const decision = classifyByRules("Hello there");
    expect(decision.service).toBe("unknown");
    expect(decision.operationType).toBe("read");
    expect(decision.isLifecycle).toBe(false);
  });
});

describe("identifyService", () => {
  it("takes the first service in table order", () => {
    expect(identifyService("Back up the database to a bucket")).toBe("s3");
    expect(identifyService("Provision a MySQL database")).toBe("rds");
    expect(identifyService("Invoke a lambda function")).toBe("lambda");
    expect(identifyService("Deploy a serverless function")).toBe("ec2");
    expect(identifyService("Add a subnet to the VPC")).toBe("vpc");
  });
});

describe("identifyOperationType", () => {
  it("takes the first operation type in table order", () => {
    expect(identifyOperationType("List my buckets")).toBe("read");
    expect(identifyOperationType("Modify the instance type")).toBe("update");
    expect(identifyOperationType("Delete the bucket")).toBe("delete");
    expect(identifyOperationType("Reboot the machine")).toBe("lifecycle");
  });

  it("classifies start as create since create is checked first", () => {
    expect(identifyOperationType("Start the server")).toBe("create");
  });
});

describe("isLifecycleRequest", () => {
  it("accepts a keyword close to a machine noun", () => {
    expect(isLifecycleRequest("Please reboot the web server")).toBe(true);
  });

  it("rejects a keyword far from any machine noun", () => {
    expect(isLifecycleRequest("Create a server with a script that will start nginx automatically")).toBe(false);
  });

  it.each(["Create a server that starts automatically", "Launch a server that starts on boot"])(
    "rejects a keyword that only follows the machine noun: %s",
    (prompt) => {
      expect(isLifecycleRequest(prompt)).toBe(false);
    },
  );

  it("routes a self-starting server to ec2 create", () => {
    expect(classifyByRules("Create a server that starts automatically")).toEqual({
      service: "ec2",
      operationType: "create",
      isLifecycle: false,
      confidence: 0.5,
      source: "rules",
    });
  });

  it("accepts any keyword when an instance id is present", () => {
    expect(isLifecycleRequest("resume i-0123456789abcdef0 please")).toBe(true);
  });

  it("needs a lifecycle keyword", () => {
    expect(isLifecycleRequest("Describe instance i-0123456789abcdef0")).toBe(false);
  });
});
