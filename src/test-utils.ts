/**
 * In-process stand-ins shared by the test suites.
 */

import { loadAgentConfig, type AgentConfig } from "./config/config.js";
import type { AgentContext } from "./context.js";
import { SchemaStore } from "./extraction/schema-store.js";
import { createAgentLogger, MemoryTransport, type AgentLogger } from "./logging/index.js";
import type { OracleCallOptions, TextOracle } from "./oracle/index.js";
import type {
  CreateInstancesRequest,
  CreateInstancesResult,
  Ec2Provider,
  InstanceStateChange,
  InstanceSummary,
} from "./ec2/types.js";

export type ScriptedReply = string | Error | ((systemInstruction: string, userText: string) => string);

export interface OracleCall {
  systemInstruction: string;
  userText: string;
  options?: OracleCallOptions;
}

/**
 * Oracle that answers from a queue. Once the queue is empty the fallback
 * reply (if any) is used for every further call.
 */
export class ScriptedOracle implements TextOracle {
  readonly calls: OracleCall[] = [];
  private queue: ScriptedReply[];

  constructor(replies: ScriptedReply[] = [], private fallback?: ScriptedReply) {
    this.queue = [...replies];
  }

  push(...replies: ScriptedReply[]): void {
    this.queue.push(...replies);
  }

  async complete(systemInstruction: string, userText: string, options?: OracleCallOptions): Promise<string> {
    this.calls.push({ systemInstruction, userText, options });
    const reply = this.queue.shift() ?? this.fallback;
    if (reply === undefined) {
      throw new Error("No scripted reply left");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply(systemInstruction, userText) : reply;
  }
}

export function createTestLogger(): { logger: AgentLogger; memory: MemoryTransport } {
  const memory = new MemoryTransport();
  return { logger: createAgentLogger("test", { level: "trace", transports: [memory] }), memory };
}

/**
 * In-memory EC2 provider. Instances live in a map keyed by id; every call
 * is recorded in `calls` as `method:arg`.
 */
export class FakeEc2Provider implements Ec2Provider {
  readonly calls: string[] = [];
  readonly instances = new Map<string, InstanceSummary>();
  failWith?: Error;
  /** What findImage answers; undefined models an empty DescribeImages result */
  publishedImageId: string | undefined = "ami-0fake0000000000001";
  private nextId = 1;

  constructor(instances: InstanceSummary[] = []) {
    for (const instance of instances) {
      this.instances.set(instance.instanceId, instance);
    }
  }

  private record(call: string): void {
    this.calls.push(call);
    if (this.failWith) {
      throw this.failWith;
    }
  }

  private transition(instanceId: string, state: string): InstanceStateChange {
    const instance = this.instances.get(instanceId);
    const previousState = instance?.state;
    if (instance) {
      instance.state = state;
    }
    return { instanceId, previousState, currentState: state };
  }

  async create(request: CreateInstancesRequest): Promise<CreateInstancesResult> {
    this.record(`create:${request.instanceType}`);
    const created: InstanceSummary[] = [];
    for (let i = 0; i < request.maxCount; i += 1) {
      const instanceId = `i-${String(this.nextId++).padStart(17, "0")}`;
      const instance: InstanceSummary = {
        instanceId,
        state: "pending",
        instanceType: request.instanceType,
        imageId: request.imageId,
        tags: Object.fromEntries((request.tags ?? []).map((tag) => [tag.Key, tag.Value])),
      };
      this.instances.set(instanceId, instance);
      created.push(instance);
    }
    return { instanceIds: created.map((c) => c.instanceId), instances: created };
  }

  async start(instanceId: string): Promise<InstanceStateChange> {
    this.record(`start:${instanceId}`);
    return this.transition(instanceId, "pending");
  }

  async stop(instanceId: string, force: boolean): Promise<InstanceStateChange> {
    this.record(`stop:${instanceId}:${force}`);
    return this.transition(instanceId, "stopping");
  }

  async reboot(instanceId: string): Promise<void> {
    this.record(`reboot:${instanceId}`);
  }

  async terminate(instanceId: string): Promise<InstanceStateChange> {
    this.record(`terminate:${instanceId}`);
    return this.transition(instanceId, "shutting-down");
  }

  async describe(instanceId: string): Promise<InstanceSummary | null> {
    this.record(`describe:${instanceId}`);
    return this.instances.get(instanceId) ?? null;
  }

  async findByTag(name: string): Promise<string | undefined> {
    this.record(`findByTag:${name}`);
    for (const instance of this.instances.values()) {
      if (instance.tags.Name === name && instance.state !== "terminated") return instance.instanceId;
    }
    return undefined;
  }

  async findImage(description: string): Promise<string | undefined> {
    this.record(`findImage:${description}`);
    return this.publishedImageId;
  }
}

export interface TestContextOptions {
  replies?: ScriptedReply[];
  instances?: InstanceSummary[];
  config?: Partial<AgentConfig>;
}

/**
 * Agent context wired to a scripted oracle and the in-memory provider
 */
export function createTestContext(options: TestContextOptions = {}) {
  const { logger, memory } = createTestLogger();
  const oracle = new ScriptedOracle(options.replies);
  const provider = new FakeEc2Provider(options.instances);
  const config = loadAgentConfig({}, { hasAwsCredentials: false, ...options.config });
  const context: AgentContext = { config, logger, oracle, schemaStore: new SchemaStore(), provider };
  return { context, oracle, provider, memory };
}
