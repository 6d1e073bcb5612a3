/**
 * AWS EC2 Provider
 *
 * Ec2Provider over @aws-sdk/client-ec2. Every SDK call goes through the
 * throttling-aware retry runner; SDK errors propagate to the agents.
 */

import {
  EC2Client,
  RunInstancesCommand,
  StartInstancesCommand,
  StopInstancesCommand,
  RebootInstancesCommand,
  TerminateInstancesCommand,
  DescribeInstancesCommand,
  DescribeImagesCommand,
  _InstanceType,
  VolumeType,
  type Instance,
  type InstanceStateChange as SdkStateChange,
  type Tag,
} from "@aws-sdk/client-ec2";

import { ProviderError } from "../errors.js";
import type { AgentLogger } from "../logging/index.js";
import { createAWSRetryRunner, type RetryRunner } from "../retry.js";
import { matchImageFamily } from "./images.js";
import type {
  CreateInstancesRequest,
  CreateInstancesResult,
  Ec2Provider,
  InstanceStateChange,
  InstanceSummary,
} from "./types.js";

const LIVE_STATES = ["pending", "running", "stopping", "stopped"];

const KNOWN_INSTANCE_TYPES: ReadonlySet<string> = new Set(Object.values(_InstanceType));

function isInstanceType(value: string): value is _InstanceType {
  return KNOWN_INSTANCE_TYPES.has(value);
}

function toVolumeType(value?: string): VolumeType | undefined {
  return Object.values(VolumeType).find((type) => type === value);
}

export interface AwsEc2ProviderConfig {
  region: string;
  maxRetries: number;
  logger: AgentLogger;
}

export class AwsEc2Provider implements Ec2Provider {
  private client: EC2Client;
  private retry: RetryRunner;
  private logger: AgentLogger;

  constructor(config: AwsEc2ProviderConfig) {
    this.client = new EC2Client({ region: config.region, maxAttempts: 1 });
    this.logger = config.logger.child("ec2");
    this.retry = createAWSRetryRunner({ retry: { attempts: config.maxRetries }, logger: this.logger });
  }

  // ===========================================================================
  // Mapping
  // ===========================================================================

  private mapTags(tags?: Tag[]): Record<string, string> {
    const result: Record<string, string> = {};
    for (const tag of tags ?? []) {
      if (tag.Key) {
        result[tag.Key] = tag.Value ?? "";
      }
    }
    return result;
  }

  private mapInstance(instance: Instance): InstanceSummary {
    return {
      instanceId: instance.InstanceId ?? "",
      state: instance.State?.Name ?? "unknown",
      instanceType: instance.InstanceType,
      imageId: instance.ImageId,
      launchTime: instance.LaunchTime?.toISOString(),
      publicIpAddress: instance.PublicIpAddress,
      privateIpAddress: instance.PrivateIpAddress,
      tags: this.mapTags(instance.Tags),
    };
  }

  private mapStateChange(instanceId: string, changes?: SdkStateChange[]): InstanceStateChange {
    const change = changes?.find((c) => c.InstanceId === instanceId) ?? changes?.[0];
    return {
      instanceId,
      previousState: change?.PreviousState?.Name,
      currentState: change?.CurrentState?.Name,
    };
  }

  // ===========================================================================
  // Creation
  // ===========================================================================

  async create(request: CreateInstancesRequest): Promise<CreateInstancesResult> {
    if (!isInstanceType(request.instanceType)) {
      throw new ProviderError(`Unsupported instance type: ${request.instanceType}`, "RunInstances");
    }
    const instanceType = request.instanceType;

    this.logger.info(`Launching ${request.maxCount} ${instanceType} instance(s) from ${request.imageId}`);

    const response = await this.retry(
      () => this.client.send(new RunInstancesCommand({
        ImageId: request.imageId,
        InstanceType: instanceType,
        MinCount: request.minCount,
        MaxCount: request.maxCount,
        KeyName: request.keyName,
        SecurityGroupIds: request.securityGroupIds,
        SubnetId: request.subnetId,
        UserData: request.userData ? Buffer.from(request.userData).toString("base64") : undefined,
        EbsOptimized: request.ebsOptimized,
        BlockDeviceMappings: request.blockDeviceMappings?.map((bdm) => ({
          DeviceName: bdm.deviceName,
          Ebs: {
            VolumeSize: bdm.volumeSize,
            VolumeType: toVolumeType(bdm.volumeType),
            Encrypted: bdm.encrypted,
            DeleteOnTermination: bdm.deleteOnTermination,
          },
        })),
        TagSpecifications: request.tags && request.tags.length > 0 ? [
          { ResourceType: "instance", Tags: request.tags },
          { ResourceType: "volume", Tags: request.tags },
        ] : undefined,
      })),
      "RunInstances",
    );

    const instances = (response.Instances ?? []).map((i) => this.mapInstance(i));
    return {
      instanceIds: instances.map((i) => i.instanceId),
      instances,
    };
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async start(instanceId: string): Promise<InstanceStateChange> {
    this.logger.info(`Starting ${instanceId}`);
    const response = await this.retry(
      () => this.client.send(new StartInstancesCommand({ InstanceIds: [instanceId] })),
      "StartInstances",
    );
    return this.mapStateChange(instanceId, response.StartingInstances);
  }

  async stop(instanceId: string, force: boolean): Promise<InstanceStateChange> {
    this.logger.info(`Stopping ${instanceId}`, { force });
    const response = await this.retry(
      () => this.client.send(new StopInstancesCommand({ InstanceIds: [instanceId], Force: force })),
      "StopInstances",
    );
    return this.mapStateChange(instanceId, response.StoppingInstances);
  }

  async reboot(instanceId: string): Promise<void> {
    this.logger.info(`Rebooting ${instanceId}`);
    await this.retry(
      () => this.client.send(new RebootInstancesCommand({ InstanceIds: [instanceId] })),
      "RebootInstances",
    );
  }

  async terminate(instanceId: string): Promise<InstanceStateChange> {
    this.logger.warn(`Terminating ${instanceId}`);
    const response = await this.retry(
      () => this.client.send(new TerminateInstancesCommand({ InstanceIds: [instanceId] })),
      "TerminateInstances",
    );
    return this.mapStateChange(instanceId, response.TerminatingInstances);
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  async describe(instanceId: string): Promise<InstanceSummary | null> {
    const response = await this.retry(
      () => this.client.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] })),
      "DescribeInstances",
    );
    const instance = response.Reservations?.[0]?.Instances?.[0];
    return instance ? this.mapInstance(instance) : null;
  }

  async findByTag(name: string): Promise<string | undefined> {
    const response = await this.retry(
      () => this.client.send(new DescribeInstancesCommand({
        Filters: [
          { Name: "tag:Name", Values: [name] },
          { Name: "instance-state-name", Values: LIVE_STATES },
        ],
      })),
      "DescribeInstances",
    );

    for (const reservation of response.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        if (instance.InstanceId) return instance.InstanceId;
      }
    }
    return undefined;
  }

  async findImage(description: string): Promise<string | undefined> {
    const family = matchImageFamily(description);

    const response = await this.retry(
      () => this.client.send(new DescribeImagesCommand({
        Filters: [
          { Name: "name", Values: [family.namePattern] },
          { Name: family.ownerFilter.name, Values: [family.ownerFilter.value] },
        ],
      })),
      "DescribeImages",
    );

    const newest = [...(response.Images ?? [])]
      .sort((a, b) => (b.CreationDate ?? "").localeCompare(a.CreationDate ?? ""))
      .find((image) => image.ImageId);
    return newest?.ImageId;
  }
}
