/**
 * EC2 provider contract
 *
 * The narrow set of EC2 calls the agents make. Implementations talk to AWS
 * (see AwsEc2Provider); tests substitute an in-memory fake.
 */

export interface ResourceTag {
  Key: string;
  Value: string;
}

export interface InstanceSummary {
  instanceId: string;
  state: string;
  instanceType?: string;
  imageId?: string;
  launchTime?: string;
  publicIpAddress?: string;
  privateIpAddress?: string;
  tags: Record<string, string>;
}

export interface InstanceStateChange {
  instanceId: string;
  previousState?: string;
  currentState?: string;
}

export interface BlockDeviceMappingRequest {
  deviceName: string;
  volumeSize?: number;
  volumeType?: string;
  encrypted?: boolean;
  deleteOnTermination?: boolean;
}

export interface CreateInstancesRequest {
  imageId: string;
  instanceType: string;
  minCount: number;
  maxCount: number;
  keyName?: string;
  securityGroupIds?: string[];
  subnetId?: string;
  userData?: string;
  ebsOptimized?: boolean;
  blockDeviceMappings?: BlockDeviceMappingRequest[];
  /** Applied to the instances and their volumes at launch */
  tags?: ResourceTag[];
}

export interface CreateInstancesResult {
  instanceIds: string[];
  instances: InstanceSummary[];
}

export interface Ec2Provider {
  create(request: CreateInstancesRequest): Promise<CreateInstancesResult>;
  start(instanceId: string): Promise<InstanceStateChange>;
  stop(instanceId: string, force: boolean): Promise<InstanceStateChange>;
  reboot(instanceId: string): Promise<void>;
  terminate(instanceId: string): Promise<InstanceStateChange>;
  /** null when the instance does not exist */
  describe(instanceId: string): Promise<InstanceSummary | null>;
  /** First live instance whose Name tag matches */
  findByTag(name: string): Promise<string | undefined>;
  /** Newest public image for an OS description; undefined when none is published */
  findImage(description: string): Promise<string | undefined>;
}
