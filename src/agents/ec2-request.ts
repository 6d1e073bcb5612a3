/**
 * Map a validated parameter set onto typed EC2 provider requests.
 */

import type { BlockDeviceMappingRequest, CreateInstancesRequest, ResourceTag } from "../ec2/types.js";
import { isParameterRecord, type ParameterSet, type ParameterValue } from "../types.js";

function optionalString(value: ParameterValue | undefined): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function optionalNumber(value: ParameterValue | undefined): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function optionalBoolean(value: ParameterValue | undefined): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

function stringList(value: ParameterValue | undefined): string[] | undefined {
  if (typeof value === "string" && value !== "") return [value];
  if (!Array.isArray(value)) return undefined;
  const items = value.filter((item): item is string => typeof item === "string" && item !== "");
  return items.length > 0 ? items : undefined;
}

function blockDeviceMappings(value: ParameterValue | undefined): BlockDeviceMappingRequest[] | undefined {
  if (!Array.isArray(value)) return undefined;

  const mappings: BlockDeviceMappingRequest[] = [];
  for (const item of value) {
    if (!isParameterRecord(item)) continue;
    const deviceName = optionalString(item.DeviceName);
    if (!deviceName) continue;
    const ebs = isParameterRecord(item.Ebs) ? item.Ebs : {};
    mappings.push({
      deviceName,
      volumeSize: optionalNumber(ebs.VolumeSize),
      volumeType: optionalString(ebs.VolumeType),
      encrypted: optionalBoolean(ebs.Encrypted),
      deleteOnTermination: optionalBoolean(ebs.DeleteOnTermination),
    });
  }
  return mappings.length > 0 ? mappings : undefined;
}

const nonEmpty = <T>(items: T[]): T[] | undefined => (items.length > 0 ? items : undefined);

/**
 * Build a launch request. Throws when the image or instance type is missing,
 * which only happens for sets that never went through the validator.
 */
export function toCreateInstancesRequest(parameters: Readonly<ParameterSet>): CreateInstancesRequest {
  const imageId = optionalString(parameters.ImageId);
  const instanceType = optionalString(parameters.InstanceType);
  if (!imageId) throw new Error("ImageId is required to launch an instance");
  if (!instanceType) throw new Error("InstanceType is required to launch an instance");

  return {
    imageId,
    instanceType,
    minCount: optionalNumber(parameters.MinCount) ?? 1,
    maxCount: optionalNumber(parameters.MaxCount) ?? 1,
    keyName: optionalString(parameters.KeyName),
    securityGroupIds: stringList(parameters.SecurityGroupIds),
    subnetId: optionalString(parameters.SubnetId),
    userData: optionalString(parameters.UserData),
    ebsOptimized: optionalBoolean(parameters.EbsOptimized),
    blockDeviceMappings: blockDeviceMappings(parameters.BlockDeviceMappings),
    tags: nonEmpty(toResourceTags(parameters.Tags)),
  };
}

/**
 * Key/Value tags from either the list form or a plain mapping
 */
export function toResourceTags(value: ParameterValue | undefined): ResourceTag[] {
  if (isParameterRecord(value)) {
    return Object.entries(value).map(([Key, v]) => ({ Key, Value: typeof v === "string" ? v : JSON.stringify(v) }));
  }
  if (!Array.isArray(value)) return [];

  const tags: ResourceTag[] = [];
  for (const item of value) {
    if (!isParameterRecord(item) || typeof item.Key !== "string" || item.Key === "") continue;
    const raw = item.Value ?? "";
    tags.push({ Key: item.Key, Value: typeof raw === "string" ? raw : JSON.stringify(raw) });
  }
  return tags;
}
