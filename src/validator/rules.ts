/**
 * Static validation rules
 *
 * Required-field and type tables for basic validation, plus the security
 * and optimization heuristics. All of these are pure functions of the
 * parameter set.
 */

import { isPresent } from "../resolver/types.js";
import { isParameterRecord, type OperationType, type ParameterSet, type ParameterValue, type ServiceName } from "../types.js";

export type ParameterKind = "string" | "integer" | "boolean" | "list";

export interface BasicRule {
  required: string[];
  /** Pairs where at least one field must be present */
  eitherOf: Array<[string, string]>;
  types: Record<string, ParameterKind>;
}

export const BASIC_RULES = new Map<string, BasicRule>([
  [
    "ec2:create",
    {
      required: ["InstanceType"],
      eitherOf: [["ImageId", "ImageDescription"]],
      types: {
        InstanceType: "string",
        ImageId: "string",
        MinCount: "integer",
        MaxCount: "integer",
        KeyName: "string",
        SecurityGroupIds: "list",
        Tags: "list",
      },
    },
  ],
  [
    "ec2:lifecycle",
    {
      required: ["Action"],
      eitherOf: [["InstanceId", "InstanceDescription"]],
      types: { InstanceId: "string", Force: "boolean" },
    },
  ],
  [
    "s3:create",
    {
      required: ["BucketName"],
      eitherOf: [],
      types: { BucketName: "string" },
    },
  ],
]);

const KIND_LABELS: Record<ParameterKind, string> = {
  string: "a string",
  integer: "an integer",
  boolean: "a boolean",
  list: "a list",
};

function matchesKind(value: ParameterValue, kind: ParameterKind): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "list":
      return Array.isArray(value);
  }
}

export function ruleKey(service: ServiceName, operationType: OperationType): string {
  return `${service}:${operationType}`;
}

/**
 * Required fields, either-of pairs and types. Every failure is reported.
 */
export function basicValidation(
  service: ServiceName,
  operationType: OperationType,
  parameters: Readonly<ParameterSet>,
): string[] {
  const rule = BASIC_RULES.get(ruleKey(service, operationType));
  if (!rule) return [];

  const errors: string[] = [];

  for (const field of rule.required) {
    if (!isPresent(parameters[field])) {
      errors.push(`Required parameter '${field}' is missing`);
    }
  }

  for (const [first, second] of rule.eitherOf) {
    if (!isPresent(parameters[first]) && !isPresent(parameters[second])) {
      errors.push(`Either ${first} or ${second} is required`);
    }
  }

  for (const [field, kind] of Object.entries(rule.types)) {
    const value = parameters[field];
    if (value === undefined || value === null) continue;
    if (!matchesKind(value, kind)) {
      errors.push(`${field} must be ${KIND_LABELS[kind]}`);
    }
  }

  return errors;
}

// =============================================================================
// Security
// =============================================================================

function unencryptedDevices(mappings: ParameterValue | undefined): string[] {
  if (!Array.isArray(mappings)) return [];

  const devices: string[] = [];
  mappings.forEach((mapping, index) => {
    if (!isParameterRecord(mapping) || !isParameterRecord(mapping.Ebs)) return;
    if (mapping.Ebs.Encrypted !== true) {
      devices.push(typeof mapping.DeviceName === "string" ? mapping.DeviceName : `#${index + 1}`);
    }
  });
  return devices;
}

export function securityWarnings(
  service: ServiceName,
  operationType: OperationType,
  parameters: Readonly<ParameterSet>,
): string[] {
  const warnings: string[] = [];

  if (service === "ec2" && operationType === "create") {
    if (!isPresent(parameters.SecurityGroupIds) && !isPresent(parameters.SecurityGroups)) {
      warnings.push("No security groups specified. The default security group will be used, which may not be secure.");
    }
    if (parameters.AssociatePublicIpAddress === true) {
      warnings.push("Instance will be assigned a public IP address. Ensure this is intended.");
    }
    if (!isPresent(parameters.KeyName)) {
      warnings.push("No SSH key specified. You may not be able to access the instance via SSH.");
    }
    const devices = unencryptedDevices(parameters.BlockDeviceMappings);
    if (devices.length > 0) {
      warnings.push(`EBS volumes are not encrypted: ${devices.join(", ")}. Consider enabling encryption.`);
    }
  } else if (service === "ec2" && operationType === "lifecycle") {
    if (parameters.Action === "terminate") {
      warnings.push("Termination is irreversible. Instance store data and volumes set to delete on termination will be lost.");
    }
  } else if (service === "s3" && operationType === "create") {
    if (parameters.ACL === "public-read" || parameters.ACL === "public-read-write") {
      warnings.push("Bucket will be publicly accessible. Ensure this is intended.");
    }
    if (!isPresent(parameters.BucketEncryption)) {
      warnings.push("Bucket encryption not specified. Consider enabling encryption for sensitive data.");
    }
  }

  return warnings;
}

// =============================================================================
// Optimization
// =============================================================================

const PREVIOUS_GENERATION_FAMILIES = new Set(["m3", "m4", "c3", "c4", "r3", "r4", "t1"]);

export function optimizationSuggestions(
  service: ServiceName,
  operationType: OperationType,
  parameters: Readonly<ParameterSet>,
): string[] {
  const suggestions: string[] = [];

  if (service === "ec2" && operationType === "create") {
    const instanceType = typeof parameters.InstanceType === "string" ? parameters.InstanceType.toLowerCase() : "";
    const family = instanceType.split(".")[0];

    if (family === "t2") {
      suggestions.push("Consider using T3 instances instead of T2 for better price-performance.");
    }
    if (PREVIOUS_GENERATION_FAMILIES.has(family)) {
      suggestions.push(`The ${family} family is a previous generation. Current-generation families offer better price-performance.`);
    }
    // Burstable (t*) families get no EBS optimization hint.
    if (!isPresent(parameters.EbsOptimized) && instanceType !== "" && !family.startsWith("t")) {
      suggestions.push("Consider enabling EBS optimization for better storage performance.");
    }
    if (!isPresent(parameters.InstanceMarketOptions)) {
      suggestions.push("Consider using Spot instances for non-critical workloads to reduce costs.");
    }
  } else if (service === "s3" && operationType === "create") {
    if (!isPresent(parameters.LifecycleConfiguration)) {
      suggestions.push(
        "Consider adding lifecycle policies to move objects to cheaper storage classes or expire old objects.",
      );
    }
    suggestions.push("Consider the S3 Intelligent-Tiering storage class for objects with changing or unknown access patterns.");
  }

  return suggestions;
}
