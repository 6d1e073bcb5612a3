/**
 * EC2 create resolver
 *
 * Applies launch defaults, maps sizing and OS descriptions to concrete
 * instance types and images, and normalizes tags into Key/Value pairs.
 */

import { formatErrorMessage } from "../errors.js";
import type { Ec2Provider } from "../ec2/types.js";
import { matchImageFamily } from "../ec2/images.js";
import type { AgentLogger } from "../logging/index.js";
import { isParameterRecord, type OperationType, type ParameterSet, type ParameterValue } from "../types.js";
import { isPresent, stringValue, type ParameterResolver } from "./types.js";

interface SizeRow {
  terms: string[];
  compute: string;
  memory: string;
  general: string;
}

// Order matters: "xlarge" must not win over "small".
const INSTANCE_SIZES: readonly SizeRow[] = [
  { terms: ["small", "micro"], compute: "t3.micro", memory: "r5.large", general: "t3.micro" },
  { terms: ["medium"], compute: "c5.large", memory: "r5.large", general: "t3.medium" },
  { terms: ["large"], compute: "c5.xlarge", memory: "r5.xlarge", general: "m5.large" },
];

const COMPUTE_TERMS = ["compute", "cpu"];
const MEMORY_TERMS = ["memory", "ram"];

export const DEFAULT_INSTANCE_TYPE = "t3.micro";

const includesAny = (text: string, terms: string[]) => terms.some((term) => text.includes(term));

/**
 * Instance type for a free-text sizing description
 */
export function resolveInstanceType(description: string): string {
  const text = description.toLowerCase();
  const row = INSTANCE_SIZES.find((r) => includesAny(text, r.terms));
  if (!row) return DEFAULT_INSTANCE_TYPE;
  if (includesAny(text, COMPUTE_TERMS)) return row.compute;
  if (includesAny(text, MEMORY_TERMS)) return row.memory;
  return row.general;
}

/**
 * Pinned image id for an OS description; Amazon Linux when nothing matches
 */
export function resolveImageId(description: string): string {
  return matchImageFamily(description).fallbackImageId;
}

function toTagValue(value: ParameterValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export class Ec2CreateResolver implements ParameterResolver {
  resolve(parameters: Readonly<ParameterSet>, operationType: OperationType): ParameterSet {
    const resolved: ParameterSet = { ...parameters };
    if (operationType !== "create") {
      return resolved;
    }

    if (!isPresent(resolved.MinCount)) resolved.MinCount = 1;
    if (!isPresent(resolved.MaxCount)) resolved.MaxCount = 1;

    const typeDescription = stringValue(resolved.InstanceTypeDescription);
    if (!isPresent(resolved.InstanceType) && typeDescription !== undefined) {
      resolved.InstanceType = resolveInstanceType(typeDescription);
    }

    const imageDescription = stringValue(resolved.ImageDescription);
    if (!isPresent(resolved.ImageId) && imageDescription !== undefined) {
      resolved.ImageId = resolveImageId(imageDescription);
    }

    const tags = resolved.Tags;
    if (isParameterRecord(tags)) {
      resolved.Tags = Object.entries(tags).map(([Key, value]) => ({ Key, Value: toTagValue(value) }));
    }

    return resolved;
  }
}

/**
 * Look up the newest image for an OS description through the provider.
 * Runs before the offline resolver; a failed lookup leaves the set as is so
 * the pinned table applies.
 */
export async function resolveImageFromProvider(
  parameters: Readonly<ParameterSet>,
  provider: Ec2Provider,
  logger: AgentLogger,
): Promise<ParameterSet> {
  const description = stringValue(parameters.ImageDescription);
  if (isPresent(parameters.ImageId) || description === undefined) {
    return { ...parameters };
  }

  try {
    const imageId = await provider.findImage(description);
    if (imageId === undefined) {
      logger.debug(`No published image for "${description}"; using the pinned table`);
      return { ...parameters };
    }
    logger.debug(`Resolved image "${description}" to ${imageId}`);
    return { ...parameters, ImageId: imageId };
  } catch (err) {
    logger.warn(`Image lookup for "${description}" failed`, { error: formatErrorMessage(err) });
    return { ...parameters };
  }
}
