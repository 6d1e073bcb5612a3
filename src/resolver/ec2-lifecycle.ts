/**
 * EC2 lifecycle resolver
 */

import { formatErrorMessage } from "../errors.js";
import type { Ec2Provider } from "../ec2/types.js";
import type { AgentLogger } from "../logging/index.js";
import type { OperationType, ParameterSet, ParameterValue } from "../types.js";
import { isPresent, stringValue, type ParameterResolver } from "./types.js";

export const LIFECYCLE_ACTIONS = ["start", "stop", "reboot", "terminate"] as const;

export type LifecycleAction = (typeof LIFECYCLE_ACTIONS)[number];

const ACTION_SYNONYMS = new Map<string, LifecycleAction>([
  ["launch", "start"],
  ["run", "start"],
  ["shutdown", "stop"],
  ["halt", "stop"],
  ["pause", "stop"],
  ["restart", "reboot"],
  ["delete", "terminate"],
  ["remove", "terminate"],
  ["destroy", "terminate"],
]);

export const DEFAULT_LIFECYCLE_ACTION: LifecycleAction = "stop";

export const INSTANCE_ID_PATTERN = /i-[a-z0-9]{8,17}/;

export function isLifecycleAction(value: unknown): value is LifecycleAction {
  return LIFECYCLE_ACTIONS.some((action) => action === value);
}

/**
 * Canonical action for whatever the extractor produced. Unrecognized or
 * missing actions become `stop`.
 */
export function normalizeAction(value: ParameterValue | undefined): LifecycleAction {
  const action = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (isLifecycleAction(action)) return action;
  return ACTION_SYNONYMS.get(action) ?? DEFAULT_LIFECYCLE_ACTION;
}

export class Ec2LifecycleResolver implements ParameterResolver {
  resolve(parameters: Readonly<ParameterSet>, _operationType: OperationType, prompt: string): ParameterSet {
    const resolved: ParameterSet = { ...parameters, Action: normalizeAction(parameters.Action) };

    if (!isPresent(resolved.InstanceId)) {
      const match = INSTANCE_ID_PATTERN.exec(prompt);
      if (match) resolved.InstanceId = match[0];
    }

    if (!isPresent(resolved.Force)) resolved.Force = false;

    return resolved;
  }
}

/**
 * Fill `InstanceId` by looking the instance up by its Name tag when only a
 * name or description is known
 */
export async function resolveInstanceTarget(
  parameters: Readonly<ParameterSet>,
  provider: Ec2Provider,
  logger: AgentLogger,
): Promise<ParameterSet> {
  if (isPresent(parameters.InstanceId)) {
    return { ...parameters };
  }

  const name = stringValue(parameters.InstanceName) ?? stringValue(parameters.InstanceDescription);
  if (name === undefined) {
    return { ...parameters };
  }

  try {
    const instanceId = await provider.findByTag(name);
    if (instanceId === undefined) {
      logger.info(`No live instance tagged Name=${name}`);
      return { ...parameters };
    }
    logger.debug(`Resolved instance "${name}" to ${instanceId}`);
    return { ...parameters, InstanceId: instanceId };
  } catch (err) {
    logger.warn(`Instance lookup for "${name}" failed`, { error: formatErrorMessage(err) });
    return { ...parameters };
  }
}
