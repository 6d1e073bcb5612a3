/**
 * Rule-based routing, used when the oracle cannot classify a prompt
 */

import { INSTANCE_ID_PATTERN } from "../resolver/ec2-lifecycle.js";
import type { OperationType, RoutingDecision, ServiceName } from "../types.js";
import {
  LIFECYCLE_KEYWORDS,
  LIFECYCLE_PROXIMITY,
  MACHINE_NOUNS,
  OPERATION_KEYWORDS,
  SERVICE_KEYWORDS,
} from "./keywords.js";

export const RULE_CONFIDENCE = 0.5;

export function identifyService(prompt: string): ServiceName {
  const text = prompt.toLowerCase();
  const match = SERVICE_KEYWORDS.find(([, keywords]) => keywords.some((k) => text.includes(k)));
  return match ? match[0] : "unknown";
}

export function identifyOperationType(prompt: string): OperationType {
  const text = prompt.toLowerCase();
  const match = OPERATION_KEYWORDS.find(([, keywords]) => keywords.some((k) => text.includes(k)));
  return match ? match[0] : "read";
}

/**
 * A lifecycle keyword counts only when an instance id is present or the
 * keyword is followed closely by a machine noun, verb before object:
 * "start the server" qualifies, "a server that starts on boot" does not.
 */
export function isLifecycleRequest(prompt: string): boolean {
  const text = prompt.toLowerCase();
  const hasInstanceId = INSTANCE_ID_PATTERN.test(text);

  for (const keyword of LIFECYCLE_KEYWORDS) {
    const keywordIndex = text.indexOf(keyword);
    if (keywordIndex === -1) continue;
    if (hasInstanceId) return true;

    for (const noun of MACHINE_NOUNS) {
      const nounIndex = text.indexOf(noun, keywordIndex + keyword.length);
      if (nounIndex !== -1 && nounIndex - keywordIndex < LIFECYCLE_PROXIMITY) {
        return true;
      }
    }
  }

  return false;
}

export function classifyByRules(prompt: string): RoutingDecision {
  return {
    service: identifyService(prompt),
    operationType: identifyOperationType(prompt),
    isLifecycle: isLifecycleRequest(prompt),
    confidence: RULE_CONFIDENCE,
    source: "rules",
  };
}
