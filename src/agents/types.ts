import type { ExecutionResult, OperationEnvelope, OperationType, RequestOptions, SuccessEnvelope } from "../types.js";

export type AgentKind = "ec2" | "ec2-lifecycle";

/**
 * One agent per resource family. `processPrompt` never executes anything;
 * `execute` runs a previously returned success envelope.
 */
export interface ResourceAgent {
  readonly kind: AgentKind;
  processPrompt(prompt: string, operationType: OperationType, options?: RequestOptions): Promise<OperationEnvelope>;
  execute(envelope: SuccessEnvelope, options?: RequestOptions): Promise<ExecutionResult>;
}
