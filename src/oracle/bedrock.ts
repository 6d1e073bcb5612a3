/**
 * Bedrock-backed text oracle
 *
 * Sends one system instruction plus one user turn through the Converse API
 * and returns the concatenated text blocks of the reply.
 */

import {
  BedrockRuntimeClient,
  ConverseCommand,
} from "@aws-sdk/client-bedrock-runtime";

import type { AgentConfig } from "../config/config.js";
import { createAWSRetryRunner, type RetryRunner } from "../retry.js";
import type { AgentLogger } from "../logging/index.js";
import type { OracleCallOptions, TextOracle } from "./types.js";

export type BedrockOracleSettings = Pick<AgentConfig, "region" | "modelId" | "temperature" | "maxTokens" | "maxRetries">;

export class BedrockTextOracle implements TextOracle {
  private client: BedrockRuntimeClient;
  private retry: RetryRunner;

  constructor(
    private settings: BedrockOracleSettings,
    logger?: AgentLogger,
  ) {
    // SDK-level retries stay off; throttling is handled by the runner.
    this.client = new BedrockRuntimeClient({ region: settings.region, maxAttempts: 1 });
    this.retry = createAWSRetryRunner({ retry: { attempts: settings.maxRetries }, logger });
  }

  async complete(systemInstruction: string, userText: string, options: OracleCallOptions = {}): Promise<string> {
    const response = await this.retry(
      () => this.client.send(
        new ConverseCommand({
          modelId: this.settings.modelId,
          system: [{ text: systemInstruction }],
          messages: [{ role: "user", content: [{ text: userText }] }],
          inferenceConfig: {
            temperature: this.settings.temperature,
            maxTokens: this.settings.maxTokens,
          },
        }),
        { abortSignal: options.signal },
      ),
      "Converse",
    );

    const blocks = response.output?.message?.content ?? [];
    const text = blocks
      .map((block) => block.text ?? "")
      .join("")
      .trim();

    if (!text) {
      throw new Error(`Model ${this.settings.modelId} returned no text (stop reason: ${response.stopReason ?? "unknown"})`);
    }
    return text;
  }
}
