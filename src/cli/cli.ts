/**
 * CLI Commands
 *
 * Registers the `aws-ops` subcommands: plan, run and classify. Each call
 * handles a single prompt and exits.
 */

import type { Command } from "commander";

import type { AgentConfig } from "../config/config.js";
import type { Orchestrator } from "../orchestrator.js";
import { formatDecision, formatEnvelope, formatOutcome } from "./format.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  config: AgentConfig;
  output: {
    log: (msg: string) => void;
    error: (msg: string) => void;
  };
  setExitCode: (code: number) => void;
};

type OutputOptions = { json?: boolean };
type RunOptions = OutputOptions & { yes?: boolean };

// =============================================================================
// CLI Registration
// =============================================================================

export function registerAgentCli(ctx: CliContext, orchestrator: Orchestrator): void {
  const { program, output } = ctx;
  // JSON always goes to stdout; human-readable failures go to stderr.
  const print = (json: boolean | undefined, value: unknown, text: string, failed = false) => {
    if (json) output.log(JSON.stringify(value, null, 2));
    else if (failed) output.error(text);
    else output.log(text);
  };

  program
    .command("plan")
    .description("Turn a request into a validated operation without executing it")
    .argument("<prompt...>", "What you want done, in plain language")
    .option("--json", "Print the envelope as JSON")
    .action(async (words: string[], opts: OutputOptions) => {
      const envelope = await orchestrator.processPrompt(words.join(" "));
      const failed = envelope.status === "error";
      print(opts.json, envelope, formatEnvelope(envelope), failed);
      if (failed) ctx.setExitCode(1);
    });

  program
    .command("run")
    .description("Plan a request and execute it once confirmed")
    .argument("<prompt...>", "What you want done, in plain language")
    .option("-y, --yes", "Confirm the operation without asking")
    .option("--json", "Print the envelope and result as JSON")
    .action(async (words: string[], opts: RunOptions) => {
      const envelope = await orchestrator.processPrompt(words.join(" "));
      if (envelope.status === "error") {
        print(opts.json, { envelope }, formatEnvelope(envelope), true);
        ctx.setExitCode(1);
        return;
      }

      const confirmed = opts.yes === true || !ctx.config.confirmationRequired;
      const outcome = await orchestrator.executeOperation(envelope, { confirmed });
      const failed = outcome.status === "error";
      print(opts.json, { envelope, outcome }, `${formatEnvelope(envelope)}\n\n${formatOutcome(outcome)}`, failed);
      if (failed) ctx.setExitCode(1);
    });

  program
    .command("classify")
    .description("Show which service and operation a request routes to")
    .argument("<prompt...>", "What you want done, in plain language")
    .option("--json", "Print the routing decision as JSON")
    .action(async (words: string[], opts: OutputOptions) => {
      const decision = await orchestrator.classify(words.join(" "));
      print(opts.json, decision, formatDecision(decision));
    });
}
