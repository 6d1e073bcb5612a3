#!/usr/bin/env node
import { Command } from "commander";

import { loadAgentConfig } from "../config/config.js";
import { createAgentContext } from "../context.js";
import { formatErrorMessage } from "../errors.js";
import { Orchestrator } from "../orchestrator.js";
import { VERSION } from "../version.js";
import { registerAgentCli } from "./cli.js";

async function main(argv: string[]): Promise<void> {
  const program = new Command()
    .name("aws-ops")
    .description("Plan and run AWS operations from plain-language requests")
    .version(VERSION);

  const config = loadAgentConfig();
  const context = createAgentContext(config);

  registerAgentCli(
    {
      program,
      config,
      output: {
        log: (msg) => console.log(msg),
        error: (msg) => console.error(msg),
      },
      setExitCode: (code) => {
        process.exitCode = code;
      },
    },
    new Orchestrator(context),
  );

  await program.parseAsync(argv);
}

main(process.argv).catch((err: unknown) => {
  console.error(`aws-ops: ${formatErrorMessage(err)}`);
  process.exitCode = 1;
});
