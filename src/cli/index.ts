#!/usr/bin/env node

/**
 * ticketplan CLI entry point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerPlanCommand } from "./commands/plan.js";
import { loadEnvFile } from "../config/env.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("ticketplan")
  .description("Turn a tracker ticket into a validated, documentation-aware work plan")
  .version(VERSION, "-v, --version", "Output the current version");

registerPlanCommand(program);

process.on("SIGINT", () => {
  console.error("\nCancelled");
  process.exit(130);
});

async function main(): Promise<void> {
  // API keys may live in ~/.ticketplan/.env; real environment variables win
  loadEnvFile();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
