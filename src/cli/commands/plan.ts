/**
 * Plan command - gather context for a ticket and generate a validated work plan
 */

import { Command, Option } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { Logger, ILogObj } from "tslog";
import { loadConfig } from "../../config/loader.js";
import type { PlannerConfig, TrackerConfig } from "../../config/schema.js";
import { createServerClient } from "../../mcp/connect.js";
import type { MCPToolClient } from "../../mcp/client.js";
import { createLazyModelClient } from "../../providers/openai.js";
import { runPipeline } from "../../pipeline/run.js";
import type { PipelineResult, PipelineServices, PipelineStage } from "../../pipeline/types.js";
import { effectiveMaturity } from "../../knowledge/types.js";
import { parseTicketKey } from "../../knowledge/parsers.js";
import { updateTicket, type FinishedRun } from "../../tracker/update.js";
import { errorMessage, formatError } from "../../utils/errors.js";
import {
  LOG_LEVELS,
  createChildLogger,
  initializeLogging,
  isLogLevel,
} from "../../utils/logger.js";

/**
 * Options for runPlan
 */
export interface PlanOptions {
  skipGeneration?: boolean;
  output?: string;
  config?: string;
  repo?: string;
  refine?: boolean;
  logLevel?: string;
  /** Comment on the ticket and move it once the run ends */
  updateTicket?: boolean;
  dryRun?: boolean;
  cwd?: string;
  /** Replaces the configured servers and model (tests) */
  services?: PipelineServices;
}

/**
 * Result of a plan run
 */
export interface PlanResult {
  success: boolean;
  result?: PipelineResult;
  error?: string;
}

const STAGE_MESSAGES: Record<PipelineStage, string> = {
  ticket: "Reading ticket",
  knowledge: "Retrieving project documentation",
  repository: "Inspecting repository",
  snapshot: "Loading context snapshot",
  generation: "Generating work plan",
  outputs: "Writing outputs",
};

/**
 * Register the plan command
 */
export function registerPlanCommand(program: Command): void {
  program
    .command("plan")
    .description("Gather context for a ticket and generate a validated work plan")
    .argument("<ticket>", "Ticket key (PROJ-123) or a ticket URL")
    .option("--skip-generation", "Stop after writing the context and prompt")
    .option("-o, --output <dir>", "Output directory")
    .option("-c, --config <path>", "Config file")
    .option("--repo <path>", "Local checkout to inspect")
    .option("--refine", "Reuse the saved context snapshot instead of retrieving again")
    .option("--update-ticket", "Comment on the ticket and move it to review or backlog")
    .option("--dry-run", "With --update-ticket, only log what would change")
    .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS))
    .action(async (ticket: string, options: PlanOptions) => {
      const outcome = await runPlan(ticket, { ...options, cwd: process.cwd() });
      if (!outcome.success) {
        process.exit(1);
      }
    });
}

interface ConfiguredServices {
  services: PipelineServices;
  close(): Promise<void>;
}

/**
 * Server clients are created on first use and closed after the run
 */
function createServices(config: PlannerConfig, logger: Logger<ILogObj>): ConfiguredServices {
  const clients = new Map<"tickets" | "documents", MCPToolClient>();
  const transportLogger = createChildLogger(logger, "transport");

  const client = (name: "tickets" | "documents") => (): MCPToolClient => {
    let existing = clients.get(name);
    if (!existing) {
      existing = createServerClient(name, config.servers[name], config.transport, transportLogger);
      clients.set(name, existing);
    }
    return existing;
  };
  const model = createLazyModelClient(config.model);

  return {
    services: { tickets: client("tickets"), documents: client("documents"), model: () => model },
    async close() {
      const results = await Promise.allSettled([...clients.values()].map((c) => c.close()));
      for (const r of results) {
        if (r.status === "rejected") {
          logger.warn(`Failed to close server connection: ${errorMessage(r.reason)}`);
        }
      }
    },
  };
}

function report(result: PipelineResult): void {
  const { knowledge } = result.context;
  const maturity = effectiveMaturity(knowledge.maturity, knowledge.missing);

  p.log.info(
    `Documentation: ${chalk.bold(maturity)} (${knowledge.mandatory.length} mandatory, ${knowledge.discovered.length} discovered)`,
  );
  if (knowledge.missing.length > 0) {
    p.log.warning(`Missing pages: ${knowledge.missing.join(", ")}`);
  }

  if (result.plan) {
    const { validation, attempts } = result.plan.generation;
    const { overall, flagged } = result.plan.confidence;
    if (validation.passed) {
      p.log.success(
        `Work plan valid: ${validation.stepsFound} steps, attempt ${attempts}, confidence ${overall.toFixed(2)}`,
      );
    } else {
      p.log.error(
        `Work plan still invalid after ${attempts} attempts (${validation.errors.length} errors)`,
      );
    }
    if (flagged.length > 0) {
      p.log.warning(`Low-confidence steps: ${flagged.join(", ")}`);
    }
  } else {
    p.log.info("Generation skipped");
  }

  for (const warning of result.warnings) {
    p.log.warning(warning);
  }

  p.log.step(
    `Outputs in ${chalk.cyan(result.outputs.dir)}\n` +
      result.outputs.files.map((f) => chalk.dim(`  ${f}`)).join("\n"),
  );
}

/**
 * Move the ticket to review or back to the backlog. Problems are warnings;
 * they never change the run's result.
 */
async function followUp(
  ticket: string,
  run: FinishedRun,
  services: PipelineServices,
  tracker: TrackerConfig,
  logger: Logger<ILogObj>,
): Promise<void> {
  try {
    const key = run.result?.ticketKey ?? parseTicketKey(ticket);
    const update = await updateTicket(services.tickets, key, run, {
      ...tracker,
      logger: createChildLogger(logger, "tracker"),
    });
    if (update.error) {
      p.log.warning(`Ticket ${key} not updated: ${update.error}`);
    } else if (update.dryRun) {
      p.log.info(`Dry run: ${key} would move to '${update.targetStatus}'`);
    } else {
      p.log.success(`Ticket ${key} moved to '${update.targetStatus}'`);
    }
  } catch (error) {
    logger.warn(`Ticket update skipped: ${errorMessage(error)}`);
    p.log.warning(`Ticket not updated: ${errorMessage(error)}`);
  }
}

/**
 * Run the plan command programmatically
 */
export async function runPlan(ticket: string, options: PlanOptions = {}): Promise<PlanResult> {
  p.intro(chalk.cyan(`ticketplan ${ticket}`));

  let config: PlannerConfig;
  try {
    config = await loadConfig({ configPath: options.config, cwd: options.cwd });
  } catch (error) {
    p.log.error(formatError(error));
    return { success: false, error: errorMessage(error) };
  }

  const outputDir = options.output ?? config.output.dir;
  const level =
    options.logLevel && isLogLevel(options.logLevel) ? options.logLevel : config.logging.level;
  const logger = initializeLogging(outputDir, level, config.logging.logToFile);

  const configured = options.services
    ? { services: options.services, close: async () => {} }
    : createServices(config, logger);

  const spinner = p.spinner();
  spinner.start(options.refine ? STAGE_MESSAGES.snapshot : STAGE_MESSAGES.ticket);

  let run: FinishedRun;
  try {
    const result = await runPipeline(configured.services, {
      ticket,
      config,
      outputDir,
      repoPath: options.repo,
      skipGeneration: options.skipGeneration,
      refine: options.refine,
      onStage: (stage) => spinner.message(STAGE_MESSAGES[stage]),
      logger,
    });
    spinner.stop(`Finished ${result.ticketKey}`);
    report(result);
    run = { result };
  } catch (error) {
    spinner.stop("Failed");
    logger.error(errorMessage(error));
    p.log.error(formatError(error));
    run = { result: null, error };
  }

  try {
    if (options.updateTicket ?? config.tracker.updateTicket) {
      const tracker = { ...config.tracker, dryRun: options.dryRun ?? config.tracker.dryRun };
      await followUp(ticket, run, configured.services, tracker, logger);
    }
  } finally {
    await configured.close();
  }

  if (!run.result) {
    return { success: false, error: errorMessage(run.error) };
  }
  p.outro(chalk.green("Done"));
  return { success: true, result: run.result };
}
