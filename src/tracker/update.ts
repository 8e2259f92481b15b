/**
 * Ticket follow-up once a run ends
 *
 * A run that produced a context moves the ticket to plan review with a
 * summary comment. A run that failed sends it back to the backlog with
 * the reason and what to fix.
 */

import type { Logger, ILogObj } from "tslog";
import type { DocumentTransport } from "../mcp/types.js";
import type { PipelineResult } from "../pipeline/types.js";
import { effectiveMaturity } from "../knowledge/types.js";
import { TOOLS } from "../knowledge/queries.js";
import { LocationNotFoundError, errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export type RunOutcome = "success" | "context_error" | "execution_error";

/**
 * How a run ended: its result, or the error that stopped it
 */
export interface FinishedRun {
  result: PipelineResult | null;
  error?: unknown;
}

type FailedOutcome = Exclude<RunOutcome, "success">;

/**
 * `issues` are the problems worth telling the ticket's readers about
 */
export type OutcomeAssessment =
  | { outcome: "success"; result: PipelineResult; issues: string[] }
  | { outcome: FailedOutcome; issues: string[] };

export interface TicketUpdateOptions {
  reviewStatus: string;
  backlogStatus: string;
  dryRun?: boolean;
  logger?: Logger<ILogObj>;
}

export interface TicketUpdate {
  outcome: RunOutcome;
  targetStatus: string;
  comment: string;
  commentAdded: boolean;
  transitioned: boolean;
  dryRun: boolean;
  error?: string;
}

export function assessOutcome(run: FinishedRun): OutcomeAssessment {
  if (run.error !== undefined) {
    return run.error instanceof LocationNotFoundError
      ? { outcome: "context_error", issues: [run.error.message] }
      : { outcome: "execution_error", issues: [`Execution error: ${errorMessage(run.error)}`] };
  }
  if (!run.result) {
    return { outcome: "execution_error", issues: ["No pipeline result available"] };
  }

  const { knowledge } = run.result.context;
  const issues: string[] = [];
  const maturity = effectiveMaturity(knowledge.maturity, knowledge.missing);
  if (maturity === "BRAND_NEW") {
    issues.push("Brand new project: documentation pages need to be created");
  } else {
    issues.push(...knowledge.missing.map((role) => `Missing documentation: ${role}`));
  }

  const generation = run.result.plan?.generation;
  if (generation && !generation.validation.passed) {
    issues.push(`Work plan failed validation after ${generation.attempts} attempts`);
  }
  issues.push(...run.result.warnings);

  return { outcome: "success", result: run.result, issues };
}

/**
 * Markdown comment for a ticket whose plan is ready for review
 */
export function buildSuccessComment(result: PipelineResult, issues: readonly string[]): string {
  const { ticket, knowledge } = result.context;
  const lines = [
    "## Work Plan Ready for Review",
    "",
    `**Task:** ${ticket.summary || ticket.key}`,
    `**Documentation:** ${effectiveMaturity(knowledge.maturity, knowledge.missing)}`,
  ];

  if (result.plan) {
    const { items, complexity } = result.plan.decomposition;
    const { overall, flagged } = result.plan.confidence;
    lines.push(
      `**Complexity:** ${complexity}`,
      `**Confidence:** ${overall.toFixed(2)}`,
      "",
      "### Steps",
      "",
      ...items.map((item) => `${item.order}. [${item.layer}] ${item.title}`),
    );
    if (flagged.length > 0) {
      lines.push("", `**Low-confidence steps:** ${flagged.join(", ")}`);
    }
  } else {
    lines.push("", "Generation was skipped; the gathered context is ready for planning.");
  }

  if (issues.length > 0) {
    lines.push("", "### Notes", "", ...issues.map((issue) => `- ${issue}`));
  }

  lines.push("", "---", "*Moved to plan review.*");
  return lines.join("\n");
}

interface FailureText {
  heading: string;
  intro: string;
  actions: string[];
}

const FAILURE_TEXT: Record<FailedOutcome, FailureText> = {
  context_error: {
    heading: "### Context Location Error",
    intro: "The project documentation could not be located.",
    actions: [
      "Check the **Project Folder** and **Project Link** fields of this ticket",
      "Make sure the folder exists in the documentation space",
      "Check that the space key matches the project key or label",
    ],
  },
  execution_error: {
    heading: "### Execution Error",
    intro: "The planning run stopped with an error.",
    actions: ["Review the issues above", "Fix the configuration or access problem"],
  },
};

/**
 * Markdown comment for a ticket sent back to the backlog
 */
export function buildFailureComment(outcome: FailedOutcome, issues: readonly string[]): string {
  const text = FAILURE_TEXT[outcome];
  const lines = ["## Work Plan Not Generated", ""];

  lines.push(text.heading, "", text.intro, "", "**Issues:**");
  lines.push(...issues.map((issue) => `- ${issue}`));

  lines.push("", "### Required Actions", "");
  const actions = [...text.actions, "Move the ticket back to the planning queue when ready"];
  lines.push(...actions.map((action, i) => `${i + 1}. ${action}`));

  lines.push("", "---", "*Returned to the backlog for refinement.*");
  return lines.join("\n");
}

/**
 * Comment on the ticket and move it. Never throws: a failed call is logged
 * and reported in `error`, and a failed comment skips the transition. A dry
 * run never creates the ticket client.
 */
export async function updateTicket(
  tickets: () => DocumentTransport,
  ticketKey: string,
  run: FinishedRun,
  options: TicketUpdateOptions,
): Promise<TicketUpdate> {
  const logger = options.logger ?? getLogger();
  const assessment = assessOutcome(run);
  const { outcome } = assessment;
  const targetStatus = outcome === "success" ? options.reviewStatus : options.backlogStatus;
  const comment =
    assessment.outcome === "success"
      ? buildSuccessComment(assessment.result, assessment.issues)
      : buildFailureComment(assessment.outcome, assessment.issues);

  const update: TicketUpdate = {
    outcome,
    targetStatus,
    comment,
    commentAdded: false,
    transitioned: false,
    dryRun: options.dryRun ?? false,
  };

  if (update.dryRun) {
    logger.info(`[dry run] Would move ${ticketKey} to '${targetStatus}' (${outcome})`);
    logger.debug(comment);
    return update;
  }

  try {
    const transport = tickets();
    await transport.invoke(TOOLS.addComment, { issue_key: ticketKey, body: comment });
    update.commentAdded = true;
    await transport.invoke(TOOLS.transitionIssue, {
      issue_key: ticketKey,
      transition_name: targetStatus,
    });
    update.transitioned = true;
    logger.info({ event: "ticket_updated", ticketKey, outcome, targetStatus });
  } catch (error) {
    update.error = errorMessage(error);
    logger.error(`Could not update ${ticketKey}: ${update.error}`);
  }
  return update;
}
