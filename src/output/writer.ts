/**
 * Run artifacts under `<output>/<KEY>/`
 */

import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import type { AggregatedContext } from "../context/types.js";
import { saveSnapshot } from "../context/store.js";
import { formatSelectionLog } from "../knowledge/discovery.js";
import type { GenerationResult } from "../generation/retry-controller.js";
import type { Decomposition } from "../generation/decomposition.js";
import type { ConfidenceSummary } from "../generation/confidence.js";
import { formatMetrics, type GenerationMetrics } from "../generation/metrics.js";
import { PLAN_SYSTEM_PROMPT, buildPlanPrompt } from "../generation/prompts.js";
import { writeTextFile } from "../utils/files.js";
import { getLogger } from "../utils/logger.js";

const NOT_FOUND = "[Section not found in response]";

export interface PlanReport {
  generation: GenerationResult;
  decomposition: Decomposition;
  confidence: ConfidenceSummary;
}

export interface RunArtifacts {
  context: AggregatedContext;
  renderedContext: string;
  /** null when generation was skipped */
  plan: PlanReport | null;
  metrics: GenerationMetrics;
  /** Model call settings echoed into the prompt file */
  model?: { name: string; temperature: number; maxTokens: number };
}

export interface WriteOptions {
  saveSnapshot?: boolean;
  logger?: Logger<ILogObj>;
}

export interface WrittenOutputs {
  dir: string;
  files: string[];
}

export function ticketDir(outputDir: string, ticketKey: string): string {
  return path.join(outputDir, ticketKey);
}

export function formatPrompt(
  ticketKey: string,
  userPrompt: string,
  generatedAt: string,
  model?: RunArtifacts["model"],
): string {
  const lines = [`# Model Prompt: ${ticketKey}`, "", `Generated: ${generatedAt}`];
  if (model) {
    lines.push(
      `Model: ${model.name}`,
      `Temperature: ${model.temperature}`,
      `Max Tokens: ${model.maxTokens}`,
    );
  }
  lines.push("", "---", "", "## System Prompt", "", "```", PLAN_SYSTEM_PROMPT.trimEnd(), "```");
  lines.push("", "---", "", "## User Prompt", "", userPrompt.trimEnd(), "");
  return lines.join("\n");
}

function formatValidation(report: PlanReport): string[] {
  const { validation, attempts, maxRetriesHit, warnings } = report.generation;
  const status = validation.passed ? "PASSED" : "FAILED";
  const lines = [
    "## Validation",
    "",
    `**Status:** ${status} after ${attempts} attempt${attempts === 1 ? "" : "s"}`,
    `**Steps:** ${validation.stepsFound}`,
  ];
  if (maxRetriesHit) {
    lines.push("", "**Max retries hit.** Review the Work Plan before acting on it.");
  }
  if (validation.errors.length > 0) {
    lines.push("", "### Errors", "");
    for (const e of validation.errors) lines.push(`- ${e}`);
  }
  const allWarnings = [...validation.warnings, ...warnings];
  if (allWarnings.length > 0) {
    lines.push("", "### Warnings", "");
    for (const w of allWarnings) lines.push(`- ${w}`);
  }
  return lines;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

function formatConfidence(report: PlanReport): string[] {
  const { items } = report.decomposition;
  const { overall, flagged, threshold } = report.confidence;
  const lines = [
    "## Confidence",
    "",
    `**Overall:** ${overall.toFixed(2)} (threshold ${threshold.toFixed(2)})`,
  ];
  if (items.length === 0) {
    lines.push("", "No steps to score.");
    return lines;
  }

  lines.push(
    "",
    "| Step | Layer | Title | Confidence | Flags |",
    "|------|-------|-------|------------|-------|",
  );
  for (const item of items) {
    const low = flagged.includes(item.order);
    const score = low ? `**${item.confidence.toFixed(2)} LOW**` : item.confidence.toFixed(2);
    const flags = item.confidenceFlags.length > 0 ? item.confidenceFlags.join("; ") : "-";
    lines.push(
      `| ${item.order} | ${item.layer} | ${escapeCell(item.title)} | ${score} | ${escapeCell(flags)} |`,
    );
  }

  if (flagged.length > 0) {
    lines.push("", `Low-confidence steps: ${flagged.map((n) => `Step ${n}`).join(", ")}`);
  }
  return lines;
}

/**
 * The reviewed plan document: the five sections, then validation and
 * confidence summaries
 */
export function formatPlan(context: AggregatedContext, report: PlanReport): string {
  const { sections, model } = report.generation;
  const { complexity, questions } = report.decomposition;

  const lines = [
    `# Work Plan: ${context.ticketKey}`,
    "",
    `**Task:** ${context.ticket.summary || context.ticketKey}`,
    `**Generated:** ${context.generatedAt}`,
    `**Model:** ${model}`,
    `**Complexity:** ${complexity}`,
    "",
    "---",
    "",
    "## Understanding",
    "",
    sections.understanding || NOT_FOUND,
    "",
    "## Concerns & Uncertainties",
    "",
    sections.concerns || NOT_FOUND,
    "",
    "## Analysis",
    "",
    sections.analysis || NOT_FOUND,
    "",
    "## Steps",
    "",
    sections.workPlan || NOT_FOUND,
    "",
    "## Definition of Ready",
    "",
    sections.definitionOfReady || NOT_FOUND,
    "",
    "---",
    "",
    ...formatValidation(report),
    "",
    ...formatConfidence(report),
  ];

  if (questions.length > 0) {
    lines.push("", "## Clarification Questions", "");
    for (const q of questions) lines.push(`- ${q.question} (${q.context})`);
  }

  return lines.join("\n") + "\n";
}

export function formatResponse(context: AggregatedContext, generation: GenerationResult): string {
  return [
    `# Model Response: ${context.ticketKey}`,
    "",
    `Generated: ${context.generatedAt}`,
    `Model: ${generation.model}`,
    `Attempts: ${generation.attempts}`,
    "",
    "---",
    "",
    generation.response.trimEnd(),
    "",
  ].join("\n");
}

/**
 * Write every artifact of a run and return the paths written. The prompt
 * file is written even when generation was skipped so it can be reused by
 * hand.
 */
export async function writeOutputs(
  outputDir: string,
  artifacts: RunArtifacts,
  options: WriteOptions = {},
): Promise<WrittenOutputs> {
  const logger = options.logger ?? getLogger();
  const { context } = artifacts;
  const key = context.ticketKey;
  const dir = ticketDir(outputDir, key);
  const files: string[] = [];

  const write = async (suffix: string, content: string): Promise<void> => {
    const filePath = path.join(dir, `${key}_${suffix}`);
    await writeTextFile(filePath, content);
    files.push(filePath);
  };

  await write("context.md", artifacts.renderedContext);

  const selectionLog = context.knowledge.selectionLog;
  if (selectionLog) {
    await write(
      "selection.md",
      `# Document Selection Log: ${key}\n\nGenerated: ${context.generatedAt}\n\n---\n\n${formatSelectionLog(selectionLog)}\n`,
    );
  }

  const userPrompt =
    artifacts.plan?.generation.userPrompt ?? buildPlanPrompt(artifacts.renderedContext);
  await write("prompt.md", formatPrompt(key, userPrompt, context.generatedAt, artifacts.model));

  if (artifacts.plan) {
    await write("response.md", formatResponse(context, artifacts.plan.generation));
    await write("plan.md", formatPlan(context, artifacts.plan));
  }

  if (artifacts.metrics.attempts.length > 0) {
    await write("metrics.md", formatMetrics(artifacts.metrics, context.generatedAt) + "\n");
  }

  if (options.saveSnapshot ?? true) {
    files.push(await saveSnapshot(context, outputDir, logger));
  }

  logger.info({ event: "outputs_written", dir, files: files.length });
  return { dir, files };
}
