/**
 * Validated generation with targeted repair
 *
 * `nextAction` is the whole retry policy as a pure transition; `runGeneration`
 * drives it against a model client.
 */

import type { Logger, ILogObj } from "tslog";
import type { ModelClient, Completion, CompletionRequest } from "../providers/types.js";
import { GenerationMetrics, type CallPurpose } from "./metrics.js";
import {
  extractRepairedPlan,
  parseResponseSections,
  replaceWorkPlan,
  type ResponseSections,
} from "./sections.js";
import { validateWorkPlan, type PlanValidation } from "./validator.js";
import {
  PLAN_SYSTEM_PROMPT,
  REPAIR_SYSTEM_PROMPT,
  buildPlanPrompt,
  buildRepairPrompt,
} from "./prompts.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export interface RetryState {
  /** Model calls made so far, including the initial one */
  attempt: number;
  maxRetries: number;
}

export type NextAction =
  | { kind: "done" }
  | { kind: "repair"; attempt: number }
  | { kind: "give-up" };

/**
 * Pass ends the loop; a failure is repaired until `maxRetries` repairs have
 * been spent, then the controller gives up.
 */
export function nextAction(state: RetryState, validation: PlanValidation): NextAction {
  if (validation.passed) {
    return { kind: "done" };
  }
  if (state.attempt <= state.maxRetries) {
    return { kind: "repair", attempt: state.attempt + 1 };
  }
  return { kind: "give-up" };
}

export interface GenerationOptions {
  model?: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
  repairExcerptLength: number;
  metrics: GenerationMetrics;
  logger?: Logger<ILogObj>;
}

export interface GenerationResult {
  /** Final full response, with the Work Plan replaced by the last repair */
  response: string;
  sections: ResponseSections;
  validation: PlanValidation;
  userPrompt: string;
  attempts: number;
  maxRetriesHit: boolean;
  /** Non-fatal problems, such as a failed repair call */
  warnings: string[];
  model: string;
}

async function timedCall(
  client: ModelClient,
  request: CompletionRequest,
  metrics: GenerationMetrics,
  attempt: number,
  purpose: CallPurpose,
): Promise<{ completion: Completion; durationMs: number }> {
  const start = performance.now();
  try {
    const completion = await client.complete(request);
    return { completion, durationMs: Math.round(performance.now() - start) };
  } catch (error) {
    metrics.record({
      attempt,
      purpose,
      model: request.model ?? client.id,
      tokensIn: 0,
      tokensOut: 0,
      durationMs: Math.round(performance.now() - start),
      validation: null,
      error: errorMessage(error),
    });
    throw error;
  }
}

/**
 * Generate a plan, validate it and repair the Work Plan section until it
 * passes or the retry budget is spent. A failed initial call rejects; a
 * failed repair keeps the last response and adds a warning.
 */
export async function runGeneration(
  client: ModelClient,
  renderedContext: string,
  options: GenerationOptions,
): Promise<GenerationResult> {
  const logger = options.logger ?? getLogger();
  const { metrics } = options;
  const warnings: string[] = [];
  const userPrompt = buildPlanPrompt(renderedContext);

  const initial = await timedCall(
    client,
    {
      system: PLAN_SYSTEM_PROMPT,
      user: userPrompt,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      model: options.model,
    },
    metrics,
    1,
    "initial",
  );

  let response = initial.completion.text;
  let sections = parseResponseSections(response);
  let validation = validateWorkPlan(sections.workPlan);
  let modelName = initial.completion.model;
  let attempt = 1;

  metrics.record({
    attempt,
    purpose: "initial",
    model: modelName,
    tokensIn: initial.completion.tokensIn,
    tokensOut: initial.completion.tokensOut,
    durationMs: initial.durationMs,
    validation: { passed: validation.passed, errors: validation.errors },
  });
  if (initial.completion.finishReason === "length") {
    warnings.push("Model reply was cut off at the token limit");
  }

  for (;;) {
    const action = nextAction({ attempt, maxRetries: options.maxRetries }, validation);

    if (action.kind === "done") {
      logger.info(`Work Plan passed validation on attempt ${attempt}`);
      break;
    }

    if (action.kind === "give-up") {
      metrics.markMaxRetriesHit();
      const message = `Max retries hit: Work Plan still invalid after ${attempt} attempts`;
      logger.warn(message);
      warnings.push(message);
      break;
    }

    logger.warn(
      `Work Plan failed validation (${validation.errors.length} errors), repair attempt ${action.attempt}`,
    );

    let repair: { completion: Completion; durationMs: number };
    try {
      repair = await timedCall(
        client,
        {
          system: REPAIR_SYSTEM_PROMPT,
          user: buildRepairPrompt(validation.errors, sections.workPlan, options.repairExcerptLength),
          temperature: options.temperature,
          maxTokens: options.maxTokens,
          model: options.model,
        },
        metrics,
        action.attempt,
        "retry",
      );
    } catch (error) {
      const message = `Repair attempt ${action.attempt} failed: ${errorMessage(error)}; keeping the previous response`;
      logger.warn(message);
      warnings.push(message);
      break;
    }

    attempt = action.attempt;
    modelName = repair.completion.model;
    response = replaceWorkPlan(response, extractRepairedPlan(repair.completion.text));
    sections = parseResponseSections(response);
    validation = validateWorkPlan(sections.workPlan);

    metrics.record({
      attempt,
      purpose: "retry",
      model: modelName,
      tokensIn: repair.completion.tokensIn,
      tokensOut: repair.completion.tokensOut,
      durationMs: repair.durationMs,
      validation: { passed: validation.passed, errors: validation.errors },
    });
  }

  return {
    response,
    sections,
    validation,
    userPrompt,
    attempts: attempt,
    maxRetriesHit: metrics.maxRetriesHit,
    warnings,
    model: modelName,
  };
}
