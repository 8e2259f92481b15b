/**
 * Plan generation, validation and scoring
 */

export {
  parseResponseSections,
  replaceWorkPlan,
  extractRepairedPlan,
  type ResponseSections,
  type SectionName,
} from "./sections.js";
export {
  VALID_LAYERS,
  isLayer,
  parseSteps,
  parseDependencies,
  significantWords,
  type Layer,
  type RawStep,
} from "./steps.js";
export {
  validateWorkPlan,
  validateStructure,
  validateFields,
  validateAcceptance,
  validateDuplicates,
  validateDependencies,
  mergeValidation,
  findDependencyCycles,
  findVaguePattern,
  isPlaceholder,
  titleOverlap,
  VAGUE_PATTERNS,
  PLACEHOLDER_VALUES,
  MIN_WORK_PLAN_LENGTH,
  MAX_REASONABLE_STEPS,
  type ValidationResult,
  type PlanValidation,
  type RuleGroup,
} from "./validator.js";
export {
  decompose,
  extractItems,
  extractQuestions,
  extractComplexity,
  extractAlternatives,
  type DecomposedItem,
  type ClarificationQuestion,
  type Complexity,
  type Decomposition,
} from "./decomposition.js";
export {
  scoreItem,
  scoreItems,
  summarizeConfidence,
  DEFAULT_CONFIDENCE_THRESHOLD,
  type ItemScore,
  type ConfidenceSummary,
} from "./confidence.js";
export {
  PLAN_SYSTEM_PROMPT,
  REPAIR_SYSTEM_PROMPT,
  buildPlanPrompt,
  buildRepairPrompt,
} from "./prompts.js";
export {
  nextAction,
  runGeneration,
  type RetryState,
  type NextAction,
  type GenerationOptions,
  type GenerationResult,
} from "./retry-controller.js";
export {
  GenerationMetrics,
  formatMetrics,
  type GenerationAttempt,
  type CallPurpose,
  type AttemptValidation,
} from "./metrics.js";
