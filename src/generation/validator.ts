/**
 * Work Plan validation
 *
 * Five independent rule groups run in a fixed order. Errors block, warnings
 * never do.
 */

import {
  VALID_LAYERS,
  isLayer,
  parseDependencies,
  parseSteps,
  significantWords,
  type RawStep,
} from "./steps.js";

export const MIN_WORK_PLAN_LENGTH = 50;
export const MAX_REASONABLE_STEPS = 15;
export const DUPLICATE_OVERLAP_THRESHOLD = 0.6;

export const PLACEHOLDER_VALUES: ReadonlySet<string> = new Set([
  "tbd",
  "todo",
  "n/a",
  "na",
  "-",
  "?",
  "none",
]);

/**
 * Acceptance phrasings that cannot be verified
 */
export const VAGUE_PATTERNS: readonly RegExp[] = [
  /\bworks?\s+(?:correctly|properly|fine|well|as\s+expected)\b/i,
  /\bshould\s+work\b/i,
  /\bas\s+expected\b/i,
  /\b(?:functions?|behaves?|performs?)\s+(?:correctly|properly|well)\b/i,
  /\bproperly\s+(?:implemented|handled|tested|configured)\b/i,
  /\bis\s+(?:done|complete|completed|implemented|working)\s*\.?\s*$/i,
  /\bno\s+(?:errors|issues|bugs|problems)\b/i,
  /\beverything\s+works\b/i,
  /^\s*(?:done|ok|works|complete|tested)\s*\.?\s*$/i,
  /\b(?:looks|is)\s+good\b/i,
];

export type RuleGroup = "structure" | "fields" | "acceptance" | "duplicates" | "dependencies";

export interface ValidationResult {
  group: RuleGroup;
  passed: boolean;
  errors: string[];
  warnings: string[];
  stepsFound: number;
  layersFound: number;
}

/**
 * All rule groups merged. Messages carry a `[group] ` prefix.
 */
export interface PlanValidation {
  passed: boolean;
  errors: string[];
  warnings: string[];
  results: ValidationResult[];
  stepsFound: number;
  layersFound: number;
}

function result(group: RuleGroup, steps: readonly RawStep[]): ValidationResult {
  return {
    group,
    passed: true,
    errors: [],
    warnings: [],
    stepsFound: steps.length,
    layersFound: steps.filter((s) => Boolean(s.layer)).length,
  };
}

function fail(r: ValidationResult, message: string): void {
  r.passed = false;
  r.errors.push(message);
}

/**
 * The first vague pattern an acceptance text matches, if any
 */
export function findVaguePattern(acceptance: string): RegExp | undefined {
  return VAGUE_PATTERNS.find((pattern) => pattern.test(acceptance));
}

export function isPlaceholder(value: string): boolean {
  return PLACEHOLDER_VALUES.has(value.trim().toLowerCase());
}

function formatList(values: readonly (string | number)[]): string {
  return `[${values.join(", ")}]`;
}

export function validateStructure(workPlan: string, steps: readonly RawStep[]): ValidationResult {
  const r = result("structure", steps);
  const length = workPlan.trim().length;

  if (length === 0) {
    fail(r, "Work Plan section is empty");
    return r;
  }
  if (length < MIN_WORK_PLAN_LENGTH) {
    fail(r, `Work Plan is too short (${length} chars, minimum ${MIN_WORK_PLAN_LENGTH})`);
    return r;
  }
  if (steps.length === 0) {
    fail(r, "No steps found (expected format: '- [ ] **Step N:** description')");
    return r;
  }

  if (r.layersFound < r.stepsFound) {
    fail(
      r,
      `Missing Layer tags: found ${r.layersFound} layers for ${r.stepsFound} steps ` +
        `(${r.stepsFound - r.layersFound} missing)`,
    );
  }

  const invalid = steps
    .map((s) => s.layer)
    .filter((layer): layer is string => Boolean(layer) && !isLayer((layer ?? "").toUpperCase()));
  if (invalid.length > 0) {
    r.warnings.push(
      `Invalid layer values: ${formatList(invalid)}. Valid layers: ${[...VALID_LAYERS].sort().join(", ")}`,
    );
  }

  if (steps.length > MAX_REASONABLE_STEPS) {
    r.warnings.push(
      `Large number of steps (${steps.length}, threshold ${MAX_REASONABLE_STEPS}). ` +
        "Consider if task should be broken into smaller features.",
    );
  }

  const numbers = steps.map((s) => s.number);
  const expected = steps.map((_, i) => i + 1);
  if (numbers.some((n, i) => n !== expected[i])) {
    r.warnings.push(
      `Step numbers not sequential: got ${formatList(numbers)}, expected ${formatList(expected)}`,
    );
  }

  return r;
}

export function validateFields(steps: readonly RawStep[]): ValidationResult {
  const r = result("fields", steps);
  const fields = [
    ["files", "Files"],
    ["acceptance", "Acceptance"],
  ] as const;

  for (const step of steps) {
    for (const [key, label] of fields) {
      const value = step[key];
      if (value === null) {
        fail(r, `Step ${step.number}: missing ${label} field`);
      } else if (value.trim() === "") {
        fail(r, `Step ${step.number}: ${label} field is empty`);
      } else if (isPlaceholder(value)) {
        r.warnings.push(`Step ${step.number}: ${label} is a placeholder ("${value.trim()}")`);
      }
    }
  }
  return r;
}

export function validateAcceptance(steps: readonly RawStep[]): ValidationResult {
  const r = result("acceptance", steps);
  for (const step of steps) {
    const acceptance = step.acceptance?.trim() ?? "";
    if (!acceptance || isPlaceholder(acceptance)) continue;
    const pattern = findVaguePattern(acceptance);
    if (pattern) {
      fail(
        r,
        `Step ${step.number}: vague acceptance criteria "${acceptance}" ` +
          `(vague-phrase rule ${pattern.source}). Use specific, verifiable criteria.`,
      );
    }
  }
  return r;
}

/**
 * Share of the smaller title's significant words found in the other title
 */
export function titleOverlap(a: string, b: string): number {
  const wordsA = new Set(significantWords(a));
  const wordsB = new Set(significantWords(b));
  const smaller = Math.min(wordsA.size, wordsB.size);
  if (smaller === 0) return 0;
  let shared = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) shared++;
  }
  return shared / smaller;
}

export function validateDuplicates(steps: readonly RawStep[]): ValidationResult {
  const r = result("duplicates", steps);
  for (let i = 0; i < steps.length; i++) {
    for (let j = i + 1; j < steps.length; j++) {
      const a = steps[i];
      const b = steps[j];
      if (!a || !b) continue;
      const overlap = titleOverlap(a.title, b.title);
      if (overlap > DUPLICATE_OVERLAP_THRESHOLD) {
        r.warnings.push(
          `Steps ${a.number} and ${b.number} may be duplicates ` +
            `(${Math.round(overlap * 100)}% title overlap)`,
        );
      }
    }
  }
  return r;
}

/**
 * Dependency cycles, each reported once, found by depth-first traversal
 */
export function findDependencyCycles(graph: ReadonlyMap<number, readonly number[]>): number[][] {
  const state = new Map<number, "visiting" | "done">();
  const stack: number[] = [];
  const cycles: number[][] = [];
  const seen = new Set<string>();

  const visit = (node: number): void => {
    state.set(node, "visiting");
    stack.push(node);
    for (const next of graph.get(node) ?? []) {
      const nextState = state.get(next);
      if (nextState === "visiting") {
        const cycle = stack.slice(stack.indexOf(next));
        const key = [...cycle].sort((x, y) => x - y).join(",");
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push([...cycle, next]);
        }
      } else if (nextState === undefined) {
        visit(next);
      }
    }
    stack.pop();
    state.set(node, "done");
  };

  for (const node of [...graph.keys()].sort((x, y) => x - y)) {
    if (!state.has(node)) visit(node);
  }
  return cycles;
}

export function validateDependencies(steps: readonly RawStep[]): ValidationResult {
  const r = result("dependencies", steps);
  const known = new Set(steps.map((s) => s.number));
  const graph = new Map<number, number[]>();

  for (const step of steps) {
    const valid: number[] = [];
    for (const ref of parseDependencies(step.dependsOn)) {
      if (ref === step.number) {
        fail(r, `Step ${step.number}: depends on itself`);
      } else if (!known.has(ref)) {
        fail(r, `Step ${step.number}: depends on Step ${ref}, which does not exist`);
      } else {
        valid.push(ref);
      }
    }
    graph.set(step.number, valid);
  }

  for (const cycle of findDependencyCycles(graph)) {
    r.warnings.push(`Dependency cycle: ${cycle.map((n) => `Step ${n}`).join(" -> ")}`);
  }
  return r;
}

/**
 * Run every rule group over a Work Plan and merge the outcome
 */
export function validateWorkPlan(workPlan: string): PlanValidation {
  const steps = parseSteps(workPlan);
  const results = [
    validateStructure(workPlan, steps),
    validateFields(steps),
    validateAcceptance(steps),
    validateDuplicates(steps),
    validateDependencies(steps),
  ];
  return mergeValidation(results);
}

export function mergeValidation(results: readonly ValidationResult[]): PlanValidation {
  return {
    passed: results.every((r) => r.errors.length === 0),
    errors: results.flatMap((r) => r.errors.map((e) => `[${r.group}] ${e}`)),
    warnings: results.flatMap((r) => r.warnings.map((w) => `[${r.group}] ${w}`)),
    results: [...results],
    stepsFound: results[0]?.stepsFound ?? 0,
    layersFound: results[0]?.layersFound ?? 0,
  };
}
