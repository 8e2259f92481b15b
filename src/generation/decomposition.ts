/**
 * Structured extraction from a generated response
 */

import { isLayer, parseDependencies, parseSteps, type Layer } from "./steps.js";
import { isPlaceholder } from "./validator.js";
import type { ResponseSections } from "./sections.js";

export interface DecomposedItem {
  layer: Layer;
  title: string;
  description: string;
  acceptance: string;
  files: string[];
  /** Step number as written */
  order: number;
  dependsOn: number[];
  confidence: number;
  confidenceFlags: string[];
}

export interface ClarificationQuestion {
  question: string;
  context: string;
}

export type Complexity = "S" | "M" | "L" | "XL";

export interface Decomposition {
  items: DecomposedItem[];
  questions: ClarificationQuestion[];
  complexity: Complexity;
  alternatives: string;
}

function splitFiles(value: string | null): string[] {
  if (!value || isPlaceholder(value)) return [];
  return value
    .split(/[,\n]/)
    .map((f) => f.trim().replace(/^-+\s*/, "").replace(/^`|`$/g, "").trim())
    .filter((f) => f.length > 0 && f !== "-" && !f.startsWith("**"));
}

/**
 * Work Plan steps as items, sorted by step number. A missing or unknown
 * layer becomes GEN. Confidence is left at 0 for the scorer.
 */
export function extractItems(workPlan: string): DecomposedItem[] {
  return parseSteps(workPlan)
    .map((step): DecomposedItem => {
      const layer = (step.layer ?? "").toUpperCase();
      return {
        layer: isLayer(layer) ? layer : "GEN",
        title: step.title,
        description: step.description,
        acceptance: step.acceptance?.trim() ?? "",
        files: splitFiles(step.files),
        order: step.number,
        dependsOn: parseDependencies(step.dependsOn),
        confidence: 0,
        confidenceFlags: [],
      };
    })
    .sort((a, b) => a.order - b.order);
}

/**
 * `[DATA MISSING: x]` markers and bulleted questions from the concerns
 */
export function extractQuestions(concerns: string): ClarificationQuestion[] {
  const questions: ClarificationQuestion[] = [];

  for (const match of concerns.matchAll(/\[DATA MISSING:\s*([^\]]+)\]/gi)) {
    const item = (match[1] ?? "").trim();
    questions.push({ question: `What is ${item}?`, context: `Data marked as missing: ${item}` });
  }

  for (const match of concerns.matchAll(/^\s*[-*]\s+(.+\?)\s*$/gm)) {
    const question = (match[1] ?? "").trim();
    if (!questions.some((q) => q.question === question)) {
      questions.push({ question, context: "From concerns section" });
    }
  }
  return questions;
}

function toComplexity(value: string | undefined): Complexity | undefined {
  switch (value?.toUpperCase()) {
    case "S":
      return "S";
    case "M":
      return "M";
    case "L":
      return "L";
    case "XL":
      return "XL";
    default:
      return undefined;
  }
}

/**
 * S/M/L/XL estimate from the analysis, M when none is given
 */
export function extractComplexity(analysis: string): Complexity {
  const labelled = /complexity[:\s]*(?:\*\*)?`?(XL|S|M|L)\b`?/i.exec(analysis);
  const bracketed = /\((XL|S|M|L)\)/i.exec(analysis);
  return toComplexity(labelled?.[1]) ?? toComplexity(bracketed?.[1]) ?? "M";
}

const ALTERNATIVE_PATTERNS = [
  /alternatives?[:\s]*(.+?)(?=\n\n|$)/is,
  /options?\s+considered[:\s]*(.+?)(?=\n\n|$)/is,
  /(?:other|discarded)\s+approach(?:es)?[:\s]*(.+?)(?=\n\n|$)/is,
];

/**
 * Alternatives the analysis mentions, "" when none
 */
export function extractAlternatives(analysis: string): string {
  for (const pattern of ALTERNATIVE_PATTERNS) {
    const match = pattern.exec(analysis);
    if (match?.[1]) return match[1].trim();
  }
  return "";
}

export function decompose(sections: ResponseSections): Decomposition {
  return {
    items: extractItems(sections.workPlan),
    questions: extractQuestions(sections.concerns),
    complexity: extractComplexity(sections.analysis),
    alternatives: extractAlternatives(sections.analysis),
  };
}
