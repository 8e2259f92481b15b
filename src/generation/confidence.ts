/**
 * Heuristic confidence for decomposed items
 *
 * Additive signals, no model call:
 *   files listed                  +0.2
 *   specific acceptance           +0.2
 *   layer other than GEN          +0.1
 *   files found in the repo tree  +0.2 (+0.1 without repository signals)
 *   documentation in context      +0.15
 *   specific title                +0.15 (+0.08 for 4-5 words)
 */

import type { DecomposedItem } from "./decomposition.js";
import { findVaguePattern } from "./validator.js";
import { significantWords } from "./steps.js";
import type { AggregatedContext } from "../context/types.js";
import type { RepositoryContext } from "../repository/types.js";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

export interface ItemScore {
  score: number;
  flags: string[];
}

export interface ConfidenceSummary {
  /** Mean item score, 0 for no items */
  overall: number;
  /** Orders of items below the threshold */
  flagged: number[];
  threshold: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function basename(file: string): string {
  const trimmed = file.trim();
  return trimmed.split("/").pop() ?? trimmed;
}

/**
 * Match by path suffix or file name. Snapshots written before the full
 * file list was kept only have the rendered tree to search.
 */
function inRepository(file: string, repository: RepositoryContext): boolean {
  const name = basename(file);
  if (name.length === 0) return false;
  if (repository.files.length > 0) {
    const wanted = file.trim().replace(/^\.?\//, "");
    return repository.files.some(
      (p) => p === wanted || p.endsWith(`/${wanted}`) || basename(p) === name,
    );
  }
  return repository.tree.includes(name);
}

export function scoreItem(item: DecomposedItem, context: AggregatedContext | null): ItemScore {
  let score = 0;
  const flags: string[] = [];

  const files = item.files.filter((f) => f.trim().length > 0);
  if (files.length > 0) {
    score += 0.2;
  } else {
    flags.push("No files specified");
  }

  const acceptance = item.acceptance.trim();
  if (!acceptance) {
    flags.push("No acceptance criteria");
  } else if (findVaguePattern(acceptance)) {
    flags.push("Vague acceptance criteria");
  } else {
    score += 0.2;
  }

  if (item.layer !== "GEN") {
    score += 0.1;
  } else {
    flags.push("Generic layer (GEN)");
  }

  const repository = context?.repository;
  if (repository?.status === "EXISTS") {
    if (files.length > 0 && (repository.files.length > 0 || repository.tree)) {
      if (files.some((f) => inRepository(f, repository))) {
        score += 0.2;
      } else {
        flags.push("Files not found in repository tree");
      }
    } else {
      flags.push("Cannot verify files against repository");
    }
  } else {
    score += 0.1;
    flags.push("No repository context available (partial credit)");
  }

  const documents = context ? context.knowledge.mandatory.length + context.knowledge.discovered.length : 0;
  if (documents > 0) {
    score += 0.15;
  } else {
    flags.push("No documentation available");
  }

  const words = significantWords(item.title).length;
  if (words > 5) {
    score += 0.15;
  } else if (words > 3) {
    score += 0.08;
    flags.push("Title could be more specific");
  } else {
    flags.push("Title is too generic");
  }

  return { score: Math.min(1, Math.max(0, round2(score))), flags };
}

/**
 * Items with `confidence` and `confidenceFlags` filled in
 */
export function scoreItems(
  items: readonly DecomposedItem[],
  context: AggregatedContext | null,
): DecomposedItem[] {
  return items.map((item) => {
    const { score, flags } = scoreItem(item, context);
    return { ...item, confidence: score, confidenceFlags: flags };
  });
}

export function summarizeConfidence(
  items: readonly DecomposedItem[],
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD,
): ConfidenceSummary {
  const overall =
    items.length === 0 ? 0 : round2(items.reduce((sum, i) => sum + i.confidence, 0) / items.length);
  return {
    overall,
    flagged: items.filter((i) => i.confidence < threshold).map((i) => i.order),
    threshold,
  };
}
