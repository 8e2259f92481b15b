/**
 * Work Plan step parsing
 *
 * Grammar:
 *   - [ ] **Step N:** title
 *     - **Layer:** BE
 *     - **Files:** src/a.ts, src/b.ts
 *     - **Acceptance:** ...
 *     - **Depends on:** Step 1
 */

export const VALID_LAYERS = ["BE", "FE", "INFRA", "DB", "QA", "DOCS", "GEN"] as const;

export type Layer = (typeof VALID_LAYERS)[number];

export function isLayer(value: string): value is Layer {
  return VALID_LAYERS.some((layer) => layer === value);
}

/**
 * One step as written. A field is null when its line is absent and ""
 * when the line is present without a value.
 */
export interface RawStep {
  number: number;
  title: string;
  description: string;
  layer: string | null;
  files: string | null;
  acceptance: string | null;
  dependsOn: string | null;
}

type FieldName = "layer" | "files" | "acceptance" | "dependsOn";

const STEP_HEADER = /-\s*\[\s*\]\s*\*\*Step\s+(\d+):\*\*/gi;
const FIELD_LINE = /^\s*(?:[-*]\s*)?\*\*(Layer|Files|Acceptance|Depends on):\*\*\s*(.*)$/i;
const INLINE_LAYER = /\s*-\s*\*\*Layer.*$/i;

function fieldName(label: string): FieldName {
  switch (label.toLowerCase()) {
    case "layer":
      return "layer";
    case "files":
      return "files";
    case "acceptance":
      return "acceptance";
    default:
      return "dependsOn";
  }
}

function parseStepBlock(number: number, block: string): RawStep {
  const [firstLine = "", ...rest] = block.split("\n");
  const step: RawStep = {
    number,
    title: firstLine.replace(INLINE_LAYER, "").trim() || `Step ${number}`,
    description: "",
    layer: null,
    files: null,
    acceptance: null,
    dependsOn: null,
  };

  // Fields written on the title line
  const inline = /\*\*Layer:\*\*\s*\[?(\w+)\]?/i.exec(firstLine);
  if (inline?.[1]) step.layer = inline[1];

  const description: string[] = [];
  const values: Partial<Record<FieldName, string[]>> = {};
  let current: FieldName | null = null;

  for (const line of rest) {
    const field = FIELD_LINE.exec(line);
    if (field) {
      current = fieldName(field[1] ?? "");
      values[current] = [field[2]?.trim() ?? ""];
      continue;
    }
    if (line.trim() === "") {
      current = null;
      continue;
    }
    if (current) {
      values[current]?.push(line.trim().replace(/^[-*]\s+/, ""));
    } else {
      description.push(line.trim());
    }
  }

  step.description = description.join("\n");
  for (const name of ["layer", "files", "acceptance", "dependsOn"] as const) {
    const lines = values[name];
    if (lines) {
      step[name] = lines.filter((l) => l.length > 0).join("\n");
    }
  }
  if (step.layer !== null) {
    step.layer = /^\[?(\w+)\]?/.exec(step.layer)?.[1] ?? "";
  }
  return step;
}

/**
 * Split a Work Plan into steps in document order
 */
export function parseSteps(workPlan: string): RawStep[] {
  const headers = [...workPlan.matchAll(STEP_HEADER)];
  return headers.map((header, i) => {
    const start = (header.index ?? 0) + header[0].length;
    const end = headers[i + 1]?.index ?? workPlan.length;
    return parseStepBlock(Number(header[1]), workPlan.slice(start, end).trim());
  });
}

const NO_DEPENDENCIES = new Set(["none", "n/a", "-", ""]);

// "Step 1", "Steps 1 and 2", "Steps 1, 3 & 4"
const STEP_LIST = /\bsteps?\s*#?(\d+(?:\s*(?:,|&|\band\b)\s*#?\d+)*)/gi;
// "1, 2" or "#1 and #3" with nothing else
const BARE_LIST = /^\s*#?\d+(?:\s*(?:,|&|\band\b)\s*#?\d+)*\s*\.?\s*$/i;

/**
 * Step numbers referenced by a "Depends on" value, in order of first mention
 */
export function parseDependencies(value: string | null): number[] {
  if (value === null || NO_DEPENDENCIES.has(value.trim().toLowerCase())) {
    return [];
  }

  const lists = BARE_LIST.test(value)
    ? [value]
    : [...value.matchAll(STEP_LIST)].map((m) => m[1] ?? "");
  const numbers = lists.flatMap((list) => [...list.matchAll(/\d+/g)].map((m) => Number(m[0])));
  return [...new Set(numbers)];
}

const TITLE_STOPWORDS = new Set([
  "the",
  "a",
  "an",
  "and",
  "or",
  "for",
  "to",
  "in",
  "of",
  "with",
  "on",
  "is",
  "are",
]);

/**
 * Lowercased title words with stopwords removed
 */
export function significantWords(title: string): string[] {
  return (title.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []).filter(
    (w) => !TITLE_STOPWORDS.has(w),
  );
}
