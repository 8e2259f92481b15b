/**
 * Five-section response parsing
 */

export interface ResponseSections {
  understanding: string;
  concerns: string;
  analysis: string;
  workPlan: string;
  definitionOfReady: string;
}

export type SectionName = keyof ResponseSections;

const SECTION_PATTERNS: Record<SectionName, RegExp> = {
  understanding: /###?\s*1\.\s*Understanding.*?\n(.*?)(?=###?\s*2\.|$)/is,
  concerns: /###?\s*2\.\s*Concerns.*?\n(.*?)(?=###?\s*3\.|$)/is,
  analysis: /###?\s*3\.\s*Analysis.*?\n(.*?)(?=###?\s*4\.|$)/is,
  workPlan: /###?\s*4\.\s*Work Plan.*?\n(.*?)(?=###?\s*5\.|$)/is,
  definitionOfReady: /###?\s*5\.\s*Definition of Ready.*?\n(.*)$/is,
};

const WORK_PLAN_BLOCK = /(###?\s*4\.\s*Work Plan.*?\n)(.*?)(?=###?\s*5\.|$)/is;
const READY_HEADER = /###?\s*5\.\s*Definition of Ready/i;

/**
 * Extract the five numbered sections. A missing section is "".
 */
export function parseResponseSections(text: string): ResponseSections {
  const read = (name: SectionName): string => SECTION_PATTERNS[name].exec(text)?.[1]?.trim() ?? "";
  return {
    understanding: read("understanding"),
    concerns: read("concerns"),
    analysis: read("analysis"),
    workPlan: read("workPlan"),
    definitionOfReady: read("definitionOfReady"),
  };
}

/**
 * Substitute the Work Plan body, leaving every other byte of the response
 * as it was. Without a Work Plan heading the section is inserted before
 * Definition of Ready, or appended.
 */
export function replaceWorkPlan(text: string, workPlan: string): string {
  const body = `\n${workPlan.trim()}\n\n`;
  if (WORK_PLAN_BLOCK.test(text)) {
    return text.replace(WORK_PLAN_BLOCK, (_match, header: string) => `${header}${body}`);
  }

  const section = `### 4. Work Plan\n${body}`;
  const ready = READY_HEADER.exec(text);
  if (ready) {
    return `${text.slice(0, ready.index)}${section}${text.slice(ready.index)}`;
  }
  return `${text.trimEnd()}\n\n${section}`;
}

/**
 * Pull a bare Work Plan out of a repair reply. Accepts either a reply that
 * repeats the heading or the steps alone.
 */
export function extractRepairedPlan(reply: string): string {
  const fenced = /^```(?:markdown|md)?\s*\n([\s\S]*?)\n```\s*$/i.exec(reply.trim());
  const text = fenced?.[1] ?? reply;
  const section = SECTION_PATTERNS.workPlan.exec(text)?.[1];
  return (section ?? text).trim();
}
