/**
 * Rerank prompts
 */

import type { SearchCandidate } from "./types.js";

export const RERANK_SYSTEM_PROMPT = `You are a technical lead selecting documentation for a development task.

## Your Role
Select ONLY documents that provide implementation details, API contracts, architectural constraints, or integration requirements directly relevant to the task.

## Selection Criteria
- SELECT: API specs, integration guides, architecture decisions, contract definitions
- REJECT: General overviews, meeting notes, status updates, unrelated modules

## Output Format
Return a JSON object with the selected page ids:
{
  "selected_ids": ["page_id_1", "page_id_2"]
}

If no documents are relevant, return: {"selected_ids": []}`;

export function buildRerankPrompt(
  summary: string,
  description: string,
  candidates: readonly SearchCandidate[],
  excerptLength: number,
): string {
  const candidateLines = candidates.map((c) => {
    const excerpt = c.excerpt.slice(0, excerptLength).replace(/\n/g, " ").trim();
    return `- ID: \`${c.id}\` | Title: ${c.title}\n  Excerpt: ${excerpt || "[No excerpt]"}`;
  });

  return `## Task

**Summary:** ${summary}

**Description:**
${description || "[No description]"}

---

## Candidates (${candidates.length} pages)

${candidateLines.join("\n")}

---

Select relevant page ids. Return JSON only.`;
}
