/**
 * Builders for upstream replies and model responses used across tests
 */

import type { KnowledgeContext, TicketContext } from "../../src/knowledge/types.js";

export interface TicketFixture {
  key: string;
  summary: string;
  description?: string;
  type?: string;
  status?: string;
  projectName?: string;
  labels?: string[];
  projectFolder?: string;
  projectLink?: string;
}

/**
 * A `jira_get_issue` reply
 */
export function ticketReply(t: TicketFixture): string {
  const projectKey = t.key.split("-")[0] ?? t.key;
  return `# ${t.key}: ${t.summary}

**Type:** ${t.type ?? "Story"}
**Status:** ${t.status ?? "To Do"}
**Project:** ${t.projectName ?? "Demo Project"} (${projectKey})
**Assignee:** Unassigned
**Labels:** ${t.labels?.length ? t.labels.join(", ") : "None"}
**Project Folder:** ${t.projectFolder ?? "None"}
**Project Link:** ${t.projectLink ?? "None"}

## Description

${t.description ?? "[No description]"}

## Metadata

- Created: 2024-03-01T09:00:00.000+0000
- Updated: 2024-03-02T09:00:00.000+0000
- Parent: None
- Subtasks: None
`;
}

export function commentsReply(key: string, comments: Array<{ author: string; body: string }>): string {
  const lines = [`Comments for ${key}:\n`];
  comments.forEach((c, i) => {
    lines.push(`\n### ${c.author} - 2024-03-0${i + 1}T10:00:00.000+0000\n\n${c.body}\n`);
  });
  return lines.join("\n");
}

export interface PageFixture {
  id: string;
  title: string;
  space?: string;
}

export function pageUrl(page: PageFixture): string {
  return `https://wiki.example.com/spaces/${page.space ?? "DEMO"}/pages/${page.id}/${page.title.replace(/\s+/g, "+")}`;
}

/**
 * A `confluence_search_pages` reply
 */
export function searchReply(pages: PageFixture[]): string {
  const lines = [`Found ${pages.length} pages:\n`];
  for (const page of pages) {
    lines.push(
      `- **${page.title}** (${page.space ?? "DEMO"}) - [View](${pageUrl(page)})\n` +
        `  Version: 1, Labels: `,
    );
  }
  return lines.join("\n");
}

/**
 * A `confluence_get_page` reply
 */
export function pageReply(title: string, content: string): string {
  return `# ${title}

**Space:** Demo (DEMO)
**Version:** 1
**URL:** https://wiki.example.com/x
**Labels:** 

## Content (Cleaned Markdown)

${content}
`;
}

export interface StepFixture {
  n: number;
  title: string;
  layer?: string | null;
  files?: string | null;
  acceptance?: string | null;
  dependsOn?: string | null;
}

/**
 * One work plan step in the generator's grammar. A null field is omitted.
 */
export function step(s: StepFixture): string {
  const lines = [`- [ ] **Step ${s.n}:** ${s.title}`];
  if (s.layer !== null) lines.push(`  - **Layer:** ${s.layer ?? "BE"}`);
  if (s.files !== null) lines.push(`  - **Files:** ${s.files ?? `src/step${s.n}.ts`}`);
  if (s.acceptance !== null) {
    lines.push(`  - **Acceptance:** ${s.acceptance ?? `Unit test for step ${s.n} passes`}`);
  }
  if (s.dependsOn !== null) lines.push(`  - **Depends on:** ${s.dependsOn ?? "None"}`);
  return lines.join("\n");
}

export function plan(...steps: StepFixture[]): string {
  return steps.map(step).join("\n");
}

/**
 * A full five-section model response
 */
export function modelResponse(workPlan: string, overrides: { understanding?: string } = {}): string {
  return `### 1. Understanding

${overrides.understanding ?? "Add a checkout endpoint."}

### 2. Concerns & Uncertainties

- Which payment provider is used?

### 3. Analysis

Estimated complexity: \`M\`

### 4. Work Plan

${workPlan}

### 5. Definition of Ready

- [x] **Clear Goal:** yes
`;
}

/**
 * A parsed ticket with empty optional fields
 */
export function ticketContext(overrides: Partial<TicketContext> = {}): TicketContext {
  return {
    key: "PROJ-1",
    summary: "Add checkout endpoint",
    description: "",
    type: "Story",
    status: "To Do",
    projectKey: "PROJ",
    projectName: "Demo Project",
    assignee: null,
    labels: [],
    parent: null,
    subtasks: [],
    created: null,
    updated: null,
    comments: [],
    projectFolder: "",
    projectLink: "",
    ...overrides,
  };
}

/**
 * Retrieval output for a project with nothing documented yet
 */
export function knowledgeContext(overrides: Partial<KnowledgeContext> = {}): KnowledgeContext {
  return {
    space: "PROJ",
    containerId: null,
    maturity: "BRAND_NEW",
    mandatory: [],
    discovered: [],
    missing: ["Project Passport", "Logical Architecture"],
    selectionLog: null,
    templates: [],
    errors: [],
    ...overrides,
  };
}
