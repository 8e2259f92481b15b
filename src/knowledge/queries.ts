/**
 * Document store query builders and tool names
 */

export const TOOLS = {
  getIssue: "jira_get_issue",
  getComments: "jira_get_comments",
  searchPages: "confluence_search_pages",
  getPage: "confluence_get_page",
  addComment: "jira_add_comment",
  transitionIssue: "jira_transition_issue",
} as const;

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function exactTitleQuery(space: string, title: string): string {
  return `space = ${quote(space)} AND title = ${quote(title)}`;
}

export function fuzzyTitleQuery(space: string, title: string): string {
  return `space = ${quote(space)} AND title ~ ${quote(title)}`;
}

export function templateQuery(space: string, role: string): string {
  return `space = ${quote(space)} AND title ~ ${quote(`${role} Template`)}`;
}

export function ancestorTitleQuery(containerId: string, keyword: string): string {
  return `ancestor = ${containerId} AND title ~ ${quote(keyword)}`;
}

export function discoveryQuery(containerId: string, keywords: readonly string[]): string {
  return `ancestor = ${containerId} AND (text ~ ${quote(keywords.join(" OR "))})`;
}
