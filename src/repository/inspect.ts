/**
 * Local repository inspection with simple-git
 */

import { simpleGit, type SimpleGit } from "simple-git";
import type { Logger, ILogObj } from "tslog";
import type { RepositoryContext } from "./types.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export const MAX_TREE_FILES = 300;
const RECENT_COMMITS = 5;

export interface InspectOptions {
  maxFiles?: number;
  logger?: Logger<ILogObj>;
}

function emptyContext(status: RepositoryContext["status"], path: string | null): RepositoryContext {
  return {
    status,
    path,
    branch: null,
    tree: "",
    files: [],
    fileCount: 0,
    keyDirectories: [],
    recentCommits: [],
    errors: [],
  };
}

/**
 * Render file paths as an indented tree, directories first seen first
 */
export function buildTree(files: readonly string[], maxFiles: number = MAX_TREE_FILES): string {
  const lines: string[] = [];
  const seen = new Set<string>();

  for (const file of files.slice(0, maxFiles)) {
    const parts = file.split("/");
    for (let depth = 0; depth < parts.length - 1; depth++) {
      const dir = parts.slice(0, depth + 1).join("/");
      if (!seen.has(dir)) {
        seen.add(dir);
        lines.push(`${"  ".repeat(depth)}${parts[depth]}/`);
      }
    }
    lines.push(`${"  ".repeat(parts.length - 1)}${parts[parts.length - 1]}`);
  }

  if (files.length > maxFiles) {
    lines.push(`... (${files.length - maxFiles} more files)`);
  }
  return lines.join("\n");
}

function topLevelDirectories(files: readonly string[]): string[] {
  const dirs = new Set<string>();
  for (const file of files) {
    const slash = file.indexOf("/");
    if (slash > 0) dirs.add(`${file.slice(0, slash)}/`);
  }
  return [...dirs];
}

/**
 * Inspect a local checkout. Never throws: a missing path is NOT_FOUND and
 * partial failures are listed in `errors`.
 */
export async function inspectRepository(
  repoPath: string | undefined,
  options: InspectOptions = {},
): Promise<RepositoryContext> {
  const logger = options.logger ?? getLogger();
  if (!repoPath) {
    return emptyContext("NEW_PROJECT", null);
  }

  let git: SimpleGit;
  try {
    git = simpleGit({ baseDir: repoPath });
    if (!(await git.checkIsRepo())) {
      logger.warn(`Not a git repository: ${repoPath}`);
      return emptyContext("NOT_FOUND", repoPath);
    }
  } catch (error) {
    logger.warn(`Cannot open repository ${repoPath}: ${errorMessage(error)}`);
    return { ...emptyContext("NOT_FOUND", repoPath), errors: [errorMessage(error)] };
  }

  const context = emptyContext("EXISTS", repoPath);

  try {
    const files = (await git.raw(["ls-files"]))
      .split("\n")
      .map((f) => f.trim())
      .filter((f) => f.length > 0);
    context.files = files;
    context.fileCount = files.length;
    context.tree = buildTree(files, options.maxFiles ?? MAX_TREE_FILES);
    context.keyDirectories = topLevelDirectories(files);
  } catch (error) {
    context.errors.push(`Could not list files: ${errorMessage(error)}`);
  }

  try {
    context.branch = (await git.revparse(["--abbrev-ref", "HEAD"])).trim();
  } catch (error) {
    context.errors.push(`Could not read the current branch: ${errorMessage(error)}`);
  }

  try {
    const log = await git.log({ maxCount: RECENT_COMMITS });
    context.recentCommits = log.all.map((c) => c.message);
  } catch (error) {
    context.errors.push(`Could not read recent commits: ${errorMessage(error)}`);
  }

  for (const problem of context.errors) {
    logger.warn(problem);
  }
  logger.info({ event: "repository_inspected", path: repoPath, files: context.fileCount });
  return context;
}

/**
 * Render repository signals as markdown
 */
export function formatRepositoryContext(repo: RepositoryContext): string {
  if (repo.status === "NEW_PROJECT") {
    return "**Repository:** New project - repository to be created";
  }
  if (repo.status === "NOT_FOUND") {
    return `**Repository:** Not found or not a git repository (${repo.path ?? "unknown"})`;
  }

  const lines = [`**Repository:** ${repo.path ?? ""}`];
  if (repo.branch) lines.push(`**Branch:** ${repo.branch}`);
  lines.push(`**Tracked Files:** ${repo.fileCount}`);
  if (repo.keyDirectories.length > 0) {
    lines.push(`**Key Directories:** ${repo.keyDirectories.join(", ")}`);
  }
  lines.push("");

  if (repo.tree) {
    lines.push("### Repository Structure", "", "```", repo.tree, "```", "");
  }

  if (repo.recentCommits.length > 0) {
    lines.push("### Recent Commits", "");
    for (const commit of repo.recentCommits) lines.push(`- ${commit}`);
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}
