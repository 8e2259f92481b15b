/**
 * Source repository signals
 */

export type RepositoryStatus = "EXISTS" | "NOT_FOUND" | "NEW_PROJECT";

export interface RepositoryContext {
  status: RepositoryStatus;
  /** Checkout path as given, null when none was supplied */
  path: string | null;
  branch: string | null;
  /** Indented listing of tracked files, capped for the prompt */
  tree: string;
  /** Every tracked path, uncapped */
  files: string[];
  fileCount: number;
  keyDirectories: string[];
  recentCommits: string[];
  errors: string[];
}
