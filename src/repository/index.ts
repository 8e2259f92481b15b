/**
 * Repository signals
 */

export type { RepositoryContext, RepositoryStatus } from "./types.js";
export { inspectRepository, formatRepositoryContext, buildTree, MAX_TREE_FILES } from "./inspect.js";
