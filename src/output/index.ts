/**
 * Run artifacts
 */

export {
  writeOutputs,
  formatPlan,
  formatPrompt,
  formatResponse,
  ticketDir,
} from "./writer.js";
export type { PlanReport, RunArtifacts, WriteOptions, WrittenOutputs } from "./writer.js";
