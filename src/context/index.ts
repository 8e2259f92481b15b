/**
 * Context aggregation and snapshot
 */

export type { AggregatedContext } from "./types.js";
export {
  buildContext,
  renderContext,
  renderMaturityBanner,
  renderTemplateCompliance,
  type ContextInput,
} from "./aggregator.js";
export { saveSnapshot, loadSnapshot, parseSnapshot, snapshotPath, SNAPSHOT_VERSION } from "./store.js";
