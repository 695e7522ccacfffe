/**
 * Pipeline modules export
 */

export { scan, scanDirectory } from "./scanner";
export { dispatch, decideConversion } from "./dispatcher";
export { run, loadRegistry } from "./runner";
export type { RunStage } from "./runner";
export { stats } from "./stats";
