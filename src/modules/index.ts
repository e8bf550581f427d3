/**
 * Batch modules export
 */

export { scan } from "./scanner";
export { convert } from "./converter";
export { cleanup } from "./cleanup";
export { stats } from "./stats";
