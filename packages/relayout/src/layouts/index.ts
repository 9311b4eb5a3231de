/**
 * Layout inference and cost queries
 */

export type { LayoutOracle } from "./oracle.js";
export { Target } from "./oracle.js";
export { DefaultLayoutOracle } from "./default-oracle.js";
