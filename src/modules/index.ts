/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { map } from "./mapper";
export { rewrite } from "./rewriter";
export { clean } from "./cleaner";
export { stats } from "./stats";
