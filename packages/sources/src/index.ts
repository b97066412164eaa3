/**
 * Signet Sources - route file names, globs, URLs and time ranges to a load plan
 */

export * from "./types.js";
export { createNodeEnvironment, createMemoryEnvironment } from "./environment.js";
export { parseTime, dayDirectories } from "./time.js";
export {
  type SourceRouter,
  createSourceRouter,
  planSource,
} from "./router.js";
