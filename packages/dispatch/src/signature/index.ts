/**
 * Signature - Public API
 */

export * from "./types.js";
export { evaluateLiteral } from "./literals.js";
export {
  introspect,
  declareSignature,
  bindReceiver,
  callableName,
} from "./introspect.js";
export { bindArguments, spreadArguments } from "./bind.js";
export { matchesSignature } from "./match.js";
