/**
 * resolve command - route inputs to a source plan
 */

import {
  error,
  flatMap,
  ok,
  type NamedArguments,
  type Result,
} from "@signet/dispatch";
import {
  planSource,
  type SourcePlan,
  type SourceRouter,
} from "@signet/sources";

/**
 * Turn `key=value` pairs into named arguments
 */
export const parseNamedPairs = (
  pairs: readonly string[]
): Result<NamedArguments, string> => {
  const named: Record<string, unknown> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      return error(`Invalid --named value '${pair}': expected key=value`);
    }
    named[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return ok(named);
};

/**
 * One input is routed as is; several are routed as a file list
 */
export const resolveCommand = (
  router: SourceRouter,
  inputs: readonly string[],
  namedPairs: readonly string[] = []
): Result<SourcePlan, string> =>
  flatMap(parseNamedPairs(namedPairs), (named): Result<SourcePlan, string> => {
    if (inputs.length === 0 && Object.keys(named).length === 0) {
      return error("resolve requires at least one input");
    }
    const args = inputs.length > 1 ? [inputs] : inputs;
    return planSource(router, args, named);
  });
