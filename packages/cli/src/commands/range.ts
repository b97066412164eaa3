/**
 * range command - archive directories for an instrument and time span
 */

import { error, type Result } from "@signet/dispatch";
import {
  planSource,
  type SourcePlan,
  type SourceRouter,
} from "@signet/sources";

export const rangeCommand = (
  router: SourceRouter,
  inputs: readonly string[],
  instrument: string | undefined
): Result<SourcePlan, string> => {
  const [start, end, ...rest] = inputs;
  if (start === undefined || end === undefined || rest.length > 0) {
    return error("range requires <start> <end>");
  }
  if (!instrument) {
    return error("range requires an instrument (--instrument or signet.json)");
  }

  return planSource(router, [instrument, start, end]);
};
