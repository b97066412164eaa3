/**
 * CLI command dispatcher
 */

import { resolve } from "node:path";
import type { DispatchTraceEvent, Result } from "@signet/dispatch";
import {
  createNodeEnvironment,
  createSourceRouter,
  type SourceEnvironment,
  type SourcePlan,
} from "@signet/sources";
import { loadConfig, findConfig, resolveConfig, isSortOrder } from "../config.js";
import { resolveCommand } from "../commands/resolve.js";
import { rangeCommand } from "../commands/range.js";
import type { SignetConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const formatTraceEvent = (event: DispatchTraceEvent): string =>
  `[${event.dispatch}] ${event.outcome}: ${event.handler} (${event.kind} #${event.index})`;

const report = (result: Result<SourcePlan, string>, quiet: boolean): number => {
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return 1;
  }
  if (!quiet) {
    console.log(JSON.stringify(result.value, null, 2));
  }
  return 0;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  env: SourceEnvironment = createNodeEnvironment()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`signet v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.command !== "resolve" && parsed.command !== "range") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'signet --help' for usage information");
    return 1;
  }

  if (parsed.options.sort !== undefined && !isSortOrder(parsed.options.sort)) {
    console.error(
      `Error: Invalid --sort value '${parsed.options.sort}': expected name or none`
    );
    return 1;
  }

  // Load config; signet.json is optional unless named with --config
  const configPath = parsed.options.config
    ? resolve(process.cwd(), parsed.options.config)
    : findConfig(process.cwd());

  let fileConfig: SignetConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return 1;
    }
    fileConfig = configResult.value;
  }

  const config = resolveConfig(fileConfig, parsed.options);

  const router = createSourceRouter(
    {
      baseUrl: config.baseUrl,
      sortBy: config.sortBy,
      trace: config.verbose
        ? (event) => console.error(formatTraceEvent(event))
        : undefined,
    },
    env
  );

  const result =
    parsed.command === "resolve"
      ? resolveCommand(router, parsed.inputs, parsed.options.named)
      : rangeCommand(router, parsed.inputs, config.instrument);

  return report(result, config.quiet);
};
