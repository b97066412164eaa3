/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

/**
 * Parse CLI arguments
 */
export const parseArgs = (
  args: string[]
): {
  command: string;
  inputs: string[];
  options: CliOptions;
} => {
  const options: CliOptions = {};
  let command = "";
  const inputs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positional inputs after command
    if (command && !arg.startsWith("-")) {
      inputs.push(arg);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", inputs: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", inputs: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-i":
      case "--instrument":
        options.instrument = args[++i] ?? "";
        break;
      case "-b":
      case "--base-url":
        options.baseUrl = args[++i] ?? "";
        break;
      case "--sort":
        options.sort = args[++i] ?? "";
        break;
      case "--named":
        {
          const pair = args[++i] ?? "";
          options.named = options.named || [];
          options.named.push(pair);
        }
        break;
    }
  }

  return { command, inputs, options };
};
