/**
 * Source router - maps loose user input to a load plan
 *
 * Each accepted input form is a handler on a ConditionalDispatch. The
 * handler's parameter name is part of its signature, so callers may pick
 * a form by name (`{ pattern: "*.fit" }`) or let the conditions decide
 * from a positional value.
 */

import { join } from "node:path";
import {
  ConditionalDispatch,
  capability,
  mapError,
  type NamedArguments,
  type Result,
} from "@signet/dispatch";
import { createNodeEnvironment } from "./environment.js";
import { dayDirectories, parseTime } from "./time.js";
import type {
  SourceEnvironment,
  SourceOptions,
  SourcePlan,
} from "./types.js";

export type SourceRouter = ConditionalDispatch<SourcePlan>;

const URL_PROTOCOLS = new Set(["http:", "https:", "ftp:", "file:"]);

const protocolOf = (value: string): string | undefined => {
  try {
    return new URL(value).protocol;
  } catch {
    return undefined;
  }
};

const urlLike = capability(
  "url",
  (value) =>
    typeof value === "string" &&
    URL_PROTOCOLS.has(protocolOf(value) ?? "")
);

const stringList = capability(
  "string[]",
  (value) =>
    Array.isArray(value) && value.every((item) => typeof item === "string")
);

const timeLike = capability("time", (value) => parseTime(value) !== undefined);

const requireTime = (value: unknown): Date => {
  const time = parseTime(value);
  if (time === undefined) {
    throw new TypeError(`Not a time: ${String(value)}`);
  }
  return time;
};

const isPattern = (value: string): boolean => value.includes("*");

/**
 * Build the router. Conditions query `env`, so a memory environment gives
 * a dry run over a fixed file list.
 */
export const createSourceRouter = (
  options: SourceOptions,
  env: SourceEnvironment = createNodeEnvironment()
): SourceRouter => {
  const router = new ConditionalDispatch<SourcePlan>({
    name: "sources",
    trace: options.trace,
  });

  const order = (paths: readonly string[]): string[] =>
    options.sortBy === "name" ? [...paths].sort() : [...paths];

  function fromFile(filename: string): SourcePlan {
    return { kind: "file", path: filename };
  }

  function fromDirectory(directory: string): SourcePlan {
    const paths = env
      .listDirectory(directory)
      .map((name) => join(directory, name))
      .filter((path) => env.isFile(path))
      .sort();
    return { kind: "files", origin: "directory", paths };
  }

  function fromSingleGlob(singlepattern: string): SourcePlan {
    const [path = singlepattern] = env.expandGlob(singlepattern);
    return { kind: "file", path };
  }

  function fromGlob(pattern: string): SourcePlan {
    return { kind: "files", origin: "glob", paths: env.expandGlob(pattern) };
  }

  function fromRange(
    instrument: string,
    start: unknown,
    end: unknown
  ): SourcePlan {
    const from = requireTime(start);
    const to = requireTime(end);
    return {
      kind: "range",
      instrument,
      start: from.toISOString(),
      end: to.toISOString(),
      directories: dayDirectories(options.baseUrl, instrument, from, to),
    };
  }

  function fromFiles(filenames: readonly string[]): SourcePlan {
    return { kind: "files", origin: "list", paths: order(filenames) };
  }

  function fromUrl(url: string): SourcePlan {
    return { kind: "url", url };
  }

  router.register(
    fromFile,
    (filename: string) => env.isFile(filename),
    [String]
  );
  router.register(
    fromDirectory,
    (directory: string) => env.isDirectory(directory),
    [String]
  );
  router.register(
    fromSingleGlob,
    (singlepattern: string) =>
      isPattern(singlepattern) && env.expandGlob(singlepattern).length === 1,
    [String]
  );
  router.register(
    fromGlob,
    (pattern: string) =>
      isPattern(pattern) && env.expandGlob(pattern).length > 0,
    [String]
  );
  router.register(
    fromRange,
    (instrument: string, start: unknown, end: unknown) =>
      (parseTime(start)?.getTime() ?? Number.NaN) <=
      (parseTime(end)?.getTime() ?? Number.NaN),
    [String, timeLike, timeLike]
  );
  router.register(fromFiles, undefined, [stringList]);
  router.register(fromUrl, undefined, [urlLike]);

  return router;
};

/**
 * Plan a load, reporting unroutable input as an error message.
 * Errors thrown by the environment propagate.
 */
export const planSource = (
  router: SourceRouter,
  args: readonly unknown[],
  named: NamedArguments = {}
): Result<SourcePlan, string> =>
  mapError(router.tryInvoke(args, named), (failure) => failure.message);
