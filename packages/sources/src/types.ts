/**
 * Type definitions for source planning
 */

import type { DispatchTraceEvent } from "@signet/dispatch";

/** A single file designated directly or by a glob matching exactly one file */
export type FilePlan = {
  readonly kind: "file";
  readonly path: string;
};

/** Several files, in load order */
export type FilesPlan = {
  readonly kind: "files";
  readonly origin: "directory" | "glob" | "list";
  readonly paths: readonly string[];
};

export type UrlPlan = {
  readonly kind: "url";
  readonly url: string;
};

/** One archive directory per UTC day, with the file prefix to look for */
export type DayDirectory = {
  readonly url: string;
  readonly prefix: string;
};

export type RangePlan = {
  readonly kind: "range";
  readonly instrument: string;
  readonly start: string; // ISO 8601, UTC
  readonly end: string; // ISO 8601, UTC
  readonly directories: readonly DayDirectory[];
};

export type SourcePlan = FilePlan | FilesPlan | UrlPlan | RangePlan;

export type SortOrder = "name" | "none";

export type SourceOptions = {
  /** Archive root used for time ranges */
  readonly baseUrl: string;
  /** Order applied to explicit file lists */
  readonly sortBy: SortOrder;
  readonly trace?: (event: DispatchTraceEvent) => void;
};

/**
 * File-system and glob access used by the source conditions.
 * Paths are returned in the form they were requested.
 */
export type SourceEnvironment = {
  readonly isFile: (path: string) => boolean;
  readonly isDirectory: (path: string) => boolean;
  /** Names of the entries directly inside a directory */
  readonly listDirectory: (path: string) => readonly string[];
  /** Files matching a glob pattern, sorted */
  readonly expandGlob: (pattern: string) => readonly string[];
};
