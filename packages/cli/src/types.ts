/**
 * Type definitions for CLI
 */

import type { SortOrder } from "@signet/sources";

/**
 * Signet configuration file (signet.json)
 */
export type SignetConfig = {
  readonly baseUrl?: string; // Archive root for time ranges
  readonly instrument?: string; // Default instrument for `range`
  readonly sortBy?: SortOrder;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  instrument?: string;
  baseUrl?: string;
  sort?: string;
  named?: string[]; // Raw key=value pairs, validated by the dispatcher
};

/**
 * Resolved configuration after merging CLI options over signet.json
 */
export type ResolvedConfig = {
  readonly baseUrl: string;
  readonly instrument: string | undefined;
  readonly sortBy: SortOrder;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
