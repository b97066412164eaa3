/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
Signet - route data sources through conditional dispatch v${VERSION}

USAGE:
  signet <command> [options]

COMMANDS:
  resolve <input...>        Resolve files, directories, globs or URLs
  range <start> <end>       Resolve archive directories for a time range

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Print dispatch decisions to stderr
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: signet.json)

RESOLVE/RANGE OPTIONS:
  -i, --instrument <name>   Instrument for range queries
  -b, --base-url <url>      Archive base URL
  --sort <name|none>        Order of explicit file lists
  --named <key=value>       Pass a named argument (repeatable)

EXAMPLES:
  signet resolve data/
  signet resolve 'data/*.fit'
  signet resolve b.fit a.fit --sort none
  signet resolve --named pattern='data/BIR_*.fit'
  signet range 2011-09-22T10:00 2011-09-22T12:00 -i BIR
`);
};
