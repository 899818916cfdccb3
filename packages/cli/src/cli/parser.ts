/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly descriptorFile?: string;
  readonly options: CliOptions;
  /** Set when the arguments cannot be used as given */
  readonly usageError?: string;
};

type StringOption =
  | "config"
  | "out"
  | "paths"
  | "module"
  | "registerFuncSuffix"
  | "importPrefix";

const VALUE_OPTIONS: ReadonlyMap<string, StringOption> = new Map<
  string,
  StringOption
>([
  ["-c", "config"],
  ["--config", "config"],
  ["-o", "out"],
  ["--out", "out"],
  ["--paths", "paths"],
  ["--module", "module"],
  ["--register-func-suffix", "registerFuncSuffix"],
  ["--import-prefix", "importPrefix"],
]);

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let descriptorFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command (descriptor file)
    if (command && !arg.startsWith("-")) {
      if (descriptorFile !== undefined) {
        return { command, options, usageError: `Unexpected argument: ${arg}` };
      }
      descriptorFile = arg;
      continue;
    }

    const valueKey = VALUE_OPTIONS.get(arg);
    if (valueKey !== undefined) {
      const value = args[++i];
      if (value === undefined) {
        return { command, options, usageError: `Option ${arg} requires a value` };
      }
      options[valueKey] = value;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "--standalone":
        options.standalone = true;
        break;
      case "--no-request-context":
        options.noRequestContext = true;
        break;
      case "--no-patch-feature":
        options.noPatchFeature = true;
        break;
      case "--omit-package-doc":
        options.omitPackageDoc = true;
        break;
      default:
        return { command, options, usageError: `Unknown option: ${arg}` };
    }
  }

  return { command, descriptorFile, options };
};
