/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const VERSION =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

export const CONFIG_FILE = "protogate.json";

export const DEFAULT_OUTPUT_DIRECTORY = "generated";

export const EXIT_CODES = {
  ok: 0,
  config: 1,
  unknownCommand: 2,
  usage: 3,
  descriptor: 4,
  generation: 5,
} as const;
