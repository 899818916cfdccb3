/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, EXIT_CODES, showHelp, parseArgs, runCli } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export { parsePluginParameter } from "./parameter.js";
export { generateCommand, generateFiles } from "./commands/generate.js";
export { pluginCommand, type PluginResponse } from "./commands/plugin.js";
