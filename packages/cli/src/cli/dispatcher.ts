/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { pluginCommand, readStream } from "../commands/plugin.js";
import { EXIT_CODES, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";
import type { ProtogateConfig } from "../types.js";

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.usageError !== undefined) {
    console.error(`Error: ${parsed.usageError}`);
    console.error("Run 'protogate --help' for usage");
    return EXIT_CODES.usage;
  }

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`protogate v${VERSION}`);
    return EXIT_CODES.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.ok;
  }

  switch (parsed.command) {
    case "generate": {
      if (!parsed.descriptorFile) {
        console.error("Error: Descriptor file required");
        console.error("Usage: protogate generate <descriptor.json> [options]");
        return EXIT_CODES.usage;
      }

      const cwd = process.cwd();
      const configPath = parsed.options.config
        ? resolve(cwd, parsed.options.config)
        : findConfig(cwd);

      let fileConfig: ProtogateConfig = {};
      if (configPath) {
        const configResult = loadConfig(configPath);
        if (!configResult.ok) {
          console.error(`Error: ${configResult.error}`);
          return EXIT_CODES.config;
        }
        fileConfig = configResult.value;
      }

      // Project root is the directory containing protogate.json
      const projectRoot = configPath ? dirname(configPath) : cwd;
      const config = resolveConfig(
        fileConfig,
        parsed.options,
        projectRoot,
        resolve(cwd, parsed.descriptorFile)
      );

      const result = generateCommand(config);
      if (!result.ok) {
        if (!config.quiet) {
          console.error(`Error: ${result.error.message}`);
        }
        return result.error.exitCode;
      }
      return EXIT_CODES.ok;
    }

    case "plugin": {
      const input = await readStream(process.stdin);
      const response = pluginCommand(input, process.cwd());
      process.stdout.write(JSON.stringify(response));
      return EXIT_CODES.ok;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'protogate --help' for usage");
      return EXIT_CODES.unknownCommand;
  }
};
