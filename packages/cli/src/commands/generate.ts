/**
 * protogate generate command - write gateway sources for a descriptor set
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, relative, resolve } from "node:path";
import {
  createRegistry,
  formatDiagnostic,
  loadDescriptorSet,
  packageIdentifier,
  type DescriptorSet,
  type Diagnostic,
} from "@protogate/frontend";
import { createGenerator, type ResponseFile } from "@protogate/emitter";
import { EXIT_CODES } from "../cli/constants.js";
import type { CommandFailure, ResolvedConfig, Result } from "../types.js";

const failure = (
  exitCode: number,
  diagnostics: readonly Diagnostic[]
): { readonly ok: false; readonly error: CommandFailure } => ({
  ok: false,
  error: { exitCode, message: diagnostics.map(formatDiagnostic).join("\n") },
});

/**
 * Link the descriptor set and run the generator over its targets
 */
export const generateFiles = (
  set: DescriptorSet,
  config: ResolvedConfig
): Result<readonly ResponseFile[], CommandFailure> => {
  const registryResult = createRegistry(set, {
    importPrefix: config.importPrefix,
    packageMap: config.packageMap,
    reservedNames: [...config.baseImports.map(packageIdentifier), "pb"],
  });
  if (!registryResult.ok) {
    return failure(EXIT_CODES.descriptor, registryResult.error);
  }
  const registry = registryResult.value;

  const generatorResult = createGenerator(
    {
      lookupEnum: registry.lookupEnum,
      omitPackageDoc: registry.omitPackageDoc || config.omitPackageDoc,
    },
    {
      baseImports: config.baseImports,
      useRequestContext: config.useRequestContext,
      registerFuncSuffix: config.registerFuncSuffix,
      pathType: config.pathType,
      modulePath: config.modulePath,
      allowPatchFeature: config.allowPatchFeature,
      standalone: config.standalone,
      verbose: config.verbose,
      // Failures are reported by the caller
      quiet: true,
    }
  );
  if (!generatorResult.ok) {
    return failure(EXIT_CODES.config, [generatorResult.error]);
  }

  const generated = generatorResult.value.generate(registry.targets);
  if (!generated.ok) {
    return failure(EXIT_CODES.generation, [generated.error]);
  }
  return generated;
};

/**
 * Generate gateway sources and write them under the output directory
 */
export const generateCommand = (
  config: ResolvedConfig
): Result<readonly string[], CommandFailure> => {
  if (config.descriptorPath === undefined) {
    return {
      ok: false,
      error: {
        exitCode: EXIT_CODES.usage,
        message: "Descriptor file required",
      },
    };
  }

  const setResult = loadDescriptorSet(resolve(config.descriptorPath));
  if (!setResult.ok) {
    return failure(EXIT_CODES.descriptor, setResult.error);
  }

  const filesResult = generateFiles(setResult.value, config);
  if (!filesResult.ok) {
    return filesResult;
  }

  const written: string[] = [];
  try {
    for (const file of filesResult.value) {
      const outputPath = join(config.outputDirectory, file.name);
      mkdirSync(dirname(outputPath), { recursive: true });
      writeFileSync(outputPath, file.content, "utf-8");
      written.push(outputPath);
      if (config.verbose) {
        console.log(`  Wrote ${relative(config.projectRoot, outputPath)}`);
      }
    }
  } catch (error) {
    return {
      ok: false,
      error: {
        exitCode: EXIT_CODES.generation,
        message: `Failed to write output: ${error instanceof Error ? error.message : String(error)}`,
      },
    };
  }

  if (!config.quiet) {
    console.log(
      `✓ Generated ${written.length} gateway file(s) in ${relative(config.projectRoot, config.outputDirectory) || "."}`
    );
  }
  return { ok: true, value: written };
};
