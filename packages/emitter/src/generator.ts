/**
 * Gateway generator - turns target files into gateway artifacts
 *
 * Each file goes through render, format and path resolution in that order.
 * The first failure aborts the whole batch.
 */

import {
  createDiagnostic,
  formatDiagnostic,
  type Diagnostic,
  type EnumLookup,
  type File,
  type Result,
  type TargetPackage,
} from "@protogate/frontend";
import { formatSource } from "./format.js";
import { collectImports } from "./imports.js";
import { createPathConfig, outputFileName, resolveFilePath } from "./paths.js";
import { applyTemplate, targetServices } from "./template.js";
import type {
  Formatter,
  GeneratorOptions,
  PathConfig,
  Renderer,
  ResponseFile,
} from "./types.js";

/**
 * What the generator needs from the registry
 */
export type GeneratorRegistry = EnumLookup & {
  readonly omitPackageDoc: boolean;
};

export type Generator = {
  readonly generate: (
    targets: readonly File[]
  ) => Result<ResponseFile[], Diagnostic>;
};

type GeneratorSettings = {
  readonly baseImports: readonly TargetPackage[];
  readonly useRequestContext: boolean;
  readonly registerFuncSuffix: string;
  readonly allowPatchFeature: boolean;
  readonly paths: PathConfig;
  readonly render: Renderer;
  readonly format: Formatter;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Create a generator. Path settings are validated here, so a bad
 * combination fails before any file is looked at.
 */
export const createGenerator = (
  registry: GeneratorRegistry,
  options: GeneratorOptions = {}
): Result<Generator, Diagnostic> => {
  const paths = createPathConfig(
    options.pathType ?? "",
    options.modulePath ?? "",
    options.standalone ?? false
  );
  if (!paths.ok) {
    if (!options.quiet) {
      console.error(formatDiagnostic(paths.error));
    }
    return paths;
  }

  const settings: GeneratorSettings = {
    baseImports: options.baseImports ?? [],
    useRequestContext: options.useRequestContext ?? true,
    registerFuncSuffix: options.registerFuncSuffix ?? "Handler",
    allowPatchFeature: options.allowPatchFeature ?? true,
    paths: paths.value,
    render: options.render ?? applyTemplate,
    format: options.format ?? formatSource,
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
  };

  return {
    ok: true,
    value: {
      generate: (targets) => generateAll(registry, settings, targets),
    },
  };
};

const generateFile = (
  registry: GeneratorRegistry,
  settings: GeneratorSettings,
  file: File
): Result<ResponseFile, Diagnostic> => {
  const imports = collectImports(
    file,
    {
      baseImports: settings.baseImports,
      standalone: settings.paths.standalone,
    },
    registry
  );

  const rendered = settings.render({
    file,
    imports,
    useRequestContext: settings.useRequestContext,
    registerFuncSuffix: settings.registerFuncSuffix,
    allowPatchFeature: settings.allowPatchFeature,
    omitPackageDoc: registry.omitPackageDoc,
    enums: registry,
  });
  if (!rendered.ok) {
    return {
      ok: false,
      error:
        rendered.error.code === "PGW2001"
          ? rendered.error
          : createDiagnostic(
              "PGW2001",
              `${file.name}: failed to render gateway: ${rendered.error.message}`
            ),
    };
  }

  const formatted = settings.format(file.name, rendered.value);
  if (!formatted.ok) {
    return formatted;
  }

  const path = resolveFilePath(file, settings.paths);
  if (!path.ok) {
    return {
      ok: false,
      error: {
        ...path.error,
        message: `${file.name}: ${path.error.message}`,
        detail: formatted.value,
      },
    };
  }

  return {
    ok: true,
    value: {
      targetPackage: file.targetPackage,
      name: outputFileName(path.value),
      content: formatted.value,
    },
  };
};

const generateAll = (
  registry: GeneratorRegistry,
  settings: GeneratorSettings,
  targets: readonly File[]
): Result<ResponseFile[], Diagnostic> => {
  const files: ResponseFile[] = [];

  for (const file of targets) {
    if (targetServices(file).length === 0) {
      if (settings.verbose) {
        console.log(
          `[Gateway] Skipping ${file.name}: no service method has an HTTP binding`
        );
      }
      continue;
    }

    const result = generateFile(registry, settings, file);
    if (!result.ok) {
      if (!settings.quiet) {
        console.error(formatDiagnostic(result.error));
      }
      return result;
    }

    if (settings.verbose) {
      console.log(`[Gateway] ${file.name} -> ${result.value.name}`);
    }
    files.push(result.value);
  }

  return { ok: true, value: files };
};
