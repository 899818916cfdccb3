/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { basename, join, resolve, dirname } from "node:path";
import type { TargetPackage } from "@protogate/frontend";
import { CONFIG_FILE, DEFAULT_OUTPUT_DIRECTORY } from "./cli/constants.js";
import type {
  BaseImport,
  CliOptions,
  ProtogateConfig,
  ResolvedConfig,
  Result,
} from "./types.js";

/**
 * Runtime helpers every generated file calls into
 */
export const DEFAULT_BASE_IMPORTS: readonly TargetPackage[] = [
  { path: "@protogate/runtime", name: "runtime" },
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const STRING_KEYS = [
  "$schema",
  "paths",
  "module",
  "registerFuncSuffix",
  "importPrefix",
  "outputDirectory",
] as const;

const BOOLEAN_KEYS = [
  "standalone",
  "requestContext",
  "allowPatchFeature",
  "omitPackageDoc",
] as const;

const decodeBaseImports = (value: unknown): BaseImport[] | string => {
  if (!Array.isArray(value)) {
    return "'baseImports' must be an array";
  }
  const imports: BaseImport[] = [];
  for (const [index, entry] of value.entries()) {
    if (
      !isRecord(entry) ||
      typeof entry.path !== "string" ||
      typeof entry.name !== "string"
    ) {
      return `'baseImports[${index}]' must have string 'path' and 'name'`;
    }
    imports.push({ path: entry.path, name: entry.name });
  }
  return imports;
};

const decodePackageMap = (value: unknown): Record<string, string> | string => {
  if (!isRecord(value)) {
    return "'packageMap' must be an object";
  }
  const map: Record<string, string> = {};
  for (const [file, pkg] of Object.entries(value)) {
    if (typeof pkg !== "string") {
      return `'packageMap.${file}' must be a string`;
    }
    map[file] = pkg;
  }
  return map;
};

/**
 * Validate parsed JSON against the ProtogateConfig shape
 */
export const decodeConfig = (
  data: unknown,
  source: string
): Result<ProtogateConfig, string> => {
  if (!isRecord(data)) {
    return { ok: false, error: `${source}: config must be an object` };
  }

  const strings: Partial<Record<(typeof STRING_KEYS)[number], string>> = {};
  for (const key of STRING_KEYS) {
    const value = data[key];
    if (value === undefined) continue;
    if (typeof value !== "string") {
      return { ok: false, error: `${source}: '${key}' must be a string` };
    }
    strings[key] = value;
  }

  const booleans: Partial<Record<(typeof BOOLEAN_KEYS)[number], boolean>> = {};
  for (const key of BOOLEAN_KEYS) {
    const value = data[key];
    if (value === undefined) continue;
    if (typeof value !== "boolean") {
      return { ok: false, error: `${source}: '${key}' must be a boolean` };
    }
    booleans[key] = value;
  }

  let baseImports: BaseImport[] | undefined;
  if (data.baseImports !== undefined) {
    const decoded = decodeBaseImports(data.baseImports);
    if (typeof decoded === "string") {
      return { ok: false, error: `${source}: ${decoded}` };
    }
    baseImports = decoded;
  }

  let packageMap: Record<string, string> | undefined;
  if (data.packageMap !== undefined) {
    const decoded = decodePackageMap(data.packageMap);
    if (typeof decoded === "string") {
      return { ok: false, error: `${source}: ${decoded}` };
    }
    packageMap = decoded;
  }

  return {
    ok: true,
    value: { ...strings, ...booleans, baseImports, packageMap },
  };
};

/**
 * Load protogate.json
 */
export const loadConfig = (
  configPath: string
): Result<ProtogateConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${basename(configPath)}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return decodeConfig(data, basename(configPath));
};

/**
 * Find protogate.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI options
 */
export const resolveConfig = (
  config: ProtogateConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  descriptorFile?: string
): ResolvedConfig => {
  return {
    projectRoot,
    descriptorPath: descriptorFile,
    outputDirectory: resolve(
      projectRoot,
      cliOptions.out ?? config.outputDirectory ?? DEFAULT_OUTPUT_DIRECTORY
    ),
    pathType: cliOptions.paths ?? config.paths ?? "import",
    modulePath: cliOptions.module ?? config.module ?? "",
    standalone: cliOptions.standalone ?? config.standalone ?? false,
    registerFuncSuffix:
      cliOptions.registerFuncSuffix ?? config.registerFuncSuffix ?? "Handler",
    useRequestContext: cliOptions.noRequestContext
      ? false
      : (config.requestContext ?? true),
    allowPatchFeature: cliOptions.noPatchFeature
      ? false
      : (config.allowPatchFeature ?? true),
    omitPackageDoc: cliOptions.omitPackageDoc ?? config.omitPackageDoc ?? false,
    importPrefix: cliOptions.importPrefix ?? config.importPrefix ?? "",
    packageMap: config.packageMap ?? {},
    baseImports: config.baseImports ?? DEFAULT_BASE_IMPORTS,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
