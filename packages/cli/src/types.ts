/**
 * Type definitions for CLI
 */

import type { TargetPackage } from "@protogate/frontend";

export type { Result } from "@protogate/frontend";

/**
 * A package every generated file imports, as written in protogate.json
 */
export type BaseImport = {
  readonly path: string;
  readonly name: string;
};

/**
 * protogate configuration file (protogate.json)
 */
export type ProtogateConfig = {
  readonly $schema?: string;
  /** "import" or "source_relative" */
  readonly paths?: string;
  /** Module prefix stripped from output paths */
  readonly module?: string;
  readonly standalone?: boolean;
  readonly registerFuncSuffix?: string;
  readonly requestContext?: boolean;
  readonly allowPatchFeature?: boolean;
  readonly omitPackageDoc?: boolean;
  readonly importPrefix?: string;
  /** Source file name -> package import path */
  readonly packageMap?: Readonly<Record<string, string>>;
  readonly outputDirectory?: string;
  readonly baseImports?: readonly BaseImport[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  paths?: string;
  module?: string;
  standalone?: boolean;
  registerFuncSuffix?: string;
  noRequestContext?: boolean;
  noPatchFeature?: boolean;
  omitPackageDoc?: boolean;
  importPrefix?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing protogate.json
  readonly descriptorPath: string | undefined;
  readonly outputDirectory: string;
  readonly pathType: string;
  readonly modulePath: string;
  readonly standalone: boolean;
  readonly registerFuncSuffix: string;
  readonly useRequestContext: boolean;
  readonly allowPatchFeature: boolean;
  readonly omitPackageDoc: boolean;
  readonly importPrefix: string;
  readonly packageMap: Readonly<Record<string, string>>;
  readonly baseImports: readonly TargetPackage[];
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * A failed command and the exit code it maps to
 */
export type CommandFailure = {
  readonly exitCode: number;
  readonly message: string;
};
