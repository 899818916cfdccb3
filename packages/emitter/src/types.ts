/**
 * Gateway generator types
 */

import type {
  Diagnostic,
  EnumLookup,
  File,
  Result,
  TargetPackage,
} from "@protogate/frontend";

/**
 * Where output files are placed:
 * - "import": under the file's package import path
 * - "source_relative": beside the source file
 */
export type PathType = "import" | "source_relative";

export type PathConfig = {
  readonly pathType: PathType;
  /** Module prefix stripped from package paths; "import" paths only */
  readonly modulePath: string;
  readonly standalone: boolean;
};

/**
 * Everything the template needs to render one file
 */
export type RenderParams = {
  readonly file: File;
  readonly imports: readonly TargetPackage[];
  readonly useRequestContext: boolean;
  readonly registerFuncSuffix: string;
  readonly allowPatchFeature: boolean;
  readonly omitPackageDoc: boolean;
  /** Resolves enum path parameters to their declaring package */
  readonly enums: EnumLookup;
};

export type Renderer = (params: RenderParams) => Result<string, Diagnostic>;

/**
 * Syntax-checks generated source and returns its normalized text
 */
export type Formatter = (
  fileName: string,
  source: string
) => Result<string, Diagnostic>;

/**
 * A generated file, ready for the plugin output
 */
export type ResponseFile = {
  readonly targetPackage: TargetPackage;
  readonly name: string;
  readonly content: string;
};

export type GeneratorOptions = {
  /** Packages every generated file imports, in order */
  readonly baseImports?: readonly TargetPackage[];
  /** Forward the incoming request's context to the client call */
  readonly useRequestContext?: boolean;
  /** Suffix of generated register functions, e.g. "Handler" */
  readonly registerFuncSuffix?: string;
  /** "", "import" or "source_relative" */
  readonly pathType?: string;
  readonly modulePath?: string;
  /** Fill in update masks for PATCH bodies */
  readonly allowPatchFeature?: boolean;
  /** Generate into a separate package that imports the message package */
  readonly standalone?: boolean;
  readonly render?: Renderer;
  readonly format?: Formatter;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
};
