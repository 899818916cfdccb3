/**
 * protogate frontend - descriptor loading and the linked descriptor registry
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./descriptor/schema.js";
export * from "./descriptor/types.js";
export { parsePathTemplate, templateVariables } from "./descriptor/path-template.js";
export {
  type PackageOptions,
  PackageTable,
  sanitizeIdentifier,
  targetPackageName,
  targetPackagePath,
} from "./descriptor/target-package.js";
export { decodeDescriptorSet, loadDescriptorSet } from "./descriptor/loader.js";
export {
  type EnumLookup,
  type Registry,
  type RegistryOptions,
  createRegistry,
} from "./descriptor/registry.js";
