/**
 * protogate emitter - gateway source generation
 */

export * from "./types.js";
export { collectImports, type ImportOptions, type ImportSet } from "./imports.js";
export {
  GATEWAY_SUFFIX,
  createPathConfig,
  outputFileName,
  parsePathType,
  resolveFilePath,
} from "./paths.js";
export { applyTemplate, lowerCamel, targetServices } from "./template.js";
export { formatSource } from "./format.js";
export {
  createGenerator,
  type Generator,
  type GeneratorRegistry,
} from "./generator.js";
