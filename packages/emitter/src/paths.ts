/**
 * Output path resolution for generated gateway files
 */

import { posix } from "node:path";
import {
  createDiagnostic,
  fail,
  type Diagnostic,
  type File,
  type Result,
} from "@protogate/frontend";
import type { PathConfig, PathType } from "./types.js";

export const GATEWAY_SUFFIX = ".pb.gw.ts";

/**
 * Parse the path type option; "" means the default, "import"
 */
export const parsePathType = (value: string): Result<PathType, Diagnostic> => {
  switch (value) {
    case "":
    case "import":
      return { ok: true, value: "import" };
    case "source_relative":
      return { ok: true, value: "source_relative" };
    default:
      return fail(
        "PGW1001",
        `Unknown path type "${value}": want "import" or "source_relative"`
      );
  }
};

const conflictError = (config: PathConfig): Diagnostic =>
  createDiagnostic(
    "PGW1002",
    `Cannot use module=${config.modulePath} with paths=${config.pathType}`,
    { hint: "module= only applies to paths=import" }
  );

/**
 * Validate the path settings together, once, before any file is processed
 */
export const createPathConfig = (
  pathType: string,
  modulePath: string,
  standalone: boolean
): Result<PathConfig, Diagnostic> => {
  const parsed = parsePathType(pathType);
  if (!parsed.ok) {
    return parsed;
  }
  const config: PathConfig = { pathType: parsed.value, modulePath, standalone };
  if (modulePath !== "" && config.pathType !== "import") {
    return { ok: false, error: conflictError(config) };
  }
  return { ok: true, value: config };
};

/**
 * Compute where a file's generated companion goes, before suffixing
 */
export const resolveFilePath = (
  file: File,
  config: PathConfig
): Result<string, Diagnostic> => {
  const name = file.name;
  const pkgPath = file.targetPackage.path;

  if (config.modulePath !== "" && config.pathType !== "import") {
    return { ok: false, error: conflictError(config) };
  }

  if (config.modulePath !== "") {
    const trimPath = `${config.modulePath}/`;
    const withSlash = `${pkgPath}/`;
    if (!withSlash.startsWith(trimPath)) {
      return fail(
        "PGW1003",
        `${pkgPath}: file package path does not match module prefix: ${trimPath}`
      );
    }
    return {
      ok: true,
      value: posix.join(withSlash.slice(trimPath.length), posix.basename(name)),
    };
  }

  if (config.pathType === "import" && pkgPath !== "") {
    return { ok: true, value: `${pkgPath}/${posix.basename(name)}` };
  }

  return { ok: true, value: name };
};

/**
 * Replace the extension of the last path element with the gateway suffix
 */
export const outputFileName = (path: string): string => {
  const dot = path.lastIndexOf(".");
  const base = dot > path.lastIndexOf("/") ? path.slice(0, dot) : path;
  return `${base}${GATEWAY_SUFFIX}`;
};
