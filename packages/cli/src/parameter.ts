/**
 * Plugin parameter parsing
 *
 * The parameter string is a comma-separated list of key=value pairs, e.g.
 * "paths=source_relative,standalone=true,Mfoo/bar.proto=example.com/foo".
 */

import type { ProtogateConfig, Result } from "./types.js";

const parseBoolean = (key: string, value: string): Result<boolean, string> => {
  switch (value) {
    case "":
    case "true":
      return { ok: true, value: true };
    case "false":
      return { ok: true, value: false };
    default:
      return {
        ok: false,
        error: `Invalid value for ${key}: "${value}" (want true or false)`,
      };
  }
};

type MutableConfig = {
  -readonly [K in keyof ProtogateConfig]: ProtogateConfig[K];
};

/**
 * Turn a plugin parameter string into configuration
 */
export const parsePluginParameter = (
  parameter: string
): Result<ProtogateConfig, string> => {
  const config: MutableConfig = {};
  const packageMap: Record<string, string> = {};

  for (const entry of parameter.split(",")) {
    if (entry === "") continue;
    const eq = entry.indexOf("=");
    const key = eq >= 0 ? entry.slice(0, eq) : entry;
    const value = eq >= 0 ? entry.slice(eq + 1) : "";

    if (key.startsWith("M") && key.length > 1) {
      packageMap[key.slice(1)] = value;
      continue;
    }

    switch (key) {
      case "paths":
        config.paths = value;
        break;
      case "module":
        config.module = value;
        break;
      case "register_func_suffix":
        config.registerFuncSuffix = value;
        break;
      case "import_prefix":
        config.importPrefix = value;
        break;
      case "standalone":
      case "request_context":
      case "allow_patch_feature":
      case "omit_package_doc": {
        const parsed = parseBoolean(key, value);
        if (!parsed.ok) return parsed;
        if (key === "standalone") config.standalone = parsed.value;
        if (key === "request_context") config.requestContext = parsed.value;
        if (key === "allow_patch_feature") config.allowPatchFeature = parsed.value;
        if (key === "omit_package_doc") config.omitPackageDoc = parsed.value;
        break;
      }
      default:
        return { ok: false, error: `Unknown parameter "${key}"` };
    }
  }

  if (Object.keys(packageMap).length > 0) {
    config.packageMap = packageMap;
  }
  return { ok: true, value: config };
};
