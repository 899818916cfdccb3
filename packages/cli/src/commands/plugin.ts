/**
 * protogate plugin command - JSON plugin request in, JSON response out
 *
 * Request:  { "fileToGenerate": [...], "parameter": "...", "protoFile": [...] }
 * Response: { "file": [{ "name": "...", "content": "..." }] } or { "error": "..." }
 */

import {
  decodeDescriptorSet,
  formatDiagnostic,
} from "@protogate/frontend";
import { resolveConfig } from "../config.js";
import { parsePluginParameter } from "../parameter.js";
import { generateFiles } from "./generate.js";

export type PluginResponse =
  | {
      readonly file: readonly {
        readonly name: string;
        readonly content: string;
      }[];
    }
  | { readonly error: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Answer one plugin request. Problems go into the response, never thrown.
 */
export const pluginCommand = (
  input: string,
  projectRoot: string
): PluginResponse => {
  let request: unknown;
  try {
    request = JSON.parse(input);
  } catch (error) {
    return {
      error: `Invalid plugin request: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  if (!isRecord(request)) {
    return { error: "Invalid plugin request: expected an object" };
  }

  const parameter = request.parameter ?? "";
  if (typeof parameter !== "string") {
    return { error: "Invalid plugin request: 'parameter' must be a string" };
  }
  const parsed = parsePluginParameter(parameter);
  if (!parsed.ok) {
    return { error: parsed.error };
  }

  const set = decodeDescriptorSet(
    {
      files: request.protoFile,
      filesToGenerate: request.fileToGenerate,
      omitPackageDoc: parsed.value.omitPackageDoc,
    },
    "plugin request"
  );
  if (!set.ok) {
    return { error: set.error.map(formatDiagnostic).join("\n") };
  }

  const config = resolveConfig(parsed.value, { quiet: true }, projectRoot);
  const files = generateFiles(set.value, config);
  if (!files.ok) {
    return { error: files.error.message };
  }
  return {
    file: files.value.map((file) => ({ name: file.name, content: file.content })),
  };
};

/**
 * Read a whole stream as UTF-8 text
 */
export const readStream = async (
  stream: AsyncIterable<string | Buffer>
): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
};
