/**
 * Descriptor set JSON loader - reads and validates descriptor set files.
 *
 * Validation decodes the parsed JSON into typed values field by field and
 * reports every problem it finds rather than stopping at the first one.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Result } from "../types/result.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import {
  FIELD_TYPES,
  type DescriptorSet,
  type EnumDescriptor,
  type FieldDescriptor,
  type FieldType,
  type FileDescriptor,
  type HttpRule,
  type MessageDescriptor,
  type MethodDescriptor,
  type ServiceDescriptor,
} from "./schema.js";

type Decoder = {
  readonly source: string;
  readonly diagnostics: Diagnostic[];
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isFieldType = (value: unknown): value is FieldType =>
  typeof value === "string" && FIELD_TYPES.has(value);

const report = (decoder: Decoder, where: string, problem: string): void => {
  decoder.diagnostics.push(
    createDiagnostic("PGW9004", `${decoder.source}: ${where}: ${problem}`)
  );
};

const decodeString = (
  decoder: Decoder,
  obj: Record<string, unknown>,
  key: string,
  where: string
): string | undefined => {
  const value = obj[key];
  if (typeof value !== "string") {
    report(decoder, where, `'${key}' must be a string`);
    return undefined;
  }
  return value;
};

const decodeOptionalString = (
  decoder: Decoder,
  obj: Record<string, unknown>,
  key: string,
  where: string
): string | undefined => {
  if (obj[key] === undefined) return undefined;
  return decodeString(decoder, obj, key, where);
};

const decodeOptionalBoolean = (
  decoder: Decoder,
  obj: Record<string, unknown>,
  key: string,
  where: string
): boolean | undefined => {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    report(decoder, where, `'${key}' must be a boolean`);
    return undefined;
  }
  return value;
};

const decodeList = <T>(
  decoder: Decoder,
  obj: Record<string, unknown>,
  key: string,
  where: string,
  item: (value: unknown, where: string) => T | undefined
): readonly T[] | undefined => {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    report(decoder, where, `'${key}' must be an array`);
    return undefined;
  }
  const items: T[] = [];
  value.forEach((entry: unknown, index) => {
    const decoded = item(entry, `${where}.${key}[${index}]`);
    if (decoded !== undefined) items.push(decoded);
  });
  return items;
};

const decodeStringList = (
  decoder: Decoder,
  obj: Record<string, unknown>,
  key: string,
  where: string
): readonly string[] | undefined =>
  decodeList(decoder, obj, key, where, (value, at) => {
    if (typeof value !== "string") {
      report(decoder, at, "must be a string");
      return undefined;
    }
    return value;
  });

const decodeField = (
  decoder: Decoder,
  value: unknown,
  where: string
): FieldDescriptor | undefined => {
  if (!isRecord(value)) {
    report(decoder, where, "must be an object");
    return undefined;
  }
  const name = decodeString(decoder, value, "name", where);
  const number = value.number;
  if (typeof number !== "number" || !Number.isInteger(number) || number < 1) {
    report(decoder, where, "'number' must be a positive integer");
    return undefined;
  }
  const type = value.type;
  if (!isFieldType(type)) {
    report(decoder, where, `'type' must be one of ${[...FIELD_TYPES].join(", ")}`);
    return undefined;
  }
  const typeName = decodeOptionalString(decoder, value, "typeName", where);
  if ((type === "message" || type === "enum") && typeName === undefined) {
    report(decoder, where, `'typeName' is required for ${type} fields`);
    return undefined;
  }
  const repeated = decodeOptionalBoolean(decoder, value, "repeated", where);
  if (name === undefined) return undefined;
  return { name, number, type, typeName, repeated };
};

const decodeEnum = (
  decoder: Decoder,
  value: unknown,
  where: string
): EnumDescriptor | undefined => {
  if (!isRecord(value)) {
    report(decoder, where, "must be an object");
    return undefined;
  }
  const name = decodeString(decoder, value, "name", where);
  const values = decodeStringList(decoder, value, "values", where) ?? [];
  return name === undefined ? undefined : { name, values };
};

const decodeMessage = (
  decoder: Decoder,
  value: unknown,
  where: string
): MessageDescriptor | undefined => {
  if (!isRecord(value)) {
    report(decoder, where, "must be an object");
    return undefined;
  }
  const name = decodeString(decoder, value, "name", where);
  const fields = decodeList(decoder, value, "fields", where, (v, at) =>
    decodeField(decoder, v, at)
  );
  const messages = decodeList(decoder, value, "messages", where, (v, at) =>
    decodeMessage(decoder, v, at)
  );
  const enums = decodeList(decoder, value, "enums", where, (v, at) =>
    decodeEnum(decoder, v, at)
  );
  return name === undefined ? undefined : { name, fields, messages, enums };
};

const HTTP_PATTERN_KEYS = ["get", "put", "post", "delete", "patch"] as const;

const decodeHttpRule = (
  decoder: Decoder,
  value: unknown,
  where: string
): HttpRule | undefined => {
  if (!isRecord(value)) {
    report(decoder, where, "must be an object");
    return undefined;
  }
  const rule: {
    get?: string;
    put?: string;
    post?: string;
    delete?: string;
    patch?: string;
    custom?: { kind: string; path: string };
    body?: string;
    additionalBindings?: readonly HttpRule[];
  } = {};
  for (const key of HTTP_PATTERN_KEYS) {
    rule[key] = decodeOptionalString(decoder, value, key, where);
  }
  if (value.custom !== undefined) {
    const custom = value.custom;
    if (!isRecord(custom)) {
      report(decoder, where, "'custom' must be an object");
    } else {
      const kind = decodeString(decoder, custom, "kind", `${where}.custom`);
      const customPath = decodeString(decoder, custom, "path", `${where}.custom`);
      if (kind !== undefined && customPath !== undefined) {
        rule.custom = { kind, path: customPath };
      }
    }
  }
  rule.body = decodeOptionalString(decoder, value, "body", where);
  rule.additionalBindings = decodeList(
    decoder,
    value,
    "additionalBindings",
    where,
    (v, at) => decodeHttpRule(decoder, v, at)
  );
  return rule;
};

const decodeMethod = (
  decoder: Decoder,
  value: unknown,
  where: string
): MethodDescriptor | undefined => {
  if (!isRecord(value)) {
    report(decoder, where, "must be an object");
    return undefined;
  }
  const name = decodeString(decoder, value, "name", where);
  const inputType = decodeString(decoder, value, "inputType", where);
  const outputType = decodeString(decoder, value, "outputType", where);
  const clientStreaming = decodeOptionalBoolean(
    decoder,
    value,
    "clientStreaming",
    where
  );
  const serverStreaming = decodeOptionalBoolean(
    decoder,
    value,
    "serverStreaming",
    where
  );
  const http =
    value.http === undefined
      ? undefined
      : decodeHttpRule(decoder, value.http, `${where}.http`);
  if (name === undefined || inputType === undefined || outputType === undefined) {
    return undefined;
  }
  return {
    name,
    inputType,
    outputType,
    clientStreaming,
    serverStreaming,
    http,
  };
};

const decodeService = (
  decoder: Decoder,
  value: unknown,
  where: string
): ServiceDescriptor | undefined => {
  if (!isRecord(value)) {
    report(decoder, where, "must be an object");
    return undefined;
  }
  const name = decodeString(decoder, value, "name", where);
  const methods = decodeList(decoder, value, "methods", where, (v, at) =>
    decodeMethod(decoder, v, at)
  );
  return name === undefined ? undefined : { name, methods };
};

const decodeFile = (
  decoder: Decoder,
  value: unknown,
  where: string
): FileDescriptor | undefined => {
  if (!isRecord(value)) {
    report(decoder, where, "must be an object");
    return undefined;
  }
  const name = decodeString(decoder, value, "name", where);
  const file = {
    package: decodeOptionalString(decoder, value, "package", where),
    targetPackage: decodeOptionalString(decoder, value, "targetPackage", where),
    dependencies: decodeStringList(decoder, value, "dependencies", where),
    messages: decodeList(decoder, value, "messages", where, (v, at) =>
      decodeMessage(decoder, v, at)
    ),
    enums: decodeList(decoder, value, "enums", where, (v, at) =>
      decodeEnum(decoder, v, at)
    ),
    services: decodeList(decoder, value, "services", where, (v, at) =>
      decodeService(decoder, v, at)
    ),
  };
  return name === undefined ? undefined : { name, ...file };
};

/**
 * Validate parsed JSON against the DescriptorSet shape
 */
export const decodeDescriptorSet = (
  data: unknown,
  source: string
): Result<DescriptorSet, Diagnostic[]> => {
  const decoder: Decoder = { source, diagnostics: [] };

  if (!isRecord(data)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "PGW9004",
          `${source}: descriptor set must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
        ),
      ],
    };
  }

  if (data.files === undefined) {
    report(decoder, "descriptor set", "'files' is required");
  }
  const files =
    decodeList(decoder, data, "files", "descriptor set", (v, at) =>
      decodeFile(decoder, v, at)
    ) ?? [];
  const filesToGenerate = decodeStringList(
    decoder,
    data,
    "filesToGenerate",
    "descriptor set"
  );
  const omitPackageDoc = decodeOptionalBoolean(
    decoder,
    data,
    "omitPackageDoc",
    "descriptor set"
  );

  if (decoder.diagnostics.length > 0) {
    return { ok: false, error: decoder.diagnostics };
  }

  return { ok: true, value: { files, filesToGenerate, omitPackageDoc } };
};

/**
 * Load and validate a descriptor set JSON file
 */
export const loadDescriptorSet = (
  filePath: string
): Result<DescriptorSet, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic("PGW9001", `Descriptor file not found: ${filePath}`),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "PGW9002",
          `Failed to read descriptor file: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "PGW9003",
          `Invalid JSON in descriptor file ${path.basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  return decodeDescriptorSet(parsed, path.basename(filePath));
};
