/**
 * Descriptor set JSON shape - the registry's input.
 *
 * Mirrors the parts of a compiled protocol-buffer file descriptor the
 * gateway generator needs. Type names on fields and methods may be
 * fully-qualified (leading ".") or relative to the enclosing scope.
 */

export type ScalarFieldType =
  | "double"
  | "float"
  | "int64"
  | "uint64"
  | "int32"
  | "uint32"
  | "sint32"
  | "sint64"
  | "fixed32"
  | "fixed64"
  | "sfixed32"
  | "sfixed64"
  | "bool"
  | "string"
  | "bytes";

export type FieldType = ScalarFieldType | "message" | "enum";

export const FIELD_TYPES: ReadonlySet<string> = new Set<FieldType>([
  "double",
  "float",
  "int64",
  "uint64",
  "int32",
  "uint32",
  "sint32",
  "sint64",
  "fixed32",
  "fixed64",
  "sfixed32",
  "sfixed64",
  "bool",
  "string",
  "bytes",
  "message",
  "enum",
]);

export type FieldDescriptor = {
  readonly name: string;
  readonly number: number;
  readonly type: FieldType;
  /** Required for message and enum fields */
  readonly typeName?: string;
  readonly repeated?: boolean;
};

export type EnumDescriptor = {
  readonly name: string;
  readonly values: readonly string[];
};

export type MessageDescriptor = {
  readonly name: string;
  readonly fields?: readonly FieldDescriptor[];
  readonly messages?: readonly MessageDescriptor[];
  readonly enums?: readonly EnumDescriptor[];
};

export type CustomHttpPattern = {
  readonly kind: string;
  readonly path: string;
};

/**
 * google.api.http style rule; exactly one pattern key is expected
 */
export type HttpRule = {
  readonly get?: string;
  readonly put?: string;
  readonly post?: string;
  readonly delete?: string;
  readonly patch?: string;
  readonly custom?: CustomHttpPattern;
  readonly body?: string;
  readonly additionalBindings?: readonly HttpRule[];
};

export type MethodDescriptor = {
  readonly name: string;
  readonly inputType: string;
  readonly outputType: string;
  readonly clientStreaming?: boolean;
  readonly serverStreaming?: boolean;
  readonly http?: HttpRule;
};

export type ServiceDescriptor = {
  readonly name: string;
  readonly methods?: readonly MethodDescriptor[];
};

export type FileDescriptor = {
  /** Path of the source file, e.g. "example/v1/items.proto" */
  readonly name: string;
  /** Proto package, e.g. "example.v1" */
  readonly package?: string;
  /** Target package option: "import/path" or "import/path;name" */
  readonly targetPackage?: string;
  readonly dependencies?: readonly string[];
  readonly messages?: readonly MessageDescriptor[];
  readonly enums?: readonly EnumDescriptor[];
  readonly services?: readonly ServiceDescriptor[];
};

export type DescriptorSet = {
  readonly files: readonly FileDescriptor[];
  /** Files to generate for; every file when absent */
  readonly filesToGenerate?: readonly string[];
  readonly omitPackageDoc?: boolean;
};
