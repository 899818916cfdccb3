/**
 * Linked descriptor graph produced by the registry.
 *
 * Every node is read-only once the registry has been built; the
 * generator only walks it.
 */

import type { FieldType } from "./schema.js";

/**
 * Package the generated code is emitted into or imports from.
 * Identity is the import path alone.
 */
export type TargetPackage = {
  readonly path: string;
  readonly name: string;
  /** Set when `name` collides with another package's name */
  readonly alias?: string;
};

/**
 * Identifier used to refer to a package in generated code
 */
export const packageIdentifier = (pkg: TargetPackage): string =>
  pkg.alias ?? pkg.name;

export const samePackage = (a: TargetPackage, b: TargetPackage): boolean =>
  a.path === b.path;

export type Field = {
  readonly name: string;
  readonly number: number;
  readonly type: FieldType;
  /** Fully-qualified type name for message and enum fields */
  readonly typeName?: string;
  readonly repeated: boolean;
};

export type Message = {
  readonly kind: "message";
  readonly name: string;
  /** ".pkg.Outer.Name" */
  readonly fullName: string;
  /** Names of enclosing messages, outermost first */
  readonly outers: readonly string[];
  readonly fields: readonly Field[];
  readonly file: File;
};

export type Enum = {
  readonly kind: "enum";
  readonly name: string;
  readonly fullName: string;
  readonly outers: readonly string[];
  readonly values: readonly string[];
  readonly file: File;
};

export type TemplateSegment =
  | { readonly kind: "literal"; readonly value: string }
  | { readonly kind: "wildcard" }
  | { readonly kind: "deepWildcard" }
  | {
      readonly kind: "variable";
      readonly fieldPath: readonly string[];
      readonly segments: readonly TemplateSegment[];
    };

export type PathTemplate = {
  readonly template: string;
  readonly segments: readonly TemplateSegment[];
  readonly verb?: string;
};

export type PathParam = {
  /** Field names from the request message down to the target */
  readonly fieldPath: readonly string[];
  readonly target: Field;
};

export type Body = {
  /** Empty when the whole request message is the body ("*") */
  readonly fieldPath: readonly string[];
};

export type Binding = {
  readonly index: number;
  /** Upper-case HTTP verb, e.g. "GET" */
  readonly httpMethod: string;
  readonly pathTemplate: PathTemplate;
  readonly pathParams: readonly PathParam[];
  readonly body?: Body;
};

export type Method = {
  readonly name: string;
  readonly service: Service;
  readonly requestType: Message;
  readonly responseType: Message;
  readonly clientStreaming: boolean;
  readonly serverStreaming: boolean;
  readonly bindings: readonly Binding[];
};

export type Service = {
  readonly name: string;
  readonly file: File;
  readonly methods: readonly Method[];
};

export type File = {
  readonly name: string;
  readonly protoPackage: string;
  readonly targetPackage: TargetPackage;
  readonly dependencies: readonly string[];
  readonly messages: readonly Message[];
  readonly enums: readonly Enum[];
  readonly services: readonly Service[];
};
