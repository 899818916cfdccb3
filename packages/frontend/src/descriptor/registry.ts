/**
 * Descriptor registry - links a DescriptorSet into the File/Service/Method
 * graph and answers type-name lookups against it.
 */

import type { Result } from "../types/result.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import type {
  DescriptorSet,
  EnumDescriptor,
  FileDescriptor,
  HttpRule,
  MessageDescriptor,
  MethodDescriptor,
} from "./schema.js";
import type {
  Binding,
  Body,
  Enum,
  Field,
  File,
  Message,
  Method,
  PathParam,
  Service,
} from "./types.js";
import { parsePathTemplate, templateVariables } from "./path-template.js";
import {
  PackageTable,
  targetPackageName,
  targetPackagePath,
  type PackageOptions,
} from "./target-package.js";

export type RegistryOptions = PackageOptions & {
  /** Identifiers already taken in generated code (e.g. base import names) */
  readonly reservedNames?: readonly string[];
};

/**
 * Resolves a type name to the enum it denotes.
 * Relative names are searched from `location` outward.
 */
export type EnumLookup = {
  readonly lookupEnum: (location: string, name: string) => Result<Enum, Diagnostic>;
};

export type Registry = EnumLookup & {
  readonly files: readonly File[];
  /** Files selected for generation, in descriptor set order */
  readonly targets: readonly File[];
  readonly omitPackageDoc: boolean;
  readonly lookupMessage: (
    location: string,
    name: string
  ) => Result<Message, Diagnostic>;
  readonly lookupFile: (name: string) => Result<File, Diagnostic>;
};

/**
 * Protobuf-style scoped lookup: ".a.b" + "X" tries ".a.b.X", ".a.X", ".X".
 * Fully-qualified names (leading ".") are looked up directly.
 */
const lookupScoped = <T>(
  table: ReadonlyMap<string, T>,
  location: string,
  name: string
): T | undefined => {
  if (name.startsWith(".")) {
    return table.get(name);
  }
  const components = location.split(".");
  while (components.length > 0) {
    const found = table.get([...components, name].join("."));
    if (found !== undefined) {
      return found;
    }
    components.pop();
  }
  return undefined;
};

type PendingMessage = {
  readonly message: Message;
  readonly fields: Field[];
  readonly descriptor: MessageDescriptor;
};

type FileBuild = {
  readonly file: File;
  readonly descriptor: FileDescriptor;
  readonly services: Service[];
};

const HTTP_VERBS = ["get", "put", "post", "delete", "patch"] as const;

/**
 * Build the linked registry from a descriptor set
 */
export const createRegistry = (
  set: DescriptorSet,
  options: RegistryOptions = {}
): Result<Registry, Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];
  const packages = new PackageTable(options.reservedNames);
  const filesByName = new Map<string, File>();
  const messages = new Map<string, Message>();
  const enums = new Map<string, Enum>();
  const pendingMessages: PendingMessage[] = [];
  const builds: FileBuild[] = [];

  const registerEnum = (
    descriptor: EnumDescriptor,
    scope: string,
    outers: readonly string[],
    file: File,
    into: Enum[]
  ): void => {
    const entry: Enum = {
      kind: "enum",
      name: descriptor.name,
      fullName: `${scope}.${descriptor.name}`,
      outers,
      values: descriptor.values,
      file,
    };
    enums.set(entry.fullName, entry);
    into.push(entry);
  };

  const registerMessage = (
    descriptor: MessageDescriptor,
    scope: string,
    outers: readonly string[],
    file: File,
    fileMessages: Message[],
    fileEnums: Enum[]
  ): void => {
    const fields: Field[] = [];
    const message: Message = {
      kind: "message",
      name: descriptor.name,
      fullName: `${scope}.${descriptor.name}`,
      outers,
      fields,
      file,
    };
    messages.set(message.fullName, message);
    fileMessages.push(message);
    pendingMessages.push({ message, fields, descriptor });

    const nestedOuters = [...outers, descriptor.name];
    for (const nested of descriptor.messages ?? []) {
      registerMessage(
        nested,
        message.fullName,
        nestedOuters,
        file,
        fileMessages,
        fileEnums
      );
    }
    for (const nested of descriptor.enums ?? []) {
      registerEnum(nested, message.fullName, nestedOuters, file, fileEnums);
    }
  };

  // Pass 1: files, messages and enums
  for (const descriptor of set.files) {
    if (filesByName.has(descriptor.name)) {
      diagnostics.push(
        createDiagnostic(
          "PGW3006",
          `Duplicate file in descriptor set: ${descriptor.name}`
        )
      );
      continue;
    }

    const fileMessages: Message[] = [];
    const fileEnums: Enum[] = [];
    const services: Service[] = [];
    const file: File = {
      name: descriptor.name,
      protoPackage: descriptor.package ?? "",
      targetPackage: packages.get(
        targetPackagePath(descriptor, options),
        targetPackageName(descriptor)
      ),
      dependencies: descriptor.dependencies ?? [],
      messages: fileMessages,
      enums: fileEnums,
      services,
    };
    filesByName.set(file.name, file);
    builds.push({ file, descriptor, services });

    const scope = file.protoPackage ? `.${file.protoPackage}` : "";
    for (const message of descriptor.messages ?? []) {
      registerMessage(message, scope, [], file, fileMessages, fileEnums);
    }
    for (const entry of descriptor.enums ?? []) {
      registerEnum(entry, scope, [], file, fileEnums);
    }
  }

  // Pass 2: field types, now that every type name is known
  for (const { message, fields, descriptor } of pendingMessages) {
    for (const field of descriptor.fields ?? []) {
      let typeName: string | undefined;
      if (field.type === "message" || field.type === "enum") {
        const table: ReadonlyMap<string, Message | Enum> =
          field.type === "message" ? messages : enums;
        const resolved = lookupScoped(
          table,
          message.fullName,
          field.typeName ?? ""
        );
        if (!resolved) {
          diagnostics.push(
            createDiagnostic(
              field.type === "message" ? "PGW3002" : "PGW3001",
              `${message.file.name}: field '${field.name}' of ${message.fullName} refers to unknown ${field.type} '${field.typeName ?? ""}'`
            )
          );
          continue;
        }
        typeName = resolved.fullName;
      }
      fields.push({
        name: field.name,
        number: field.number,
        type: field.type,
        typeName,
        repeated: field.repeated ?? false,
      });
    }
  }

  const resolveFieldPath = (
    root: Message,
    fieldPath: readonly string[]
  ): Result<Field, string> => {
    let current = root;
    for (let i = 0; i < fieldPath.length; i++) {
      const name = fieldPath[i];
      const field = current.fields.find((f) => f.name === name);
      if (!field) {
        return {
          ok: false,
          error: `no field '${name ?? ""}' in ${current.fullName}`,
        };
      }
      if (i === fieldPath.length - 1) {
        return { ok: true, value: field };
      }
      const next =
        field.type === "message" && !field.repeated && field.typeName
          ? messages.get(field.typeName)
          : undefined;
      if (!next) {
        return {
          ok: false,
          error: `field '${field.name}' of ${current.fullName} is not a singular message`,
        };
      }
      current = next;
    }
    return { ok: false, error: "empty field path" };
  };

  const buildBinding = (
    rule: HttpRule,
    index: number,
    request: Message,
    where: string
  ): Binding | undefined => {
    const patterns: { readonly httpMethod: string; readonly path: string }[] =
      [];
    for (const verb of HTTP_VERBS) {
      const pattern = rule[verb];
      if (pattern !== undefined) {
        patterns.push({ httpMethod: verb.toUpperCase(), path: pattern });
      }
    }
    if (rule.custom) {
      patterns.push({ httpMethod: rule.custom.kind, path: rule.custom.path });
    }

    const pattern = patterns[0];
    if (!pattern || patterns.length > 1) {
      diagnostics.push(
        createDiagnostic(
          "PGW3009",
          `${where}: HTTP rule must set exactly one pattern, found ${patterns.length}`
        )
      );
      return undefined;
    }

    const template = parsePathTemplate(pattern.path);
    if (!template.ok) {
      diagnostics.push(
        createDiagnostic("PGW3004", `${where}: ${template.error}`)
      );
      return undefined;
    }

    const pathParams: PathParam[] = [];
    for (const fieldPath of templateVariables(template.value)) {
      const target = resolveFieldPath(request, fieldPath);
      if (!target.ok) {
        diagnostics.push(
          createDiagnostic(
            "PGW3005",
            `${where}: path parameter '${fieldPath.join(".")}': ${target.error}`
          )
        );
        return undefined;
      }
      pathParams.push({ fieldPath, target: target.value });
    }

    let body: Body | undefined;
    if (rule.body !== undefined && rule.body !== "") {
      if (pattern.httpMethod === "GET") {
        diagnostics.push(
          createDiagnostic(
            "PGW3008",
            `${where}: must not set request body when HTTP method is GET`
          )
        );
        return undefined;
      }
      if (rule.body === "*") {
        body = { fieldPath: [] };
      } else {
        const fieldPath = rule.body.split(".");
        const field = resolveFieldPath(request, fieldPath);
        if (!field.ok) {
          diagnostics.push(
            createDiagnostic(
              "PGW3007",
              `${where}: body '${rule.body}': ${field.error}`
            )
          );
          return undefined;
        }
        body = { fieldPath };
      }
    }

    return {
      index,
      httpMethod: pattern.httpMethod,
      pathTemplate: template.value,
      pathParams,
      body,
    };
  };

  const buildBindings = (
    descriptor: MethodDescriptor,
    request: Message,
    where: string
  ): Binding[] => {
    if (!descriptor.http) {
      return [];
    }
    const rules = [descriptor.http, ...(descriptor.http.additionalBindings ?? [])];
    const bindings: Binding[] = [];
    rules.forEach((rule, index) => {
      const binding = buildBinding(rule, index, request, where);
      if (binding) bindings.push(binding);
    });
    return bindings;
  };

  // Pass 3: services, methods and HTTP bindings
  for (const { file, descriptor, services } of builds) {
    const scope = file.protoPackage ? `.${file.protoPackage}` : "";
    for (const serviceDescriptor of descriptor.services ?? []) {
      const methods: Method[] = [];
      const service: Service = {
        name: serviceDescriptor.name,
        file,
        methods,
      };
      services.push(service);

      for (const methodDescriptor of serviceDescriptor.methods ?? []) {
        const where = `${file.name}: ${service.name}.${methodDescriptor.name}`;
        const requestType = lookupScoped(messages, scope, methodDescriptor.inputType);
        const responseType = lookupScoped(
          messages,
          scope,
          methodDescriptor.outputType
        );
        if (!requestType || !responseType) {
          const missing = !requestType
            ? methodDescriptor.inputType
            : methodDescriptor.outputType;
          diagnostics.push(
            createDiagnostic("PGW3002", `${where}: unknown message '${missing}'`)
          );
          continue;
        }

        methods.push({
          name: methodDescriptor.name,
          service,
          requestType,
          responseType,
          clientStreaming: methodDescriptor.clientStreaming ?? false,
          serverStreaming: methodDescriptor.serverStreaming ?? false,
          bindings: buildBindings(methodDescriptor, requestType, where),
        });
      }
    }
  }

  const targets: File[] = [];
  for (const name of set.filesToGenerate ?? [...filesByName.keys()]) {
    const file = filesByName.get(name);
    if (file) {
      targets.push(file);
    } else {
      diagnostics.push(
        createDiagnostic("PGW3003", `File to generate not found: ${name}`)
      );
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  const files = builds.map((build) => build.file);

  return {
    ok: true,
    value: {
      files,
      targets,
      omitPackageDoc: set.omitPackageDoc ?? false,
      lookupEnum: (location, name) => {
        const found = lookupScoped(enums, location, name);
        return found
          ? { ok: true, value: found }
          : {
              ok: false,
              error: createDiagnostic(
                "PGW3001",
                `no enum '${name}' found (location '${location}')`
              ),
            };
      },
      lookupMessage: (location, name) => {
        const found = lookupScoped(messages, location, name);
        return found
          ? { ok: true, value: found }
          : {
              ok: false,
              error: createDiagnostic(
                "PGW3002",
                `no message '${name}' found (location '${location}')`
              ),
            };
      },
      lookupFile: (name) => {
        const found = filesByName.get(name);
        return found
          ? { ok: true, value: found }
          : {
              ok: false,
              error: createDiagnostic("PGW3003", `no file '${name}' found`),
            };
      },
    },
  };
};
