/**
 * Gateway source template
 *
 * Renders one TypeScript module per input file. Each target service gets a
 * register function that binds its HTTP routes on a runtime router and
 * forwards decoded requests to a service client.
 */

import { posix } from "node:path";
import {
  fail,
  packageIdentifier,
  samePackage,
  type Binding,
  type Diagnostic,
  type Enum,
  type File,
  type Message,
  type Method,
  type Result,
  type Service,
} from "@protogate/frontend";
import type { RenderParams } from "./types.js";

const RUNTIME = "runtime";
const LOCAL_MESSAGES = "pb";
const FIELD_MASK = ".google.protobuf.FieldMask";
const SUPPORTED_METHODS = new Set([
  "GET",
  "PUT",
  "POST",
  "DELETE",
  "PATCH",
  "HEAD",
  "OPTIONS",
]);

class RenderError extends Error {}

/**
 * "update_mask" -> "updateMask", "GetItem" -> "getItem"
 */
export const lowerCamel = (name: string): string => {
  const camel = name.replace(/_+([A-Za-z0-9])/g, (_, c: string) =>
    c.toUpperCase()
  );
  return camel.charAt(0).toLowerCase() + camel.slice(1);
};

const literal = (value: string): string => JSON.stringify(value);

const pathLiteral = (fieldPath: readonly string[]): string =>
  `[${fieldPath.map(literal).join(", ")}]`;

type RenderContext = {
  readonly params: RenderParams;
  /** Identifier the file's own messages are reached through */
  readonly ownRef: string;
};

const typeRef = (ctx: RenderContext, type: Message | Enum): string => {
  const pkg = type.file.targetPackage;
  const qualifier = samePackage(pkg, ctx.params.file.targetPackage)
    ? ctx.ownRef
    : packageIdentifier(pkg);
  return `${qualifier}.${[...type.outers, type.name].join("_")}`;
};

/**
 * Services with at least one HTTP-bound method
 */
export const targetServices = (file: File): readonly Service[] =>
  file.services.filter((service) =>
    service.methods.some((method) => method.bindings.length > 0)
  );

const hasBindings = (method: Method): boolean => method.bindings.length > 0;

const renderPathParams = (
  ctx: RenderContext,
  binding: Binding,
  lines: string[]
): void => {
  for (const param of binding.pathParams) {
    const raw = `pathParams[${literal(param.fieldPath.join("."))}]`;
    const enumType =
      param.target.type === "enum"
        ? ctx.params.enums.lookupEnum("", param.target.typeName ?? "")
        : undefined;
    const value = enumType?.ok
      ? `${RUNTIME}.parseEnum(${typeRef(ctx, enumType.value)}, ${raw})`
      : raw;
    lines.push(
      `    ${RUNTIME}.setField(message, ${pathLiteral(param.fieldPath)}, ${value});`
    );
  }
};

const fieldMaskField = (message: Message): string | undefined =>
  message.fields.find(
    (field) => field.type === "message" && field.typeName === FIELD_MASK
  )?.name;

const renderUnaryRequest = (
  ctx: RenderContext,
  method: Method,
  binding: Binding,
  lines: string[]
): void => {
  lines.push(`    const message = ${typeRef(ctx, method.requestType)}.create();`);

  const body = binding.body;
  if (body && body.fieldPath.length === 0) {
    lines.push(`    await ${RUNTIME}.decodeBody(req, message);`);
  } else if (body) {
    lines.push(
      `    await ${RUNTIME}.decodeBodyField(req, message, ${pathLiteral(body.fieldPath)});`
    );
    const mask = fieldMaskField(method.requestType);
    if (
      ctx.params.allowPatchFeature &&
      binding.httpMethod === "PATCH" &&
      mask !== undefined
    ) {
      const property = `message.${lowerCamel(mask)}`;
      lines.push(`    if (!${property}) {`);
      lines.push(
        `      ${property} = ${RUNTIME}.fieldMaskFromBody(req, ${pathLiteral(body.fieldPath)});`
      );
      lines.push("    }");
    }
  }

  renderPathParams(ctx, binding, lines);

  if (!body || body.fieldPath.length > 0) {
    const filter = binding.pathParams.map((param) => param.fieldPath);
    if (body) filter.push(body.fieldPath);
    const filterLiteral = `[${filter.map(pathLiteral).join(", ")}]`;
    lines.push(`    ${RUNTIME}.populateQuery(message, req, ${filterLiteral});`);
  }
};

const renderHandler = (
  ctx: RenderContext,
  method: Method,
  binding: Binding,
  lines: string[]
): void => {
  const where = `${method.service.name}.${method.name} binding ${binding.index}`;
  if (!SUPPORTED_METHODS.has(binding.httpMethod)) {
    throw new RenderError(
      `${where}: unsupported HTTP method "${binding.httpMethod}"`
    );
  }
  if (
    method.clientStreaming &&
    (!binding.body || binding.body.fieldPath.length > 0)
  ) {
    throw new RenderError(
      `${where}: client streaming methods require body "*"`
    );
  }

  const call = `client.${lowerCamel(method.name)}`;
  lines.push(
    `  router.handle(${literal(binding.httpMethod)}, ${literal(binding.pathTemplate.template)}, async (req, res, pathParams) => {`
  );
  lines.push(
    ctx.params.useRequestContext
      ? `    const ctx = ${RUNTIME}.requestContext(req);`
      : `    const ctx = ${RUNTIME}.backgroundContext();`
  );

  let request = "message";
  if (method.clientStreaming) {
    request = `${RUNTIME}.decodeBodyStream(req, ${typeRef(ctx, method.requestType)})`;
  } else {
    renderUnaryRequest(ctx, method, binding, lines);
  }

  if (method.serverStreaming) {
    lines.push(
      `    await ${RUNTIME}.forwardResponseStream(res, ${call}(${request}, ctx));`
    );
  } else {
    lines.push(`    const response = await ${call}(${request}, ctx);`);
    lines.push(`    ${RUNTIME}.forwardResponse(res, response);`);
  }
  lines.push("  });");
};

const renderService = (
  ctx: RenderContext,
  service: Service,
  lines: string[]
): void => {
  const name = `register${service.name}${ctx.params.registerFuncSuffix}`;
  lines.push("/**");
  lines.push(
    ` * Registers the HTTP bindings of ${service.name} on the router and forwards`
  );
  lines.push(" * each call to the client.");
  lines.push(" */");
  lines.push(`export function ${name}(`);
  lines.push(`  router: ${RUNTIME}.Router,`);
  lines.push(`  client: ${ctx.ownRef}.${service.name}Client`);
  lines.push("): void {");
  for (const method of service.methods.filter(hasBindings)) {
    for (const binding of method.bindings) {
      renderHandler(ctx, method, binding, lines);
    }
  }
  lines.push("}");
};

/**
 * Render the gateway module for `params.file`.
 * The own package is imported directly when it is in the import list
 * (standalone output); otherwise messages come from the sibling module.
 */
export const applyTemplate = (
  params: RenderParams
): Result<string, Diagnostic> => {
  const { file } = params;
  const standalone = params.imports.some((pkg) =>
    samePackage(pkg, file.targetPackage)
  );
  const ctx: RenderContext = {
    params,
    ownRef: standalone ? packageIdentifier(file.targetPackage) : LOCAL_MESSAGES,
  };

  const lines: string[] = [];
  if (!params.omitPackageDoc) {
    lines.push("/**");
    lines.push(` * HTTP gateway for the services in ${file.name}.`);
    lines.push(" *");
    lines.push(" * @packageDocumentation");
    lines.push(" */");
    lines.push("");
  }
  lines.push(`// Generated by protogate from ${file.name}.`);
  lines.push("");

  for (const pkg of params.imports) {
    lines.push(`import * as ${packageIdentifier(pkg)} from ${literal(pkg.path)};`);
  }
  if (!standalone) {
    const base = posix.basename(file.name);
    const dot = base.lastIndexOf(".");
    const stem = dot > 0 ? base.slice(0, dot) : base;
    lines.push(`import * as ${LOCAL_MESSAGES} from ${literal(`./${stem}.pb.js`)};`);
  }

  try {
    for (const service of targetServices(file)) {
      lines.push("");
      renderService(ctx, service, lines);
    }
  } catch (err) {
    if (err instanceof RenderError) {
      return fail("PGW2001", `${file.name}: failed to render gateway: ${err.message}`);
    }
    throw err;
  }

  return { ok: true, value: `${lines.join("\n")}\n` };
};
