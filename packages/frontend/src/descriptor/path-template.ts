/**
 * HTTP path template parsing
 *
 * Grammar:
 *   Template = "/" Segments [ ":" Verb ]
 *   Segments = Segment { "/" Segment }
 *   Segment  = "*" | "**" | LITERAL | Variable
 *   Variable = "{" FieldPath [ "=" Segments ] "}"
 *   FieldPath = IDENT { "." IDENT }
 */

import type { Result } from "../types/result.js";
import type { PathTemplate, TemplateSegment } from "./types.js";

const IDENT = /^[A-Za-z_][A-Za-z0-9_]*/;
const LITERAL_STOP = new Set(["/", ":", "{", "}", "=", "*"]);

type Cursor = {
  readonly text: string;
  pos: number;
};

class TemplateSyntaxError extends Error {}

const fail = (cursor: Cursor, message: string): never => {
  throw new TemplateSyntaxError(`${message} at offset ${cursor.pos}`);
};

const peek = (cursor: Cursor): string | undefined => cursor.text[cursor.pos];

const expect = (cursor: Cursor, char: string): void => {
  if (peek(cursor) !== char) {
    fail(cursor, `expected '${char}'`);
  }
  cursor.pos++;
};

const parseLiteral = (cursor: Cursor): string => {
  const start = cursor.pos;
  while (cursor.pos < cursor.text.length) {
    const char = cursor.text[cursor.pos];
    if (char === undefined || LITERAL_STOP.has(char)) break;
    cursor.pos++;
  }
  if (cursor.pos === start) {
    fail(cursor, "expected a literal");
  }
  return cursor.text.slice(start, cursor.pos);
};

const parseFieldPath = (cursor: Cursor): readonly string[] => {
  const components: string[] = [];
  for (;;) {
    const match = IDENT.exec(cursor.text.slice(cursor.pos));
    if (!match) {
      return fail(cursor, "expected a field name");
    }
    components.push(match[0]);
    cursor.pos += match[0].length;
    if (peek(cursor) !== ".") return components;
    cursor.pos++;
  }
};

const parseSegments = (
  cursor: Cursor,
  insideVariable: boolean
): readonly TemplateSegment[] => {
  const segments = [parseSegment(cursor, insideVariable)];
  while (peek(cursor) === "/") {
    cursor.pos++;
    segments.push(parseSegment(cursor, insideVariable));
  }
  return segments;
};

const parseVariable = (cursor: Cursor): TemplateSegment => {
  expect(cursor, "{");
  const fieldPath = parseFieldPath(cursor);
  let segments: readonly TemplateSegment[] = [{ kind: "wildcard" }];
  if (peek(cursor) === "=") {
    cursor.pos++;
    segments = parseSegments(cursor, true);
  }
  expect(cursor, "}");
  return { kind: "variable", fieldPath, segments };
};

const parseSegment = (
  cursor: Cursor,
  insideVariable: boolean
): TemplateSegment => {
  const char = peek(cursor);
  if (char === "{") {
    if (insideVariable) {
      return fail(cursor, "nested variables are not allowed");
    }
    return parseVariable(cursor);
  }
  if (cursor.text.startsWith("**", cursor.pos)) {
    cursor.pos += 2;
    return { kind: "deepWildcard" };
  }
  if (char === "*") {
    cursor.pos++;
    return { kind: "wildcard" };
  }
  return { kind: "literal", value: parseLiteral(cursor) };
};

/**
 * Field paths bound by the template's variables, in template order
 */
export const templateVariables = (
  template: PathTemplate
): readonly (readonly string[])[] =>
  template.segments.flatMap((segment) =>
    segment.kind === "variable" ? [segment.fieldPath] : []
  );

/**
 * Parse an HTTP path template such as "/v1/{name=shelves/*}/books:publish"
 */
export const parsePathTemplate = (
  template: string
): Result<PathTemplate, string> => {
  if (template === "/") {
    return { ok: true, value: { template, segments: [] } };
  }

  const cursor: Cursor = { text: template, pos: 0 };
  try {
    expect(cursor, "/");
    const segments = parseSegments(cursor, false);
    let verb: string | undefined;
    if (peek(cursor) === ":") {
      cursor.pos++;
      verb = parseLiteral(cursor);
    }
    if (cursor.pos !== template.length) {
      fail(cursor, "unexpected trailing input");
    }

    const parsed: PathTemplate = { template, segments, verb };
    const seen = new Set<string>();
    for (const fieldPath of templateVariables(parsed)) {
      const key = fieldPath.join(".");
      if (seen.has(key)) {
        return {
          ok: false,
          error: `${template}: field '${key}' is bound more than once`,
        };
      }
      seen.add(key);
    }

    return { ok: true, value: parsed };
  } catch (err) {
    if (err instanceof TemplateSyntaxError) {
      return { ok: false, error: `${template}: ${err.message}` };
    }
    throw err;
  }
};
