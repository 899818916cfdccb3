/**
 * Tests for HTTP path template parsing
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parsePathTemplate, templateVariables } from "./path-template.js";

describe("parsePathTemplate", () => {
  it("parses literal segments", () => {
    const result = parsePathTemplate("/v1/items");
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.segments).to.deep.equal([
      { kind: "literal", value: "v1" },
      { kind: "literal", value: "items" },
    ]);
    expect(result.value.verb).to.equal(undefined);
  });

  it("treats a lone slash as the root path", () => {
    const result = parsePathTemplate("/");
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.segments).to.deep.equal([]);
  });

  it("defaults a variable to a single wildcard segment", () => {
    const result = parsePathTemplate("/v1/items/{id}");
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.segments[2]).to.deep.equal({
      kind: "variable",
      fieldPath: ["id"],
      segments: [{ kind: "wildcard" }],
    });
  });

  it("parses nested field paths, explicit segments and a verb", () => {
    const result = parsePathTemplate("/v1/{book.name=shelves/*/books/**}:publish");
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.verb).to.equal("publish");
    expect(result.value.segments).to.deep.equal([
      { kind: "literal", value: "v1" },
      {
        kind: "variable",
        fieldPath: ["book", "name"],
        segments: [
          { kind: "literal", value: "shelves" },
          { kind: "wildcard" },
          { kind: "literal", value: "books" },
          { kind: "deepWildcard" },
        ],
      },
    ]);
  });

  it("lists bound field paths in template order", () => {
    const result = parsePathTemplate("/v1/{parent}/things/{thing.id}");
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(templateVariables(result.value)).to.deep.equal([
      ["parent"],
      ["thing", "id"],
    ]);
  });

  it("requires a leading slash", () => {
    const result = parsePathTemplate("v1/items");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error).to.equal("v1/items: expected '/' at offset 0");
  });

  it("rejects an empty trailing segment", () => {
    const result = parsePathTemplate("/v1/");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error).to.equal("/v1/: expected a literal at offset 4");
  });

  it("rejects nested variables", () => {
    const result = parsePathTemplate("/v1/{a={b}}");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error).to.equal(
      "/v1/{a={b}}: nested variables are not allowed at offset 7"
    );
  });

  it("rejects a field bound twice", () => {
    const result = parsePathTemplate("/v1/{id}/{id}");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error).to.equal("/v1/{id}/{id}: field 'id' is bound more than once");
  });

  it("rejects an unterminated variable", () => {
    const result = parsePathTemplate("/v1/{id");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error).to.equal("/v1/{id: expected '}' at offset 7");
  });
});
