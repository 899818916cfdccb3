/**
 * Tests for diagnostic formatting
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic, formatDiagnostic, isError } from "./diagnostic.js";

describe("Diagnostics", () => {
  it("defaults to error severity", () => {
    const diagnostic = createDiagnostic("PGW1001", "Unknown path type");
    expect(diagnostic.severity).to.equal("error");
    expect(isError(diagnostic)).to.equal(true);
  });

  it("formats location, code, message and hint on one line", () => {
    const diagnostic = createDiagnostic("PGW9003", "Invalid JSON", {
      location: { file: "set.json", line: 3, column: 7 },
      hint: "check the trailing comma",
    });
    expect(formatDiagnostic(diagnostic)).to.equal(
      "set.json:3:7 error PGW9003: Invalid JSON Hint: check the trailing comma"
    );
  });

  it("appends the detail on the following lines", () => {
    const diagnostic = createDiagnostic("PGW2002", "does not parse", {
      severity: "warning",
      detail: "line one\nline two",
    });
    expect(isError(diagnostic)).to.equal(false);
    expect(formatDiagnostic(diagnostic)).to.equal(
      "warning PGW2002: does not parse\nline one\nline two"
    );
  });
});
