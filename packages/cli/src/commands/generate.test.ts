/**
 * Tests for the generate command
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fixtureSet } from "@protogate/frontend/testing";
import { resolveConfig } from "../config.js";
import { generateCommand, generateFiles } from "./generate.js";

describe("generate command", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "protogate-generate-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeSet = (data: unknown): string => {
    const setPath = path.join(tmpDir, "api.json");
    fs.writeFileSync(setPath, JSON.stringify(data));
    return setPath;
  };

  it("writes one gateway file per target under the output directory", () => {
    const setPath = writeSet(fixtureSet());
    const config = resolveConfig({}, { quiet: true }, tmpDir, setPath);

    const result = generateCommand(config);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value).to.deep.equal([
      path.join(tmpDir, "generated/example.com/gen/items/v1/items.pb.gw.ts"),
      path.join(tmpDir, "generated/example.com/gen/orders/v1/orders.pb.gw.ts"),
    ]);
    const items = fs.readFileSync(result.value[0] ?? "", "utf-8");
    expect(items).to.contain("export function registerItemServiceHandler(");
    expect(items).to.contain('import * as runtime from "@protogate/runtime";');
  });

  it("follows source_relative paths and the output directory option", () => {
    const setPath = writeSet(fixtureSet());
    const config = resolveConfig(
      {},
      { quiet: true, paths: "source_relative", out: "src/gen" },
      tmpDir,
      setPath
    );

    const result = generateCommand(config);

    expect(result.ok && result.value).to.deep.equal([
      path.join(tmpDir, "src/gen/example/v1/items.pb.gw.ts"),
      path.join(tmpDir, "src/gen/example/v1/orders.pb.gw.ts"),
    ]);
  });

  it("maps a missing descriptor file to the descriptor exit code", () => {
    const config = resolveConfig(
      {},
      { quiet: true },
      tmpDir,
      path.join(tmpDir, "missing.json")
    );

    const result = generateCommand(config);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.exitCode).to.equal(4);
    expect(result.error.message).to.contain("PGW9001");
  });

  it("maps registry errors to the descriptor exit code", () => {
    const setPath = writeSet(fixtureSet({ filesToGenerate: ["nope.proto"] }));
    const config = resolveConfig({}, { quiet: true }, tmpDir, setPath);

    const result = generateCommand(config);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.exitCode).to.equal(4);
    expect(result.error.message).to.equal(
      "error PGW3003: File to generate not found: nope.proto"
    );
  });

  it("maps bad path settings to the config exit code", () => {
    const config = resolveConfig(
      {},
      { quiet: true, paths: "source_relative", module: "example.com/gen" },
      tmpDir
    );

    const result = generateFiles(fixtureSet(), config);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.exitCode).to.equal(1);
  });

  it("maps generation failures to the generation exit code", () => {
    const config = resolveConfig(
      {},
      { quiet: true, module: "example.com/gen/items" },
      tmpDir
    );

    const result = generateFiles(fixtureSet(), config);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.exitCode).to.equal(5);
    expect(result.error.message).to.contain("PGW1003");
  });

  it("requires a descriptor file", () => {
    const result = generateCommand(resolveConfig({}, { quiet: true }, tmpDir));
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error).to.deep.equal({
      exitCode: 3,
      message: "Descriptor file required",
    });
  });

  it("forces package documentation off when asked", () => {
    const config = resolveConfig({}, { quiet: true, omitPackageDoc: true }, tmpDir);
    const result = generateFiles(fixtureSet(), config);
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value[0]?.content).to.not.contain("@packageDocumentation");
  });
});
