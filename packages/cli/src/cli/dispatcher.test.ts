/**
 * Tests for command dispatch and exit codes
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fixtureSet } from "@protogate/frontend/testing";
import { runCli } from "./dispatcher.js";

describe("runCli", () => {
  const originalError = console.error;
  const originalLog = console.log;
  let errors: string[];

  beforeEach(() => {
    errors = [];
    console.error = (...parts: unknown[]) => {
      errors.push(parts.join(" "));
    };
    console.log = () => {};
  });

  afterEach(() => {
    console.error = originalError;
    console.log = originalLog;
  });

  it("returns the usage code for an unknown option", async () => {
    expect(await runCli(["generate", "--fast"])).to.equal(3);
    expect(errors[0]).to.equal("Error: Unknown option: --fast");
  });

  it("returns the unknown command code", async () => {
    expect(await runCli(["frobnicate"])).to.equal(2);
    expect(errors[0]).to.equal("Error: Unknown command 'frobnicate'");
  });

  it("requires a descriptor file for generate", async () => {
    expect(await runCli(["generate"])).to.equal(3);
    expect(errors[0]).to.equal("Error: Descriptor file required");
  });

  it("answers help and version", async () => {
    expect(await runCli(["--help"])).to.equal(0);
    expect(await runCli(["--version"])).to.equal(0);
    expect(await runCli([])).to.equal(0);
  });

  describe("generate", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "protogate-cli-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("writes gateway files under the configured output directory", async () => {
      const setPath = path.join(tmpDir, "api.json");
      const configPath = path.join(tmpDir, "protogate.json");
      fs.writeFileSync(setPath, JSON.stringify(fixtureSet()));
      fs.writeFileSync(
        configPath,
        JSON.stringify({ outputDirectory: "out", paths: "source_relative" })
      );

      const code = await runCli(["generate", setPath, "-c", configPath, "-q"]);

      expect(code).to.equal(0);
      expect(
        fs.existsSync(path.join(tmpDir, "out/example/v1/items.pb.gw.ts"))
      ).to.equal(true);
    });

    it("returns the config code for a broken config file", async () => {
      const configPath = path.join(tmpDir, "protogate.json");
      fs.writeFileSync(configPath, JSON.stringify({ standalone: "yes" }));

      const code = await runCli([
        "generate",
        path.join(tmpDir, "api.json"),
        "-c",
        configPath,
      ]);

      expect(code).to.equal(1);
    });

    it("returns the descriptor code for a missing descriptor set", async () => {
      const configPath = path.join(tmpDir, "protogate.json");
      fs.writeFileSync(configPath, "{}");

      const code = await runCli([
        "generate",
        path.join(tmpDir, "missing.json"),
        "-c",
        configPath,
        "-q",
      ]);

      expect(code).to.equal(4);
      expect(errors).to.deep.equal([]);
    });
  });
});
