/**
 * Tests for the plugin command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { Readable } from "node:stream";
import { fixtureSet } from "@protogate/frontend/testing";
import { pluginCommand, readStream } from "./plugin.js";

const request = (parameter: string, fileToGenerate?: readonly string[]): string =>
  JSON.stringify({
    fileToGenerate,
    parameter,
    protoFile: fixtureSet().files,
  });

describe("plugin command", () => {
  it("answers with the generated files", () => {
    const response = pluginCommand(
      request("paths=source_relative", ["example/v1/orders.proto"]),
      "/project"
    );
    expect("file" in response).to.equal(true);
    if (!("file" in response)) return;
    expect(response.file.map((f) => f.name)).to.deep.equal([
      "example/v1/orders.pb.gw.ts",
    ]);
    expect(response.file[0]?.content).to.contain(
      "export function registerOrderServiceHandler("
    );
  });

  it("applies the register function suffix parameter", () => {
    const response = pluginCommand(
      request("register_func_suffix=Routes", ["example/v1/items.proto"]),
      "/project"
    );
    expect(response).to.have.property("file");
    if (!("file" in response)) return;
    expect(response.file[0]?.content).to.contain(
      "export function registerItemServiceRoutes("
    );
  });

  it("applies package map parameters", () => {
    const response = pluginCommand(
      request("Mexample/v1/orders.proto=example.com/mapped/orders", [
        "example/v1/orders.proto",
      ]),
      "/project"
    );
    expect(response).to.have.property("file");
    if (!("file" in response)) return;
    expect(response.file[0]?.name).to.equal(
      "example.com/mapped/orders/orders.pb.gw.ts"
    );
  });

  it("reports unknown parameters", () => {
    expect(pluginCommand(request("fast=true"), "/project")).to.deep.equal({
      error: 'Unknown parameter "fast"',
    });
  });

  it("reports conflicting path settings", () => {
    const response = pluginCommand(
      request("paths=source_relative,module=example.com/gen"),
      "/project"
    );
    expect(response).to.deep.equal({
      error:
        "error PGW1002: Cannot use module=example.com/gen with paths=source_relative Hint: module= only applies to paths=import",
    });
  });

  it("reports requests that are not JSON objects", () => {
    expect(pluginCommand("[]", "/project")).to.deep.equal({
      error: "Invalid plugin request: expected an object",
    });
  });

  it("reports a request without proto files", () => {
    expect(pluginCommand("{}", "/project")).to.deep.equal({
      error: "error PGW9004: plugin request: descriptor set: 'files' is required",
    });
  });

  it("reads a whole stream", async () => {
    const text = await readStream(Readable.from(["{\"a\":", Buffer.from("1}")]));
    expect(text).to.equal('{"a":1}');
  });
});
