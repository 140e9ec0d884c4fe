/**
 * Tests for CLI command dispatch and exit codes
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { runCli } from "./dispatcher.js";

describe("CLI Dispatcher", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "genapi-cli-"));
    fs.mkdirSync(path.join(tmpDir, "lib"));
    fs.writeFileSync(
      path.join(tmpDir, "lib", "Shapes.metadata.json"),
      JSON.stringify({
        name: "Shapes",
        version: "1.0.0.0",
        types: [
          {
            namespace: "Shapes",
            name: "Kind",
            kind: "enum",
            accessibility: "public",
            enumMembers: [
              { name: "Circle", value: 0 },
              { name: "Square", value: 1 },
            ],
          },
        ],
      })
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should return 0 for --version", async () => {
    expect(await runCli(["--version"], tmpDir)).to.equal(0);
  });

  it("should return 2 for an unknown command", async () => {
    expect(await runCli(["publish"], tmpDir)).to.equal(2);
  });

  it("should return 2 for an unknown option", async () => {
    expect(await runCli(["generate", "lib", "--fast"], tmpDir)).to.equal(2);
  });

  it("should return 2 when generate has no modules", async () => {
    expect(await runCli(["generate"], tmpDir)).to.equal(2);
  });

  it("should return 2 when resolve has no identities", async () => {
    expect(await runCli(["resolve"], tmpDir)).to.equal(2);
  });

  it("should return 3 when the named config file is missing", async () => {
    expect(await runCli(["generate", "lib", "-c", "nope.json"], tmpDir)).to.equal(3);
  });

  it("should return 3 when genapi.json is invalid", async () => {
    fs.writeFileSync(path.join(tmpDir, "genapi.json"), JSON.stringify({ strict: 1 }));
    expect(await runCli(["generate", "lib"], tmpDir)).to.equal(3);
  });

  it("should generate from positional arguments", async () => {
    const code = await runCli(["generate", "lib", "", "api.cs", "-q"], tmpDir);

    expect(code).to.equal(0);
    expect(fs.readFileSync(path.join(tmpDir, "api.cs"), "utf-8")).to.equal(
      [
        "namespace Shapes",
        "{",
        "    public enum Kind",
        "    {",
        "        Circle = 0,",
        "        Square = 1",
        "    }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("should generate from genapi.json", async () => {
    fs.writeFileSync(
      path.join(tmpDir, "genapi.json"),
      JSON.stringify({ modules: ["lib"], output: "out/api.cs" })
    );
    const nested = path.join(tmpDir, "src");
    fs.mkdirSync(nested);

    expect(await runCli(["generate", "-q"], nested)).to.equal(0);
    expect(fs.existsSync(path.join(tmpDir, "out", "api.cs"))).to.be.true;
  });

  it("should return 1 when strict resolution fails", async () => {
    const code = await runCli(
      ["generate", "lib", "-o", "api.cs", "-m", "Missing", "--strict", "-q"],
      tmpDir
    );
    expect(code).to.equal(1);
    expect(fs.existsSync(path.join(tmpDir, "api.cs"))).to.be.false;
  });
});
