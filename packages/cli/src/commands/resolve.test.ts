/**
 * Tests for the resolve command
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { formatResolvedModule, resolveCommand } from "./resolve.js";
import type { ResolvedConfig } from "../types.js";

describe("resolve command", () => {
  let tmpDir: string;

  const writeModule = (name: string, version: string, publicKeyToken?: string): string => {
    const filePath = path.join(tmpDir, "refs", `${name}.metadata.json`);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ name, version, publicKeyToken }));
    return filePath;
  };

  const configFor = (identities: readonly string[]): ResolvedConfig => ({
    projectRoot: tmpDir,
    modules: [],
    references: [path.join(tmpDir, "refs")],
    identities,
    output: undefined,
    strict: false,
    verbose: false,
    quiet: true,
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "genapi-resolve-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should resolve identities in the order requested", () => {
    const alpha = writeModule("Alpha", "1.0.0.0");
    const beta = writeModule("Beta", "2.1.0.0", "b77a5c561934e089");

    const result = resolveCommand(
      configFor(["Beta, Version=2.1.0.0", "Alpha, Version=1.0.0.0"])
    );

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.map((m) => m.filePath)).to.deep.equal([beta, alpha]);
    }
  });

  it("should resolve despite a version mismatch", () => {
    writeModule("Alpha", "1.5.0.0");

    const result = resolveCommand(configFor(["Alpha, Version=1.0.0.0"]));

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value[0]?.identity.version).to.deep.equal([1, 5, 0, 0]);
    }
  });

  it("should fail when an identity cannot be resolved", () => {
    writeModule("Alpha", "1.0.0.0");

    const result = resolveCommand(configFor(["Alpha", "Gamma"]));

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error).to.equal("1 of 2 module identities could not be resolved");
    }
  });

  it("should format a resolved module as identity and path", () => {
    const filePath = writeModule("Beta", "2.1.0.0", "b77a5c561934e089");
    const result = resolveCommand(configFor(["Beta"]));

    expect(result.ok).to.equal(true);
    if (result.ok) {
      const [module] = result.value;
      expect(module && formatResolvedModule(module)).to.equal(
        `Beta, Version=2.1.0.0, Culture=neutral, PublicKeyToken=b77a5c561934e089 => ${filePath}`
      );
    }
  });
});
