/**
 * Tests for the reference resolver
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { createReferenceResolver, splitSearchPath } from "./reference-resolver.js";
import { createSymbolUniverse } from "./symbol-universe.js";
import { createMetadataReader } from "./module-reader.js";
import type { Diagnostic } from "./types/diagnostic.js";

const writeModule = (
  directory: string,
  fileName: string,
  name: string,
  version: string,
  publicKeyToken?: string
): string => {
  fs.mkdirSync(directory, { recursive: true });
  const filePath = path.join(directory, fileName);
  fs.writeFileSync(
    filePath,
    JSON.stringify({ name, version, publicKeyToken, types: [] })
  );
  return filePath;
};

describe("Reference Resolver", () => {
  let tmpDir: string;
  let notices: Diagnostic[];

  const createResolver = (env: Record<string, string> = {}) => {
    const universe = createSymbolUniverse();
    const resolver = createReferenceResolver(universe, createMetadataReader(), {
      onNotice: (notice) => notices.push(notice),
      env,
    });
    return { universe, resolver };
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "genapi-resolver-"));
    notices = [];
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("splitSearchPath", () => {
    it("should split on commas and semicolons and drop empty entries", () => {
      expect(splitSearchPath("a;b,, ;c")).to.deep.equal(["a", "b", "c"]);
    });
  });

  describe("registerSearchPath", () => {
    it("should bind every module file directly inside a directory", () => {
      const dir = path.join(tmpDir, "lib");
      writeModule(dir, "B.metadata.json", "B", "1.0.0.0");
      writeModule(dir, "A.metadata.json", "A", "1.0.0.0");
      writeModule(path.join(dir, "nested"), "C.metadata.json", "C", "1.0.0.0");
      fs.writeFileSync(path.join(dir, "readme.txt"), "not a module");

      const { resolver } = createResolver();
      const bound = resolver.registerSearchPath(dir);

      expect(bound.map((m) => m.fileName)).to.deep.equal([
        "A.metadata.json",
        "B.metadata.json",
      ]);
      expect(resolver.searchDirectories).to.deep.equal([dir]);
    });

    it("should register the directory of a file entry and bind only that file", () => {
      const dir = path.join(tmpDir, "lib");
      const file = writeModule(dir, "A.metadata.json", "A", "1.0.0.0");
      writeModule(dir, "B.metadata.json", "B", "1.0.0.0");

      const { resolver, universe } = createResolver();
      resolver.registerSearchPath(file);

      expect(resolver.searchDirectories).to.deep.equal([dir]);
      expect(universe.modules.map((m) => m.fileName)).to.deep.equal([
        "A.metadata.json",
      ]);
    });

    it("should skip entries that do not exist", () => {
      const { resolver } = createResolver();
      const bound = resolver.registerSearchPath(
        `${path.join(tmpDir, "missing")};${path.join(tmpDir, "gone.metadata.json")}`
      );
      expect(bound).to.deep.equal([]);
      expect(resolver.searchDirectories).to.deep.equal([]);
    });

    it("should expand environment variables in entries", () => {
      const dir = path.join(tmpDir, "sdk");
      writeModule(dir, "A.metadata.json", "A", "1.0.0.0");

      const { resolver } = createResolver({ SDK: tmpDir });
      resolver.registerSearchPath("%SDK%/sdk");

      expect(resolver.searchDirectories).to.deep.equal([dir]);
    });
  });

  describe("bindIfAbsent", () => {
    it("should deduplicate by file name across directories without a diagnostic", () => {
      const first = writeModule(
        path.join(tmpDir, "one"),
        "Foo.metadata.json",
        "Foo",
        "1.0.0.0"
      );
      const second = writeModule(
        path.join(tmpDir, "two"),
        "Foo.metadata.json",
        "Foo",
        "2.0.0.0"
      );

      const { resolver, universe } = createResolver();
      const a = resolver.bindIfAbsent(first);
      const b = resolver.bindIfAbsent(second);

      expect(b).to.equal(a);
      expect(universe.modules).to.have.length(1);
      expect(resolver.hasDiagnostics()).to.deep.equal({
        hasDiagnostics: false,
        diagnostics: [],
      });
    });
  });

  describe("resolve", () => {
    it("should resolve a version mismatch with one notice", () => {
      const dir = path.join(tmpDir, "lib");
      writeModule(dir, "Foo.metadata.json", "Foo", "1.0.0.0");

      const { resolver } = createResolver();
      resolver.registerSearchPath(dir);
      const resolved = resolver.resolve([
        { name: "Foo", version: [1, 2, 0, 0] },
      ]);

      expect(resolved.map((m) => m.identity.name)).to.deep.equal(["Foo"]);
      expect(notices.map((n) => n.message)).to.deep.equal([
        "Found 'Foo' with version '1.0.0.0' instead of '1.2.0.0'.",
      ]);
    });

    it("should bind from the first registered directory", () => {
      const d1 = path.join(tmpDir, "d1");
      const d2 = path.join(tmpDir, "d2");
      fs.mkdirSync(d1);
      fs.mkdirSync(d2);

      const { resolver } = createResolver();
      resolver.registerSearchPath(`${d1};${d2}`);
      writeModule(d2, "Foo.metadata.json", "Foo", "2.0.0.0");
      writeModule(d1, "Foo.metadata.json", "Foo", "1.0.0.0");

      const resolved = resolver.resolve([
        { name: "Foo", version: [1, 0, 0, 0] },
      ]);
      expect(resolved[0]?.filePath).to.equal(path.join(d1, "Foo.metadata.json"));
      expect(notices).to.deep.equal([]);
    });

    it("should omit unresolved identities and keep the order of the rest", () => {
      const dir = path.join(tmpDir, "lib");
      writeModule(dir, "A.metadata.json", "A", "1.0.0.0");
      writeModule(dir, "B.metadata.json", "B", "1.0.0.0");

      const { resolver } = createResolver();
      resolver.registerSearchPath(dir);
      const resolved = resolver.resolve([
        { name: "B", version: [1, 0, 0, 0] },
        { name: "Missing", version: [1, 0, 0, 0] },
        { name: "A", version: [1, 0, 0, 0] },
      ]);

      expect(resolved.map((m) => m.identity.name)).to.deep.equal(["B", "A"]);
      expect(notices.map((n) => n.code)).to.deep.equal(["GEN2003"]);
      expect(notices[0]?.message).to.equal(
        "Could not resolve module 'Missing, Version=1.0.0.0, Culture=neutral, PublicKeyToken=null'."
      );
    });

    it("should report key mismatches", () => {
      const dir = path.join(tmpDir, "lib");
      writeModule(dir, "Foo.metadata.json", "Foo", "1.0.0.0", "abcd");

      const { resolver } = createResolver();
      resolver.registerSearchPath(dir);
      resolver.resolve([{ name: "Foo", version: [1, 0, 0, 0] }]);

      expect(notices.map((n) => n.message)).to.deep.equal([
        "Found 'Foo' with PublicKeyToken 'abcd' instead of ''.",
      ]);
    });
  });

  describe("loadModules", () => {
    it("should return the modules named by the entries, each once", () => {
      const dir = path.join(tmpDir, "lib");
      const a = writeModule(dir, "A.metadata.json", "A", "1.0.0.0");
      writeModule(dir, "B.metadata.json", "B", "1.0.0.0");

      const { resolver } = createResolver();
      const modules = resolver.loadModules(`${a};${dir}`);

      expect(modules.map((m) => m.identity.name)).to.deep.equal(["A", "B"]);
    });
  });

  describe("hasDiagnostics", () => {
    it("should surface malformed module files", () => {
      const dir = path.join(tmpDir, "lib");
      fs.mkdirSync(dir);
      fs.writeFileSync(path.join(dir, "Bad.metadata.json"), "{ nope");

      const { resolver } = createResolver();
      resolver.registerSearchPath(dir);
      const result = resolver.hasDiagnostics();

      expect(result.hasDiagnostics).to.equal(true);
      expect(result.diagnostics.map((d) => d.code)).to.deep.equal(["GEN1003"]);
    });
  });
});
