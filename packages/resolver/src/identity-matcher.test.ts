/**
 * Tests for the identity matcher
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { matchIdentity, noticeToDiagnostic } from "./identity-matcher.js";
import type {
  ModuleIdentity,
  ModuleSymbol,
  ModuleVersion,
} from "./types/module.js";

const moduleOf = (
  name: string,
  version: ModuleVersion,
  publicKeyToken?: Uint8Array
): ModuleSymbol => ({
  identity:
    publicKeyToken === undefined
      ? { name, version }
      : { name, version, publicKeyToken },
  filePath: `/modules/${name}-${version.join(".")}.metadata.json`,
  references: [],
  globalNamespace: { name: "", fullName: "", types: [], namespaces: [] },
});

const request = (
  name: string,
  version: ModuleVersion,
  publicKeyToken?: Uint8Array
): ModuleIdentity =>
  publicKeyToken === undefined
    ? { name, version }
    : { name, version, publicKeyToken };

describe("Identity Matcher", () => {
  it("should report unresolved when nothing is bound under the name", () => {
    const result = matchIdentity(request("Foo", [1, 0, 0, 0]), [
      moduleOf("Bar", [1, 0, 0, 0]),
    ]);
    expect(result.kind).to.equal("unresolved");
  });

  it("should resolve an exact match without notices", () => {
    const foo = moduleOf("Foo", [1, 2, 0, 0]);
    const result = matchIdentity(request("Foo", [1, 2, 0, 0]), [foo]);
    expect(result.kind).to.equal("resolved");
    if (result.kind === "resolved") {
      expect(result.module).to.equal(foo);
      expect(result.notices).to.deep.equal([]);
    }
  });

  it("should resolve a version mismatch with one notice", () => {
    const result = matchIdentity(request("Foo", [1, 2, 0, 0]), [
      moduleOf("Foo", [1, 0, 0, 0]),
    ]);
    expect(result.kind).to.equal("resolved");
    if (result.kind === "resolved") {
      expect(result.notices).to.deep.equal([
        { kind: "version", name: "Foo", found: "1.0.0.0", requested: "1.2.0.0" },
      ]);
    }
  });

  it("should render key mismatches as lowercase hex, empty when absent", () => {
    const result = matchIdentity(request("Foo", [1, 0, 0, 0]), [
      moduleOf("Foo", [1, 0, 0, 0], new Uint8Array([0xab, 0x0c])),
    ]);
    expect(result.kind).to.equal("resolved");
    if (result.kind === "resolved") {
      expect(result.notices).to.deep.equal([
        { kind: "publicKeyToken", name: "Foo", found: "ab0c", requested: "" },
      ]);
    }
  });

  it("should still resolve with both mismatches", () => {
    const result = matchIdentity(
      request("Foo", [2, 0, 0, 0], new Uint8Array([0x01])),
      [moduleOf("Foo", [1, 0, 0, 0])]
    );
    expect(result.kind).to.equal("resolved");
    if (result.kind === "resolved") {
      expect(result.notices.map((n) => n.kind)).to.deep.equal([
        "version",
        "publicKeyToken",
      ]);
    }
  });

  it("should prefer the exact version among several candidates", () => {
    const older = moduleOf("Foo", [1, 0, 0, 0]);
    const exact = moduleOf("Foo", [1, 2, 0, 0]);
    const newer = moduleOf("Foo", [3, 0, 0, 0]);
    const result = matchIdentity(request("Foo", [1, 2, 0, 0]), [
      older,
      newer,
      exact,
    ]);
    expect(result.kind === "resolved" && result.module).to.equal(exact);
  });

  it("should fall back to the highest version", () => {
    const older = moduleOf("Foo", [1, 0, 0, 0]);
    const newer = moduleOf("Foo", [3, 0, 0, 0]);
    const result = matchIdentity(request("Foo", [2, 0, 0, 0]), [older, newer]);
    expect(result.kind === "resolved" && result.module).to.equal(newer);
  });

  describe("noticeToDiagnostic", () => {
    it("should format version notices as GEN2001 warnings", () => {
      const diagnostic = noticeToDiagnostic({
        kind: "version",
        name: "Foo",
        found: "1.0.0.0",
        requested: "1.2.0.0",
      });
      expect(diagnostic.code).to.equal("GEN2001");
      expect(diagnostic.severity).to.equal("warning");
      expect(diagnostic.message).to.equal(
        "Found 'Foo' with version '1.0.0.0' instead of '1.2.0.0'."
      );
    });

    it("should format key notices as GEN2002 warnings", () => {
      const diagnostic = noticeToDiagnostic({
        kind: "publicKeyToken",
        name: "Foo",
        found: "abcd",
        requested: "",
      });
      expect(diagnostic.code).to.equal("GEN2002");
      expect(diagnostic.message).to.equal(
        "Found 'Foo' with PublicKeyToken 'abcd' instead of ''."
      );
    });
  });
});
