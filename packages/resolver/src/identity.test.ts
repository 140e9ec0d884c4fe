/**
 * Tests for module identity parsing and formatting
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  compareVersions,
  formatIdentity,
  formatPublicKeyToken,
  parseIdentity,
  parsePublicKeyToken,
  parseVersion,
} from "./identity.js";

describe("Module identity", () => {
  describe("parseVersion", () => {
    it("should pad missing parts with zeros", () => {
      expect(parseVersion("1.2")).to.deep.equal([1, 2, 0, 0]);
    });

    it("should parse four parts", () => {
      expect(parseVersion("8.0.1.7")).to.deep.equal([8, 0, 1, 7]);
    });

    it("should reject more than four parts", () => {
      expect(parseVersion("1.2.3.4.5")).to.equal(undefined);
    });

    it("should reject parts above 65535", () => {
      expect(parseVersion("1.65535")).to.deep.equal([1, 65535, 0, 0]);
      expect(parseVersion("1.65536")).to.equal(undefined);
      expect(parseVersion("1.99999999999999999999")).to.equal(undefined);
    });

    it("should reject non-numeric parts", () => {
      expect(parseVersion("1.x")).to.equal(undefined);
      expect(parseVersion("")).to.equal(undefined);
    });
  });

  describe("compareVersions", () => {
    it("should order by the most significant differing part", () => {
      expect(compareVersions([1, 10, 0, 0], [1, 9, 9, 9])).to.be.greaterThan(0);
      expect(compareVersions([1, 0, 0, 0], [1, 0, 0, 1])).to.be.lessThan(0);
      expect(compareVersions([2, 0, 0, 0], [2, 0, 0, 0])).to.equal(0);
    });
  });

  describe("public key tokens", () => {
    it("should render lowercase hex with two digits per byte", () => {
      expect(formatPublicKeyToken(new Uint8Array([0x0a, 0xbc, 0x01]))).to.equal(
        "0abc01"
      );
    });

    it("should render a missing token as the empty string", () => {
      expect(formatPublicKeyToken(undefined)).to.equal("");
    });

    it("should parse mixed-case hex", () => {
      expect(Array.from(parsePublicKeyToken("B77A") ?? [])).to.deep.equal([
        0xb7, 0x7a,
      ]);
    });

    it("should reject odd-length or non-hex tokens", () => {
      expect(parsePublicKeyToken("abc")).to.equal(undefined);
      expect(parsePublicKeyToken("zz")).to.equal(undefined);
    });
  });

  describe("parseIdentity", () => {
    it("should parse a full display string", () => {
      const result = parseIdentity(
        "Contoso.Core, Version=1.2.0.0, Culture=neutral, PublicKeyToken=b77a5c561934e089"
      );
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.name).to.equal("Contoso.Core");
        expect(result.value.version).to.deep.equal([1, 2, 0, 0]);
        expect(formatPublicKeyToken(result.value.publicKeyToken)).to.equal(
          "b77a5c561934e089"
        );
      }
    });

    it("should treat a bare name as version 0.0.0.0 without a key", () => {
      const result = parseIdentity("Foo");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value).to.deep.equal({ name: "Foo", version: [0, 0, 0, 0] });
      }
    });

    it("should treat PublicKeyToken=null as no key", () => {
      const result = parseIdentity("Foo, Version=1.0, PublicKeyToken=null");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.publicKeyToken).to.equal(undefined);
      }
    });

    it("should report GEN3001 for a bad version", () => {
      const result = parseIdentity("Foo, Version=one");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("GEN3001");
        expect(result.error.message).to.equal(
          "Invalid module identity 'Foo, Version=one': bad version 'one'"
        );
      }
    });

    it("should report GEN3001 for an out-of-range version part", () => {
      const result = parseIdentity("Foo, Version=1.99999999999999999999");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("GEN3001");
        expect(result.error.message).to.equal(
          "Invalid module identity 'Foo, Version=1.99999999999999999999': bad version '1.99999999999999999999'"
        );
      }
    });

    it("should report GEN3001 for a missing name", () => {
      const result = parseIdentity(", Version=1.0.0.0");
      expect(result.ok).to.equal(false);
    });

    it("should report GEN3001 for unknown properties", () => {
      const result = parseIdentity("Foo, Flavor=mild");
      expect(result.ok).to.equal(false);
    });
  });

  describe("formatIdentity", () => {
    it("should render the display form", () => {
      expect(
        formatIdentity({
          name: "Foo",
          version: [1, 2, 0, 0],
          publicKeyToken: new Uint8Array([0xab, 0xcd]),
        })
      ).to.equal("Foo, Version=1.2.0.0, Culture=neutral, PublicKeyToken=abcd");
    });

    it("should render a missing key as null", () => {
      expect(formatIdentity({ name: "Foo", version: [1, 0, 0, 0] })).to.equal(
        "Foo, Version=1.0.0.0, Culture=neutral, PublicKeyToken=null"
      );
    });
  });
});
