/**
 * Tests for the metadata module reader
 */

import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  createMetadataReader,
  parseModuleDocument,
  readMetadataModule,
} from "./module-reader.js";
import { formatPublicKeyToken } from "./identity.js";

const widgetModule = {
  name: "Contoso.Core",
  version: "1.2.0.0",
  publicKeyToken: "b77a5c561934e089",
  references: [{ name: "System.Runtime", version: "8.0.0.0" }],
  types: [
    {
      namespace: "Contoso.Core",
      name: "Widget",
      kind: "class",
      accessibility: "public",
      baseType: "System.Object",
      typeParameters: [{ name: "T", constraints: ["class", "new()"] }],
      methods: [
        {
          name: "Render",
          returnType: "System.String",
          accessibility: "public",
          parameters: [
            { name: "count", type: "System.Int32", defaultValue: 3 },
          ],
        },
      ],
      properties: [
        {
          name: "Size",
          type: "System.Int32",
          accessibility: "public",
          getter: {},
          setter: { accessibility: "protected" },
        },
      ],
      nestedTypes: [
        { name: "Part", kind: "struct", accessibility: "public" },
      ],
    },
    {
      namespace: "Contoso.Core.Text",
      name: "Glyph",
      kind: "enum",
      accessibility: "public",
      enumMembers: [
        { name: "None", value: 0 },
        { name: "Bold", value: 1 },
      ],
    },
    { name: "Loose", kind: "interface", accessibility: "public" },
  ],
};

describe("Module Reader", () => {
  describe("parseModuleDocument", () => {
    it("should read identity and references", () => {
      const result = parseModuleDocument(
        JSON.stringify(widgetModule),
        "/m/Contoso.Core.metadata.json"
      );
      expect(result.ok).to.equal(true);
      if (!result.ok) return;

      const module = result.value;
      expect(module.identity.name).to.equal("Contoso.Core");
      expect(module.identity.version).to.deep.equal([1, 2, 0, 0]);
      expect(formatPublicKeyToken(module.identity.publicKeyToken)).to.equal(
        "b77a5c561934e089"
      );
      expect(module.references).to.deep.equal([
        { name: "System.Runtime", version: [8, 0, 0, 0] },
      ]);
      expect(module.filePath).to.equal("/m/Contoso.Core.metadata.json");
    });

    it("should build a sorted namespace tree", () => {
      const result = parseModuleDocument(JSON.stringify(widgetModule), "x");
      expect(result.ok).to.equal(true);
      if (!result.ok) return;

      const root = result.value.globalNamespace;
      expect(root.types.map((t) => t.name)).to.deep.equal(["Loose"]);
      expect(root.namespaces.map((n) => n.fullName)).to.deep.equal([
        "Contoso",
      ]);
      const core = root.namespaces[0]?.namespaces[0];
      expect(core?.fullName).to.equal("Contoso.Core");
      expect(core?.types.map((t) => t.name)).to.deep.equal(["Widget"]);
      expect(core?.namespaces[0]?.fullName).to.equal("Contoso.Core.Text");
    });

    it("should read members, accessors and nested types", () => {
      const result = parseModuleDocument(JSON.stringify(widgetModule), "x");
      expect(result.ok).to.equal(true);
      if (!result.ok) return;

      const widget =
        result.value.globalNamespace.namespaces[0]?.namespaces[0]?.types[0];
      expect(widget?.fullName).to.equal("Contoso.Core.Widget");
      expect(widget?.typeParameters[0]?.constraints).to.deep.equal([
        { kind: "class" },
        { kind: "new" },
      ]);
      expect(widget?.methods[0]?.parameters[0]?.defaultValue).to.deep.equal({
        value: 3,
      });
      expect(widget?.properties[0]?.getter).to.deep.equal({
        accessibility: "public",
        isInit: false,
      });
      expect(widget?.properties[0]?.setter?.accessibility).to.equal(
        "protected"
      );
      expect(widget?.nestedTypes[0]?.fullName).to.equal(
        "Contoso.Core.Widget+Part"
      );
      expect(widget?.nestedTypes[0]?.namespace).to.equal("Contoso.Core");
    });

    it("should reject invalid JSON with GEN1003", () => {
      const result = parseModuleDocument("{ nope", "bad.metadata.json");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("GEN1003");
        expect(result.error[0]?.file).to.equal("bad.metadata.json");
      }
    });

    it("should reject non-object documents with GEN1004", () => {
      const result = parseModuleDocument("[]", "bad.metadata.json");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "Module file must be an object, got array"
        );
      }
    });

    it("should report missing fields with their location", () => {
      const result = parseModuleDocument(
        JSON.stringify({
          name: "M",
          types: [{ name: "A", kind: "class" }],
        }),
        "/m/M.metadata.json"
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.message)).to.deep.equal([
          "'accessibility' must be one of public, protected, protectedInternal, internal, privateProtected, private at M.metadata.json.types[0]",
        ]);
        expect(result.error[0]?.code).to.equal("GEN1005");
      }
    });

    it("should report bad type references with GEN1006", () => {
      const result = parseModuleDocument(
        JSON.stringify({
          name: "M",
          types: [
            {
              name: "A",
              kind: "class",
              accessibility: "public",
              fields: [
                { name: "f", type: "List<", accessibility: "public" },
              ],
            },
          ],
        }),
        "M.metadata.json"
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("GEN1006");
        expect(result.error[0]?.message).to.equal(
          "Invalid type reference 'List<' at M.metadata.json.types[0].fields[0].type"
        );
      }
    });

    it("should report bad identities with GEN1007", () => {
      const result = parseModuleDocument(
        JSON.stringify({ name: "M", version: "1.x", publicKeyToken: "xyz" }),
        "M.metadata.json"
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.code)).to.deep.equal([
          "GEN1007",
          "GEN1007",
        ]);
      }
    });

    it("should require an invoke signature for delegates", () => {
      const result = parseModuleDocument(
        JSON.stringify({
          name: "M",
          types: [{ name: "Handler", kind: "delegate", accessibility: "public" }],
        }),
        "M.metadata.json"
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "Expected an object at M.metadata.json.types[0].invoke"
        );
      }
    });

    it("should read 64-bit enum values written as decimal strings", () => {
      const result = parseModuleDocument(
        JSON.stringify({
          name: "M",
          types: [
            {
              name: "Limits",
              kind: "enum",
              accessibility: "public",
              enumUnderlyingType: "System.UInt64",
              enumMembers: [
                { name: "None", value: 0 },
                { name: "All", value: "18446744073709551615" },
                { name: "Min", value: "-9223372036854775808" },
              ],
            },
          ],
        }),
        "M.metadata.json"
      );
      expect(result.ok).to.equal(true);
      if (result.ok) {
        const members = result.value.globalNamespace.types[0]?.enumMembers ?? [];
        expect(members.map((m) => m.name)).to.deep.equal(["None", "All", "Min"]);
        expect(members[0]?.value).to.equal(0);
        expect(members[1]?.value).to.equal(18446744073709551615n);
        expect(members[2]?.value).to.equal(-9223372036854775808n);
      }
    });

    it("should read large constants written as integer objects", () => {
      const result = parseModuleDocument(
        JSON.stringify({
          name: "M",
          types: [
            {
              name: "Limits",
              kind: "class",
              accessibility: "public",
              fields: [
                {
                  name: "Max",
                  type: "System.UInt64",
                  accessibility: "public",
                  isStatic: true,
                  isConst: true,
                  constantValue: { integer: "18446744073709551615" },
                },
              ],
            },
          ],
        }),
        "M.metadata.json"
      );
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.globalNamespace.types[0]?.fields[0]?.constantValue?.value).to.equal(
          18446744073709551615n
        );
      }
    });

    it("should reject integers outside the safe range with GEN1005", () => {
      const content =
        '{"name":"M","types":[{"name":"Limits","kind":"enum","accessibility":"public",' +
        '"enumMembers":[{"name":"All","value":18446744073709551615}]}]}';
      const result = parseModuleDocument(content, "M.metadata.json");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("GEN1005");
        expect(result.error[0]?.message).to.equal(
          "Integer 18446744073709552000 is outside the safe range at M.metadata.json.types[0].enumMembers[0].value; write it as a decimal string"
        );
      }
    });

    it("should reject malformed decimal strings", () => {
      const result = parseModuleDocument(
        JSON.stringify({
          name: "M",
          types: [
            {
              name: "Limits",
              kind: "enum",
              accessibility: "public",
              enumMembers: [{ name: "All", value: "0x10" }],
            },
          ],
        }),
        "M.metadata.json"
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "Invalid integer '0x10' at M.metadata.json.types[0].enumMembers[0].value"
        );
      }
    });
  });

  describe("readMetadataModule", () => {
    let tmpDir: string | undefined;

    afterEach(() => {
      if (tmpDir) {
        fs.rmSync(tmpDir, { recursive: true, force: true });
        tmpDir = undefined;
      }
    });

    it("should read a module file from disk", () => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "genapi-reader-"));
      const filePath = path.join(tmpDir, "Contoso.Core.metadata.json");
      fs.writeFileSync(filePath, JSON.stringify(widgetModule));

      const result = createMetadataReader().readModule(filePath);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.identity.name).to.equal("Contoso.Core");
      }
    });

    it("should report GEN1001 for a missing file", () => {
      const result = readMetadataModule("/nonexistent/Foo.metadata.json");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("GEN1001");
      }
    });

    it("should use the .metadata.json extension", () => {
      expect(createMetadataReader().extension).to.equal(".metadata.json");
    });
  });
});
