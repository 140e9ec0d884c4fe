/**
 * Type references -> type syntax
 *
 * Named types render fully qualified with `global::`; type parameters in
 * scope stay bare; special types become C# keywords.
 */

import { createRequire } from "node:module";
import type { TypeReference } from "@genapi/resolver";
import type { NameSyntax, TypeSyntax } from "./syntax/types.js";
import {
  arrayType,
  predefinedType,
  qualifiedName,
  token,
} from "./syntax/factory.js";

const require = createRequire(import.meta.url);

const loadKeywords = (): readonly string[] => {
  const data: unknown = require("./keywords.json");
  const keywords =
    typeof data === "object" && data !== null && "keywords" in data
      ? data.keywords
      : undefined;
  if (
    !Array.isArray(keywords) ||
    !keywords.every((k): k is string => typeof k === "string")
  ) {
    throw new Error("ICE: keywords.json must hold a 'keywords' array of strings");
  }
  return keywords;
};

const CSHARP_KEYWORDS: ReadonlySet<string> = new Set(loadKeywords());

const SPECIAL_TYPE_KEYWORDS: ReadonlyMap<string, string> = new Map([
  ["System.Void", "void"],
  ["System.Object", "object"],
  ["System.String", "string"],
  ["System.Boolean", "bool"],
  ["System.Char", "char"],
  ["System.SByte", "sbyte"],
  ["System.Byte", "byte"],
  ["System.Int16", "short"],
  ["System.UInt16", "ushort"],
  ["System.Int32", "int"],
  ["System.UInt32", "uint"],
  ["System.Int64", "long"],
  ["System.UInt64", "ulong"],
  ["System.Single", "float"],
  ["System.Double", "double"],
  ["System.Decimal", "decimal"],
]);

export const isCSharpKeyword = (name: string): boolean =>
  CSHARP_KEYWORDS.has(name);

/**
 * Escape a C# identifier if it's a keyword.
 */
export const escapeIdentifier = (name: string): string =>
  CSHARP_KEYWORDS.has(name) ? `@${name}` : name;

export const specialTypeKeyword = (fullName: string): string | undefined =>
  SPECIAL_TYPE_KEYWORDS.get(fullName);

export type TypeNameScope = {
  /** Type parameter names visible at the use site */
  readonly typeParameters: ReadonlySet<string>;
};

export const emptyScope: TypeNameScope = { typeParameters: new Set() };

export const extendScope = (
  scope: TypeNameScope,
  names: readonly string[]
): TypeNameScope =>
  names.length === 0
    ? scope
    : { typeParameters: new Set([...scope.typeParameters, ...names]) };

/**
 * `global::` + dotted name, nesting separators as dots, keyword segments
 * escaped.
 */
export const globalName = (
  fullName: string,
  typeArguments: readonly TypeSyntax[] = []
): NameSyntax =>
  qualifiedName(
    `global::${fullName.replace(/\+/g, ".").split(".").map(escapeIdentifier).join(".")}`,
    typeArguments
  );

export const typeSyntaxFromReference = (
  type: TypeReference,
  scope: TypeNameScope
): TypeSyntax => {
  switch (type.kind) {
    case "named": {
      const args = type.typeArguments.map((arg) =>
        typeSyntaxFromReference(arg, scope)
      );
      if (args.length === 0 && scope.typeParameters.has(type.name)) {
        return qualifiedName(escapeIdentifier(type.name));
      }
      const [underlying] = args;
      if (type.name === "System.Nullable" && args.length === 1 && underlying) {
        return {
          kind: "nullableType",
          elementType: underlying,
          questionToken: token("?"),
        };
      }
      const keyword = args.length === 0 ? specialTypeKeyword(type.name) : undefined;
      return keyword !== undefined
        ? predefinedType(keyword)
        : globalName(type.name, args);
    }
    case "array":
      return arrayType(typeSyntaxFromReference(type.elementType, scope), type.rank);
    case "nullable":
      return {
        kind: "nullableType",
        elementType: typeSyntaxFromReference(type.underlyingType, scope),
        questionToken: token("?"),
      };
    case "pointer":
      return {
        kind: "pointerType",
        elementType: typeSyntaxFromReference(type.elementType, scope),
        asterisk: token("*"),
      };
  }
};
