/**
 * Symbol builders for tests
 */

import {
  parseNamedTypeReference,
  parseTypeReference,
  type MethodSymbol,
  type NamedTypeReference,
  type PropertySymbol,
  type TypeReference,
  type TypeSymbol,
} from "@genapi/resolver";

export const typeRef = (text: string): TypeReference => {
  const parsed = parseTypeReference(text);
  if (!parsed) {
    throw new Error(`Bad type reference in test: ${text}`);
  }
  return parsed;
};

export const namedRef = (text: string): NamedTypeReference => {
  const parsed = parseNamedTypeReference(text);
  if (!parsed) {
    throw new Error(`Bad type name in test: ${text}`);
  }
  return parsed;
};

export const typeSymbol = (
  fields: Partial<TypeSymbol> & { readonly name: string }
): TypeSymbol => {
  const namespace = fields.namespace ?? "";
  return {
    fullName: namespace === "" ? fields.name : `${namespace}.${fields.name}`,
    namespace,
    kind: "class",
    accessibility: "public",
    isAbstract: false,
    isSealed: false,
    isStatic: false,
    typeParameters: [],
    interfaces: [],
    attributes: [],
    fields: [],
    constructors: [],
    methods: [],
    properties: [],
    events: [],
    enumMembers: [],
    nestedTypes: [],
    ...fields,
  };
};

const noModifiers = {
  isStatic: false,
  isAbstract: false,
  isVirtual: false,
  isOverride: false,
  isSealed: false,
};

export const methodSymbol = (
  fields: Partial<MethodSymbol> & { readonly name: string }
): MethodSymbol => ({
  ...noModifiers,
  accessibility: "public",
  typeParameters: [],
  parameters: [],
  attributes: [],
  returnAttributes: [],
  ...fields,
});

export const propertySymbol = (
  fields: Partial<PropertySymbol> & {
    readonly name: string;
    readonly type: TypeReference;
  }
): PropertySymbol => ({
  ...noModifiers,
  accessibility: "public",
  parameters: [],
  attributes: [],
  ...fields,
});
