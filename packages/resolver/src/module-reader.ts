/**
 * Module reader - Reads and validates .metadata.json module documents.
 *
 * A metadata document is the JSON form of a compiled module's identity,
 * references and type/member tables. Validation is field by field; every
 * problem is reported as a diagnostic against the file, and a file with any
 * diagnostic yields no module.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Result } from "./types/result.js";
import {
  createDiagnostic,
  type Diagnostic,
  type DiagnosticCode,
} from "./types/diagnostic.js";
import type {
  Accessibility,
  AccessorSymbol,
  AttributeArgument,
  AttributeData,
  ConstantValue,
  ConstructorSymbol,
  DelegateSignature,
  EnumMemberSymbol,
  EventSymbol,
  FieldSymbol,
  MemberModifiers,
  MethodSymbol,
  ModuleIdentity,
  ModuleSymbol,
  NamedAttributeArgument,
  NamedTypeReference,
  NamespaceSymbol,
  ParameterModifier,
  ParameterSymbol,
  PropertySymbol,
  TypeKind,
  TypeParameterConstraint,
  TypeParameterSymbol,
  TypeReference,
  TypeSymbol,
  Variance,
} from "./types/module.js";
import {
  createIdentity,
  parsePublicKeyToken,
  parseVersion,
  ZERO_VERSION,
} from "./identity.js";
import {
  parseNamedTypeReference,
  parseTypeReference,
} from "./type-reference.js";

/**
 * Turns a module file into a module symbol.
 */
export type ModuleReader = {
  /** File extension of module files, including the leading dot */
  readonly extension: string;
  readonly readModule: (filePath: string) => Result<ModuleSymbol, Diagnostic[]>;
};

export const METADATA_EXTENSION = ".metadata.json";

const TYPE_KINDS: readonly TypeKind[] = [
  "class",
  "struct",
  "interface",
  "enum",
  "delegate",
];

const ACCESSIBILITIES: readonly Accessibility[] = [
  "public",
  "protected",
  "protectedInternal",
  "internal",
  "privateProtected",
  "private",
];

const PARAMETER_MODIFIERS: readonly ParameterModifier[] = [
  "ref",
  "out",
  "in",
  "params",
  "this",
];

const VARIANCES: readonly Variance[] = ["in", "out"];

// ============================================================
// Validation helpers
// ============================================================

type Context = {
  readonly file: string;
  readonly diagnostics: Diagnostic[];
};

type JsonObject = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const report = (ctx: Context, code: DiagnosticCode, message: string): void => {
  ctx.diagnostics.push(createDiagnostic(code, "error", message, ctx.file));
};

const readString = (
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string
): string | undefined => {
  const value = obj[key];
  if (typeof value === "string" && value !== "") {
    return value;
  }
  report(ctx, "GEN1005", `Missing or invalid '${key}' at ${where}`);
  return undefined;
};

const readOptionalString = (
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string
): string | undefined => {
  const value = obj[key];
  if (value === undefined || typeof value === "string") {
    return value;
  }
  report(ctx, "GEN1005", `'${key}' must be a string at ${where}`);
  return undefined;
};

const readFlag = (
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string
): boolean => {
  const value = obj[key];
  if (value === undefined) {
    return false;
  }
  if (typeof value === "boolean") {
    return value;
  }
  report(ctx, "GEN1005", `'${key}' must be a boolean at ${where}`);
  return false;
};

const readOneOf = <T extends string>(
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string,
  allowed: readonly T[]
): T | undefined => {
  const value = obj[key];
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    report(
      ctx,
      "GEN1005",
      `'${key}' must be one of ${allowed.join(", ")} at ${where}`
    );
  }
  return match;
};

const readOptionalOneOf = <T extends string>(
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string,
  allowed: readonly T[]
): T | undefined =>
  obj[key] === undefined ? undefined : readOneOf(ctx, obj, key, where, allowed);

const readList = <T>(
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string,
  readItem: (ctx: Context, item: unknown, where: string) => T | undefined
): readonly T[] => {
  const value = obj[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    report(ctx, "GEN1005", `'${key}' must be an array at ${where}`);
    return [];
  }

  const items: T[] = [];
  value.forEach((item: unknown, index: number) => {
    const read = readItem(ctx, item, `${where}.${key}[${index}]`);
    if (read !== undefined) {
      items.push(read);
    }
  });
  return items;
};

const readObject = (
  ctx: Context,
  item: unknown,
  where: string
): JsonObject | undefined => {
  if (isRecord(item)) {
    return item;
  }
  report(ctx, "GEN1005", `Expected an object at ${where}`);
  return undefined;
};

// Integers beyond the safe range cannot travel as JSON numbers: enum values
// carry them as decimal strings, constants as { "integer": "<digits>" }.
const INTEGER_TEXT = /^-?(0|[1-9][0-9]*)$/;

const readNumber = (
  ctx: Context,
  value: number,
  where: string
): number | undefined => {
  if (Number.isInteger(value) && !Number.isSafeInteger(value)) {
    report(
      ctx,
      "GEN1005",
      `Integer ${String(value)} is outside the safe range at ${where}; write it as a decimal string`
    );
    return undefined;
  }
  return value;
};

const readIntegerText = (
  ctx: Context,
  text: string,
  where: string
): bigint | undefined => {
  if (!INTEGER_TEXT.test(text)) {
    report(ctx, "GEN1005", `Invalid integer '${text}' at ${where}`);
    return undefined;
  }
  return BigInt(text);
};

const isBigIntegerConstant = (
  value: unknown
): value is { readonly integer: string } =>
  isRecord(value) && typeof value.integer === "string";

const isConstantShape = (value: unknown): boolean =>
  value === null ||
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "boolean" ||
  isBigIntegerConstant(value);

/**
 * A constant of any shape accepted by isConstantShape; undefined once a
 * problem is reported
 */
const toConstant = (
  ctx: Context,
  value: unknown,
  where: string
): ConstantValue | undefined => {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return readNumber(ctx, value, where);
  }
  if (isBigIntegerConstant(value)) {
    return readIntegerText(ctx, value.integer, `${where}.integer`);
  }
  report(ctx, "GEN1005", `Expected a constant at ${where}`);
  return undefined;
};

const readConstant = (
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string
): { readonly value: ConstantValue } | undefined => {
  const value = obj[key];
  if (!isConstantShape(value)) {
    report(
      ctx,
      "GEN1005",
      `'${key}' must be a string, number, boolean, null or { "integer": ... } at ${where}`
    );
    return undefined;
  }
  const constant = toConstant(ctx, value, `${where}.${key}`);
  return constant === undefined ? undefined : { value: constant };
};

// ============================================================
// Type references
// ============================================================

const invalidTypeReference = (
  ctx: Context,
  text: string,
  where: string
): undefined => {
  report(ctx, "GEN1006", `Invalid type reference '${text}' at ${where}`);
  return undefined;
};

const toTypeReference = (
  ctx: Context,
  text: string,
  where: string
): TypeReference | undefined =>
  parseTypeReference(text) ?? invalidTypeReference(ctx, text, where);

const toNamedTypeReference = (
  ctx: Context,
  text: string,
  where: string
): NamedTypeReference | undefined =>
  parseNamedTypeReference(text) ?? invalidTypeReference(ctx, text, where);

const readType = (
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string
): TypeReference | undefined => {
  const text = readString(ctx, obj, key, where);
  return text === undefined
    ? undefined
    : toTypeReference(ctx, text, `${where}.${key}`);
};

const readOptionalType = (
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string
): TypeReference | undefined => {
  const text = readOptionalString(ctx, obj, key, where);
  return text === undefined
    ? undefined
    : toTypeReference(ctx, text, `${where}.${key}`);
};

const readOptionalNamedType = (
  ctx: Context,
  obj: JsonObject,
  key: string,
  where: string
): NamedTypeReference | undefined => {
  const text = readOptionalString(ctx, obj, key, where);
  return text === undefined
    ? undefined
    : toNamedTypeReference(ctx, text, `${where}.${key}`);
};

const readNamedTypeItem = (
  ctx: Context,
  item: unknown,
  where: string
): NamedTypeReference | undefined => {
  if (typeof item !== "string") {
    report(ctx, "GEN1005", `Expected a type name at ${where}`);
    return undefined;
  }
  return toNamedTypeReference(ctx, item, where);
};

// ============================================================
// Attributes and parameters
// ============================================================

const readAttributeArgument = (
  ctx: Context,
  item: unknown,
  where: string
): AttributeArgument | undefined => {
  if (isConstantShape(item)) {
    const value = toConstant(ctx, item, where);
    return value === undefined ? undefined : { kind: "constant", value };
  }
  if (isRecord(item) && typeof item.typeof === "string") {
    const type = toTypeReference(ctx, item.typeof, `${where}.typeof`);
    return type ? { kind: "typeof", type } : undefined;
  }
  report(
    ctx,
    "GEN1005",
    `Attribute argument must be a constant or { "typeof": ... } at ${where}`
  );
  return undefined;
};

const readNamedAttributeArgument = (
  ctx: Context,
  item: unknown,
  where: string
): NamedAttributeArgument | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const name = readString(ctx, obj, "name", where);
  const value = readAttributeArgument(ctx, obj.value, `${where}.value`);
  return name !== undefined && value !== undefined
    ? { name, value }
    : undefined;
};

const readAttribute = (
  ctx: Context,
  item: unknown,
  where: string
): AttributeData | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const typeText = readString(ctx, obj, "type", where);
  const type =
    typeText === undefined
      ? undefined
      : toNamedTypeReference(ctx, typeText, `${where}.type`);
  const args = readList(ctx, obj, "arguments", where, readAttributeArgument);
  const namedArguments = readList(
    ctx,
    obj,
    "namedArguments",
    where,
    readNamedAttributeArgument
  );
  return type ? { type, arguments: args, namedArguments } : undefined;
};

const readParameter = (
  ctx: Context,
  item: unknown,
  where: string
): ParameterSymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const name = readString(ctx, obj, "name", where);
  const type = readType(ctx, obj, "type", where);
  const modifier = readOptionalOneOf(
    ctx,
    obj,
    "modifier",
    where,
    PARAMETER_MODIFIERS
  );
  const defaultValue =
    "defaultValue" in obj
      ? readConstant(ctx, obj, "defaultValue", where)
      : undefined;
  const attributes = readList(ctx, obj, "attributes", where, readAttribute);
  if (name === undefined || type === undefined) return undefined;
  return {
    name,
    type,
    ...(modifier !== undefined ? { modifier } : {}),
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    attributes,
  };
};

const readTypeParameterConstraint = (
  ctx: Context,
  item: unknown,
  where: string
): TypeParameterConstraint | undefined => {
  switch (item) {
    case "class":
      return { kind: "class" };
    case "struct":
      return { kind: "struct" };
    case "unmanaged":
      return { kind: "unmanaged" };
    case "notnull":
      return { kind: "notnull" };
    case "new()":
      return { kind: "new" };
  }
  if (typeof item !== "string") {
    report(ctx, "GEN1005", `Expected a constraint string at ${where}`);
    return undefined;
  }
  const type = toTypeReference(ctx, item, where);
  return type ? { kind: "type", type } : undefined;
};

const readTypeParameter = (
  ctx: Context,
  item: unknown,
  where: string
): TypeParameterSymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const name = readString(ctx, obj, "name", where);
  const variance = readOptionalOneOf(ctx, obj, "variance", where, VARIANCES);
  const constraints = readList(
    ctx,
    obj,
    "constraints",
    where,
    readTypeParameterConstraint
  );
  if (name === undefined) return undefined;
  return {
    name,
    ...(variance !== undefined ? { variance } : {}),
    constraints,
  };
};

// ============================================================
// Members
// ============================================================

const readModifiers = (
  ctx: Context,
  obj: JsonObject,
  where: string
): MemberModifiers => ({
  isStatic: readFlag(ctx, obj, "isStatic", where),
  isAbstract: readFlag(ctx, obj, "isAbstract", where),
  isVirtual: readFlag(ctx, obj, "isVirtual", where),
  isOverride: readFlag(ctx, obj, "isOverride", where),
  isSealed: readFlag(ctx, obj, "isSealed", where),
});

const readField = (
  ctx: Context,
  item: unknown,
  where: string
): FieldSymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const name = readString(ctx, obj, "name", where);
  const type = readType(ctx, obj, "type", where);
  const accessibility = readOneOf(
    ctx,
    obj,
    "accessibility",
    where,
    ACCESSIBILITIES
  );
  const isConst = readFlag(ctx, obj, "isConst", where);
  const constantValue = isConst
    ? readConstant(ctx, obj, "constantValue", where)
    : undefined;
  const field = {
    isStatic: readFlag(ctx, obj, "isStatic", where),
    isReadOnly: readFlag(ctx, obj, "isReadOnly", where),
    attributes: readList(ctx, obj, "attributes", where, readAttribute),
  };
  if (name === undefined || type === undefined || accessibility === undefined)
    return undefined;
  if (isConst && constantValue === undefined) return undefined;
  return {
    name,
    type,
    accessibility,
    ...field,
    ...(constantValue !== undefined ? { constantValue } : {}),
  };
};

const readConstructor = (
  ctx: Context,
  item: unknown,
  where: string
): ConstructorSymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const accessibility = readOneOf(
    ctx,
    obj,
    "accessibility",
    where,
    ACCESSIBILITIES
  );
  const ctor = {
    isStatic: readFlag(ctx, obj, "isStatic", where),
    parameters: readList(ctx, obj, "parameters", where, readParameter),
    attributes: readList(ctx, obj, "attributes", where, readAttribute),
  };
  return accessibility === undefined ? undefined : { accessibility, ...ctor };
};

const readMethod = (
  ctx: Context,
  item: unknown,
  where: string
): MethodSymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const name = readString(ctx, obj, "name", where);
  const accessibility = readOneOf(
    ctx,
    obj,
    "accessibility",
    where,
    ACCESSIBILITIES
  );
  const returnType = readOptionalType(ctx, obj, "returnType", where);
  const method = {
    ...readModifiers(ctx, obj, where),
    typeParameters: readList(
      ctx,
      obj,
      "typeParameters",
      where,
      readTypeParameter
    ),
    parameters: readList(ctx, obj, "parameters", where, readParameter),
    attributes: readList(ctx, obj, "attributes", where, readAttribute),
    returnAttributes: readList(
      ctx,
      obj,
      "returnAttributes",
      where,
      readAttribute
    ),
  };
  if (name === undefined || accessibility === undefined) return undefined;
  return {
    name,
    accessibility,
    ...(returnType !== undefined ? { returnType } : {}),
    ...method,
  };
};

const readAccessor = (
  ctx: Context,
  obj: JsonObject,
  key: "getter" | "setter",
  where: string,
  fallback: Accessibility
): AccessorSymbol | undefined => {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  const accessor = readObject(ctx, value, `${where}.${key}`);
  if (!accessor) return undefined;
  const accessibility =
    accessor.accessibility === undefined
      ? fallback
      : readOneOf(
          ctx,
          accessor,
          "accessibility",
          `${where}.${key}`,
          ACCESSIBILITIES
        );
  const isInit = readFlag(ctx, accessor, "isInit", `${where}.${key}`);
  return accessibility === undefined ? undefined : { accessibility, isInit };
};

const readProperty = (
  ctx: Context,
  item: unknown,
  where: string
): PropertySymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const name = readString(ctx, obj, "name", where);
  const type = readType(ctx, obj, "type", where);
  const accessibility = readOneOf(
    ctx,
    obj,
    "accessibility",
    where,
    ACCESSIBILITIES
  );
  const property = {
    ...readModifiers(ctx, obj, where),
    parameters: readList(ctx, obj, "parameters", where, readParameter),
    attributes: readList(ctx, obj, "attributes", where, readAttribute),
  };
  if (name === undefined || type === undefined || accessibility === undefined)
    return undefined;
  const getter = readAccessor(ctx, obj, "getter", where, accessibility);
  const setter = readAccessor(ctx, obj, "setter", where, accessibility);
  if (getter === undefined && setter === undefined) {
    report(ctx, "GEN1005", `Property needs a 'getter' or 'setter' at ${where}`);
    return undefined;
  }
  return {
    name,
    type,
    accessibility,
    ...property,
    ...(getter !== undefined ? { getter } : {}),
    ...(setter !== undefined ? { setter } : {}),
  };
};

const readEvent = (
  ctx: Context,
  item: unknown,
  where: string
): EventSymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const name = readString(ctx, obj, "name", where);
  const type = readType(ctx, obj, "type", where);
  const accessibility = readOneOf(
    ctx,
    obj,
    "accessibility",
    where,
    ACCESSIBILITIES
  );
  const event = {
    ...readModifiers(ctx, obj, where),
    attributes: readList(ctx, obj, "attributes", where, readAttribute),
  };
  if (name === undefined || type === undefined || accessibility === undefined)
    return undefined;
  return { name, type, accessibility, ...event };
};

const readEnumValue = (
  ctx: Context,
  raw: unknown,
  where: string
): number | bigint | undefined => {
  if (typeof raw === "number" && Number.isInteger(raw)) {
    return readNumber(ctx, raw, where);
  }
  if (typeof raw === "string") {
    return readIntegerText(ctx, raw, where);
  }
  report(ctx, "GEN1005", `Expected an integer or a decimal string at ${where}`);
  return undefined;
};

const readEnumMember = (
  ctx: Context,
  item: unknown,
  where: string
): EnumMemberSymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;
  const name = readString(ctx, obj, "name", where);
  const value = readEnumValue(ctx, obj.value, `${where}.value`);
  return name === undefined || value === undefined ? undefined : { name, value };
};

const readInvoke = (
  ctx: Context,
  obj: JsonObject,
  where: string
): DelegateSignature | undefined => {
  const invoke = readObject(ctx, obj.invoke, `${where}.invoke`);
  if (!invoke) return undefined;
  const returnType = readOptionalType(
    ctx,
    invoke,
    "returnType",
    `${where}.invoke`
  );
  const parameters = readList(
    ctx,
    invoke,
    "parameters",
    `${where}.invoke`,
    readParameter
  );
  return {
    ...(returnType !== undefined ? { returnType } : {}),
    parameters,
  };
};

// ============================================================
// Types
// ============================================================

const readTypeSymbol = (
  ctx: Context,
  item: unknown,
  where: string,
  parent: TypeSymbol | undefined
): TypeSymbol | undefined => {
  const obj = readObject(ctx, item, where);
  if (!obj) return undefined;

  const name = readString(ctx, obj, "name", where);
  const kind = readOneOf(ctx, obj, "kind", where, TYPE_KINDS);
  const accessibility = readOneOf(
    ctx,
    obj,
    "accessibility",
    where,
    ACCESSIBILITIES
  );
  const namespace =
    parent?.namespace ?? readOptionalString(ctx, obj, "namespace", where) ?? "";
  if (name === undefined || kind === undefined || accessibility === undefined) {
    return undefined;
  }

  const fullName = parent
    ? `${parent.fullName}+${name}`
    : namespace === ""
      ? name
      : `${namespace}.${name}`;

  const baseType = readOptionalNamedType(ctx, obj, "baseType", where);
  const enumUnderlyingType = readOptionalNamedType(
    ctx,
    obj,
    "enumUnderlyingType",
    where
  );
  const invoke =
    kind === "delegate" ? readInvoke(ctx, obj, where) : undefined;

  const partial: Omit<TypeSymbol, "nestedTypes"> = {
    name,
    fullName,
    namespace,
    kind,
    accessibility,
    isAbstract: readFlag(ctx, obj, "isAbstract", where),
    isSealed: readFlag(ctx, obj, "isSealed", where),
    isStatic: readFlag(ctx, obj, "isStatic", where),
    typeParameters: readList(
      ctx,
      obj,
      "typeParameters",
      where,
      readTypeParameter
    ),
    ...(baseType !== undefined ? { baseType } : {}),
    interfaces: readList(ctx, obj, "interfaces", where, readNamedTypeItem),
    attributes: readList(ctx, obj, "attributes", where, readAttribute),
    fields: readList(ctx, obj, "fields", where, readField),
    constructors: readList(ctx, obj, "constructors", where, readConstructor),
    methods: readList(ctx, obj, "methods", where, readMethod),
    properties: readList(ctx, obj, "properties", where, readProperty),
    events: readList(ctx, obj, "events", where, readEvent),
    ...(enumUnderlyingType !== undefined ? { enumUnderlyingType } : {}),
    enumMembers: readList(ctx, obj, "enumMembers", where, readEnumMember),
    ...(invoke !== undefined ? { invoke } : {}),
  };

  // Nested types need the containing type's full name
  const self: TypeSymbol = { ...partial, nestedTypes: [] };
  const nestedTypes = readList(ctx, obj, "nestedTypes", where, (c, n, w) =>
    readTypeSymbol(c, n, w, self)
  );
  return { ...partial, nestedTypes };
};

// ============================================================
// Identity and namespaces
// ============================================================

const readIdentity = (
  ctx: Context,
  obj: JsonObject,
  where: string
): ModuleIdentity | undefined => {
  const name = readString(ctx, obj, "name", where);
  const versionText = readOptionalString(ctx, obj, "version", where);
  const tokenValue = obj.publicKeyToken;

  const version =
    versionText === undefined ? ZERO_VERSION : parseVersion(versionText);
  if (!version) {
    report(ctx, "GEN1007", `Invalid version '${versionText}' at ${where}`);
  }

  let token: Uint8Array | undefined;
  let tokenValid = true;
  if (typeof tokenValue === "string") {
    token = parsePublicKeyToken(tokenValue);
    if (!token) {
      tokenValid = false;
      report(
        ctx,
        "GEN1007",
        `Invalid public key token '${tokenValue}' at ${where}`
      );
    }
  } else if (tokenValue !== undefined && tokenValue !== null) {
    tokenValid = false;
    report(ctx, "GEN1007", `'publicKeyToken' must be a hex string at ${where}`);
  }

  if (name === undefined || !version || !tokenValid) {
    return undefined;
  }
  return createIdentity(name, version, token);
};

const readReference = (
  ctx: Context,
  item: unknown,
  where: string
): ModuleIdentity | undefined => {
  const obj = readObject(ctx, item, where);
  return obj ? readIdentity(ctx, obj, where) : undefined;
};

type NamespaceBuilder = {
  readonly name: string;
  readonly fullName: string;
  readonly types: TypeSymbol[];
  readonly children: Map<string, NamespaceBuilder>;
};

const createNamespaceBuilder = (
  name: string,
  fullName: string
): NamespaceBuilder => ({ name, fullName, types: [], children: new Map() });

const compareOrdinal = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const freezeNamespace = (builder: NamespaceBuilder): NamespaceSymbol => ({
  name: builder.name,
  fullName: builder.fullName,
  types: builder.types,
  namespaces: [...builder.children.values()]
    .sort((a, b) => compareOrdinal(a.name, b.name))
    .map(freezeNamespace),
});

/**
 * Group top-level types into a namespace tree rooted at the global namespace.
 */
export const buildNamespaceTree = (
  types: readonly TypeSymbol[]
): NamespaceSymbol => {
  const root = createNamespaceBuilder("", "");

  for (const type of types) {
    let current = root;
    if (type.namespace !== "") {
      for (const segment of type.namespace.split(".")) {
        const fullName =
          current.fullName === "" ? segment : `${current.fullName}.${segment}`;
        const existing = current.children.get(segment);
        const next = existing ?? createNamespaceBuilder(segment, fullName);
        if (!existing) {
          current.children.set(segment, next);
        }
        current = next;
      }
    }
    current.types.push(type);
  }

  return freezeNamespace(root);
};

// ============================================================
// Reader
// ============================================================

/**
 * Parse and validate the content of a metadata document.
 */
export const parseModuleDocument = (
  content: string,
  filePath: string
): Result<ModuleSymbol, Diagnostic[]> => {
  const fileName = path.basename(filePath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "GEN1003",
          "error",
          `Invalid JSON in module file: ${error}`,
          filePath
        ),
      ],
    };
  }

  if (!isRecord(parsed)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "GEN1004",
          "error",
          `Module file must be an object, got ${Array.isArray(parsed) ? "array" : typeof parsed}`,
          filePath
        ),
      ],
    };
  }

  const ctx: Context = { file: filePath, diagnostics: [] };
  const identity = readIdentity(ctx, parsed, fileName);
  const references = readList(
    ctx,
    parsed,
    "references",
    fileName,
    readReference
  );
  const types = readList(ctx, parsed, "types", fileName, (c, item, where) =>
    readTypeSymbol(c, item, where, undefined)
  );

  if (ctx.diagnostics.length > 0 || !identity) {
    return { ok: false, error: ctx.diagnostics };
  }

  return {
    ok: true,
    value: {
      identity,
      filePath,
      references,
      globalNamespace: buildNamespaceTree(types),
    },
  };
};

/**
 * Read one module file from disk.
 */
export const readMetadataModule = (
  filePath: string
): Result<ModuleSymbol, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "GEN1001",
          "error",
          `Module file not found: ${filePath}`,
          filePath
        ),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "GEN1002",
          "error",
          `Failed to read module file: ${error}`,
          filePath
        ),
      ],
    };
  }

  return parseModuleDocument(content, filePath);
};

export const createMetadataReader = (): ModuleReader => ({
  extension: METADATA_EXTENSION,
  readModule: readMetadataModule,
});
