/**
 * Declaration synthesizer
 *
 * Drafts the declaration tree of one type from its symbol: header,
 * attributes and every visible member, with all named types spelled
 * `global::`-qualified. Drafts carry no trivia; the surface walker
 * normalizes and canonicalizes them.
 */

import {
  isVisibleOutsideModule,
  type Accessibility,
  type AttributeArgument as AttributeArgumentData,
  type AttributeData,
  type ConstantValue,
  type ConstructorSymbol,
  type EventSymbol,
  type FieldSymbol,
  type MemberModifiers,
  type MethodSymbol,
  type ParameterSymbol,
  type PropertySymbol,
  type TypeHost,
  type TypeParameterSymbol,
  type TypeReference,
  type TypeSymbol,
} from "@genapi/resolver";
import type {
  AccessorDeclaration,
  AttributeArgument,
  AttributeList,
  ClassLikeDeclaration,
  ConstructorDeclaration,
  DelegateDeclaration,
  EnumDeclaration,
  EnumMemberDeclaration,
  EqualsValueClause,
  EventFieldDeclaration,
  ExpressionSyntax,
  FieldDeclaration,
  IndexerDeclaration,
  MemberDeclarationSyntax,
  MethodDeclaration,
  Parameter,
  PropertyDeclaration,
  SyntaxToken,
  TypeDeclarationSyntax,
  TypeParameterConstraint,
  TypeParameterConstraintClause,
  TypeParameterList,
  TypeSyntax,
  VariableDeclarator,
} from "./syntax/types.js";
import {
  accessorDeclaration,
  accessorList,
  attribute,
  attributeList,
  baseList,
  block,
  constraintClause,
  identifierName,
  literal,
  parameterList,
  predefinedType,
  separatedList,
  token,
  typeParameterList,
} from "./syntax/factory.js";
import {
  escapeIdentifier,
  extendScope,
  emptyScope,
  globalName,
  typeSyntaxFromReference,
  type TypeNameScope,
} from "./type-syntax.js";

export type DeclarationSynthesizer = (type: TypeSymbol) => TypeDeclarationSyntax;

export type SynthesizerOptions = {
  /** Looks up attribute types to drop those hidden from public source */
  readonly host?: TypeHost;
};

type SynthesisContext = {
  readonly host?: TypeHost;
  readonly scope: TypeNameScope;
  /** The type being drafted */
  readonly owner: TypeSymbol;
};

const tokens = (texts: readonly string[]): readonly SyntaxToken[] =>
  texts.map((text) => token(text));

// ============================================================
// Modifiers
// ============================================================

const accessibilityKeywords = (accessibility: Accessibility): readonly string[] => {
  switch (accessibility) {
    case "public":
      return ["public"];
    case "protected":
      return ["protected"];
    case "protectedInternal":
      return ["protected", "internal"];
    case "internal":
      return ["internal"];
    case "privateProtected":
      return ["private", "protected"];
    case "private":
      return ["private"];
  }
};

const typeModifiers = (type: TypeSymbol): readonly string[] => {
  const accessibility = accessibilityKeywords(type.accessibility);
  if (type.kind !== "class") {
    return accessibility;
  }
  if (type.isStatic) {
    return [...accessibility, "static"];
  }
  return [
    ...accessibility,
    ...(type.isAbstract ? ["abstract"] : type.isSealed ? ["sealed"] : []),
  ];
};

const inheritanceKeywords = (modifiers: MemberModifiers): readonly string[] => {
  if (modifiers.isAbstract) {
    return modifiers.isOverride ? ["abstract", "override"] : ["abstract"];
  }
  if (modifiers.isOverride) {
    return modifiers.isSealed ? ["sealed", "override"] : ["override"];
  }
  return modifiers.isVirtual ? ["virtual"] : [];
};

/**
 * Interface members carry no accessibility or inheritance keywords.
 */
const memberModifiers = (
  ctx: SynthesisContext,
  accessibility: Accessibility,
  modifiers: MemberModifiers
): readonly SyntaxToken[] => {
  const isStatic = modifiers.isStatic ? ["static"] : [];
  if (ctx.owner.kind === "interface") {
    return tokens(isStatic);
  }
  return tokens([
    ...accessibilityKeywords(accessibility),
    ...isStatic,
    ...inheritanceKeywords(modifiers),
  ]);
};

const fieldModifiers = (field: FieldSymbol): readonly SyntaxToken[] =>
  tokens([
    ...accessibilityKeywords(field.accessibility),
    ...(field.constantValue !== undefined
      ? ["const"]
      : [
          ...(field.isStatic ? ["static"] : []),
          ...(field.isReadOnly ? ["readonly"] : []),
        ]),
  ]);

// ============================================================
// Literals and attributes
// ============================================================

const escapeChar = (char: string): string => {
  switch (char) {
    case "\\":
      return "\\\\";
    case '"':
      return '\\"';
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    case "\t":
      return "\\t";
    case "\0":
      return "\\0";
  }
  const code = char.charCodeAt(0);
  return code < 0x20 || code === 0x7f
    ? `\\u${code.toString(16).padStart(4, "0")}`
    : char;
};

/**
 * C# source text of a metadata constant
 */
export const formatConstant = (value: ConstantValue): string => {
  if (value === null) {
    return "null";
  }
  if (typeof value === "string") {
    return `"${Array.from(value, escapeChar).join("")}"`;
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return String(value);
};

const constantExpression = (value: ConstantValue): ExpressionSyntax =>
  literal(formatConstant(value));

const attributeArgumentExpression = (
  argument: AttributeArgumentData,
  ctx: SynthesisContext
): ExpressionSyntax => {
  switch (argument.kind) {
    case "constant":
      return constantExpression(argument.value);
    case "typeof":
      return {
        kind: "typeOfExpression",
        keyword: token("typeof"),
        openParen: token("("),
        type: typeSyntaxFromReference(argument.type, ctx.scope),
        closeParen: token(")"),
      };
  }
};

const isHiddenAttribute = (data: AttributeData, ctx: SynthesisContext): boolean => {
  const type = ctx.host?.findType(data.type.name);
  return type !== undefined && !isVisibleOutsideModule(type.accessibility);
};

/**
 * One attribute list per attribute
 */
const attributeLists = (
  attributes: readonly AttributeData[],
  ctx: SynthesisContext,
  target?: string
): readonly AttributeList[] =>
  attributes
    .filter((data) => !isHiddenAttribute(data, ctx))
    .map((data) => {
      const positional = data.arguments.map(
        (argument): AttributeArgument => ({
          kind: "attributeArgument",
          expression: attributeArgumentExpression(argument, ctx),
        })
      );
      const named = data.namedArguments.map(
        (argument): AttributeArgument => ({
          kind: "attributeArgument",
          nameEquals: {
            kind: "nameEquals",
            name: identifierName(escapeIdentifier(argument.name)),
            equals: token("="),
          },
          expression: attributeArgumentExpression(argument.value, ctx),
        })
      );
      const typeArguments = data.type.typeArguments.map((arg) =>
        typeSyntaxFromReference(arg, ctx.scope)
      );
      return attributeList(
        [attribute(globalName(data.type.name, typeArguments), [...positional, ...named])],
        target
      );
    });

// ============================================================
// Type parameters, parameters and types
// ============================================================

const typeOf = (type: TypeReference, ctx: SynthesisContext): TypeSyntax =>
  typeSyntaxFromReference(type, ctx.scope);

const returnTypeOf = (
  type: TypeReference | undefined,
  ctx: SynthesisContext
): TypeSyntax => (type === undefined ? predefinedType("void") : typeOf(type, ctx));

const equalsValue = (value: ConstantValue): EqualsValueClause => ({
  kind: "equalsValueClause",
  equals: token("="),
  value: constantExpression(value),
});

const parameter = (symbol: ParameterSymbol, ctx: SynthesisContext): Parameter => ({
  kind: "parameter",
  attributeLists: attributeLists(symbol.attributes, ctx),
  modifiers: symbol.modifier !== undefined ? [token(symbol.modifier)] : [],
  type: typeOf(symbol.type, ctx),
  identifier: token(escapeIdentifier(symbol.name)),
  ...(symbol.defaultValue !== undefined
    ? { defaultValue: equalsValue(symbol.defaultValue.value) }
    : {}),
});

const parameters = (
  symbols: readonly ParameterSymbol[],
  ctx: SynthesisContext
): readonly Parameter[] => symbols.map((symbol) => parameter(symbol, ctx));

const keywordConstraint = (keyword: string): TypeParameterConstraint => ({
  kind: "keywordConstraint",
  keyword: token(keyword),
});

/**
 * Keyword constraints first, then type constraints, `new()` last.
 */
const constraintClauses = (
  typeParameters: readonly TypeParameterSymbol[],
  ctx: SynthesisContext
): readonly TypeParameterConstraintClause[] =>
  typeParameters
    .filter((tp) => tp.constraints.length > 0)
    .map((tp) => {
      const keywords: TypeParameterConstraint[] = [];
      const types: TypeParameterConstraint[] = [];
      let hasNew = false;
      for (const constraint of tp.constraints) {
        switch (constraint.kind) {
          case "class":
          case "struct":
          case "unmanaged":
          case "notnull":
            keywords.push(keywordConstraint(constraint.kind));
            break;
          case "type":
            types.push({ kind: "typeConstraint", type: typeOf(constraint.type, ctx) });
            break;
          case "new":
            hasNew = true;
            break;
        }
      }
      const ctor: readonly TypeParameterConstraint[] = hasNew
        ? [
            {
              kind: "constructorConstraint",
              newKeyword: token("new"),
              openParen: token("("),
              closeParen: token(")"),
            },
          ]
        : [];
      return constraintClause(escapeIdentifier(tp.name), [
        ...keywords,
        ...types,
        ...ctor,
      ]);
    });

const typeParameterListOf = (
  typeParameters: readonly TypeParameterSymbol[]
): { readonly typeParameterList?: TypeParameterList } =>
  typeParameters.length === 0
    ? {}
    : {
        typeParameterList: typeParameterList(
          typeParameters.map((tp) => ({
            name: escapeIdentifier(tp.name),
            ...(tp.variance !== undefined ? { variance: tp.variance } : {}),
          }))
        ),
      };

const declarator = (
  name: string,
  initializer?: EqualsValueClause
): VariableDeclarator => ({
  kind: "variableDeclarator",
  identifier: token(escapeIdentifier(name)),
  ...(initializer !== undefined ? { initializer } : {}),
});

// ============================================================
// Members
// ============================================================

const fieldDeclaration = (
  field: FieldSymbol,
  ctx: SynthesisContext
): FieldDeclaration => ({
  kind: "fieldDeclaration",
  attributeLists: attributeLists(field.attributes, ctx),
  modifiers: fieldModifiers(field),
  type: typeOf(field.type, ctx),
  variables: separatedList([
    declarator(
      field.name,
      field.constantValue !== undefined
        ? equalsValue(field.constantValue.value)
        : undefined
    ),
  ]),
  semicolon: token(";"),
});

const constructorDeclaration = (
  ctor: ConstructorSymbol,
  ctx: SynthesisContext
): ConstructorDeclaration => ({
  kind: "constructorDeclaration",
  attributeLists: attributeLists(ctor.attributes, ctx),
  modifiers: tokens(accessibilityKeywords(ctor.accessibility)),
  identifier: token(escapeIdentifier(ctx.owner.name)),
  parameterList: parameterList(parameters(ctor.parameters, ctx)),
  body: block(),
});

const hasSemicolonBody = (
  ctx: SynthesisContext,
  modifiers: MemberModifiers
): boolean => ctx.owner.kind === "interface" || modifiers.isAbstract;

const methodDeclaration = (
  method: MethodSymbol,
  outer: SynthesisContext
): MethodDeclaration => {
  const ctx: SynthesisContext = {
    ...outer,
    scope: extendScope(
      outer.scope,
      method.typeParameters.map((tp) => tp.name)
    ),
  };
  return {
    kind: "methodDeclaration",
    attributeLists: [
      ...attributeLists(method.attributes, ctx),
      ...attributeLists(method.returnAttributes, ctx, "return"),
    ],
    modifiers: memberModifiers(ctx, method.accessibility, method),
    returnType: returnTypeOf(method.returnType, ctx),
    identifier: token(escapeIdentifier(method.name)),
    ...typeParameterListOf(method.typeParameters),
    parameterList: parameterList(parameters(method.parameters, ctx)),
    constraintClauses: constraintClauses(method.typeParameters, ctx),
    ...(hasSemicolonBody(ctx, method)
      ? { semicolon: token(";") }
      : { body: block() }),
  };
};

/**
 * Visible accessors, each with its own accessibility when it differs from
 * the property's
 */
const accessors = (
  property: PropertySymbol,
  ctx: SynthesisContext
): readonly AccessorDeclaration[] => {
  const drafted: AccessorDeclaration[] = [];
  const add = (keyword: string, accessibility: Accessibility): void => {
    if (!isVisibleOutsideModule(accessibility)) {
      return;
    }
    const own =
      ctx.owner.kind !== "interface" && accessibility !== property.accessibility
        ? accessibilityKeywords(accessibility)
        : [];
    drafted.push(accessorDeclaration(keyword, own));
  };
  if (property.getter) {
    add("get", property.getter.accessibility);
  }
  if (property.setter) {
    add(property.setter.isInit ? "init" : "set", property.setter.accessibility);
  }
  return drafted;
};

const propertyDeclaration = (
  property: PropertySymbol,
  ctx: SynthesisContext
): PropertyDeclaration => ({
  kind: "propertyDeclaration",
  attributeLists: attributeLists(property.attributes, ctx),
  modifiers: memberModifiers(ctx, property.accessibility, property),
  type: typeOf(property.type, ctx),
  identifier: token(escapeIdentifier(property.name)),
  accessorList: accessorList(accessors(property, ctx)),
});

const indexerDeclaration = (
  property: PropertySymbol,
  ctx: SynthesisContext
): IndexerDeclaration => ({
  kind: "indexerDeclaration",
  attributeLists: attributeLists(property.attributes, ctx),
  modifiers: memberModifiers(ctx, property.accessibility, property),
  type: typeOf(property.type, ctx),
  thisKeyword: token("this"),
  parameterList: {
    kind: "bracketedParameterList",
    openBracket: token("["),
    parameters: separatedList(parameters(property.parameters, ctx)),
    closeBracket: token("]"),
  },
  accessorList: accessorList(accessors(property, ctx)),
});

const eventDeclaration = (
  event: EventSymbol,
  ctx: SynthesisContext
): EventFieldDeclaration => ({
  kind: "eventFieldDeclaration",
  attributeLists: attributeLists(event.attributes, ctx),
  modifiers: memberModifiers(ctx, event.accessibility, event),
  eventKeyword: token("event"),
  type: typeOf(event.type, ctx),
  variables: separatedList([declarator(event.name)]),
  semicolon: token(";"),
});

const visible = <T extends { readonly accessibility: Accessibility }>(
  members: readonly T[]
): readonly T[] =>
  members.filter((member) => isVisibleOutsideModule(member.accessibility));

const members = (
  type: TypeSymbol,
  ctx: SynthesisContext
): readonly MemberDeclarationSyntax[] => {
  const properties = visible(type.properties);
  const fields: readonly FieldSymbol[] =
    type.kind === "enum" ? [] : visible(type.fields);
  return [
    ...fields.map((field) =>
      fieldDeclaration(field, ctx)
    ),
    ...visible(type.constructors)
      .filter((ctor) => !ctor.isStatic)
      .map((ctor) => constructorDeclaration(ctor, ctx)),
    ...properties
      .filter((property) => property.parameters.length === 0)
      .map((property) => propertyDeclaration(property, ctx)),
    ...properties
      .filter((property) => property.parameters.length > 0)
      .map((property) => indexerDeclaration(property, ctx)),
    ...visible(type.events).map((event) => eventDeclaration(event, ctx)),
    ...visible(type.methods).map((method) => methodDeclaration(method, ctx)),
    ...visible(type.nestedTypes).map((nested) =>
      typeDeclaration(nested, ctx.host, ctx.scope)
    ),
  ];
};

// ============================================================
// Types
// ============================================================

const OBJECT_TYPE = "System.Object";

const classBaseTypes = (
  type: TypeSymbol,
  ctx: SynthesisContext
): readonly TypeSyntax[] => {
  const base = type.baseType;
  const baseSyntax =
    base === undefined ||
    (base.name === OBJECT_TYPE && base.typeArguments.length === 0)
      ? globalName(OBJECT_TYPE)
      : typeOf(base, ctx);
  return [baseSyntax, ...type.interfaces.map((i) => typeOf(i, ctx))];
};

const classLikeDeclaration = (
  type: TypeSymbol,
  kind: ClassLikeDeclaration["kind"],
  keyword: string,
  ctx: SynthesisContext
): ClassLikeDeclaration => {
  const baseTypes =
    kind === "classDeclaration"
      ? classBaseTypes(type, ctx)
      : type.interfaces.map((i) => typeOf(i, ctx));
  const declaration = {
    attributeLists: attributeLists(type.attributes, ctx),
    modifiers: tokens(typeModifiers(type)),
    keyword: token(keyword),
    identifier: token(escapeIdentifier(type.name)),
    ...typeParameterListOf(type.typeParameters),
    ...(baseTypes.length > 0 ? { baseList: baseList(baseTypes) } : {}),
    constraintClauses: constraintClauses(type.typeParameters, ctx),
    openBrace: token("{"),
    members: members(type, ctx),
    closeBrace: token("}"),
  };
  switch (kind) {
    case "classDeclaration":
      return { kind, ...declaration };
    case "structDeclaration":
      return { kind, ...declaration };
    case "interfaceDeclaration":
      return { kind, ...declaration };
  }
};

const enumDeclaration = (
  type: TypeSymbol,
  ctx: SynthesisContext
): EnumDeclaration => {
  const underlying = type.enumUnderlyingType;
  const explicitBase =
    underlying !== undefined && underlying.name !== "System.Int32"
      ? underlying
      : undefined;
  return {
    kind: "enumDeclaration",
    attributeLists: attributeLists(type.attributes, ctx),
    modifiers: tokens(typeModifiers(type)),
    enumKeyword: token("enum"),
    identifier: token(escapeIdentifier(type.name)),
    ...(explicitBase !== undefined
      ? { baseList: baseList([typeOf(explicitBase, ctx)]) }
      : {}),
    openBrace: token("{"),
    members: separatedList(
      type.enumMembers.map(
        (member): EnumMemberDeclaration => ({
          kind: "enumMemberDeclaration",
          attributeLists: [],
          identifier: token(escapeIdentifier(member.name)),
          equalsValue: equalsValue(member.value),
        })
      )
    ),
    closeBrace: token("}"),
  };
};

const delegateDeclaration = (
  type: TypeSymbol,
  ctx: SynthesisContext
): DelegateDeclaration => ({
  kind: "delegateDeclaration",
  attributeLists: attributeLists(type.attributes, ctx),
  modifiers: tokens(typeModifiers(type)),
  delegateKeyword: token("delegate"),
  returnType: returnTypeOf(type.invoke?.returnType, ctx),
  identifier: token(escapeIdentifier(type.name)),
  ...typeParameterListOf(type.typeParameters),
  parameterList: parameterList(parameters(type.invoke?.parameters ?? [], ctx)),
  constraintClauses: constraintClauses(type.typeParameters, ctx),
  semicolon: token(";"),
});

const typeDeclaration = (
  type: TypeSymbol,
  host: TypeHost | undefined,
  outerScope: TypeNameScope
): TypeDeclarationSyntax => {
  const ctx: SynthesisContext = {
    ...(host !== undefined ? { host } : {}),
    owner: type,
    scope: extendScope(
      outerScope,
      type.typeParameters.map((tp) => tp.name)
    ),
  };
  switch (type.kind) {
    case "class":
      return classLikeDeclaration(type, "classDeclaration", "class", ctx);
    case "struct":
      return classLikeDeclaration(type, "structDeclaration", "struct", ctx);
    case "interface":
      return classLikeDeclaration(type, "interfaceDeclaration", "interface", ctx);
    case "enum":
      return enumDeclaration(type, ctx);
    case "delegate":
      return delegateDeclaration(type, ctx);
  }
};

/**
 * Draft the declaration of a top-level type.
 */
export const synthesizeDeclaration = (
  type: TypeSymbol,
  options: SynthesizerOptions = {}
): TypeDeclarationSyntax => typeDeclaration(type, options.host, emptyScope);

export const createDeclarationSynthesizer = (
  options: SynthesizerOptions = {}
): DeclarationSynthesizer => (type) => synthesizeDeclaration(type, options);
