/**
 * Builders for declaration syntax nodes.
 *
 * Builders produce tokens without trivia; layout is applied afterwards by
 * normalizeWhitespace.
 */

import type {
  AccessorDeclaration,
  AccessorList,
  ArrayType,
  Attribute,
  AttributeArgument,
  AttributeArgumentList,
  AttributeList,
  AttributeTargetSpecifier,
  BaseList,
  Block,
  ExpressionSyntax,
  IdentifierName,
  LiteralExpression,
  NameSyntax,
  Parameter,
  ParameterList,
  PredefinedType,
  SeparatedList,
  SimpleName,
  SimpleBaseType,
  StatementSyntax,
  SyntaxToken,
  ThrowStatement,
  TypeArgumentList,
  TypeParameter,
  TypeParameterConstraint,
  TypeParameterConstraintClause,
  TypeParameterList,
  TypeSyntax,
} from "./types.js";

export const token = (
  text: string,
  leadingTrivia: string = "",
  trailingTrivia: string = ""
): SyntaxToken => ({ text, leadingTrivia, trailingTrivia });

export const withTrivia = (
  tok: SyntaxToken,
  leadingTrivia: string,
  trailingTrivia: string
): SyntaxToken => ({ text: tok.text, leadingTrivia, trailingTrivia });

export const withLeading = (
  tok: SyntaxToken,
  leadingTrivia: string
): SyntaxToken => ({ ...tok, leadingTrivia });

export const withTrailing = (
  tok: SyntaxToken,
  trailingTrivia: string
): SyntaxToken => ({ ...tok, trailingTrivia });

export const separatedList = <T>(
  items: readonly T[],
  separator: string = ","
): SeparatedList<T> => ({
  items,
  separators: items.slice(1).map(() => token(separator)),
});

export const emptyList = <T>(): SeparatedList<T> => ({
  items: [],
  separators: [],
});

// ============================================================
// Names
// ============================================================

export const identifierName = (name: string): IdentifierName => ({
  kind: "identifierName",
  identifier: token(name),
});

export const typeArgumentList = (
  args: readonly TypeSyntax[]
): TypeArgumentList => ({
  kind: "typeArgumentList",
  lessThan: token("<"),
  arguments: separatedList(args),
  greaterThan: token(">"),
});

export const simpleName = (
  name: string,
  typeArguments: readonly TypeSyntax[] = []
): SimpleName =>
  typeArguments.length === 0
    ? identifierName(name)
    : {
        kind: "genericName",
        identifier: token(name),
        typeArgumentList: typeArgumentList(typeArguments),
      };

/**
 * Build a name from dotted text, with an optional `global::` alias on the
 * leftmost segment. Type arguments attach to the rightmost segment.
 *
 * qualifiedName("global::System.Collections.List", [T])
 *   -> global::System.Collections.List<T>
 */
export const qualifiedName = (
  text: string,
  typeArguments: readonly TypeSyntax[] = []
): NameSyntax => {
  const globalPrefix = "global::";
  const hasGlobal = text.startsWith(globalPrefix);
  const segments = (hasGlobal ? text.slice(globalPrefix.length) : text).split(
    "."
  );
  const [first = "", ...rest] = segments;

  const firstName =
    rest.length === 0 ? simpleName(first, typeArguments) : identifierName(first);
  let name: NameSyntax = hasGlobal
    ? {
        kind: "aliasQualifiedName",
        alias: identifierName("global"),
        colonColon: token("::"),
        name: firstName,
      }
    : firstName;

  for (const [index, segment] of rest.entries()) {
    const isLast = index === rest.length - 1;
    name = {
      kind: "qualifiedName",
      left: name,
      dot: token("."),
      right: isLast ? simpleName(segment, typeArguments) : identifierName(segment),
    };
  }

  return name;
};

export const predefinedType = (keyword: string): PredefinedType => ({
  kind: "predefinedType",
  keyword: token(keyword),
});

export const arrayType = (elementType: TypeSyntax, rank: number): ArrayType => ({
  kind: "arrayType",
  elementType,
  rankSpecifiers: [
    {
      kind: "arrayRankSpecifier",
      openBracket: token("["),
      commas: Array.from({ length: Math.max(rank - 1, 0) }, () => token(",")),
      closeBracket: token("]"),
    },
  ],
});

// ============================================================
// Expressions and statements
// ============================================================

export const literal = (text: string): LiteralExpression => ({
  kind: "literalExpression",
  token: token(text),
});

export const block = (statements: readonly StatementSyntax[] = []): Block => ({
  kind: "block",
  openBrace: token("{"),
  statements,
  closeBrace: token("}"),
});

export const throwStatement = (
  expression?: ExpressionSyntax
): ThrowStatement => ({
  kind: "throwStatement",
  throwKeyword: token("throw"),
  ...(expression !== undefined ? { expression } : {}),
  semicolon: token(";"),
});

// ============================================================
// Declarations
// ============================================================

export const attributeList = (
  attributes: readonly Attribute[],
  target?: string
): AttributeList => {
  const specifier: AttributeTargetSpecifier | undefined =
    target === undefined
      ? undefined
      : {
          kind: "attributeTargetSpecifier",
          identifier: token(target),
          colon: token(":"),
        };
  return {
    kind: "attributeList",
    openBracket: token("["),
    ...(specifier !== undefined ? { target: specifier } : {}),
    attributes: separatedList(attributes),
    closeBracket: token("]"),
  };
};

export const attribute = (
  name: NameSyntax,
  args: readonly AttributeArgument[]
): Attribute => {
  if (args.length === 0) {
    return { kind: "attribute", name };
  }
  const argumentList: AttributeArgumentList = {
    kind: "attributeArgumentList",
    openParen: token("("),
    arguments: separatedList(args),
    closeParen: token(")"),
  };
  return { kind: "attribute", name, argumentList };
};

export const baseList = (types: readonly TypeSyntax[]): BaseList => ({
  kind: "baseList",
  colon: token(":"),
  types: separatedList(
    types.map((type): SimpleBaseType => ({ kind: "simpleBaseType", type }))
  ),
});

export const typeParameterList = (
  parameters: readonly { readonly name: string; readonly variance?: string }[]
): TypeParameterList => ({
  kind: "typeParameterList",
  lessThan: token("<"),
  parameters: separatedList(
    parameters.map(
      (p): TypeParameter =>
        p.variance === undefined
          ? { kind: "typeParameter", identifier: token(p.name) }
          : {
              kind: "typeParameter",
              varianceKeyword: token(p.variance),
              identifier: token(p.name),
            }
    )
  ),
  greaterThan: token(">"),
});

export const constraintClause = (
  name: string,
  constraints: readonly TypeParameterConstraint[]
): TypeParameterConstraintClause => ({
  kind: "typeParameterConstraintClause",
  whereKeyword: token("where"),
  name: identifierName(name),
  colon: token(":"),
  constraints: separatedList(constraints),
});

export const parameterList = (
  parameters: readonly Parameter[]
): ParameterList => ({
  kind: "parameterList",
  openParen: token("("),
  parameters: separatedList(parameters),
  closeParen: token(")"),
});

export const accessorDeclaration = (
  keyword: string,
  modifiers: readonly string[] = []
): AccessorDeclaration => ({
  kind: "accessorDeclaration",
  modifiers: modifiers.map((m) => token(m)),
  keyword: token(keyword),
  semicolon: token(";"),
});

export const accessorList = (
  accessors: readonly AccessorDeclaration[]
): AccessorList => ({
  kind: "accessorList",
  openBrace: token("{"),
  accessors,
  closeBrace: token("}"),
});
