/**
 * Whitespace normalizer
 *
 * Overwrites every token's trivia with the default layout:
 * - four spaces of indentation per depth
 * - declaration attribute lists on their own lines
 * - declaration headers on one line (base list and constraints included)
 * - braces of namespace, type, block and accessor bodies on their own lines
 * - `, ` between list items; everything else inside a line tight
 *
 * The closing brace of the outermost namespace keeps no trailing trivia.
 */

import type {
  AccessorDeclaration,
  AccessorList,
  ArrowExpressionClause,
  Attribute,
  AttributeArgument,
  AttributeList,
  BaseList,
  Block,
  BracketedParameterList,
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
  NameSyntax,
  NamespaceDeclaration,
  Parameter,
  ParameterList,
  PropertyDeclaration,
  SeparatedList,
  SimpleName,
  StatementSyntax,
  SyntaxToken,
  TypeDeclarationSyntax,
  TypeArgumentList,
  TypeParameterConstraint,
  TypeParameterConstraintClause,
  TypeParameterList,
  TypeSyntax,
  VariableDeclarator,
} from "./types.js";
import { withTrivia } from "./factory.js";
import { indentation, NEWLINE, withTypeLeading } from "./trivia.js";

const tight = (token: SyntaxToken, trailing: string = ""): SyntaxToken =>
  withTrivia(token, "", trailing);

/**
 * Items inline, separators as `, `; the last item gets `trailing`.
 */
const inlineList = <T>(
  list: SeparatedList<T>,
  item: (node: T, trailing: string) => T,
  trailing: string
): SeparatedList<T> => ({
  items: list.items.map((node, index) =>
    item(node, index === list.items.length - 1 ? trailing : "")
  ),
  separators: list.separators.map((sep) => tight(sep, " ")),
});

// ============================================================
// Inline layout: names, types, expressions
// ============================================================

const inlineTypeArguments = (
  list: TypeArgumentList,
  trailing: string
): TypeArgumentList => ({
  ...list,
  lessThan: tight(list.lessThan),
  arguments: inlineList(list.arguments, inlineType, ""),
  greaterThan: tight(list.greaterThan, trailing),
});

const inlineSimpleName = (name: SimpleName, trailing: string): SimpleName => {
  switch (name.kind) {
    case "identifierName":
      return { ...name, identifier: tight(name.identifier, trailing) };
    case "genericName":
      return {
        ...name,
        identifier: tight(name.identifier),
        typeArgumentList: inlineTypeArguments(name.typeArgumentList, trailing),
      };
  }
};

const inlineName = (name: NameSyntax, trailing: string): NameSyntax => {
  switch (name.kind) {
    case "identifierName":
    case "genericName":
      return inlineSimpleName(name, trailing);
    case "aliasQualifiedName":
      return {
        ...name,
        alias: { ...name.alias, identifier: tight(name.alias.identifier) },
        colonColon: tight(name.colonColon),
        name: inlineSimpleName(name.name, trailing),
      };
    case "qualifiedName":
      return {
        ...name,
        left: inlineName(name.left, ""),
        dot: tight(name.dot),
        right: inlineSimpleName(name.right, trailing),
      };
  }
};

export const inlineType = (type: TypeSyntax, trailing: string): TypeSyntax => {
  switch (type.kind) {
    case "identifierName":
    case "genericName":
    case "aliasQualifiedName":
    case "qualifiedName":
      return inlineName(type, trailing);
    case "predefinedType":
      return { ...type, keyword: tight(type.keyword, trailing) };
    case "nullableType":
      return {
        ...type,
        elementType: inlineType(type.elementType, ""),
        questionToken: tight(type.questionToken, trailing),
      };
    case "arrayType": {
      const ranks = type.rankSpecifiers;
      return {
        ...type,
        elementType: inlineType(type.elementType, ""),
        rankSpecifiers: ranks.map((rank, index) => ({
          ...rank,
          openBracket: tight(rank.openBracket),
          commas: rank.commas.map((comma) => tight(comma)),
          closeBracket: tight(
            rank.closeBracket,
            index === ranks.length - 1 ? trailing : ""
          ),
        })),
      };
    }
    case "pointerType":
      return {
        ...type,
        elementType: inlineType(type.elementType, ""),
        asterisk: tight(type.asterisk, trailing),
      };
  }
};

const inlineExpression = (
  expression: ExpressionSyntax,
  trailing: string
): ExpressionSyntax => {
  switch (expression.kind) {
    case "literalExpression":
      return { ...expression, token: tight(expression.token, trailing) };
    case "typeOfExpression":
      return {
        ...expression,
        keyword: tight(expression.keyword),
        openParen: tight(expression.openParen),
        type: inlineType(expression.type, ""),
        closeParen: tight(expression.closeParen, trailing),
      };
    case "throwExpression":
      return {
        ...expression,
        throwKeyword: tight(expression.throwKeyword, " "),
        expression: inlineExpression(expression.expression, trailing),
      };
  }
};

const inlineEqualsValue = (
  clause: EqualsValueClause,
  trailing: string
): EqualsValueClause => ({
  ...clause,
  equals: tight(clause.equals, " "),
  value: inlineExpression(clause.value, trailing),
});

const inlineArrow = (
  clause: ArrowExpressionClause,
  trailing: string
): ArrowExpressionClause => ({
  ...clause,
  arrow: tight(clause.arrow, " "),
  expression: inlineExpression(clause.expression, trailing),
});

// ============================================================
// Attributes
// ============================================================

const inlineAttributeArgument = (
  argument: AttributeArgument,
  trailing: string
): AttributeArgument => ({
  ...argument,
  ...(argument.nameEquals
    ? {
        nameEquals: {
          ...argument.nameEquals,
          name: {
            ...argument.nameEquals.name,
            identifier: tight(argument.nameEquals.name.identifier, " "),
          },
          equals: tight(argument.nameEquals.equals, " "),
        },
      }
    : {}),
  expression: inlineExpression(argument.expression, trailing),
});

const inlineAttribute = (attribute: Attribute, trailing: string): Attribute => {
  const argumentList = attribute.argumentList;
  if (!argumentList) {
    return { ...attribute, name: inlineName(attribute.name, trailing) };
  }
  return {
    ...attribute,
    name: inlineName(attribute.name, ""),
    argumentList: {
      ...argumentList,
      openParen: tight(argumentList.openParen),
      arguments: inlineList(argumentList.arguments, inlineAttributeArgument, ""),
      closeParen: tight(argumentList.closeParen, trailing),
    },
  };
};

const layoutAttributeList = (
  list: AttributeList,
  leading: string,
  trailing: string
): AttributeList => ({
  ...list,
  openBracket: withTrivia(list.openBracket, leading, ""),
  ...(list.target
    ? {
        target: {
          ...list.target,
          identifier: tight(list.target.identifier),
          colon: tight(list.target.colon, " "),
        },
      }
    : {}),
  attributes: inlineList(list.attributes, inlineAttribute, ""),
  closeBracket: tight(list.closeBracket, trailing),
});

/**
 * Declaration attributes: one list per line at the declaration's indent
 */
const ownLineAttributes = (
  lists: readonly AttributeList[],
  depth: number
): readonly AttributeList[] =>
  lists.map((list) => layoutAttributeList(list, indentation(depth), NEWLINE));

// ============================================================
// Headers: type parameters, constraints, base lists, parameters
// ============================================================

const inlineTypeParameters = (
  list: TypeParameterList,
  trailing: string
): TypeParameterList => ({
  ...list,
  lessThan: tight(list.lessThan),
  parameters: inlineList(
    list.parameters,
    (parameter, _trailing) => ({
      ...parameter,
      ...(parameter.varianceKeyword
        ? { varianceKeyword: tight(parameter.varianceKeyword, " ") }
        : {}),
      identifier: tight(parameter.identifier),
    }),
    ""
  ),
  greaterThan: tight(list.greaterThan, trailing),
});

const inlineConstraint = (
  constraint: TypeParameterConstraint,
  trailing: string
): TypeParameterConstraint => {
  switch (constraint.kind) {
    case "keywordConstraint":
      return { ...constraint, keyword: tight(constraint.keyword, trailing) };
    case "constructorConstraint":
      return {
        ...constraint,
        newKeyword: tight(constraint.newKeyword),
        openParen: tight(constraint.openParen),
        closeParen: tight(constraint.closeParen, trailing),
      };
    case "typeConstraint":
      return { ...constraint, type: inlineType(constraint.type, trailing) };
  }
};

/**
 * Clauses inline, separated by spaces; the last gets `trailing`.
 */
const inlineClauses = (
  clauses: readonly TypeParameterConstraintClause[],
  trailing: string
): readonly TypeParameterConstraintClause[] =>
  clauses.map((clause, index) => ({
    ...clause,
    whereKeyword: tight(clause.whereKeyword, " "),
    name: { ...clause.name, identifier: tight(clause.name.identifier, " ") },
    colon: tight(clause.colon, " "),
    constraints: inlineList(
      clause.constraints,
      inlineConstraint,
      index === clauses.length - 1 ? trailing : " "
    ),
  }));

const inlineBaseList = (list: BaseList, trailing: string): BaseList => ({
  ...list,
  colon: tight(list.colon, " "),
  types: inlineList(
    list.types,
    (entry, last) => ({ ...entry, type: inlineType(entry.type, last) }),
    trailing
  ),
});

const inlineParameter = (parameter: Parameter, trailing: string): Parameter => ({
  ...parameter,
  attributeLists: parameter.attributeLists.map((list) =>
    layoutAttributeList(list, "", " ")
  ),
  modifiers: parameter.modifiers.map((modifier) => tight(modifier, " ")),
  type: inlineType(parameter.type, " "),
  identifier: tight(parameter.identifier, parameter.defaultValue ? " " : trailing),
  ...(parameter.defaultValue
    ? { defaultValue: inlineEqualsValue(parameter.defaultValue, trailing) }
    : {}),
});

const inlineParameterList = (
  list: ParameterList,
  trailing: string
): ParameterList => ({
  ...list,
  openParen: tight(list.openParen),
  parameters: inlineList(list.parameters, inlineParameter, ""),
  closeParen: tight(list.closeParen, trailing),
});

const inlineBracketedParameterList = (
  list: BracketedParameterList,
  trailing: string
): BracketedParameterList => ({
  ...list,
  openBracket: tight(list.openBracket),
  parameters: inlineList(list.parameters, inlineParameter, ""),
  closeBracket: tight(list.closeBracket, trailing),
});

/**
 * Modifiers of a declaration header; the first starts the line.
 */
const headerModifiers = (
  modifiers: readonly SyntaxToken[],
  depth: number
): readonly SyntaxToken[] =>
  modifiers.map((modifier, index) =>
    withTrivia(modifier, index === 0 ? indentation(depth) : "", " ")
  );

/**
 * Leading trivia for the header token after the modifiers
 */
const afterModifiers = (
  modifiers: readonly SyntaxToken[],
  depth: number
): string => (modifiers.length === 0 ? indentation(depth) : "");

// ============================================================
// Bodies
// ============================================================

const layoutStatement = (
  statement: StatementSyntax,
  depth: number
): StatementSyntax => {
  switch (statement.kind) {
    case "block":
      return layoutBlock(statement, depth);
    case "throwStatement":
      return {
        ...statement,
        throwKeyword: withTrivia(
          statement.throwKeyword,
          indentation(depth),
          statement.expression ? " " : ""
        ),
        ...(statement.expression
          ? { expression: inlineExpression(statement.expression, "") }
          : {}),
        semicolon: tight(statement.semicolon, NEWLINE),
      };
    case "returnStatement":
      return {
        ...statement,
        returnKeyword: withTrivia(
          statement.returnKeyword,
          indentation(depth),
          statement.expression ? " " : ""
        ),
        ...(statement.expression
          ? { expression: inlineExpression(statement.expression, "") }
          : {}),
        semicolon: tight(statement.semicolon, NEWLINE),
      };
  }
};

const layoutBlock = (block: Block, depth: number): Block => ({
  ...block,
  openBrace: withTrivia(block.openBrace, indentation(depth), NEWLINE),
  statements: block.statements.map((s) => layoutStatement(s, depth + 1)),
  closeBrace: withTrivia(block.closeBrace, indentation(depth), NEWLINE),
});

type BodyParts = {
  readonly body?: Block;
  readonly expressionBody?: ArrowExpressionClause;
  readonly semicolon?: SyntaxToken;
};

/**
 * Trailing trivia for the last header token before a body
 */
const headerEnd = (member: BodyParts): string =>
  member.body ? NEWLINE : member.expressionBody ? " " : "";

const layoutBody = <T extends BodyParts>(member: T, depth: number): BodyParts => ({
  ...(member.body ? { body: layoutBlock(member.body, depth) } : {}),
  ...(member.expressionBody
    ? { expressionBody: inlineArrow(member.expressionBody, "") }
    : {}),
  ...(member.semicolon ? { semicolon: tight(member.semicolon, NEWLINE) } : {}),
});

const layoutAccessor = (
  accessor: AccessorDeclaration,
  depth: number
): AccessorDeclaration => ({
  kind: "accessorDeclaration",
  modifiers: headerModifiers(accessor.modifiers, depth),
  keyword: withTrivia(
    accessor.keyword,
    afterModifiers(accessor.modifiers, depth),
    headerEnd(accessor)
  ),
  ...layoutBody(accessor, depth),
});

const layoutAccessorList = (list: AccessorList, depth: number): AccessorList => ({
  ...list,
  openBrace: withTrivia(list.openBrace, indentation(depth), NEWLINE),
  accessors: list.accessors.map((a) => layoutAccessor(a, depth + 1)),
  closeBrace: withTrivia(list.closeBrace, indentation(depth), NEWLINE),
});

// ============================================================
// Members
// ============================================================

const inlineDeclarators = (
  variables: SeparatedList<VariableDeclarator>
): SeparatedList<VariableDeclarator> =>
  inlineList(
    variables,
    (declarator, trailing) => ({
      ...declarator,
      identifier: tight(
        declarator.identifier,
        declarator.initializer ? " " : trailing
      ),
      ...(declarator.initializer
        ? { initializer: inlineEqualsValue(declarator.initializer, trailing) }
        : {}),
    }),
    ""
  );

const layoutField = (field: FieldDeclaration, depth: number): FieldDeclaration => ({
  ...field,
  attributeLists: ownLineAttributes(field.attributeLists, depth),
  modifiers: headerModifiers(field.modifiers, depth),
  type: withTypeLeading(
    inlineType(field.type, " "),
    afterModifiers(field.modifiers, depth)
  ),
  variables: inlineDeclarators(field.variables),
  semicolon: tight(field.semicolon, NEWLINE),
});

const layoutEventField = (
  event: EventFieldDeclaration,
  depth: number
): EventFieldDeclaration => ({
  ...event,
  attributeLists: ownLineAttributes(event.attributeLists, depth),
  modifiers: headerModifiers(event.modifiers, depth),
  eventKeyword: withTrivia(
    event.eventKeyword,
    afterModifiers(event.modifiers, depth),
    " "
  ),
  type: inlineType(event.type, " "),
  variables: inlineDeclarators(event.variables),
  semicolon: tight(event.semicolon, NEWLINE),
});

const layoutConstructor = (
  ctor: ConstructorDeclaration,
  depth: number
): ConstructorDeclaration => ({
  kind: "constructorDeclaration",
  attributeLists: ownLineAttributes(ctor.attributeLists, depth),
  modifiers: headerModifiers(ctor.modifiers, depth),
  identifier: withTrivia(ctor.identifier, afterModifiers(ctor.modifiers, depth), ""),
  parameterList: inlineParameterList(ctor.parameterList, headerEnd(ctor)),
  ...layoutBody(ctor, depth),
});

const layoutMethod = (
  method: MethodDeclaration,
  depth: number
): MethodDeclaration => {
  const end = headerEnd(method);
  const hasClauses = method.constraintClauses.length > 0;
  return {
    kind: "methodDeclaration",
    attributeLists: ownLineAttributes(method.attributeLists, depth),
    modifiers: headerModifiers(method.modifiers, depth),
    returnType: withTypeLeading(
      inlineType(method.returnType, " "),
      afterModifiers(method.modifiers, depth)
    ),
    identifier: tight(method.identifier),
    ...(method.typeParameterList
      ? { typeParameterList: inlineTypeParameters(method.typeParameterList, "") }
      : {}),
    parameterList: inlineParameterList(
      method.parameterList,
      hasClauses ? " " : end
    ),
    constraintClauses: inlineClauses(method.constraintClauses, end),
    ...layoutBody(method, depth),
  };
};

const propertyHeaderEnd = (member: {
  readonly accessorList?: AccessorList;
  readonly expressionBody?: ArrowExpressionClause;
}): string =>
  member.accessorList ? NEWLINE : member.expressionBody ? " " : "";

const layoutPropertyBody = (
  member: PropertyDeclaration | IndexerDeclaration,
  depth: number
): {
  readonly accessorList?: AccessorList;
  readonly expressionBody?: ArrowExpressionClause;
  readonly semicolon?: SyntaxToken;
} => ({
  ...(member.accessorList
    ? { accessorList: layoutAccessorList(member.accessorList, depth) }
    : {}),
  ...(member.expressionBody
    ? { expressionBody: inlineArrow(member.expressionBody, "") }
    : {}),
  ...(member.semicolon ? { semicolon: tight(member.semicolon, NEWLINE) } : {}),
});

const layoutProperty = (
  property: PropertyDeclaration,
  depth: number
): PropertyDeclaration => ({
  kind: "propertyDeclaration",
  attributeLists: ownLineAttributes(property.attributeLists, depth),
  modifiers: headerModifiers(property.modifiers, depth),
  type: withTypeLeading(
    inlineType(property.type, " "),
    afterModifiers(property.modifiers, depth)
  ),
  identifier: tight(property.identifier, propertyHeaderEnd(property)),
  ...layoutPropertyBody(property, depth),
});

const layoutIndexer = (
  indexer: IndexerDeclaration,
  depth: number
): IndexerDeclaration => ({
  kind: "indexerDeclaration",
  attributeLists: ownLineAttributes(indexer.attributeLists, depth),
  modifiers: headerModifiers(indexer.modifiers, depth),
  type: withTypeLeading(
    inlineType(indexer.type, " "),
    afterModifiers(indexer.modifiers, depth)
  ),
  thisKeyword: tight(indexer.thisKeyword),
  parameterList: inlineBracketedParameterList(
    indexer.parameterList,
    propertyHeaderEnd(indexer)
  ),
  ...layoutPropertyBody(indexer, depth),
});

const layoutDelegate = (
  delegate: DelegateDeclaration,
  depth: number
): DelegateDeclaration => ({
  ...delegate,
  attributeLists: ownLineAttributes(delegate.attributeLists, depth),
  modifiers: headerModifiers(delegate.modifiers, depth),
  delegateKeyword: withTrivia(
    delegate.delegateKeyword,
    afterModifiers(delegate.modifiers, depth),
    " "
  ),
  returnType: inlineType(delegate.returnType, " "),
  identifier: tight(delegate.identifier),
  ...(delegate.typeParameterList
    ? { typeParameterList: inlineTypeParameters(delegate.typeParameterList, "") }
    : {}),
  parameterList: inlineParameterList(
    delegate.parameterList,
    delegate.constraintClauses.length > 0 ? " " : ""
  ),
  constraintClauses: inlineClauses(delegate.constraintClauses, ""),
  semicolon: tight(delegate.semicolon, NEWLINE),
});

// ============================================================
// Types
// ============================================================

const layoutClassLike = <T extends ClassLikeDeclaration>(
  decl: T,
  depth: number
): T => {
  const hasBaseList = decl.baseList !== undefined;
  const hasClauses = decl.constraintClauses.length > 0;
  const afterTypeParameters = hasBaseList || hasClauses ? " " : NEWLINE;
  const afterIdentifier = decl.typeParameterList ? "" : afterTypeParameters;

  return {
    ...decl,
    attributeLists: ownLineAttributes(decl.attributeLists, depth),
    modifiers: headerModifiers(decl.modifiers, depth),
    keyword: withTrivia(decl.keyword, afterModifiers(decl.modifiers, depth), " "),
    identifier: tight(decl.identifier, afterIdentifier),
    ...(decl.typeParameterList
      ? {
          typeParameterList: inlineTypeParameters(
            decl.typeParameterList,
            afterTypeParameters
          ),
        }
      : {}),
    ...(decl.baseList
      ? { baseList: inlineBaseList(decl.baseList, hasClauses ? " " : NEWLINE) }
      : {}),
    constraintClauses: inlineClauses(decl.constraintClauses, NEWLINE),
    openBrace: withTrivia(decl.openBrace, indentation(depth), NEWLINE),
    members: decl.members.map((m) => layoutMember(m, depth + 1)),
    closeBrace: withTrivia(decl.closeBrace, indentation(depth), NEWLINE),
  };
};

const layoutEnumMember = (
  member: EnumMemberDeclaration,
  depth: number,
  trailing: string
): EnumMemberDeclaration => ({
  ...member,
  attributeLists: ownLineAttributes(member.attributeLists, depth),
  identifier: withTrivia(
    member.identifier,
    indentation(depth),
    member.equalsValue ? " " : trailing
  ),
  ...(member.equalsValue
    ? { equalsValue: inlineEqualsValue(member.equalsValue, trailing) }
    : {}),
});

const layoutEnum = (decl: EnumDeclaration, depth: number): EnumDeclaration => ({
  ...decl,
  attributeLists: ownLineAttributes(decl.attributeLists, depth),
  modifiers: headerModifiers(decl.modifiers, depth),
  enumKeyword: withTrivia(
    decl.enumKeyword,
    afterModifiers(decl.modifiers, depth),
    " "
  ),
  identifier: tight(decl.identifier, decl.baseList ? " " : NEWLINE),
  ...(decl.baseList ? { baseList: inlineBaseList(decl.baseList, NEWLINE) } : {}),
  openBrace: withTrivia(decl.openBrace, indentation(depth), NEWLINE),
  members: {
    items: decl.members.items.map((member, index) =>
      layoutEnumMember(
        member,
        depth + 1,
        index === decl.members.items.length - 1 ? NEWLINE : ""
      )
    ),
    separators: decl.members.separators.map((sep) => tight(sep, NEWLINE)),
  },
  closeBrace: withTrivia(decl.closeBrace, indentation(depth), NEWLINE),
});

const layoutTypeDeclaration = (
  decl: TypeDeclarationSyntax,
  depth: number
): TypeDeclarationSyntax => {
  switch (decl.kind) {
    case "classDeclaration":
    case "structDeclaration":
    case "interfaceDeclaration":
      return layoutClassLike(decl, depth);
    case "enumDeclaration":
      return layoutEnum(decl, depth);
    case "delegateDeclaration":
      return layoutDelegate(decl, depth);
  }
};

const layoutMember = (
  member: MemberDeclarationSyntax,
  depth: number
): MemberDeclarationSyntax => {
  switch (member.kind) {
    case "fieldDeclaration":
      return layoutField(member, depth);
    case "eventFieldDeclaration":
      return layoutEventField(member, depth);
    case "constructorDeclaration":
      return layoutConstructor(member, depth);
    case "methodDeclaration":
      return layoutMethod(member, depth);
    case "propertyDeclaration":
      return layoutProperty(member, depth);
    case "indexerDeclaration":
      return layoutIndexer(member, depth);
    case "classDeclaration":
    case "structDeclaration":
    case "interfaceDeclaration":
    case "enumDeclaration":
    case "delegateDeclaration":
      return layoutTypeDeclaration(member, depth);
  }
};

const layoutNamespace = (
  decl: NamespaceDeclaration,
  depth: number
): NamespaceDeclaration => ({
  ...decl,
  namespaceKeyword: withTrivia(decl.namespaceKeyword, indentation(depth), " "),
  name: inlineName(decl.name, NEWLINE),
  openBrace: withTrivia(decl.openBrace, indentation(depth), NEWLINE),
  members: decl.members.map((m) => layoutTypeDeclaration(m, depth + 1)),
  closeBrace: withTrivia(decl.closeBrace, indentation(depth), ""),
});

/**
 * Apply the default layout to a namespace or type declaration at `depth`.
 */
export function normalizeWhitespace(
  node: NamespaceDeclaration,
  depth?: number
): NamespaceDeclaration;
export function normalizeWhitespace(
  node: TypeDeclarationSyntax,
  depth?: number
): TypeDeclarationSyntax;
export function normalizeWhitespace(
  node: NamespaceDeclaration | TypeDeclarationSyntax,
  depth: number = 0
): NamespaceDeclaration | TypeDeclarationSyntax {
  return node.kind === "namespaceDeclaration"
    ? layoutNamespace(node, depth)
    : layoutTypeDeclaration(node, depth);
}
