/**
 * Canonicalization rewriter
 *
 * Turns a normalized declaration tree into its canonical skeleton form:
 * - `global::` aliases are dropped from every name (qualified names included)
 * - `System.Object` is dropped from base lists
 * - constructors and void methods get `{ }`, other methods `{ throw null; }`
 * - accessors collapse onto the property line; `get` throws, the rest are empty
 * - abstract and interface members keep their semicolon form
 *
 * Rewriting is pure and idempotent. Every slot is revisited bottom-up, and a
 * rule that puts a node of the wrong category into a slot is an internal
 * compiler error.
 */

import type {
  AccessorDeclaration,
  AccessorList,
  BaseList,
  Block,
  ClassLikeDeclaration,
  ConstructorDeclaration,
  EnumDeclaration,
  IndexerDeclaration,
  MethodDeclaration,
  NamespaceDeclaration,
  ParameterList,
  PropertyDeclaration,
  SeparatedList,
  SimpleBaseType,
  SyntaxNode,
  SyntaxToken,
  TypeDeclarationSyntax,
} from "./syntax/types.js";
import {
  isExpressionSyntax,
  isKind,
  isMemberDeclarationSyntax,
  isNameSyntax,
  isSimpleName,
  isStatementSyntax,
  isTypeDeclarationSyntax,
  isTypeParameterConstraint,
  isTypeSyntax,
} from "./syntax/types.js";
import {
  literal,
  token,
  withLeading,
  withTrailing,
  withTrivia,
} from "./syntax/factory.js";
import { lastToken, printNodeText } from "./syntax/printer.js";
import {
  NEWLINE,
  withBaseListTrailing,
  withClausesTrailing,
  withSimpleNameLeading,
  withTypeTrailing,
} from "./syntax/trivia.js";

type RewriteContext = {
  /** Kind of the innermost enclosing class, struct or interface */
  readonly containingType?: ClassLikeDeclaration["kind"];
  /** Accessors being visited belong to an abstract property or indexer */
  readonly abstractAccessors: boolean;
};

const rootContext: RewriteContext = { abstractAccessors: false };

const OBJECT_BASE_NAMES: ReadonlySet<string> = new Set([
  "global::System.Object",
  "System.Object",
  "object",
]);

type Guard<T extends SyntaxNode> = (node: SyntaxNode) => node is T;

// ============================================================
// Slot visitors
// ============================================================

const slotError = (node: SyntaxNode, result: SyntaxNode | undefined): Error =>
  new Error(
    `ICE: Rewriting '${node.kind}' produced ${
      result === undefined ? "no node" : `'${result.kind}'`
    } in a slot that does not accept it`
  );

const visitAs = <T extends SyntaxNode>(
  node: SyntaxNode,
  guard: Guard<T>,
  ctx: RewriteContext
): T => {
  const result = rewriteNode(node, ctx);
  if (result === undefined || !guard(result)) {
    throw slotError(node, result);
  }
  return result;
};

const visitOptional = <T extends SyntaxNode>(
  node: T | undefined,
  guard: Guard<T>,
  ctx: RewriteContext
): T | undefined => {
  if (node === undefined) {
    return undefined;
  }
  const result = rewriteNode(node, ctx);
  if (result !== undefined && !guard(result)) {
    throw slotError(node, result);
  }
  return result;
};

const visitList = <T extends SyntaxNode>(
  nodes: readonly T[],
  guard: Guard<T>,
  ctx: RewriteContext
): readonly T[] => nodes.map((node) => visitAs(node, guard, ctx));

const visitSeparated = <T extends SyntaxNode>(
  list: SeparatedList<T>,
  guard: Guard<T>,
  ctx: RewriteContext
): SeparatedList<T> => ({
  items: list.items.map((node) => visitAs(node, guard, ctx)),
  separators: list.separators,
});

// ============================================================
// Child visitors for the kinds the rules rebuild
// ============================================================

const classLikeChildren = <T extends ClassLikeDeclaration>(
  decl: T,
  ctx: RewriteContext
): T => ({
  ...decl,
  attributeLists: visitList(decl.attributeLists, isKind("attributeList"), ctx),
  typeParameterList: visitOptional(
    decl.typeParameterList,
    isKind("typeParameterList"),
    ctx
  ),
  baseList: visitOptional(decl.baseList, isKind("baseList"), ctx),
  constraintClauses: visitList(
    decl.constraintClauses,
    isKind("typeParameterConstraintClause"),
    ctx
  ),
  members: visitList(decl.members, isMemberDeclarationSyntax, {
    containingType: decl.kind,
    abstractAccessors: false,
  }),
});

const enumChildren = (
  decl: EnumDeclaration,
  ctx: RewriteContext
): EnumDeclaration => ({
  ...decl,
  attributeLists: visitList(decl.attributeLists, isKind("attributeList"), ctx),
  baseList: visitOptional(decl.baseList, isKind("baseList"), ctx),
  members: visitSeparated(decl.members, isKind("enumMemberDeclaration"), ctx),
});

const constructorChildren = (
  decl: ConstructorDeclaration,
  ctx: RewriteContext
): ConstructorDeclaration => ({
  ...decl,
  attributeLists: visitList(decl.attributeLists, isKind("attributeList"), ctx),
  parameterList: visitAs(decl.parameterList, isKind("parameterList"), ctx),
  body: visitOptional(decl.body, isKind("block"), ctx),
  expressionBody: visitOptional(
    decl.expressionBody,
    isKind("arrowExpressionClause"),
    ctx
  ),
});

const methodChildren = (
  decl: MethodDeclaration,
  ctx: RewriteContext
): MethodDeclaration => ({
  ...decl,
  attributeLists: visitList(decl.attributeLists, isKind("attributeList"), ctx),
  returnType: visitAs(decl.returnType, isTypeSyntax, ctx),
  typeParameterList: visitOptional(
    decl.typeParameterList,
    isKind("typeParameterList"),
    ctx
  ),
  parameterList: visitAs(decl.parameterList, isKind("parameterList"), ctx),
  constraintClauses: visitList(
    decl.constraintClauses,
    isKind("typeParameterConstraintClause"),
    ctx
  ),
  body: visitOptional(decl.body, isKind("block"), ctx),
  expressionBody: visitOptional(
    decl.expressionBody,
    isKind("arrowExpressionClause"),
    ctx
  ),
});

const propertyChildren = (
  decl: PropertyDeclaration,
  ctx: RewriteContext
): PropertyDeclaration => ({
  ...decl,
  attributeLists: visitList(decl.attributeLists, isKind("attributeList"), ctx),
  type: visitAs(decl.type, isTypeSyntax, ctx),
  accessorList: visitOptional(decl.accessorList, isKind("accessorList"), ctx),
  expressionBody: visitOptional(
    decl.expressionBody,
    isKind("arrowExpressionClause"),
    ctx
  ),
});

const indexerChildren = (
  decl: IndexerDeclaration,
  ctx: RewriteContext
): IndexerDeclaration => ({
  ...decl,
  attributeLists: visitList(decl.attributeLists, isKind("attributeList"), ctx),
  type: visitAs(decl.type, isTypeSyntax, ctx),
  parameterList: visitAs(
    decl.parameterList,
    isKind("bracketedParameterList"),
    ctx
  ),
  accessorList: visitOptional(decl.accessorList, isKind("accessorList"), ctx),
  expressionBody: visitOptional(
    decl.expressionBody,
    isKind("arrowExpressionClause"),
    ctx
  ),
});

const accessorChildren = (
  decl: AccessorDeclaration,
  ctx: RewriteContext
): AccessorDeclaration => ({
  ...decl,
  body: visitOptional(decl.body, isKind("block"), ctx),
  expressionBody: visitOptional(
    decl.expressionBody,
    isKind("arrowExpressionClause"),
    ctx
  ),
});

/**
 * Rebuild a node with every child slot rewritten.
 */
const visitChildren = (node: SyntaxNode, ctx: RewriteContext): SyntaxNode => {
  switch (node.kind) {
    case "identifierName":
    case "predefinedType":
    case "arrayRankSpecifier":
    case "literalExpression":
    case "attributeTargetSpecifier":
    case "typeParameter":
    case "keywordConstraint":
    case "constructorConstraint":
      return node;

    case "genericName":
      return {
        ...node,
        typeArgumentList: visitAs(
          node.typeArgumentList,
          isKind("typeArgumentList"),
          ctx
        ),
      };
    case "typeArgumentList":
      return {
        ...node,
        arguments: visitSeparated(node.arguments, isTypeSyntax, ctx),
      };
    case "aliasQualifiedName":
      return {
        ...node,
        alias: visitAs(node.alias, isKind("identifierName"), ctx),
        name: visitAs(node.name, isSimpleName, ctx),
      };
    case "qualifiedName":
      return {
        ...node,
        left: visitAs(node.left, isNameSyntax, ctx),
        right: visitAs(node.right, isSimpleName, ctx),
      };
    case "nullableType":
    case "pointerType":
      return { ...node, elementType: visitAs(node.elementType, isTypeSyntax, ctx) };
    case "arrayType":
      return {
        ...node,
        elementType: visitAs(node.elementType, isTypeSyntax, ctx),
        rankSpecifiers: visitList(
          node.rankSpecifiers,
          isKind("arrayRankSpecifier"),
          ctx
        ),
      };

    case "typeOfExpression":
      return { ...node, type: visitAs(node.type, isTypeSyntax, ctx) };
    case "throwExpression":
      return {
        ...node,
        expression: visitAs(node.expression, isExpressionSyntax, ctx),
      };
    case "block":
      return {
        ...node,
        statements: visitList(node.statements, isStatementSyntax, ctx),
      };
    case "throwStatement":
    case "returnStatement":
      return {
        ...node,
        expression: visitOptional(node.expression, isExpressionSyntax, ctx),
      };
    case "arrowExpressionClause":
      return {
        ...node,
        expression: visitAs(node.expression, isExpressionSyntax, ctx),
      };
    case "equalsValueClause":
      return { ...node, value: visitAs(node.value, isExpressionSyntax, ctx) };

    case "attributeList":
      return {
        ...node,
        target: visitOptional(node.target, isKind("attributeTargetSpecifier"), ctx),
        attributes: visitSeparated(node.attributes, isKind("attribute"), ctx),
      };
    case "attribute":
      return {
        ...node,
        name: visitAs(node.name, isNameSyntax, ctx),
        argumentList: visitOptional(
          node.argumentList,
          isKind("attributeArgumentList"),
          ctx
        ),
      };
    case "attributeArgumentList":
      return {
        ...node,
        arguments: visitSeparated(node.arguments, isKind("attributeArgument"), ctx),
      };
    case "attributeArgument":
      return {
        ...node,
        nameEquals: visitOptional(node.nameEquals, isKind("nameEquals"), ctx),
        expression: visitAs(node.expression, isExpressionSyntax, ctx),
      };
    case "nameEquals":
      return { ...node, name: visitAs(node.name, isKind("identifierName"), ctx) };

    case "typeParameterList":
      return {
        ...node,
        parameters: visitSeparated(node.parameters, isKind("typeParameter"), ctx),
      };
    case "typeParameterConstraintClause":
      return {
        ...node,
        name: visitAs(node.name, isKind("identifierName"), ctx),
        constraints: visitSeparated(
          node.constraints,
          isTypeParameterConstraint,
          ctx
        ),
      };
    case "typeConstraint":
    case "simpleBaseType":
      return { ...node, type: visitAs(node.type, isTypeSyntax, ctx) };
    case "baseList":
      return {
        ...node,
        types: visitSeparated(node.types, isKind("simpleBaseType"), ctx),
      };

    case "parameter":
      return {
        ...node,
        attributeLists: visitList(node.attributeLists, isKind("attributeList"), ctx),
        type: visitAs(node.type, isTypeSyntax, ctx),
        defaultValue: visitOptional(
          node.defaultValue,
          isKind("equalsValueClause"),
          ctx
        ),
      };
    case "parameterList":
    case "bracketedParameterList":
      return {
        ...node,
        parameters: visitSeparated(node.parameters, isKind("parameter"), ctx),
      };
    case "variableDeclarator":
      return {
        ...node,
        initializer: visitOptional(
          node.initializer,
          isKind("equalsValueClause"),
          ctx
        ),
      };
    case "fieldDeclaration":
    case "eventFieldDeclaration":
      return {
        ...node,
        attributeLists: visitList(node.attributeLists, isKind("attributeList"), ctx),
        type: visitAs(node.type, isTypeSyntax, ctx),
        variables: visitSeparated(node.variables, isKind("variableDeclarator"), ctx),
      };

    case "constructorDeclaration":
      return constructorChildren(node, ctx);
    case "methodDeclaration":
      return methodChildren(node, ctx);
    case "propertyDeclaration":
      return propertyChildren(node, ctx);
    case "indexerDeclaration":
      return indexerChildren(node, ctx);
    case "accessorList":
      return {
        ...node,
        accessors: visitList(node.accessors, isKind("accessorDeclaration"), ctx),
      };
    case "accessorDeclaration":
      return accessorChildren(node, ctx);
    case "enumMemberDeclaration":
      return {
        ...node,
        attributeLists: visitList(node.attributeLists, isKind("attributeList"), ctx),
        equalsValue: visitOptional(
          node.equalsValue,
          isKind("equalsValueClause"),
          ctx
        ),
      };
    case "delegateDeclaration":
      return {
        ...node,
        attributeLists: visitList(node.attributeLists, isKind("attributeList"), ctx),
        returnType: visitAs(node.returnType, isTypeSyntax, ctx),
        typeParameterList: visitOptional(
          node.typeParameterList,
          isKind("typeParameterList"),
          ctx
        ),
        parameterList: visitAs(node.parameterList, isKind("parameterList"), ctx),
        constraintClauses: visitList(
          node.constraintClauses,
          isKind("typeParameterConstraintClause"),
          ctx
        ),
      };

    case "classDeclaration":
    case "structDeclaration":
    case "interfaceDeclaration":
      return classLikeChildren(node, ctx);
    case "enumDeclaration":
      return enumChildren(node, ctx);
    case "namespaceDeclaration":
      return {
        ...node,
        name: visitAs(node.name, isNameSyntax, ctx),
        members: visitList(node.members, isTypeDeclarationSyntax, rootContext),
      };

    default: {
      const exhaustiveCheck: never = node;
      throw new Error(
        `ICE: Unhandled syntax node kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

// ============================================================
// Stand-in bodies
// ============================================================

/** `{ }` */
const emptyBody = (end: string): Block => ({
  kind: "block",
  openBrace: token("{", "", " "),
  statements: [],
  closeBrace: token("}", "", end),
});

/** `{ throw null; }` */
const throwBody = (end: string): Block => ({
  kind: "block",
  openBrace: token("{", "", " "),
  statements: [
    {
      kind: "throwStatement",
      throwKeyword: token("throw", "", " "),
      expression: literal("null"),
      semicolon: token(";", "", " "),
    },
  ],
  closeBrace: token("}", "", end),
});

const hasModifier = (modifiers: readonly SyntaxToken[], text: string): boolean =>
  modifiers.some((modifier) => modifier.text === text);

const withCloseParenTrailing = (
  list: ParameterList,
  trivia: string
): ParameterList => ({ ...list, closeParen: withTrailing(list.closeParen, trivia) });

// ============================================================
// Rules
// ============================================================

const rewriteClassLike = <T extends ClassLikeDeclaration>(
  decl: T,
  ctx: RewriteContext
): T => {
  const visited = classLikeChildren(decl, ctx);
  const closed = { ...visited, closeBrace: withTrailing(visited.closeBrace, NEWLINE) };
  if (visited.baseList !== undefined || visited.constraintClauses.length > 0) {
    return closed;
  }
  const typeParameters = visited.typeParameterList;
  return typeParameters
    ? {
        ...closed,
        typeParameterList: {
          ...typeParameters,
          greaterThan: withTrailing(typeParameters.greaterThan, NEWLINE),
        },
      }
    : { ...closed, identifier: withTrailing(closed.identifier, NEWLINE) };
};

const rewriteEnum = (
  decl: EnumDeclaration,
  ctx: RewriteContext
): EnumDeclaration => {
  const visited = enumChildren(decl, ctx);
  const closeBrace = withTrailing(visited.closeBrace, NEWLINE);
  return visited.baseList
    ? {
        ...visited,
        baseList: withBaseListTrailing(visited.baseList, NEWLINE),
        closeBrace,
      }
    : {
        ...visited,
        identifier: withTrailing(visited.identifier, NEWLINE),
        closeBrace,
      };
};

/**
 * Drop the first `System.Object` entry. When it was the last entry, the
 * entry before it inherits its trailing trivia.
 */
const rewriteBaseList = (
  list: BaseList,
  ctx: RewriteContext
): BaseList | undefined => {
  const { items, separators } = list.types;
  const index = items.findIndex((entry) =>
    OBJECT_BASE_NAMES.has(printNodeText(entry.type))
  );
  const removed = items[index];
  if (removed === undefined) {
    return { ...list, types: visitSeparated(list.types, isKind("simpleBaseType"), ctx) };
  }
  if (items.length === 1) {
    return undefined;
  }

  const isLast = index === items.length - 1;
  const remaining = items.filter((_, i) => i !== index);
  const keptSeparators = separators.filter(
    (_, i) => i !== (isLast ? index - 1 : index)
  );
  const trailing = lastToken(removed)?.trailingTrivia ?? "";
  const entries: readonly SimpleBaseType[] = isLast
    ? remaining.map((entry, i) =>
        i === remaining.length - 1
          ? { ...entry, type: withTypeTrailing(entry.type, trailing) }
          : entry
      )
    : remaining;

  return {
    ...list,
    types: visitSeparated(
      { items: entries, separators: keptSeparators },
      isKind("simpleBaseType"),
      ctx
    ),
  };
};

const rewriteConstructor = (
  decl: ConstructorDeclaration,
  ctx: RewriteContext
): ConstructorDeclaration => {
  const visited = constructorChildren(decl, ctx);
  return {
    kind: "constructorDeclaration",
    attributeLists: visited.attributeLists,
    modifiers: visited.modifiers,
    identifier: visited.identifier,
    parameterList: withCloseParenTrailing(visited.parameterList, " "),
    body: emptyBody(NEWLINE),
  };
};

const rewriteMethod = (
  decl: MethodDeclaration,
  ctx: RewriteContext
): MethodDeclaration => {
  const visited = methodChildren(decl, ctx);
  const isAbstract =
    hasModifier(visited.modifiers, "abstract") ||
    (ctx.containingType === "interfaceDeclaration" &&
      visited.body === undefined &&
      visited.expressionBody === undefined);
  if (isAbstract) {
    return visited;
  }

  const returnText = printNodeText(visited.returnType);
  const isVoid = returnText === "void" || returnText === "System.Void";
  return {
    kind: "methodDeclaration",
    attributeLists: visited.attributeLists,
    modifiers: visited.modifiers,
    returnType: visited.returnType,
    identifier: visited.identifier,
    typeParameterList: visited.typeParameterList,
    parameterList: withCloseParenTrailing(visited.parameterList, " "),
    constraintClauses: withClausesTrailing(visited.constraintClauses, " "),
    body: isVoid ? emptyBody(NEWLINE) : throwBody(NEWLINE),
  };
};

/**
 * `{ get; set; }` on the declaration line
 */
const collapseAccessorList = (list: AccessorList): AccessorList => ({
  ...list,
  openBrace: withTrivia(list.openBrace, "", " "),
  closeBrace: withTrivia(list.closeBrace, "", NEWLINE),
});

const getterOnly = (): AccessorList => ({
  kind: "accessorList",
  openBrace: token("{"),
  accessors: [
    { kind: "accessorDeclaration", modifiers: [], keyword: token("get") },
  ],
  closeBrace: token("}"),
});

const isAbstractPropertyLike = (
  decl: PropertyDeclaration | IndexerDeclaration,
  ctx: RewriteContext
): boolean =>
  hasModifier(decl.modifiers, "abstract") ||
  (ctx.containingType === "interfaceDeclaration" &&
    decl.expressionBody === undefined &&
    (decl.accessorList?.accessors ?? []).every(
      (accessor) =>
        accessor.body === undefined && accessor.expressionBody === undefined
    ));

/**
 * Accessor list of a property or indexer, in canonical form. An expression
 * body becomes a lone `get`.
 */
const canonicalAccessors = (
  decl: PropertyDeclaration | IndexerDeclaration,
  ctx: RewriteContext
): AccessorList => {
  const accessorContext: RewriteContext = {
    ...ctx,
    abstractAccessors: isAbstractPropertyLike(decl, ctx),
  };
  const list = decl.accessorList ?? getterOnly();
  return collapseAccessorList(
    visitAs(list, isKind("accessorList"), accessorContext)
  );
};

const rewriteProperty = (
  decl: PropertyDeclaration,
  ctx: RewriteContext
): PropertyDeclaration => ({
  kind: "propertyDeclaration",
  attributeLists: visitList(decl.attributeLists, isKind("attributeList"), ctx),
  modifiers: decl.modifiers,
  type: visitAs(decl.type, isTypeSyntax, ctx),
  identifier: withTrailing(decl.identifier, " "),
  accessorList: canonicalAccessors(decl, ctx),
});

const rewriteIndexer = (
  decl: IndexerDeclaration,
  ctx: RewriteContext
): IndexerDeclaration => {
  const parameterList = visitAs(
    decl.parameterList,
    isKind("bracketedParameterList"),
    ctx
  );
  return {
    kind: "indexerDeclaration",
    attributeLists: visitList(decl.attributeLists, isKind("attributeList"), ctx),
    modifiers: decl.modifiers,
    type: visitAs(decl.type, isTypeSyntax, ctx),
    thisKeyword: decl.thisKeyword,
    parameterList: {
      ...parameterList,
      closeBracket: withTrailing(parameterList.closeBracket, " "),
    },
    accessorList: canonicalAccessors(decl, ctx),
  };
};

const rewriteAccessor = (
  decl: AccessorDeclaration,
  ctx: RewriteContext
): AccessorDeclaration => {
  const [first, ...rest] = decl.modifiers;
  const modifiers = first ? [withLeading(first, ""), ...rest] : [];

  if (ctx.abstractAccessors) {
    return {
      kind: "accessorDeclaration",
      modifiers,
      keyword: withTrivia(decl.keyword, "", ""),
      semicolon: decl.semicolon
        ? withTrivia(decl.semicolon, "", " ")
        : token(";", "", " "),
    };
  }

  return {
    kind: "accessorDeclaration",
    modifiers,
    keyword: withTrivia(decl.keyword, "", " "),
    body: decl.keyword.text === "get" ? throwBody(" ") : emptyBody(" "),
  };
};

/**
 * Rewrite one node. `undefined` means the node is removed from its slot.
 */
const rewriteNode = (
  node: SyntaxNode,
  ctx: RewriteContext
): SyntaxNode | undefined => {
  switch (node.kind) {
    case "classDeclaration":
    case "structDeclaration":
    case "interfaceDeclaration":
      return rewriteClassLike(node, ctx);
    case "enumDeclaration":
      return rewriteEnum(node, ctx);
    case "baseList":
      return rewriteBaseList(node, ctx);
    case "aliasQualifiedName":
      return node.alias.identifier.text === "global"
        ? visitAs(
            withSimpleNameLeading(node.name, node.alias.identifier.leadingTrivia),
            isSimpleName,
            ctx
          )
        : visitChildren(node, ctx);
    case "constructorDeclaration":
      return rewriteConstructor(node, ctx);
    case "methodDeclaration":
      return rewriteMethod(node, ctx);
    case "propertyDeclaration":
      return rewriteProperty(node, ctx);
    case "indexerDeclaration":
      return rewriteIndexer(node, ctx);
    case "accessorDeclaration":
      return rewriteAccessor(node, ctx);
    default:
      return visitChildren(node, ctx);
  }
};

/**
 * Rewrite a normalized namespace or type declaration into canonical form.
 */
export function rewriteDeclaration(node: NamespaceDeclaration): NamespaceDeclaration;
export function rewriteDeclaration(node: TypeDeclarationSyntax): TypeDeclarationSyntax;
export function rewriteDeclaration(
  node: NamespaceDeclaration | TypeDeclarationSyntax
): NamespaceDeclaration | TypeDeclarationSyntax {
  return node.kind === "namespaceDeclaration"
    ? visitAs(node, isKind("namespaceDeclaration"), rootContext)
    : visitAs(node, isTypeDeclarationSyntax, rootContext);
}
