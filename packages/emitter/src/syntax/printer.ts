/**
 * Declaration tree printer
 *
 * Serializes a tree by concatenating its tokens in source order, each with
 * its leading and trailing trivia. Pure and stateless: all layout lives in
 * the trivia.
 */

import type {
  SeparatedList,
  SyntaxNode,
  SyntaxToken,
} from "./types.js";

type TokenSink = (token: SyntaxToken) => void;

const optional = (node: SyntaxNode | undefined, emit: TokenSink): void => {
  if (node !== undefined) {
    visitTokens(node, emit);
  }
};

const optionalToken = (token: SyntaxToken | undefined, emit: TokenSink): void => {
  if (token !== undefined) {
    emit(token);
  }
};

const nodes = (list: readonly SyntaxNode[], emit: TokenSink): void => {
  for (const node of list) {
    visitTokens(node, emit);
  }
};

const separated = <T extends SyntaxNode>(
  list: SeparatedList<T>,
  emit: TokenSink
): void => {
  list.items.forEach((item, index) => {
    visitTokens(item, emit);
    optionalToken(list.separators[index], emit);
  });
};

/**
 * Emit every token of a node in source order.
 */
export const visitTokens = (node: SyntaxNode, emit: TokenSink): void => {
  switch (node.kind) {
    case "identifierName":
      emit(node.identifier);
      return;
    case "genericName":
      emit(node.identifier);
      visitTokens(node.typeArgumentList, emit);
      return;
    case "typeArgumentList":
      emit(node.lessThan);
      separated(node.arguments, emit);
      emit(node.greaterThan);
      return;
    case "aliasQualifiedName":
      visitTokens(node.alias, emit);
      emit(node.colonColon);
      visitTokens(node.name, emit);
      return;
    case "qualifiedName":
      visitTokens(node.left, emit);
      emit(node.dot);
      visitTokens(node.right, emit);
      return;
    case "predefinedType":
      emit(node.keyword);
      return;
    case "nullableType":
      visitTokens(node.elementType, emit);
      emit(node.questionToken);
      return;
    case "arrayRankSpecifier":
      emit(node.openBracket);
      node.commas.forEach(emit);
      emit(node.closeBracket);
      return;
    case "arrayType":
      visitTokens(node.elementType, emit);
      nodes(node.rankSpecifiers, emit);
      return;
    case "pointerType":
      visitTokens(node.elementType, emit);
      emit(node.asterisk);
      return;

    case "literalExpression":
      emit(node.token);
      return;
    case "typeOfExpression":
      emit(node.keyword);
      emit(node.openParen);
      visitTokens(node.type, emit);
      emit(node.closeParen);
      return;
    case "throwExpression":
      emit(node.throwKeyword);
      visitTokens(node.expression, emit);
      return;

    case "block":
      emit(node.openBrace);
      nodes(node.statements, emit);
      emit(node.closeBrace);
      return;
    case "throwStatement":
      emit(node.throwKeyword);
      optional(node.expression, emit);
      emit(node.semicolon);
      return;
    case "returnStatement":
      emit(node.returnKeyword);
      optional(node.expression, emit);
      emit(node.semicolon);
      return;
    case "arrowExpressionClause":
      emit(node.arrow);
      visitTokens(node.expression, emit);
      return;
    case "equalsValueClause":
      emit(node.equals);
      visitTokens(node.value, emit);
      return;

    case "attributeList":
      emit(node.openBracket);
      optional(node.target, emit);
      separated(node.attributes, emit);
      emit(node.closeBracket);
      return;
    case "attributeTargetSpecifier":
      emit(node.identifier);
      emit(node.colon);
      return;
    case "attribute":
      visitTokens(node.name, emit);
      optional(node.argumentList, emit);
      return;
    case "attributeArgumentList":
      emit(node.openParen);
      separated(node.arguments, emit);
      emit(node.closeParen);
      return;
    case "attributeArgument":
      optional(node.nameEquals, emit);
      visitTokens(node.expression, emit);
      return;
    case "nameEquals":
      visitTokens(node.name, emit);
      emit(node.equals);
      return;

    case "typeParameterList":
      emit(node.lessThan);
      separated(node.parameters, emit);
      emit(node.greaterThan);
      return;
    case "typeParameter":
      optionalToken(node.varianceKeyword, emit);
      emit(node.identifier);
      return;
    case "typeParameterConstraintClause":
      emit(node.whereKeyword);
      visitTokens(node.name, emit);
      emit(node.colon);
      separated(node.constraints, emit);
      return;
    case "keywordConstraint":
      emit(node.keyword);
      return;
    case "constructorConstraint":
      emit(node.newKeyword);
      emit(node.openParen);
      emit(node.closeParen);
      return;
    case "typeConstraint":
      visitTokens(node.type, emit);
      return;

    case "baseList":
      emit(node.colon);
      separated(node.types, emit);
      return;
    case "simpleBaseType":
      visitTokens(node.type, emit);
      return;
    case "parameter":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      visitTokens(node.type, emit);
      emit(node.identifier);
      optional(node.defaultValue, emit);
      return;
    case "parameterList":
      emit(node.openParen);
      separated(node.parameters, emit);
      emit(node.closeParen);
      return;
    case "bracketedParameterList":
      emit(node.openBracket);
      separated(node.parameters, emit);
      emit(node.closeBracket);
      return;

    case "variableDeclarator":
      emit(node.identifier);
      optional(node.initializer, emit);
      return;
    case "fieldDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      visitTokens(node.type, emit);
      separated(node.variables, emit);
      emit(node.semicolon);
      return;
    case "eventFieldDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      emit(node.eventKeyword);
      visitTokens(node.type, emit);
      separated(node.variables, emit);
      emit(node.semicolon);
      return;
    case "constructorDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      emit(node.identifier);
      visitTokens(node.parameterList, emit);
      optional(node.body, emit);
      optional(node.expressionBody, emit);
      optionalToken(node.semicolon, emit);
      return;
    case "methodDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      visitTokens(node.returnType, emit);
      emit(node.identifier);
      optional(node.typeParameterList, emit);
      visitTokens(node.parameterList, emit);
      nodes(node.constraintClauses, emit);
      optional(node.body, emit);
      optional(node.expressionBody, emit);
      optionalToken(node.semicolon, emit);
      return;
    case "propertyDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      visitTokens(node.type, emit);
      emit(node.identifier);
      optional(node.accessorList, emit);
      optional(node.expressionBody, emit);
      optionalToken(node.semicolon, emit);
      return;
    case "indexerDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      visitTokens(node.type, emit);
      emit(node.thisKeyword);
      visitTokens(node.parameterList, emit);
      optional(node.accessorList, emit);
      optional(node.expressionBody, emit);
      optionalToken(node.semicolon, emit);
      return;
    case "accessorList":
      emit(node.openBrace);
      nodes(node.accessors, emit);
      emit(node.closeBrace);
      return;
    case "accessorDeclaration":
      node.modifiers.forEach(emit);
      emit(node.keyword);
      optional(node.body, emit);
      optional(node.expressionBody, emit);
      optionalToken(node.semicolon, emit);
      return;
    case "enumMemberDeclaration":
      nodes(node.attributeLists, emit);
      emit(node.identifier);
      optional(node.equalsValue, emit);
      return;
    case "delegateDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      emit(node.delegateKeyword);
      visitTokens(node.returnType, emit);
      emit(node.identifier);
      optional(node.typeParameterList, emit);
      visitTokens(node.parameterList, emit);
      nodes(node.constraintClauses, emit);
      emit(node.semicolon);
      return;

    case "classDeclaration":
    case "structDeclaration":
    case "interfaceDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      emit(node.keyword);
      emit(node.identifier);
      optional(node.typeParameterList, emit);
      optional(node.baseList, emit);
      nodes(node.constraintClauses, emit);
      emit(node.openBrace);
      nodes(node.members, emit);
      emit(node.closeBrace);
      return;
    case "enumDeclaration":
      nodes(node.attributeLists, emit);
      node.modifiers.forEach(emit);
      emit(node.enumKeyword);
      emit(node.identifier);
      optional(node.baseList, emit);
      emit(node.openBrace);
      separated(node.members, emit);
      emit(node.closeBrace);
      return;
    case "namespaceDeclaration":
      emit(node.namespaceKeyword);
      visitTokens(node.name, emit);
      emit(node.openBrace);
      nodes(node.members, emit);
      emit(node.closeBrace);
      return;

    default: {
      const exhaustiveCheck: never = node;
      throw new Error(
        `ICE: Unhandled syntax node kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

export const collectTokens = (node: SyntaxNode): readonly SyntaxToken[] => {
  const tokens: SyntaxToken[] = [];
  visitTokens(node, (token) => tokens.push(token));
  return tokens;
};

export const firstToken = (node: SyntaxNode): SyntaxToken | undefined =>
  collectTokens(node)[0];

export const lastToken = (node: SyntaxNode): SyntaxToken | undefined =>
  collectTokens(node).at(-1);

/**
 * Full text, trivia included
 */
export const printNode = (node: SyntaxNode): string =>
  collectTokens(node)
    .map((t) => `${t.leadingTrivia}${t.text}${t.trailingTrivia}`)
    .join("");

/**
 * Text without the first token's leading and the last token's trailing
 * trivia
 */
export const printNodeText = (node: SyntaxNode): string => {
  const tokens = collectTokens(node);
  return tokens
    .map((t, index) => {
      const leading = index === 0 ? "" : t.leadingTrivia;
      const trailing = index === tokens.length - 1 ? "" : t.trailingTrivia;
      return `${leading}${t.text}${trailing}`;
    })
    .join("");
};
