/**
 * Trivia edits on the first or last token of a node.
 */

import type {
  BaseList,
  NameSyntax,
  SeparatedList,
  SimpleName,
  TypeParameterConstraint,
  TypeParameterConstraintClause,
  TypeSyntax,
} from "./types.js";
import { withLeading, withTrailing } from "./factory.js";

export const NEWLINE = "\n";

export const indentation = (depth: number): string => "    ".repeat(depth);

/**
 * Replace the last item of a separated list.
 */
export const withLastItem = <T>(
  list: SeparatedList<T>,
  update: (item: T) => T
): SeparatedList<T> => {
  const last = list.items.at(-1);
  if (last === undefined) {
    return list;
  }
  return {
    items: [...list.items.slice(0, -1), update(last)],
    separators: list.separators,
  };
};

// ============================================================
// Names and types
// ============================================================

export const withSimpleNameLeading = (
  name: SimpleName,
  trivia: string
): SimpleName => ({ ...name, identifier: withLeading(name.identifier, trivia) });

export const withSimpleNameTrailing = (
  name: SimpleName,
  trivia: string
): SimpleName => {
  switch (name.kind) {
    case "identifierName":
      return { ...name, identifier: withTrailing(name.identifier, trivia) };
    case "genericName":
      return {
        ...name,
        typeArgumentList: {
          ...name.typeArgumentList,
          greaterThan: withTrailing(name.typeArgumentList.greaterThan, trivia),
        },
      };
  }
};

export const withNameLeading = (
  name: NameSyntax,
  trivia: string
): NameSyntax => {
  switch (name.kind) {
    case "identifierName":
    case "genericName":
      return withSimpleNameLeading(name, trivia);
    case "aliasQualifiedName":
      return {
        ...name,
        alias: {
          ...name.alias,
          identifier: withLeading(name.alias.identifier, trivia),
        },
      };
    case "qualifiedName":
      return { ...name, left: withNameLeading(name.left, trivia) };
  }
};

export const withNameTrailing = (
  name: NameSyntax,
  trivia: string
): NameSyntax => {
  switch (name.kind) {
    case "identifierName":
    case "genericName":
      return withSimpleNameTrailing(name, trivia);
    case "aliasQualifiedName":
      return { ...name, name: withSimpleNameTrailing(name.name, trivia) };
    case "qualifiedName":
      return { ...name, right: withSimpleNameTrailing(name.right, trivia) };
  }
};

export const withTypeLeading = (
  type: TypeSyntax,
  trivia: string
): TypeSyntax => {
  switch (type.kind) {
    case "identifierName":
    case "genericName":
    case "aliasQualifiedName":
    case "qualifiedName":
      return withNameLeading(type, trivia);
    case "predefinedType":
      return { ...type, keyword: withLeading(type.keyword, trivia) };
    case "nullableType":
    case "arrayType":
    case "pointerType":
      return { ...type, elementType: withTypeLeading(type.elementType, trivia) };
  }
};

export const withTypeTrailing = (
  type: TypeSyntax,
  trivia: string
): TypeSyntax => {
  switch (type.kind) {
    case "identifierName":
    case "genericName":
    case "aliasQualifiedName":
    case "qualifiedName":
      return withNameTrailing(type, trivia);
    case "predefinedType":
      return { ...type, keyword: withTrailing(type.keyword, trivia) };
    case "nullableType":
      return { ...type, questionToken: withTrailing(type.questionToken, trivia) };
    case "arrayType": {
      const last = type.rankSpecifiers.at(-1);
      if (last === undefined) {
        return { ...type, elementType: withTypeTrailing(type.elementType, trivia) };
      }
      return {
        ...type,
        rankSpecifiers: [
          ...type.rankSpecifiers.slice(0, -1),
          { ...last, closeBracket: withTrailing(last.closeBracket, trivia) },
        ],
      };
    }
    case "pointerType":
      return { ...type, asterisk: withTrailing(type.asterisk, trivia) };
  }
};

// ============================================================
// Constraints and base lists
// ============================================================

export const withConstraintTrailing = (
  constraint: TypeParameterConstraint,
  trivia: string
): TypeParameterConstraint => {
  switch (constraint.kind) {
    case "keywordConstraint":
      return { ...constraint, keyword: withTrailing(constraint.keyword, trivia) };
    case "constructorConstraint":
      return {
        ...constraint,
        closeParen: withTrailing(constraint.closeParen, trivia),
      };
    case "typeConstraint":
      return { ...constraint, type: withTypeTrailing(constraint.type, trivia) };
  }
};

export const withClauseTrailing = (
  clause: TypeParameterConstraintClause,
  trivia: string
): TypeParameterConstraintClause => ({
  ...clause,
  constraints: withLastItem(clause.constraints, (c) =>
    withConstraintTrailing(c, trivia)
  ),
});

export const withClausesTrailing = (
  clauses: readonly TypeParameterConstraintClause[],
  trivia: string
): readonly TypeParameterConstraintClause[] => {
  const last = clauses.at(-1);
  return last === undefined
    ? clauses
    : [...clauses.slice(0, -1), withClauseTrailing(last, trivia)];
};

export const withBaseListTrailing = (
  baseList: BaseList,
  trivia: string
): BaseList => ({
  ...baseList,
  types: withLastItem(baseList.types, (entry) => ({
    ...entry,
    type: withTypeTrailing(entry.type, trivia),
  })),
});
