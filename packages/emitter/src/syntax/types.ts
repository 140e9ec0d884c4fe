/**
 * Declaration syntax tree
 *
 * Kind-tagged nodes for C# declaration source. Every token carries its own
 * leading and trailing trivia (whitespace and line breaks only), so printing
 * is a plain concatenation and layout is decided entirely by the trivia.
 *
 * Pipeline: TypeSymbol -> draft tree -> normalized -> canonical -> text
 */

// ============================================================
// Tokens
// ============================================================

export type SyntaxToken = {
  readonly text: string;
  readonly leadingTrivia: string;
  readonly trailingTrivia: string;
};

/**
 * Items with the separator tokens between them.
 * INVARIANT: separators.length === max(items.length - 1, 0)
 */
export type SeparatedList<T> = {
  readonly items: readonly T[];
  readonly separators: readonly SyntaxToken[];
};

// ============================================================
// Names and types
// ============================================================

export type IdentifierName = {
  readonly kind: "identifierName";
  readonly identifier: SyntaxToken;
};

export type GenericName = {
  readonly kind: "genericName";
  readonly identifier: SyntaxToken;
  readonly typeArgumentList: TypeArgumentList;
};

export type TypeArgumentList = {
  readonly kind: "typeArgumentList";
  readonly lessThan: SyntaxToken;
  readonly arguments: SeparatedList<TypeSyntax>;
  readonly greaterThan: SyntaxToken;
};

/** `global::Name` */
export type AliasQualifiedName = {
  readonly kind: "aliasQualifiedName";
  readonly alias: IdentifierName;
  readonly colonColon: SyntaxToken;
  readonly name: SimpleName;
};

/** `Left.Right` */
export type QualifiedName = {
  readonly kind: "qualifiedName";
  readonly left: NameSyntax;
  readonly dot: SyntaxToken;
  readonly right: SimpleName;
};

/** `int`, `string`, `void`, ... */
export type PredefinedType = {
  readonly kind: "predefinedType";
  readonly keyword: SyntaxToken;
};

export type NullableType = {
  readonly kind: "nullableType";
  readonly elementType: TypeSyntax;
  readonly questionToken: SyntaxToken;
};

/** `[,]`: one comma per extra dimension */
export type ArrayRankSpecifier = {
  readonly kind: "arrayRankSpecifier";
  readonly openBracket: SyntaxToken;
  readonly commas: readonly SyntaxToken[];
  readonly closeBracket: SyntaxToken;
};

export type ArrayType = {
  readonly kind: "arrayType";
  readonly elementType: TypeSyntax;
  readonly rankSpecifiers: readonly ArrayRankSpecifier[];
};

export type PointerType = {
  readonly kind: "pointerType";
  readonly elementType: TypeSyntax;
  readonly asterisk: SyntaxToken;
};

export type SimpleName = IdentifierName | GenericName;

export type NameSyntax = SimpleName | QualifiedName | AliasQualifiedName;

export type TypeSyntax =
  | NameSyntax
  | PredefinedType
  | NullableType
  | ArrayType
  | PointerType;

// ============================================================
// Expressions and statements
// ============================================================

export type LiteralExpression = {
  readonly kind: "literalExpression";
  /** "null", "true", "42", `"text"` */
  readonly token: SyntaxToken;
};

export type TypeOfExpression = {
  readonly kind: "typeOfExpression";
  readonly keyword: SyntaxToken;
  readonly openParen: SyntaxToken;
  readonly type: TypeSyntax;
  readonly closeParen: SyntaxToken;
};

export type ThrowExpression = {
  readonly kind: "throwExpression";
  readonly throwKeyword: SyntaxToken;
  readonly expression: ExpressionSyntax;
};

export type ExpressionSyntax =
  | LiteralExpression
  | TypeOfExpression
  | ThrowExpression;

export type Block = {
  readonly kind: "block";
  readonly openBrace: SyntaxToken;
  readonly statements: readonly StatementSyntax[];
  readonly closeBrace: SyntaxToken;
};

export type ThrowStatement = {
  readonly kind: "throwStatement";
  readonly throwKeyword: SyntaxToken;
  readonly expression?: ExpressionSyntax;
  readonly semicolon: SyntaxToken;
};

export type ReturnStatement = {
  readonly kind: "returnStatement";
  readonly returnKeyword: SyntaxToken;
  readonly expression?: ExpressionSyntax;
  readonly semicolon: SyntaxToken;
};

export type StatementSyntax = Block | ThrowStatement | ReturnStatement;

/** `=> expression` */
export type ArrowExpressionClause = {
  readonly kind: "arrowExpressionClause";
  readonly arrow: SyntaxToken;
  readonly expression: ExpressionSyntax;
};

/** `= value` */
export type EqualsValueClause = {
  readonly kind: "equalsValueClause";
  readonly equals: SyntaxToken;
  readonly value: ExpressionSyntax;
};

// ============================================================
// Attributes
// ============================================================

export type AttributeList = {
  readonly kind: "attributeList";
  readonly openBracket: SyntaxToken;
  readonly target?: AttributeTargetSpecifier;
  readonly attributes: SeparatedList<Attribute>;
  readonly closeBracket: SyntaxToken;
};

/** `return:` */
export type AttributeTargetSpecifier = {
  readonly kind: "attributeTargetSpecifier";
  readonly identifier: SyntaxToken;
  readonly colon: SyntaxToken;
};

export type Attribute = {
  readonly kind: "attribute";
  readonly name: NameSyntax;
  readonly argumentList?: AttributeArgumentList;
};

export type AttributeArgumentList = {
  readonly kind: "attributeArgumentList";
  readonly openParen: SyntaxToken;
  readonly arguments: SeparatedList<AttributeArgument>;
  readonly closeParen: SyntaxToken;
};

export type AttributeArgument = {
  readonly kind: "attributeArgument";
  readonly nameEquals?: NameEquals;
  readonly expression: ExpressionSyntax;
};

export type NameEquals = {
  readonly kind: "nameEquals";
  readonly name: IdentifierName;
  readonly equals: SyntaxToken;
};

// ============================================================
// Type parameters and constraints
// ============================================================

export type TypeParameterList = {
  readonly kind: "typeParameterList";
  readonly lessThan: SyntaxToken;
  readonly parameters: SeparatedList<TypeParameter>;
  readonly greaterThan: SyntaxToken;
};

export type TypeParameter = {
  readonly kind: "typeParameter";
  readonly varianceKeyword?: SyntaxToken;
  readonly identifier: SyntaxToken;
};

/** `where T : class, new()` */
export type TypeParameterConstraintClause = {
  readonly kind: "typeParameterConstraintClause";
  readonly whereKeyword: SyntaxToken;
  readonly name: IdentifierName;
  readonly colon: SyntaxToken;
  readonly constraints: SeparatedList<TypeParameterConstraint>;
};

/** `class`, `struct`, `unmanaged`, `notnull` */
export type KeywordConstraint = {
  readonly kind: "keywordConstraint";
  readonly keyword: SyntaxToken;
};

/** `new()` */
export type ConstructorConstraint = {
  readonly kind: "constructorConstraint";
  readonly newKeyword: SyntaxToken;
  readonly openParen: SyntaxToken;
  readonly closeParen: SyntaxToken;
};

export type TypeConstraint = {
  readonly kind: "typeConstraint";
  readonly type: TypeSyntax;
};

export type TypeParameterConstraint =
  | KeywordConstraint
  | ConstructorConstraint
  | TypeConstraint;

// ============================================================
// Base lists and parameters
// ============================================================

export type BaseList = {
  readonly kind: "baseList";
  readonly colon: SyntaxToken;
  readonly types: SeparatedList<SimpleBaseType>;
};

export type SimpleBaseType = {
  readonly kind: "simpleBaseType";
  readonly type: TypeSyntax;
};

export type Parameter = {
  readonly kind: "parameter";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly type: TypeSyntax;
  readonly identifier: SyntaxToken;
  readonly defaultValue?: EqualsValueClause;
};

export type ParameterList = {
  readonly kind: "parameterList";
  readonly openParen: SyntaxToken;
  readonly parameters: SeparatedList<Parameter>;
  readonly closeParen: SyntaxToken;
};

/** Indexer parameters: `[int index]` */
export type BracketedParameterList = {
  readonly kind: "bracketedParameterList";
  readonly openBracket: SyntaxToken;
  readonly parameters: SeparatedList<Parameter>;
  readonly closeBracket: SyntaxToken;
};

// ============================================================
// Members
// ============================================================

export type VariableDeclarator = {
  readonly kind: "variableDeclarator";
  readonly identifier: SyntaxToken;
  readonly initializer?: EqualsValueClause;
};

export type FieldDeclaration = {
  readonly kind: "fieldDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly type: TypeSyntax;
  readonly variables: SeparatedList<VariableDeclarator>;
  readonly semicolon: SyntaxToken;
};

export type EventFieldDeclaration = {
  readonly kind: "eventFieldDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly eventKeyword: SyntaxToken;
  readonly type: TypeSyntax;
  readonly variables: SeparatedList<VariableDeclarator>;
  readonly semicolon: SyntaxToken;
};

/**
 * Members with a body take one of three forms: a block body, an
 * expression body followed by a semicolon, or a lone semicolon.
 */
type BodyForms = {
  readonly body?: Block;
  readonly expressionBody?: ArrowExpressionClause;
  readonly semicolon?: SyntaxToken;
};

export type ConstructorDeclaration = BodyForms & {
  readonly kind: "constructorDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly identifier: SyntaxToken;
  readonly parameterList: ParameterList;
};

export type MethodDeclaration = BodyForms & {
  readonly kind: "methodDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly returnType: TypeSyntax;
  readonly identifier: SyntaxToken;
  readonly typeParameterList?: TypeParameterList;
  readonly parameterList: ParameterList;
  readonly constraintClauses: readonly TypeParameterConstraintClause[];
};

export type AccessorDeclaration = BodyForms & {
  readonly kind: "accessorDeclaration";
  readonly modifiers: readonly SyntaxToken[];
  /** `get`, `set`, `init`, `add`, `remove` */
  readonly keyword: SyntaxToken;
};

export type AccessorList = {
  readonly kind: "accessorList";
  readonly openBrace: SyntaxToken;
  readonly accessors: readonly AccessorDeclaration[];
  readonly closeBrace: SyntaxToken;
};

export type PropertyDeclaration = {
  readonly kind: "propertyDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly type: TypeSyntax;
  readonly identifier: SyntaxToken;
  readonly accessorList?: AccessorList;
  readonly expressionBody?: ArrowExpressionClause;
  readonly semicolon?: SyntaxToken;
};

export type IndexerDeclaration = {
  readonly kind: "indexerDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly type: TypeSyntax;
  readonly thisKeyword: SyntaxToken;
  readonly parameterList: BracketedParameterList;
  readonly accessorList?: AccessorList;
  readonly expressionBody?: ArrowExpressionClause;
  readonly semicolon?: SyntaxToken;
};

export type EnumMemberDeclaration = {
  readonly kind: "enumMemberDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly identifier: SyntaxToken;
  readonly equalsValue?: EqualsValueClause;
};

export type DelegateDeclaration = {
  readonly kind: "delegateDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly delegateKeyword: SyntaxToken;
  readonly returnType: TypeSyntax;
  readonly identifier: SyntaxToken;
  readonly typeParameterList?: TypeParameterList;
  readonly parameterList: ParameterList;
  readonly constraintClauses: readonly TypeParameterConstraintClause[];
  readonly semicolon: SyntaxToken;
};

// ============================================================
// Type and namespace declarations
// ============================================================

/**
 * Shared shape of class, struct and interface declarations
 */
type TypeDeclarationOf<K extends string> = {
  readonly kind: K;
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  /** `class`, `struct`, `interface` */
  readonly keyword: SyntaxToken;
  readonly identifier: SyntaxToken;
  readonly typeParameterList?: TypeParameterList;
  readonly baseList?: BaseList;
  readonly constraintClauses: readonly TypeParameterConstraintClause[];
  readonly openBrace: SyntaxToken;
  readonly members: readonly MemberDeclarationSyntax[];
  readonly closeBrace: SyntaxToken;
};

export type ClassDeclaration = TypeDeclarationOf<"classDeclaration">;
export type StructDeclaration = TypeDeclarationOf<"structDeclaration">;
export type InterfaceDeclaration = TypeDeclarationOf<"interfaceDeclaration">;

export type ClassLikeDeclaration =
  | ClassDeclaration
  | StructDeclaration
  | InterfaceDeclaration;

export type EnumDeclaration = {
  readonly kind: "enumDeclaration";
  readonly attributeLists: readonly AttributeList[];
  readonly modifiers: readonly SyntaxToken[];
  readonly enumKeyword: SyntaxToken;
  readonly identifier: SyntaxToken;
  readonly baseList?: BaseList;
  readonly openBrace: SyntaxToken;
  readonly members: SeparatedList<EnumMemberDeclaration>;
  readonly closeBrace: SyntaxToken;
};

export type TypeDeclarationSyntax =
  | ClassLikeDeclaration
  | EnumDeclaration
  | DelegateDeclaration;

export type MemberDeclarationSyntax =
  | FieldDeclaration
  | EventFieldDeclaration
  | ConstructorDeclaration
  | MethodDeclaration
  | PropertyDeclaration
  | IndexerDeclaration
  | TypeDeclarationSyntax;

export type NamespaceDeclaration = {
  readonly kind: "namespaceDeclaration";
  readonly namespaceKeyword: SyntaxToken;
  readonly name: NameSyntax;
  readonly openBrace: SyntaxToken;
  readonly members: readonly TypeDeclarationSyntax[];
  readonly closeBrace: SyntaxToken;
};

// ============================================================
// Node universe
// ============================================================

export type SyntaxNode =
  | TypeSyntax
  | TypeArgumentList
  | ArrayRankSpecifier
  | ExpressionSyntax
  | StatementSyntax
  | ArrowExpressionClause
  | EqualsValueClause
  | AttributeList
  | AttributeTargetSpecifier
  | Attribute
  | AttributeArgumentList
  | AttributeArgument
  | NameEquals
  | TypeParameterList
  | TypeParameter
  | TypeParameterConstraintClause
  | TypeParameterConstraint
  | BaseList
  | SimpleBaseType
  | Parameter
  | ParameterList
  | BracketedParameterList
  | VariableDeclarator
  | AccessorList
  | AccessorDeclaration
  | EnumMemberDeclaration
  | MemberDeclarationSyntax
  | NamespaceDeclaration;

export type SyntaxKind = SyntaxNode["kind"];

export type NodeMap = { readonly [N in SyntaxNode as N["kind"]]: N };

// ============================================================
// Category guards
// ============================================================

const kindSet = <K extends SyntaxKind>(kinds: readonly K[]): ReadonlySet<SyntaxKind> =>
  new Set<SyntaxKind>(kinds);

const SIMPLE_NAME_KINDS = kindSet(["identifierName", "genericName"]);
const NAME_KINDS = kindSet([
  "identifierName",
  "genericName",
  "qualifiedName",
  "aliasQualifiedName",
]);
const TYPE_KINDS = kindSet([
  "identifierName",
  "genericName",
  "qualifiedName",
  "aliasQualifiedName",
  "predefinedType",
  "nullableType",
  "arrayType",
  "pointerType",
]);
const EXPRESSION_KINDS = kindSet([
  "literalExpression",
  "typeOfExpression",
  "throwExpression",
]);
const STATEMENT_KINDS = kindSet(["block", "throwStatement", "returnStatement"]);
const CONSTRAINT_KINDS = kindSet([
  "keywordConstraint",
  "constructorConstraint",
  "typeConstraint",
]);
const TYPE_DECLARATION_KINDS = kindSet([
  "classDeclaration",
  "structDeclaration",
  "interfaceDeclaration",
  "enumDeclaration",
  "delegateDeclaration",
]);
const MEMBER_KINDS = kindSet([
  "fieldDeclaration",
  "eventFieldDeclaration",
  "constructorDeclaration",
  "methodDeclaration",
  "propertyDeclaration",
  "indexerDeclaration",
  "classDeclaration",
  "structDeclaration",
  "interfaceDeclaration",
  "enumDeclaration",
  "delegateDeclaration",
]);

export const isSimpleName = (node: SyntaxNode): node is SimpleName =>
  SIMPLE_NAME_KINDS.has(node.kind);

export const isNameSyntax = (node: SyntaxNode): node is NameSyntax =>
  NAME_KINDS.has(node.kind);

export const isTypeSyntax = (node: SyntaxNode): node is TypeSyntax =>
  TYPE_KINDS.has(node.kind);

export const isExpressionSyntax = (
  node: SyntaxNode
): node is ExpressionSyntax => EXPRESSION_KINDS.has(node.kind);

export const isStatementSyntax = (node: SyntaxNode): node is StatementSyntax =>
  STATEMENT_KINDS.has(node.kind);

export const isTypeParameterConstraint = (
  node: SyntaxNode
): node is TypeParameterConstraint => CONSTRAINT_KINDS.has(node.kind);

export const isTypeDeclarationSyntax = (
  node: SyntaxNode
): node is TypeDeclarationSyntax => TYPE_DECLARATION_KINDS.has(node.kind);

export const isMemberDeclarationSyntax = (
  node: SyntaxNode
): node is MemberDeclarationSyntax => MEMBER_KINDS.has(node.kind);

export const isKind =
  <K extends SyntaxKind>(kind: K) =>
  (node: SyntaxNode): node is NodeMap[K] =>
    node.kind === kind;
