/**
 * Module symbol model
 *
 * Typed view of a compiled .NET module: its identity, the identities it
 * references, and its namespace/type/member tables. Produced by a
 * ModuleReader and never mutated afterwards.
 */

// ============================================================
// Identity
// ============================================================

/** Four-part module version: major.minor.build.revision */
export type ModuleVersion = readonly [number, number, number, number];

export type ModuleIdentity = {
  readonly name: string;
  readonly version: ModuleVersion;
  /** Strong-name public key token bytes; absent for unsigned modules */
  readonly publicKeyToken?: Uint8Array;
};

// ============================================================
// Type references
// ============================================================

export type NamedTypeReference = {
  readonly kind: "named";
  /**
   * Dotted full name; nested types use "+" ("Outer+Inner").
   * A name without separators may denote a type parameter in scope.
   */
  readonly name: string;
  readonly typeArguments: readonly TypeReference[];
};

export type ArrayTypeReference = {
  readonly kind: "array";
  readonly elementType: TypeReference;
  /** 1 for T[], 2 for T[,] */
  readonly rank: number;
};

export type NullableTypeReference = {
  readonly kind: "nullable";
  readonly underlyingType: TypeReference;
};

export type PointerTypeReference = {
  readonly kind: "pointer";
  readonly elementType: TypeReference;
};

export type TypeReference =
  | NamedTypeReference
  | ArrayTypeReference
  | NullableTypeReference
  | PointerTypeReference;

// ============================================================
// Members
// ============================================================

export type Accessibility =
  | "public"
  | "protected"
  | "protectedInternal"
  | "internal"
  | "privateProtected"
  | "private";

export type TypeKind = "class" | "struct" | "interface" | "enum" | "delegate";

/**
 * Literal constant as stored in metadata. Integers outside the safe range
 * are bigint.
 */
export type ConstantValue = string | number | bigint | boolean | null;

export type AttributeArgument =
  | { readonly kind: "constant"; readonly value: ConstantValue }
  | { readonly kind: "typeof"; readonly type: TypeReference };

export type NamedAttributeArgument = {
  readonly name: string;
  readonly value: AttributeArgument;
};

export type AttributeData = {
  readonly type: NamedTypeReference;
  readonly arguments: readonly AttributeArgument[];
  readonly namedArguments: readonly NamedAttributeArgument[];
};

export type ParameterModifier = "ref" | "out" | "in" | "params" | "this";

export type ParameterSymbol = {
  readonly name: string;
  readonly type: TypeReference;
  readonly modifier?: ParameterModifier;
  /** Present when the parameter is optional */
  readonly defaultValue?: { readonly value: ConstantValue };
  readonly attributes: readonly AttributeData[];
};

export type Variance = "in" | "out";

export type TypeParameterConstraint =
  | { readonly kind: "class" }
  | { readonly kind: "struct" }
  | { readonly kind: "unmanaged" }
  | { readonly kind: "notnull" }
  | { readonly kind: "new" }
  | { readonly kind: "type"; readonly type: TypeReference };

export type TypeParameterSymbol = {
  readonly name: string;
  readonly variance?: Variance;
  readonly constraints: readonly TypeParameterConstraint[];
};

export type MemberModifiers = {
  readonly isStatic: boolean;
  readonly isAbstract: boolean;
  readonly isVirtual: boolean;
  readonly isOverride: boolean;
  readonly isSealed: boolean;
};

export type FieldSymbol = {
  readonly name: string;
  readonly type: TypeReference;
  readonly accessibility: Accessibility;
  readonly isStatic: boolean;
  readonly isReadOnly: boolean;
  /** Present for const fields */
  readonly constantValue?: { readonly value: ConstantValue };
  readonly attributes: readonly AttributeData[];
};

export type ConstructorSymbol = {
  readonly accessibility: Accessibility;
  readonly isStatic: boolean;
  readonly parameters: readonly ParameterSymbol[];
  readonly attributes: readonly AttributeData[];
};

export type MethodSymbol = MemberModifiers & {
  readonly name: string;
  /** Absent for void methods */
  readonly returnType?: TypeReference;
  readonly accessibility: Accessibility;
  readonly typeParameters: readonly TypeParameterSymbol[];
  readonly parameters: readonly ParameterSymbol[];
  readonly attributes: readonly AttributeData[];
  readonly returnAttributes: readonly AttributeData[];
};

export type AccessorSymbol = {
  readonly accessibility: Accessibility;
  /** Setter declared as `init` */
  readonly isInit: boolean;
};

export type PropertySymbol = MemberModifiers & {
  readonly name: string;
  readonly type: TypeReference;
  /** Accessibility of the most accessible accessor */
  readonly accessibility: Accessibility;
  /** Non-empty for indexers */
  readonly parameters: readonly ParameterSymbol[];
  readonly getter?: AccessorSymbol;
  readonly setter?: AccessorSymbol;
  readonly attributes: readonly AttributeData[];
};

export type EventSymbol = MemberModifiers & {
  readonly name: string;
  readonly type: TypeReference;
  readonly accessibility: Accessibility;
  readonly attributes: readonly AttributeData[];
};

export type EnumMemberSymbol = {
  readonly name: string;
  readonly value: number | bigint;
};

export type DelegateSignature = {
  readonly returnType?: TypeReference;
  readonly parameters: readonly ParameterSymbol[];
};

export type TypeSymbol = {
  readonly name: string;
  /** Namespace-qualified name; nested types use "+" */
  readonly fullName: string;
  /** Containing namespace ("" for the global namespace) */
  readonly namespace: string;
  readonly kind: TypeKind;
  readonly accessibility: Accessibility;
  readonly isAbstract: boolean;
  readonly isSealed: boolean;
  readonly isStatic: boolean;
  readonly typeParameters: readonly TypeParameterSymbol[];
  readonly baseType?: NamedTypeReference;
  readonly interfaces: readonly NamedTypeReference[];
  readonly attributes: readonly AttributeData[];
  readonly fields: readonly FieldSymbol[];
  readonly constructors: readonly ConstructorSymbol[];
  readonly methods: readonly MethodSymbol[];
  readonly properties: readonly PropertySymbol[];
  readonly events: readonly EventSymbol[];
  readonly enumUnderlyingType?: NamedTypeReference;
  readonly enumMembers: readonly EnumMemberSymbol[];
  readonly invoke?: DelegateSignature;
  readonly nestedTypes: readonly TypeSymbol[];
};

// ============================================================
// Modules
// ============================================================

export type NamespaceSymbol = {
  /** Last segment ("" for the global namespace) */
  readonly name: string;
  readonly fullName: string;
  readonly types: readonly TypeSymbol[];
  readonly namespaces: readonly NamespaceSymbol[];
};

export type ModuleSymbol = {
  readonly identity: ModuleIdentity;
  readonly filePath: string;
  readonly references: readonly ModuleIdentity[];
  readonly globalNamespace: NamespaceSymbol;
};

/**
 * Accessibilities that make a symbol part of the public surface.
 */
export const isVisibleOutsideModule = (accessibility: Accessibility): boolean =>
  accessibility === "public" ||
  accessibility === "protected" ||
  accessibility === "protectedInternal";
