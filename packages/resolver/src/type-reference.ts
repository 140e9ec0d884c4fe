/**
 * Type reference text parsing
 *
 * Metadata documents spell types in display form with full names:
 * `System.Collections.Generic.List<System.String>`, `T[]`, `T[,]`,
 * `System.Int32?`, `System.Byte*`, `Outer+Inner`.
 */

import type { NamedTypeReference, TypeReference } from "./types/module.js";

const namePattern =
  /^[A-Za-z_][A-Za-z0-9_]*(?:[.+][A-Za-z_][A-Za-z0-9_]*)*$/;

const splitTopLevelCommaSeparated = (
  input: string
): readonly string[] | undefined => {
  const items: string[] = [];
  let depth = 0;
  let start = 0;
  for (let index = 0; index < input.length; index++) {
    const ch = input[index];
    if (ch === "<" || ch === "[") {
      depth++;
      continue;
    }
    if (ch === ">" || ch === "]") {
      depth--;
      if (depth < 0) return undefined;
      continue;
    }
    if (ch === "," && depth === 0) {
      const part = input.slice(start, index).trim();
      if (!part) return undefined;
      items.push(part);
      start = index + 1;
    }
  }
  if (depth !== 0) return undefined;
  const tail = input.slice(start).trim();
  if (!tail) return undefined;
  items.push(tail);
  return items;
};

const parseArray = (text: string): TypeReference | undefined => {
  const match = text.match(/^(.*)\[(,*)\]$/);
  if (!match) return undefined;
  const base = match[1]?.trim();
  if (!base) return undefined;
  const elementType = parseTypeReference(base);
  if (!elementType) return undefined;
  return {
    kind: "array",
    elementType,
    rank: (match[2] ?? "").length + 1,
  };
};

const parseGeneric = (text: string): NamedTypeReference | undefined => {
  const lt = text.indexOf("<");
  if (lt <= 0 || !text.endsWith(">")) return undefined;
  const name = text.slice(0, lt).trim();
  const argsText = text.slice(lt + 1, -1).trim();
  if (!namePattern.test(name) || !argsText) return undefined;
  const args = splitTopLevelCommaSeparated(argsText);
  if (!args) return undefined;

  const typeArguments: TypeReference[] = [];
  for (const arg of args) {
    const parsed = parseTypeReference(arg);
    if (!parsed) return undefined;
    typeArguments.push(parsed);
  }
  return { kind: "named", name, typeArguments };
};

/**
 * Parse a display-form type string. Returns undefined for malformed text.
 */
export const parseTypeReference = (text: string): TypeReference | undefined => {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  if (trimmed.endsWith("?")) {
    const underlying = parseTypeReference(trimmed.slice(0, -1));
    return underlying
      ? { kind: "nullable", underlyingType: underlying }
      : undefined;
  }

  if (trimmed.endsWith("*")) {
    const element = parseTypeReference(trimmed.slice(0, -1));
    return element ? { kind: "pointer", elementType: element } : undefined;
  }

  if (trimmed.endsWith("]")) {
    return parseArray(trimmed);
  }

  return parseNamedTypeReference(trimmed);
};

/**
 * Parse a type string that must denote a named type (base types,
 * interfaces, attribute classes).
 */
export const parseNamedTypeReference = (
  text: string
): NamedTypeReference | undefined => {
  const trimmed = text.trim();
  if (trimmed.endsWith(">")) {
    return parseGeneric(trimmed);
  }
  return namePattern.test(trimmed)
    ? { kind: "named", name: trimmed, typeArguments: [] }
    : undefined;
};

/**
 * Display form of a reference, the inverse of parseTypeReference.
 */
export const formatTypeReference = (type: TypeReference): string => {
  switch (type.kind) {
    case "named":
      return type.typeArguments.length === 0
        ? type.name
        : `${type.name}<${type.typeArguments.map(formatTypeReference).join(", ")}>`;
    case "array":
      return `${formatTypeReference(type.elementType)}[${",".repeat(type.rank - 1)}]`;
    case "nullable":
      return `${formatTypeReference(type.underlyingType)}?`;
    case "pointer":
      return `${formatTypeReference(type.elementType)}*`;
  }
};
