/**
 * Surface walker
 *
 * Writes the public surface of a module as C# skeleton source: one
 * namespace declaration per namespace that has visible types, depth-first in
 * ordinal name order. Visible types of the global namespace come first, as
 * bare declarations.
 */

import {
  isVisibleOutsideModule,
  type ModuleSymbol,
  type NamespaceSymbol,
  type TypeSymbol,
} from "@genapi/resolver";
import type { NamespaceDeclaration, TypeDeclarationSyntax } from "./syntax/types.js";
import { qualifiedName, token, withTrailing } from "./syntax/factory.js";
import { normalizeWhitespace } from "./syntax/normalize.js";
import { printNode } from "./syntax/printer.js";
import { NEWLINE } from "./syntax/trivia.js";
import { rewriteDeclaration } from "./rewriter.js";
import type { DeclarationSynthesizer } from "./synthesizer.js";
import { escapeIdentifier } from "./type-syntax.js";

export type TextSink = {
  readonly write: (text: string) => void;
};

export type SourceWriterOptions = {
  readonly synthesize: DeclarationSynthesizer;
};

export type SourceWriter = {
  readonly writeModule: (module: ModuleSymbol) => void;
};

const compareOrdinal = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Visible types, by name then arity
 */
export const visibleTypes = (namespace: NamespaceSymbol): readonly TypeSymbol[] =>
  namespace.types
    .filter((type) => isVisibleOutsideModule(type.accessibility))
    .sort(
      (a, b) =>
        compareOrdinal(a.name, b.name) ||
        a.typeParameters.length - b.typeParameters.length
    );

const namespaceDeclaration = (
  fullName: string,
  members: readonly TypeDeclarationSyntax[]
): NamespaceDeclaration => ({
  kind: "namespaceDeclaration",
  namespaceKeyword: token("namespace"),
  name: qualifiedName(fullName.split(".").map(escapeIdentifier).join(".")),
  openBrace: token("{"),
  members,
  closeBrace: token("}"),
});

export const createSourceWriter = (
  sink: TextSink,
  options: SourceWriterOptions
): SourceWriter => {
  const writeGlobalTypes = (namespace: NamespaceSymbol): void => {
    for (const type of visibleTypes(namespace)) {
      const normalized = normalizeWhitespace(options.synthesize(type), 0);
      sink.write(printNode(rewriteDeclaration(normalized)));
    }
  };

  const writeNamespace = (namespace: NamespaceSymbol): void => {
    const types = visibleTypes(namespace);
    if (types.length > 0) {
      const normalized = normalizeWhitespace(
        namespaceDeclaration(namespace.fullName, types.map(options.synthesize)),
        0
      );
      const closed: NamespaceDeclaration = {
        ...normalized,
        closeBrace: withTrailing(normalized.closeBrace, NEWLINE),
      };
      sink.write(printNode(rewriteDeclaration(closed)));
    }
    namespace.namespaces.forEach(writeNamespace);
  };

  return {
    writeModule: (module) => {
      writeGlobalTypes(module.globalNamespace);
      module.globalNamespace.namespaces.forEach(writeNamespace);
    },
  };
};
