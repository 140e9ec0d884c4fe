/**
 * Symbol universe - the append-only store of bound modules.
 *
 * Modules are keyed by file name (not full path): the first file bound under
 * a name wins and later binds of the same name are no-ops. A bound module is
 * never replaced or removed.
 */

import * as path from "node:path";
import type { Result } from "./types/result.js";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import type { ModuleSymbol, NamespaceSymbol, TypeSymbol } from "./types/module.js";
import { formatIdentity, versionsEqual } from "./identity.js";

/**
 * A module file bound into the universe. `module` is absent when the file
 * could not be read or claims an identity that is already bound.
 */
export type LoadedModule = {
  readonly fileName: string;
  readonly filePath: string;
  readonly module?: ModuleSymbol;
};

/**
 * Resolves cross-module type references over every bound module.
 */
export type TypeHost = {
  readonly findType: (fullName: string) => TypeSymbol | undefined;
};

export class SymbolUniverse {
  private readonly loaded: LoadedModule[] = [];
  private readonly byFileName = new Map<string, LoadedModule>();
  private readonly byModuleName = new Map<string, ModuleSymbol[]>();
  private readonly typesByFullName = new Map<string, TypeSymbol>();
  private readonly collected: Diagnostic[] = [];

  readonly host: TypeHost = {
    findType: (fullName) => this.typesByFullName.get(fullName),
  };

  /**
   * Modules in bind order
   */
  get modules(): readonly LoadedModule[] {
    return this.loaded;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.collected;
  }

  findByFileName(fileName: string): LoadedModule | undefined {
    return this.byFileName.get(fileName);
  }

  /**
   * Readable modules bound under a module name, in bind order
   */
  modulesNamed(name: string): readonly ModuleSymbol[] {
    return this.byModuleName.get(name) ?? [];
  }

  /**
   * The single insertion point. `read` runs only when no module with the
   * same file name is bound yet.
   */
  bind(
    filePath: string,
    read: (filePath: string) => Result<ModuleSymbol, Diagnostic[]>
  ): LoadedModule {
    const fileName = path.basename(filePath);
    const existing = this.byFileName.get(fileName);
    if (existing) {
      return existing;
    }

    const result = read(filePath);
    const loaded = result.ok
      ? this.admit(fileName, filePath, result.value)
      : this.reject(fileName, filePath, result.error);

    this.loaded.push(loaded);
    this.byFileName.set(fileName, loaded);
    return loaded;
  }

  private reject(
    fileName: string,
    filePath: string,
    diagnostics: readonly Diagnostic[]
  ): LoadedModule {
    this.collected.push(...diagnostics);
    return { fileName, filePath };
  }

  private admit(
    fileName: string,
    filePath: string,
    module: ModuleSymbol
  ): LoadedModule {
    const sameName = this.byModuleName.get(module.identity.name) ?? [];
    const clash = sameName.find((other) =>
      versionsEqual(other.identity.version, module.identity.version)
    );
    if (clash) {
      return this.reject(fileName, filePath, [
        createDiagnostic(
          "GEN1008",
          "error",
          `Module '${formatIdentity(module.identity)}' is already bound from ${clash.filePath}`,
          filePath
        ),
      ]);
    }

    this.byModuleName.set(module.identity.name, [...sameName, module]);
    this.indexNamespace(module.globalNamespace);
    return { fileName, filePath, module };
  }

  private indexNamespace(namespace: NamespaceSymbol): void {
    namespace.types.forEach((type) => this.indexType(type));
    namespace.namespaces.forEach((child) => this.indexNamespace(child));
  }

  private indexType(type: TypeSymbol): void {
    if (!this.typesByFullName.has(type.fullName)) {
      this.typesByFullName.set(type.fullName, type);
    }
    type.nestedTypes.forEach((nested) => this.indexType(nested));
  }
}

export const createSymbolUniverse = (): SymbolUniverse => new SymbolUniverse();
