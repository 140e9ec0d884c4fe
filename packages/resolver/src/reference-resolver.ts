/**
 * Reference resolver - maps module identities onto module files.
 *
 * Probe directories are an explicit ordered list: probing a name tries them
 * in registration order and the first directory holding `<name><extension>`
 * wins. Every file goes through SymbolUniverse.bind, so a file name is bound
 * at most once.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import type { ModuleIdentity, ModuleSymbol } from "./types/module.js";
import type { LoadedModule, SymbolUniverse } from "./symbol-universe.js";
import type { ModuleReader } from "./module-reader.js";
import { matchIdentity, noticeToDiagnostic } from "./identity-matcher.js";
import { formatIdentity } from "./identity.js";
import { expandEnvironmentVariables, type Environment } from "./env.js";

export type ReferenceResolverOptions = {
  /** Receives mismatch and unresolved notices as warnings */
  readonly onNotice?: (notice: Diagnostic) => void;
  /** Variables for search path expansion (default: process.env) */
  readonly env?: Environment;
};

export type UniverseDiagnostics = {
  readonly hasDiagnostics: boolean;
  readonly diagnostics: readonly Diagnostic[];
};

const compareOrdinal = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const statEntry = (entry: string): fs.Stats | undefined =>
  fs.statSync(entry, { throwIfNoEntry: false });

const isFile = (entry: string): boolean => statEntry(entry)?.isFile() ?? false;

/**
 * Split a comma/semicolon-delimited search path, dropping empty entries.
 */
export const splitSearchPath = (paths: string): readonly string[] =>
  paths
    .split(/[,;]/)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");

export class ReferenceResolver {
  private readonly probeDirectories: string[] = [];
  private readonly env: Environment;
  private readonly onNotice: (notice: Diagnostic) => void;

  constructor(
    private readonly universe: SymbolUniverse,
    private readonly reader: ModuleReader,
    options: ReferenceResolverOptions = {}
  ) {
    this.env = options.env ?? process.env;
    this.onNotice = options.onNotice ?? (() => undefined);
  }

  /**
   * Probe directories in registration order
   */
  get searchDirectories(): readonly string[] {
    return this.probeDirectories;
  }

  /**
   * Register directory and file entries. Directories become probe
   * directories and every module file directly inside is bound; a file
   * entry registers its directory and binds the file. Entries that exist as
   * neither are skipped.
   *
   * @returns Modules bound (or already bound) for the entries, in entry order
   */
  registerSearchPath(paths: string): readonly LoadedModule[] {
    const bound: LoadedModule[] = [];

    for (const rawEntry of splitSearchPath(paths)) {
      const entry = path.resolve(expandEnvironmentVariables(rawEntry, this.env));
      const stats = statEntry(entry);

      if (stats?.isDirectory()) {
        this.addProbeDirectory(entry);
        const files = fs
          .readdirSync(entry)
          .filter((name) => name.endsWith(this.reader.extension))
          .sort(compareOrdinal)
          .map((name) => path.join(entry, name))
          .filter(isFile);
        for (const file of files) {
          bound.push(this.bindIfAbsent(file));
        }
      } else if (stats?.isFile()) {
        this.addProbeDirectory(path.dirname(entry));
        bound.push(this.bindIfAbsent(entry));
      }
    }

    return bound;
  }

  /**
   * Bind a module file unless a file with the same name is already bound.
   */
  bindIfAbsent(filePath: string): LoadedModule {
    return this.universe.bind(filePath, this.reader.readModule);
  }

  /**
   * Resolve identities against the probe directories.
   *
   * @returns Resolved modules in the order of `identities`; unresolved
   * identities are omitted and reported as notices
   */
  resolve(identities: readonly ModuleIdentity[]): readonly ModuleSymbol[] {
    const resolved: ModuleSymbol[] = [];
    for (const identity of identities) {
      const module = this.resolveOne(identity);
      if (module) {
        resolved.push(module);
      }
    }
    return resolved;
  }

  /**
   * Register entries like registerSearchPath and return the modules they
   * name, each once.
   */
  loadModules(paths: string): readonly ModuleSymbol[] {
    const modules: ModuleSymbol[] = [];
    for (const loaded of this.registerSearchPath(paths)) {
      if (loaded.module && !modules.includes(loaded.module)) {
        modules.push(loaded.module);
      }
    }
    return modules;
  }

  /**
   * Diagnostics accumulated over the whole universe
   */
  hasDiagnostics(): UniverseDiagnostics {
    const diagnostics = this.universe.diagnostics;
    return { hasDiagnostics: diagnostics.length > 0, diagnostics };
  }

  private resolveOne(identity: ModuleIdentity): ModuleSymbol | undefined {
    const fileName = `${identity.name}${this.reader.extension}`;

    for (const directory of this.probeDirectories) {
      const candidate = path.join(directory, fileName);
      if (!isFile(candidate)) {
        continue;
      }
      this.bindIfAbsent(candidate);
      const module = this.classify(identity);
      if (module) {
        return module;
      }
    }

    // Bound earlier under a different file name
    const module = this.classify(identity);
    if (module) {
      return module;
    }

    this.onNotice(
      createDiagnostic(
        "GEN2003",
        "warning",
        `Could not resolve module '${formatIdentity(identity)}'.`,
        undefined,
        "Add the directory that contains it to the references"
      )
    );
    return undefined;
  }

  private classify(identity: ModuleIdentity): ModuleSymbol | undefined {
    const match = matchIdentity(
      identity,
      this.universe.modulesNamed(identity.name)
    );
    if (match.kind === "unresolved") {
      return undefined;
    }
    match.notices.map(noticeToDiagnostic).forEach(this.onNotice);
    return match.module;
  }

  private addProbeDirectory(directory: string): void {
    if (!this.probeDirectories.includes(directory)) {
      this.probeDirectories.push(directory);
    }
  }
}

export const createReferenceResolver = (
  universe: SymbolUniverse,
  reader: ModuleReader,
  options?: ReferenceResolverOptions
): ReferenceResolver => new ReferenceResolver(universe, reader, options);
