/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
genapi - public API skeleton generator for .NET modules v${VERSION}

USAGE:
  genapi <command> [options]

COMMANDS:
  generate <modules> [references] [output]
                            Write the public surface of modules as C# source
  resolve <identity>...     Resolve module identities against references

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: genapi.json)

GENERATE/RESOLVE OPTIONS:
  -r, --references <paths>  Files or directories probed for references,
                            separated by ';' or ','
  -o, --out <file>          Output file (default: standard output)
  -m, --module <identity>   Also resolve this module identity (repeatable)
  --strict                  Fail when any module identity is unresolved

EXIT CODES:
  0  success
  1  failed run
  2  usage error
  3  configuration error

EXAMPLES:
  genapi generate lib/Contoso.Core.metadata.json refs/ -o Contoso.Core.cs
  genapi generate lib -r "refs;$DOTNET_REFS" --strict
  genapi resolve "System.Runtime, Version=8.0.0.0" -r refs
`);
};
