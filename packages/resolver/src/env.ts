/**
 * Environment variable expansion for search path entries.
 *
 * Accepts `%VAR%`, `${VAR}` and `$VAR`. Unknown variables stay as written.
 */

export type Environment = Readonly<Record<string, string | undefined>>;

const VARIABLE_PATTERN =
  /%([A-Za-z_][A-Za-z0-9_]*)%|\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

export const expandEnvironmentVariables = (
  text: string,
  env: Environment
): string =>
  text.replace(
    VARIABLE_PATTERN,
    (match: string, percent?: string, braced?: string, bare?: string) => {
      const name = percent ?? braced ?? bare;
      const value = name === undefined ? undefined : env[name];
      return value ?? match;
    }
  );
