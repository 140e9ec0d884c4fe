/**
 * Diagnostic types for genapi
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Module reading errors (GEN1001-GEN1008)
  | "GEN1001" // Module file not found
  | "GEN1002" // Failed to read module file
  | "GEN1003" // Invalid JSON in module file
  | "GEN1004" // Module file must be an object
  | "GEN1005" // Missing or invalid field
  | "GEN1006" // Invalid type reference
  | "GEN1007" // Invalid identity (version or public key token)
  | "GEN1008" // Two module files claim the same identity
  // Resolution notices (GEN2001-GEN2003)
  | "GEN2001" // Version mismatch
  | "GEN2002" // PublicKeyToken mismatch
  | "GEN2003" // Unresolved module identity
  // Invocation errors (GEN3001-GEN3002)
  | "GEN3001" // Invalid module identity display string
  | "GEN3002"; // No modules found

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** Module file the diagnostic refers to */
  readonly file?: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  file?: string,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  file,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.file) {
    parts.push(`${diagnostic.file}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
