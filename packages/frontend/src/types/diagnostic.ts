/**
 * Diagnostic types for protogate
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Generator configuration (PGW1001-PGW1099)
  | "PGW1001" // Unknown path type
  | "PGW1002" // Module prefix combined with a non-import path type
  | "PGW1003" // Package path does not match module prefix
  // Generation (PGW2001-PGW2099)
  | "PGW2001" // Template rendering failed
  | "PGW2002" // Generated source failed syntax validation
  // Registry lookups and linking (PGW3001-PGW3099)
  | "PGW3001" // Enum not found
  | "PGW3002" // Message not found
  | "PGW3003" // File not found
  | "PGW3004" // Malformed HTTP path template
  | "PGW3005" // Path parameter does not name a request field
  | "PGW3006" // Duplicate file in descriptor set
  | "PGW3007" // Body does not name a request field
  | "PGW3008" // Request body not allowed for HTTP method
  | "PGW3009" // Invalid HTTP rule
  // Descriptor set loading (PGW9001-PGW9099)
  | "PGW9001" // Descriptor file not found
  | "PGW9002" // Failed to read descriptor file
  | "PGW9003" // Invalid JSON in descriptor file
  | "PGW9004"; // Descriptor set does not match the expected shape

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  /** Verbatim payload needed to diagnose the failure (e.g. generated source) */
  readonly detail?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  message: string,
  extras: {
    readonly severity?: DiagnosticSeverity;
    readonly location?: SourceLocation;
    readonly hint?: string;
    readonly detail?: string;
  } = {}
): Diagnostic => ({
  code,
  severity: extras.severity ?? "error",
  message,
  location: extras.location,
  hint: extras.hint,
  detail: extras.detail,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  const head = parts.join(" ");
  return diagnostic.detail !== undefined
    ? `${head}\n${diagnostic.detail}`
    : head;
};
