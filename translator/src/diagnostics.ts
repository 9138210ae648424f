export type DiagnosticCode =
  | "STEP_MALFORMED_MARKER"
  | "STEP_MISSING_DIRECTORY_CHANGE"
  | "STEP_MISSING_COMMAND"
  | "SWIFT_PRIMARY_OUTPUT_MISMATCH"
  | "OUTPUT_FILE_MAP_OPTION_MISSING"
  | "OUTPUT_FILE_MAP_UNREADABLE"
  | "OUTPUT_FILE_MAP_INVALID"
  | "LINK_FILELIST_OPTION_MISSING"
  | "LINK_FILELIST_UNREADABLE";

export type DiagnosticSeverity = "error" | "warning";

export interface DiagnosticSpan {
  file: string;
  line: number;
}

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  severity: DiagnosticSeverity;
  span: DiagnosticSpan;
}

export const DEFAULT_DIAGNOSTIC_FILE = "<log>";

// Warnings still produce a rule; errors mean the step was skipped.
const DIAGNOSTIC_SEVERITY_BY_CODE: Record<DiagnosticCode, DiagnosticSeverity> = {
  STEP_MALFORMED_MARKER: "error",
  STEP_MISSING_DIRECTORY_CHANGE: "error",
  STEP_MISSING_COMMAND: "error",
  SWIFT_PRIMARY_OUTPUT_MISMATCH: "error",
  OUTPUT_FILE_MAP_OPTION_MISSING: "error",
  OUTPUT_FILE_MAP_UNREADABLE: "error",
  OUTPUT_FILE_MAP_INVALID: "error",
  LINK_FILELIST_OPTION_MISSING: "warning",
  LINK_FILELIST_UNREADABLE: "error"
};

export function createDiagnosticSpan(line: number, file = DEFAULT_DIAGNOSTIC_FILE): DiagnosticSpan {
  return {
    file,
    line
  };
}

export function createDiagnostic(
  code: DiagnosticCode,
  message: string,
  span: DiagnosticSpan
): Diagnostic {
  return {
    code,
    message,
    severity: DIAGNOSTIC_SEVERITY_BY_CODE[code],
    span
  };
}

export function emitDiagnostic(diagnostics: Diagnostic[], diagnostic: Diagnostic): void {
  diagnostics.push(diagnostic);
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.span.file}:${diagnostic.span.line}: ${diagnostic.severity}: ${diagnostic.message} [${diagnostic.code}]`;
}

export function countDiagnostics(
  diagnostics: readonly Diagnostic[]
): Record<DiagnosticSeverity, number> {
  const counts: Record<DiagnosticSeverity, number> = { error: 0, warning: 0 };
  for (const diagnostic of diagnostics) {
    counts[diagnostic.severity] += 1;
  }
  return counts;
}
