import { appendFileSync } from "node:fs";

import { countDiagnostics, type TranslateResult } from "../../translator/src/index.ts";

export const TRANSLATION_LEDGER_SCHEMA_VERSION = "0.1.0";

export interface TranslationLedgerError {
  name: string;
  message: string;
}

export interface TranslationLedgerCounts {
  rules: number;
  linked_products: number;
  errors: number;
  warnings: number;
}

export interface TranslationLedgerRun {
  run_id: string;
  started_at: string;
  log_path: string;
  output_path: string;
  invocation: string;
}

export interface TranslationLedgerEntryV0 extends TranslationLedgerRun {
  schema_version: typeof TRANSLATION_LEDGER_SCHEMA_VERSION;
  completed_at: string;
  counts: TranslationLedgerCounts;
  outcome: { status: "success" } | { status: "failure"; error: TranslationLedgerError };
}

export interface EmitTranslationLedgerEntryOptions {
  outputPath?: string;
}

const EMPTY_COUNTS: TranslationLedgerCounts = { rules: 0, linked_products: 0, errors: 0, warnings: 0 };

export function countTranslation(result: TranslateResult): TranslationLedgerCounts {
  const diagnosticCounts = countDiagnostics(result.diagnostics);
  return {
    rules: result.rules.length,
    linked_products: result.linkedProducts.length,
    errors: diagnosticCounts.error,
    warnings: diagnosticCounts.warning
  };
}

export function toTranslationLedgerError(error: unknown): TranslationLedgerError {
  if (error instanceof Error) {
    const normalizedErrorName = error.name.trim();
    return {
      name: normalizedErrorName.length > 0 ? normalizedErrorName : "Error",
      message: error.message
    };
  }

  return {
    name: "NonErrorThrown",
    message: String(error)
  };
}

export function createSuccessLedgerEntry(
  run: TranslationLedgerRun,
  completedAt: string,
  result: TranslateResult
): TranslationLedgerEntryV0 {
  return {
    schema_version: TRANSLATION_LEDGER_SCHEMA_VERSION,
    ...run,
    completed_at: completedAt,
    counts: countTranslation(result),
    outcome: { status: "success" }
  };
}

/** A failed run produced no rule set, so every count is zero. */
export function createFailureLedgerEntry(
  run: TranslationLedgerRun,
  completedAt: string,
  error: unknown
): TranslationLedgerEntryV0 {
  return {
    schema_version: TRANSLATION_LEDGER_SCHEMA_VERSION,
    ...run,
    completed_at: completedAt,
    counts: { ...EMPTY_COUNTS },
    outcome: { status: "failure", error: toTranslationLedgerError(error) }
  };
}

export function emitTranslationLedgerEntry(
  entry: TranslationLedgerEntryV0,
  options: EmitTranslationLedgerEntryOptions = {}
): void {
  if (!options.outputPath) {
    return;
  }

  appendFileSync(options.outputPath, `${JSON.stringify(entry)}\n`, "utf8");
}
