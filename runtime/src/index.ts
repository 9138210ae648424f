import { randomUUID } from "node:crypto";

import {
  DEFAULT_AGGREGATE_TARGET,
  translate,
  writeRuleSet,
  type TranslateResult
} from "../../translator/src/index.ts";
import { requireAggregateTargetName, type TranslatorConfigContract } from "./contracts.ts";
import {
  createFailureLedgerEntry,
  createSuccessLedgerEntry,
  emitTranslationLedgerEntry,
  type TranslationLedgerRun
} from "./translation-ledger.ts";

export interface RunTranslationInput {
  logPath: string;
  outputPath: string;
}

export interface RunTranslationOptions {
  invocation?: string;
  aggregateTarget?: string;
  ledgerPath?: string;
  config?: TranslatorConfigContract;
  now?: () => Date;
  runIdFactory?: () => string;
}

export interface RunTranslationResult extends TranslateResult {
  runId: string;
  outputPath: string;
}

function normalizeOptionalString(value?: string): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveAggregateTarget(options: RunTranslationOptions): string {
  const explicitAggregateTarget = normalizeOptionalString(options.aggregateTarget);
  if (explicitAggregateTarget !== undefined) {
    return requireAggregateTargetName(explicitAggregateTarget);
  }

  return normalizeOptionalString(options.config?.aggregate_target) ?? DEFAULT_AGGREGATE_TARGET;
}

function resolveRunId(runIdFactory: () => string): string {
  const normalizedRunId = runIdFactory().trim();
  return normalizedRunId.length > 0 ? normalizedRunId : `run-${Date.now().toString(36)}`;
}

function resolveTimestamp(now: () => Date): string {
  const candidate = now();
  if (Number.isFinite(candidate.getTime())) {
    return candidate.toISOString();
  }

  return new Date().toISOString();
}

/**
 * Translates a captured log into a rule set file and records the run in the
 * translation ledger. Explicit options take precedence over `config`.
 * An invalid explicit aggregate target throws `ContractValidationError`
 * before anything is read. Errors that make the translation impossible are
 * recorded and rethrown.
 */
export function runTranslation(
  input: RunTranslationInput,
  options: RunTranslationOptions = {}
): RunTranslationResult {
  const now = options.now ?? (() => new Date());
  const runId = resolveRunId(options.runIdFactory ?? randomUUID);
  const startedAt = resolveTimestamp(now);
  const invocation = options.invocation ?? options.config?.invocation ?? "";
  const aggregateTarget = resolveAggregateTarget(options);
  const ledgerPath =
    normalizeOptionalString(options.ledgerPath) ?? normalizeOptionalString(options.config?.ledger_path);

  const run: TranslationLedgerRun = {
    run_id: runId,
    started_at: startedAt,
    log_path: input.logPath,
    output_path: input.outputPath,
    invocation
  };

  let result: TranslateResult;
  try {
    result = translate(input.logPath, { invocation, aggregateTarget });
    writeRuleSet(input.outputPath, result.text);
  } catch (error) {
    emitTranslationLedgerEntry(createFailureLedgerEntry(run, resolveTimestamp(now), error), {
      outputPath: ledgerPath
    });
    throw error;
  }

  emitTranslationLedgerEntry(createSuccessLedgerEntry(run, resolveTimestamp(now), result), {
    outputPath: ledgerPath
  });

  return {
    ...result,
    runId,
    outputPath: input.outputPath
  };
}

export {
  ContractValidationError,
  SUPPORTED_TRANSLATOR_CONFIG_SCHEMA_VERSION,
  loadTranslatorConfigContract,
  readTranslatorConfigFile,
  requireAggregateTargetName
} from "./contracts.ts";
export type {
  ContractName,
  ContractValidationCode,
  ContractValidationIssue,
  TranslatorConfigContract
} from "./contracts.ts";
export {
  TRANSLATION_LEDGER_SCHEMA_VERSION,
  countTranslation,
  createFailureLedgerEntry,
  createSuccessLedgerEntry,
  emitTranslationLedgerEntry,
  toTranslationLedgerError
} from "./translation-ledger.ts";
export type {
  TranslationLedgerCounts,
  TranslationLedgerEntryV0,
  TranslationLedgerError,
  TranslationLedgerRun
} from "./translation-ledger.ts";
