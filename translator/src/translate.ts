import { readFileSync, statSync, writeFileSync } from "node:fs";

import { classifyRecord } from "./classifiers.ts";
import { buildCompileCRules, buildSwiftCompileRules, buildSwiftDriverRules } from "./compile-rules.ts";
import { DEFAULT_DIAGNOSTIC_FILE, type Diagnostic } from "./diagnostics.ts";
import { DEFAULT_AGGREGATE_TARGET, renderRuleSet, type EmissionEntry } from "./emitter.ts";
import { dollarEscape } from "./escaping.ts";
import { LineCursor } from "./line-cursor.ts";
import { buildLinkRules } from "./link-rule.ts";
import { RuleTable, type Rule, type RuleBuilderContext } from "./rule-table.ts";
import type { BuildStep } from "./steps.ts";

export interface TranslateLogOptions {
  capturedAt: string;
  invocation?: string;
  aggregateTarget?: string;
  file?: string;
}

export type TranslateOptions = Omit<TranslateLogOptions, "capturedAt" | "file">;

export interface TranslateResult {
  text: string;
  rules: Rule[];
  linkedProducts: string[];
  diagnostics: Diagnostic[];
}

export type TranslationErrorCode = "LOG_UNREADABLE" | "OUTPUT_UNWRITABLE";

export class TranslationError extends Error {
  readonly code: TranslationErrorCode;
  readonly path: string;

  constructor(params: { code: TranslationErrorCode; path: string; message: string }) {
    super(params.message);
    this.name = "TranslationError";
    this.code = params.code;
    this.path = params.path;
  }
}

function buildRules(step: BuildStep, context: RuleBuilderContext, postLinkRecipe: string[]): Rule[] {
  switch (step.kind) {
    case "compileC":
      return buildCompileCRules(step, context);
    case "swiftDriver":
      return buildSwiftDriverRules(step, context);
    case "swiftCompile":
      return buildSwiftCompileRules(step, context);
    case "link":
      return buildLinkRules(step, context);
    case "codesign":
      postLinkRecipe.push(dollarEscape(step.command));
      return [];
  }
}

/**
 * Translates captured log text into a rule set. Steps that cannot be read
 * are skipped with a diagnostic; the translation itself never fails.
 */
export function translateLog(source: string, options: TranslateLogOptions): TranslateResult {
  const file = options.file ?? DEFAULT_DIAGNOSTIC_FILE;
  const diagnostics: Diagnostic[] = [];
  const table = new RuleTable();
  const cursor = new LineCursor(source);
  const entries: EmissionEntry[] = [];
  const postLinkRecipe: string[] = [];
  const context: RuleBuilderContext = { table, diagnostics, file };

  for (let record = cursor.nextLine(); record !== null; record = cursor.nextLine()) {
    if (record.text.length === 0) {
      continue;
    }

    entries.push({ kind: "comment", text: record.text });

    const outcome = classifyRecord(record, { cursor, diagnostics, file });
    if (outcome.status !== "step") {
      continue;
    }

    for (const rule of buildRules(outcome.step, context, postLinkRecipe)) {
      entries.push({ kind: "rule", rule });
    }
  }

  const linkedProducts = table.linkedProducts();
  const text = renderRuleSet(
    {
      capturedAt: options.capturedAt,
      invocation: options.invocation ?? ""
    },
    entries,
    {
      target: options.aggregateTarget ?? DEFAULT_AGGREGATE_TARGET,
      prerequisites: linkedProducts,
      recipe: postLinkRecipe
    }
  );

  return {
    text,
    rules: table.rules(),
    linkedProducts,
    diagnostics
  };
}

/** Translates the log at `logPath`, stamping its modification time as the capture time. */
export function translate(logPath: string, options: TranslateOptions = {}): TranslateResult {
  let source: string;
  let capturedAt: string;
  try {
    source = readFileSync(logPath, "utf8");
    capturedAt = statSync(logPath).mtime.toISOString();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TranslationError({
      code: "LOG_UNREADABLE",
      path: logPath,
      message: `Cannot read build log ${logPath}: ${reason}`
    });
  }

  return translateLog(source, { ...options, capturedAt, file: logPath });
}

export function writeRuleSet(outputPath: string, text: string): void {
  try {
    writeFileSync(outputPath, text, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TranslationError({
      code: "OUTPUT_UNWRITABLE",
      path: outputPath,
      message: `Cannot write rule set ${outputPath}: ${reason}`
    });
  }
}
