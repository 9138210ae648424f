export { findOptionValue, findOptionValues, splitArguments } from "./arguments.ts";
export { STEP_CLASSIFIERS, classifyRecord, isStepMarker } from "./classifiers.ts";
export { countDiagnostics, formatDiagnostic } from "./diagnostics.ts";
export {
  DEFAULT_AGGREGATE_TARGET,
  isRuleSetFresh,
  readRuleSetInvocation,
  renderRuleSet
} from "./emitter.ts";
export {
  dollarEscape,
  makeTargetEscape,
  recipePath,
  shellEscape,
  unescapeMakeTarget,
  unescapeShell
} from "./escaping.ts";
export { LineCursor, parseDirectoryChange } from "./line-cursor.ts";
export { buildLinkRules, readLinkFileList, selectLinkPrerequisites } from "./link-rule.ts";
export {
  extractSwiftDriverInvocation,
  findOutputFileMapPath,
  readOutputFileMap
} from "./output-file-map.ts";
export { OBJECT_FILE_SUFFIX, RuleTable } from "./rule-table.ts";
export { getSchemaValidator, isRecord, mapAjvIssues, schemaId, validateAgainstSchema } from "./schema-validation.ts";
export { TranslationError, translate, translateLog, writeRuleSet } from "./translate.ts";
export type { ArgumentToken } from "./arguments.ts";
export type { ClassifierContext, ClassifyOutcome, StepClassifier } from "./classifiers.ts";
export type { Diagnostic, DiagnosticCode, DiagnosticSeverity, DiagnosticSpan } from "./diagnostics.ts";
export type { AggregateRule, EmissionEntry, RuleSetHeader } from "./emitter.ts";
export type { DirectoryChange, LogRecord } from "./line-cursor.ts";
export type { LinkFileListResult } from "./link-rule.ts";
export type { OutputFileMapEntry, OutputFileMapResult } from "./output-file-map.ts";
export type { Rule, RuleBuilderContext } from "./rule-table.ts";
export type { SchemaName, SchemaValidationIssue, SchemaValidationResult } from "./schema-validation.ts";
export type {
  BuildStep,
  BuildStepKind,
  CodesignStep,
  CompileCStep,
  LinkStep,
  SourceObjectPair,
  SwiftCompileStep,
  SwiftDriverStep
} from "./steps.ts";
export type {
  TranslateLogOptions,
  TranslateOptions,
  TranslateResult,
  TranslationErrorCode
} from "./translate.ts";
