import { createDiagnostic, createDiagnosticSpan, emitDiagnostic } from "./diagnostics.ts";
import { dollarEscape, makeTargetEscape, recipePath } from "./escaping.ts";
import type { DirectoryChange } from "./line-cursor.ts";
import { readOutputFileMap, resolveOutputFileMapPath } from "./output-file-map.ts";
import type { Rule, RuleBuilderContext } from "./rule-table.ts";
import type { CompileCStep, SourceObjectPair, SwiftCompileStep, SwiftDriverStep } from "./steps.ts";

export function createObjectRule(directory: DirectoryChange, pair: SourceObjectPair, command: string): Rule {
  return {
    target: makeTargetEscape(pair.objectPath),
    prerequisites: [makeTargetEscape(pair.sourcePath)],
    workingDir: directory.directory,
    recipe: `${directory.recipePrefix} && ${dollarEscape(command)} && touch ${recipePath(pair.objectPath)}`
  };
}

function registerAll(rules: readonly Rule[], context: RuleBuilderContext): Rule[] {
  return rules.filter((rule) => context.table.register(rule));
}

export function buildCompileCRules(step: CompileCStep, context: RuleBuilderContext): Rule[] {
  return registerAll(
    [createObjectRule(step.directory, { sourcePath: step.sourcePath, objectPath: step.objectPath }, step.command)],
    context
  );
}

export function buildSwiftCompileRules(step: SwiftCompileStep, context: RuleBuilderContext): Rule[] {
  return registerAll(
    step.pairs.map((pair) => createObjectRule(step.directory, pair, step.command)),
    context
  );
}

/**
 * One rule per Swift source in the driver's output file map, each rerunning
 * the whole driver invocation.
 */
export function buildSwiftDriverRules(step: SwiftDriverStep, context: RuleBuilderContext): Rule[] {
  const span = createDiagnosticSpan(step.records[step.records.length - 1].line, context.file);

  if (step.outputFileMapPath === null) {
    emitDiagnostic(
      context.diagnostics,
      createDiagnostic(
        "OUTPUT_FILE_MAP_OPTION_MISSING",
        "Swift driver invocation has no -output-file-map option",
        span
      )
    );
    return [];
  }

  const outputFileMap = readOutputFileMap(
    resolveOutputFileMapPath(step.outputFileMapPath, step.directory.directory)
  );
  if (!outputFileMap.ok) {
    emitDiagnostic(context.diagnostics, createDiagnostic(outputFileMap.code, outputFileMap.message, span));
    return [];
  }

  return registerAll(
    outputFileMap.entries.map((entry) => createObjectRule(step.directory, entry, step.invocation)),
    context
  );
}
