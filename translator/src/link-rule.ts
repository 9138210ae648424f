import { readFileSync } from "node:fs";
import path from "node:path";

import { createDiagnostic, createDiagnosticSpan, emitDiagnostic } from "./diagnostics.ts";
import { dollarEscape, makeTargetEscape } from "./escaping.ts";
import { OBJECT_FILE_SUFFIX, type Rule, type RuleBuilderContext, type RuleTable } from "./rule-table.ts";
import type { LinkStep } from "./steps.ts";

export type LinkFileListResult = { ok: true; paths: string[] } | { ok: false; message: string };

export function readLinkFileList(fileListPath: string): LinkFileListResult {
  let contents: string;
  try {
    contents = readFileSync(fileListPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, message: `Cannot read link file list ${fileListPath}: ${reason}` };
  }

  return {
    ok: true,
    paths: contents
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  };
}

/**
 * Keeps the objects the rule set can rebuild, plus any other `.o` so that
 * prebuilt objects still make the link stale when they change.
 */
export function selectLinkPrerequisites(objectPaths: readonly string[], table: RuleTable): string[] {
  const prerequisites: string[] = [];
  const seen = new Set<string>();

  for (const objectPath of objectPaths) {
    const target = makeTargetEscape(objectPath);
    if (seen.has(target)) {
      continue;
    }
    if (table.has(target) || objectPath.endsWith(OBJECT_FILE_SUFFIX)) {
      seen.add(target);
      prerequisites.push(target);
    }
  }

  return prerequisites;
}

export function buildLinkRules(step: LinkStep, context: RuleBuilderContext): Rule[] {
  const invocationLine = step.records[step.records.length - 1].line;
  const target = makeTargetEscape(step.outputPath);

  let prerequisites: string[] = [];
  if (step.fileListPath === null) {
    emitDiagnostic(
      context.diagnostics,
      createDiagnostic(
        "LINK_FILELIST_OPTION_MISSING",
        `Link of ${step.outputPath} has no -filelist option; its objects are not tracked`,
        createDiagnosticSpan(invocationLine, context.file)
      )
    );
  } else {
    const fileList = readLinkFileList(path.resolve(step.directory.directory, step.fileListPath));
    if (!fileList.ok) {
      emitDiagnostic(
        context.diagnostics,
        createDiagnostic("LINK_FILELIST_UNREADABLE", fileList.message, createDiagnosticSpan(invocationLine, context.file))
      );
      return [];
    }
    prerequisites = selectLinkPrerequisites(fileList.paths, context.table);
  }

  const rule: Rule = {
    target,
    prerequisites,
    workingDir: step.directory.directory,
    recipe: `${step.directory.recipePrefix} && ${dollarEscape(step.invocation)}`
  };

  const registered = context.table.register(rule);
  if (!step.outputPath.endsWith(OBJECT_FILE_SUFFIX)) {
    context.table.addLinkedProduct(target);
  }

  return registered ? [rule] : [];
}
