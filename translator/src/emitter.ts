import type { Rule } from "./rule-table.ts";

export const DEFAULT_AGGREGATE_TARGET = "main";

const HEADER_TITLE = "# Makefile generated by logmake. Do not edit.";
const CAPTURED_PREFIX = "# captured: ";
const INVOCATION_PREFIX = "# invocation: ";
const DEFAULT_GOAL_PREFIX = ".DEFAULT_GOAL := ";

export type EmissionEntry = { kind: "comment"; text: string } | { kind: "rule"; rule: Rule };

export interface RuleSetHeader {
  capturedAt: string;
  invocation: string;
}

export interface AggregateRule {
  target: string;
  prerequisites: readonly string[];
  recipe: readonly string[];
}

function singleLine(value: string): string {
  return value.replace(/\r?\n/g, " ");
}

// A trailing backslash would continue the comment onto the next line.
export function renderComment(text: string): string {
  const body = singleLine(text).replace(/\\+$/, "");
  return body.length > 0 ? `# ${body}` : "#";
}

export function renderRule(
  rule: { target: string; prerequisites: readonly string[] },
  recipe: readonly string[]
): string[] {
  const dependencyLine =
    rule.prerequisites.length > 0 ? `${rule.target}: ${rule.prerequisites.join(" ")}` : `${rule.target}:`;
  return [dependencyLine, ...recipe.map((line) => `\t${line}`)];
}

// The aggregate rule is written last, so a bare `make` needs the goal named.
export function renderHeader(header: RuleSetHeader, defaultGoal: string): string[] {
  return [
    HEADER_TITLE,
    `${CAPTURED_PREFIX}${singleLine(header.capturedAt)}`,
    `${INVOCATION_PREFIX}${singleLine(header.invocation)}`,
    `${DEFAULT_GOAL_PREFIX}${defaultGoal}`,
    ""
  ];
}

/**
 * Serializes a rule set: header, log commentary and rule blocks in log
 * order, then the aggregate rule.
 */
export function renderRuleSet(
  header: RuleSetHeader,
  entries: readonly EmissionEntry[],
  aggregate: AggregateRule
): string {
  const lines = renderHeader(header, aggregate.target);

  for (const entry of entries) {
    if (entry.kind === "comment") {
      lines.push(renderComment(entry.text));
      continue;
    }

    lines.push(...renderRule(entry.rule, [entry.rule.recipe]), "");
  }

  lines.push(...renderRule(aggregate, aggregate.recipe));
  return `${lines.join("\n")}\n`;
}

export function readRuleSetInvocation(ruleSetText: string): string | null {
  const lines = ruleSetText.split("\n", 4);
  if (lines[0] !== HEADER_TITLE) {
    return null;
  }

  const invocationLine = lines.find((line) => line.startsWith(INVOCATION_PREFIX));
  return invocationLine === undefined ? null : invocationLine.slice(INVOCATION_PREFIX.length);
}

/** True when the rule set was generated from a capture made with `invocation`. */
export function isRuleSetFresh(ruleSetText: string, invocation: string): boolean {
  return readRuleSetInvocation(ruleSetText) === singleLine(invocation);
}
