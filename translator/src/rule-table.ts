import type { Diagnostic } from "./diagnostics.ts";

export const OBJECT_FILE_SUFFIX = ".o";

export interface Rule {
  target: string;
  prerequisites: string[];
  workingDir: string;
  recipe: string;
}

export interface RuleBuilderContext {
  table: RuleTable;
  diagnostics: Diagnostic[];
  file: string;
}

/**
 * Rules keyed by canonical target. The first rule registered for a target is
 * kept and later registrations are ignored, as make keeps one recipe per
 * target.
 */
export class RuleTable {
  private readonly rulesByTarget = new Map<string, Rule>();
  private readonly linkedProductSet = new Set<string>();

  register(rule: Rule): boolean {
    if (this.rulesByTarget.has(rule.target)) {
      return false;
    }

    this.rulesByTarget.set(rule.target, {
      target: rule.target,
      prerequisites: [...rule.prerequisites],
      workingDir: rule.workingDir,
      recipe: rule.recipe
    });
    return true;
  }

  has(target: string): boolean {
    return this.rulesByTarget.has(target);
  }

  get(target: string): Rule | undefined {
    return this.rulesByTarget.get(target);
  }

  get size(): number {
    return this.rulesByTarget.size;
  }

  rules(): Rule[] {
    return [...this.rulesByTarget.values()];
  }

  /** Object outputs are never linked products. */
  addLinkedProduct(target: string): boolean {
    if (target.endsWith(OBJECT_FILE_SUFFIX) || this.linkedProductSet.has(target)) {
      return false;
    }

    this.linkedProductSet.add(target);
    return true;
  }

  linkedProducts(): string[] {
    return [...this.linkedProductSet];
  }
}
