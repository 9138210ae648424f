import { readFileSync } from "node:fs";

import {
  isRecord,
  validateAgainstSchema,
  type SchemaValidationIssue
} from "../../translator/src/index.ts";

export interface TranslatorConfigContract {
  schema_version: string;
  aggregate_target?: string;
  invocation?: string;
  ledger_path?: string;
}

export type ContractName = "TranslatorConfig";
export type ContractValidationCode =
  | "INVALID_INPUT"
  | "VERSION_INCOMPATIBLE"
  | "SCHEMA_VALIDATION_FAILED";

export type ContractValidationIssue = SchemaValidationIssue;

export class ContractValidationError extends Error {
  readonly contract: ContractName;
  readonly code: ContractValidationCode;
  readonly issues: ContractValidationIssue[];

  constructor(params: {
    contract: ContractName;
    code: ContractValidationCode;
    message: string;
    issues?: ContractValidationIssue[];
  }) {
    super(params.message);
    this.name = "ContractValidationError";
    this.contract = params.contract;
    this.code = params.code;
    this.issues = params.issues ?? [];
  }
}

export const SUPPORTED_TRANSLATOR_CONFIG_SCHEMA_VERSION = "0.1.0";

function requireRecord(value: unknown, contract: ContractName): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ContractValidationError({
      contract,
      code: "INVALID_INPUT",
      message: `${contract} contract input must be an object`
    });
  }

  return value;
}

function requireCompatibleSchemaVersion(
  contract: ContractName,
  value: Record<string, unknown>,
  expectedVersion: string
): void {
  const schemaVersion = value.schema_version;
  if (typeof schemaVersion !== "string" || schemaVersion.trim().length === 0) {
    throw new ContractValidationError({
      contract,
      code: "SCHEMA_VALIDATION_FAILED",
      message: `${contract} schema_version is required`,
      issues: [
        {
          instancePath: "/schema_version",
          keyword: "required",
          message: "schema_version is required"
        }
      ]
    });
  }

  if (schemaVersion !== expectedVersion) {
    throw new ContractValidationError({
      contract,
      code: "VERSION_INCOMPATIBLE",
      message: `${contract} schema_version "${schemaVersion}" is incompatible; expected "${expectedVersion}"`,
      issues: [
        {
          instancePath: "/schema_version",
          keyword: "const",
          message: `expected "${expectedVersion}"`
        }
      ]
    });
  }
}

function toTranslatorConfig(value: Record<string, unknown>): TranslatorConfigContract {
  const config: TranslatorConfigContract = {
    schema_version: String(value.schema_version)
  };
  if (typeof value.aggregate_target === "string") {
    config.aggregate_target = value.aggregate_target;
  }
  if (typeof value.invocation === "string") {
    config.invocation = value.invocation;
  }
  if (typeof value.ledger_path === "string") {
    config.ledger_path = value.ledger_path;
  }
  return config;
}

export function loadTranslatorConfigContract(input: unknown): TranslatorConfigContract {
  const contract: ContractName = "TranslatorConfig";
  const candidate = requireRecord(input, contract);
  requireCompatibleSchemaVersion(contract, candidate, SUPPORTED_TRANSLATOR_CONFIG_SCHEMA_VERSION);

  const validation = validateAgainstSchema("translator-config-v0", candidate);
  if (!validation.valid) {
    const firstIssue = validation.issues[0];
    const issuePath = firstIssue?.instancePath || "/";
    const issueMessage = firstIssue?.message ?? "validation failed";

    throw new ContractValidationError({
      contract,
      code: "SCHEMA_VALIDATION_FAILED",
      message: `${contract} contract validation failed at ${issuePath}: ${issueMessage}`,
      issues: validation.issues
    });
  }

  return toTranslatorConfig(candidate);
}

/**
 * Checks a target name given outside a configuration file against the same
 * schema rule that `aggregate_target` follows inside one.
 */
export function requireAggregateTargetName(name: string): string {
  const validation = validateAgainstSchema("translator-config-v0", {
    schema_version: SUPPORTED_TRANSLATOR_CONFIG_SCHEMA_VERSION,
    aggregate_target: name
  });
  if (!validation.valid) {
    throw new ContractValidationError({
      contract: "TranslatorConfig",
      code: "SCHEMA_VALIDATION_FAILED",
      message: `Aggregate target "${name}" is not a valid make target name: ${validation.issues[0]?.message ?? "validation failed"}`,
      issues: validation.issues
    });
  }

  return name;
}

export function readTranslatorConfigFile(configPath: string): TranslatorConfigContract {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf8")) as unknown;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContractValidationError({
      contract: "TranslatorConfig",
      code: "INVALID_INPUT",
      message: `Cannot load configuration ${configPath}: ${reason}`
    });
  }

  return loadTranslatorConfigContract(parsed);
}
