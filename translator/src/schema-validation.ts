import { readFileSync } from "node:fs";
import { createRequire } from "node:module";

import type { ErrorObject, ValidateFunction } from "ajv/dist/2020.js";

export type SchemaName = "output-file-map-v0" | "translator-config-v0";

export interface SchemaValidationIssue {
  instancePath: string;
  keyword: string;
  message: string;
}

export type SchemaValidationResult =
  | { valid: true }
  | { valid: false; issues: SchemaValidationIssue[] };

interface SchemaRegistry {
  addSchema(schema: object): unknown;
  getSchema(id: string): ValidateFunction | undefined;
}

type Ajv2020Constructor = new (options: { allErrors: boolean }) => SchemaRegistry;

const SCHEMA_NAMES: readonly SchemaName[] = ["output-file-map-v0", "translator-config-v0"];

let schemaRegistry: SchemaRegistry | null = null;

function resolveAjv2020Constructor(moduleValue: unknown): Ajv2020Constructor {
  const candidate = moduleValue as
    | Ajv2020Constructor
    | { default?: Ajv2020Constructor; Ajv2020?: Ajv2020Constructor };

  if (typeof candidate === "function") {
    return candidate;
  }
  if (candidate.default && typeof candidate.default === "function") {
    return candidate.default;
  }
  if (candidate.Ajv2020 && typeof candidate.Ajv2020 === "function") {
    return candidate.Ajv2020;
  }

  throw new Error("Unable to resolve Ajv2020 constructor");
}

export function schemaId(name: SchemaName): string {
  return `urn:logmake:schema:${name}`;
}

function readSchemaFile(name: SchemaName): object {
  const fileContents = readFileSync(new URL(`../../schemas/${name}.schema.json`, import.meta.url), "utf8");
  return JSON.parse(fileContents) as object;
}

// Every schema under schemas/ is registered once, keyed by its `$id`.
function getSchemaRegistry(): SchemaRegistry {
  if (schemaRegistry) {
    return schemaRegistry;
  }

  const Ajv2020 = resolveAjv2020Constructor(createRequire(import.meta.url)("ajv/dist/2020.js"));
  const registry = new Ajv2020({ allErrors: true });
  for (const name of SCHEMA_NAMES) {
    registry.addSchema(readSchemaFile(name));
  }

  schemaRegistry = registry;
  return registry;
}

export function getSchemaValidator(name: SchemaName): ValidateFunction {
  const validator = getSchemaRegistry().getSchema(schemaId(name));
  if (validator === undefined) {
    throw new Error(`Schema ${schemaId(name)} is not registered; check the $id in schemas/${name}.schema.json`);
  }

  return validator;
}

export function mapAjvIssues(errors: ErrorObject[] | null | undefined): SchemaValidationIssue[] {
  return (errors ?? []).map((error) => ({
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? "validation failed"
  }));
}

export function validateAgainstSchema(name: SchemaName, value: unknown): SchemaValidationResult {
  const validator = getSchemaValidator(name);
  if (validator(value) === true) {
    return { valid: true };
  }

  return { valid: false, issues: mapAjvIssues(validator.errors) };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
