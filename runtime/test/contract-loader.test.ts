import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import {
  ContractValidationError,
  SUPPORTED_TRANSLATOR_CONFIG_SCHEMA_VERSION,
  loadTranslatorConfigContract,
  readTranslatorConfigFile,
  requireAggregateTargetName
} from "../src/index.ts";

function expectContractValidationError(
  operation: () => unknown,
  expectation: {
    code: "INVALID_INPUT" | "VERSION_INCOMPATIBLE" | "SCHEMA_VALIDATION_FAILED";
    messageIncludes: string;
    issues?: {
      hasKeyword?: string;
      hasInstancePath?: string;
    };
  }
): void {
  assert.throws(operation, (error) => {
    assert.ok(error instanceof ContractValidationError);
    assert.equal(error.contract, "TranslatorConfig");
    assert.equal(error.code, expectation.code);
    assert.equal(error.message.includes(expectation.messageIncludes), true);
    if (expectation.issues?.hasKeyword !== undefined) {
      assert.equal(
        error.issues.some((issue) => issue.keyword === expectation.issues?.hasKeyword),
        true
      );
    }
    if (expectation.issues?.hasInstancePath !== undefined) {
      assert.equal(
        error.issues.some((issue) => issue.instancePath === expectation.issues?.hasInstancePath),
        true
      );
    }
    return true;
  });
}

test("loadTranslatorConfigContract accepts a complete configuration", () => {
  const config = loadTranslatorConfigContract({
    schema_version: SUPPORTED_TRANSLATOR_CONFIG_SCHEMA_VERSION,
    aggregate_target: "all",
    invocation: "xcodebuild -scheme App build",
    ledger_path: "logmake-ledger.ndjson"
  });

  assert.deepEqual(config, {
    schema_version: "0.1.0",
    aggregate_target: "all",
    invocation: "xcodebuild -scheme App build",
    ledger_path: "logmake-ledger.ndjson"
  });
});

test("loadTranslatorConfigContract leaves absent keys unset", () => {
  assert.deepEqual(loadTranslatorConfigContract({ schema_version: "0.1.0" }), { schema_version: "0.1.0" });
});

test("loadTranslatorConfigContract rejects non-object input", () => {
  expectContractValidationError(() => loadTranslatorConfigContract(["0.1.0"]), {
    code: "INVALID_INPUT",
    messageIncludes: "TranslatorConfig contract input must be an object"
  });
});

test("loadTranslatorConfigContract requires schema_version", () => {
  expectContractValidationError(() => loadTranslatorConfigContract({ invocation: "xcodebuild" }), {
    code: "SCHEMA_VALIDATION_FAILED",
    messageIncludes: "schema_version is required",
    issues: { hasKeyword: "required", hasInstancePath: "/schema_version" }
  });
});

test("loadTranslatorConfigContract rejects an unsupported schema_version", () => {
  expectContractValidationError(() => loadTranslatorConfigContract({ schema_version: "2.0.0" }), {
    code: "VERSION_INCOMPATIBLE",
    messageIncludes: 'schema_version "2.0.0" is incompatible; expected "0.1.0"',
    issues: { hasKeyword: "const" }
  });
});

test("loadTranslatorConfigContract rejects unknown keys", () => {
  expectContractValidationError(
    () => loadTranslatorConfigContract({ schema_version: "0.1.0", output: "Makefile" }),
    {
      code: "SCHEMA_VALIDATION_FAILED",
      messageIncludes: "TranslatorConfig contract validation failed at /",
      issues: { hasKeyword: "additionalProperties", hasInstancePath: "" }
    }
  );
});

test("loadTranslatorConfigContract rejects an aggregate target make cannot name", () => {
  expectContractValidationError(
    () => loadTranslatorConfigContract({ schema_version: "0.1.0", aggregate_target: "all targets" }),
    {
      code: "SCHEMA_VALIDATION_FAILED",
      messageIncludes: "validation failed at /aggregate_target",
      issues: { hasKeyword: "pattern", hasInstancePath: "/aggregate_target" }
    }
  );
});

test("requireAggregateTargetName accepts names the configuration schema allows", () => {
  assert.equal(requireAggregateTargetName("build-all_1.x"), "build-all_1.x");
});

test("requireAggregateTargetName rejects names that would break the rule line", () => {
  expectContractValidationError(() => requireAggregateTargetName("a: b"), {
    code: "SCHEMA_VALIDATION_FAILED",
    messageIncludes: 'Aggregate target "a: b" is not a valid make target name: must match pattern',
    issues: { hasKeyword: "pattern", hasInstancePath: "/aggregate_target" }
  });
});

test("readTranslatorConfigFile loads a configuration from disk", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "logmake-config-"));
  const configPath = join(tmpRoot, "logmake.json");
  writeFileSync(configPath, JSON.stringify({ schema_version: "0.1.0", aggregate_target: "all" }), "utf8");

  try {
    assert.deepEqual(readTranslatorConfigFile(configPath), { schema_version: "0.1.0", aggregate_target: "all" });
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("readTranslatorConfigFile reports unparseable files as invalid input", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "logmake-config-"));
  const configPath = join(tmpRoot, "logmake.json");
  writeFileSync(configPath, "{ schema_version: 0.1.0 ", "utf8");

  try {
    expectContractValidationError(() => readTranslatorConfigFile(configPath), {
      code: "INVALID_INPUT",
      messageIncludes: `Cannot load configuration ${configPath}`
    });
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("readTranslatorConfigFile reports missing files as invalid input", () => {
  const configPath = join(tmpdir(), "logmake-missing-dir", "logmake.json");

  expectContractValidationError(() => readTranslatorConfigFile(configPath), {
    code: "INVALID_INPUT",
    messageIncludes: `Cannot load configuration ${configPath}`
  });
});
