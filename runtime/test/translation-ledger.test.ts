import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { translateLog } from "../../translator/src/index.ts";
import {
  TRANSLATION_LEDGER_SCHEMA_VERSION,
  createFailureLedgerEntry,
  createSuccessLedgerEntry,
  emitTranslationLedgerEntry,
  runTranslation,
  type TranslationLedgerEntryV0,
  type TranslationLedgerRun
} from "../src/index.ts";

const BUILD_LOG = [
  "CompileC /b/a.o /s/a.c normal",
  "    cd /s",
  "    clang -c a.c -o /b/a.o",
  "Ld /b/App normal",
  "    cd /b",
  "    clang -o /b/App /b/a.o",
  ""
].join("\n");

function readTranslationLedgerEntries(outputPath: string): TranslationLedgerEntryV0[] {
  const rawContents = readFileSync(outputPath, "utf8").trim();
  if (rawContents.length === 0) {
    return [];
  }

  return rawContents
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => JSON.parse(line) as TranslationLedgerEntryV0);
}

function makeDeterministicClock(isoTimestamps: [string, string]): () => Date {
  let index = 0;
  return () => {
    const next = isoTimestamps[Math.min(index, isoTimestamps.length - 1)];
    index += 1;
    return new Date(next);
  };
}

test("runTranslation writes the rule set and records a successful run", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "logmake-ledger-"));
  const logPath = join(tmpRoot, "build.log");
  const outputPath = join(tmpRoot, "Makefile");
  const ledgerPath = join(tmpRoot, "ledger.ndjson");
  writeFileSync(logPath, BUILD_LOG, "utf8");

  try {
    const result = runTranslation(
      { logPath, outputPath },
      {
        invocation: "xcodebuild -scheme App",
        ledgerPath,
        runIdFactory: () => "run-success-001",
        now: makeDeterministicClock(["2026-02-20T10:00:00.000Z", "2026-02-20T10:00:01.000Z"])
      }
    );

    assert.equal(result.runId, "run-success-001");
    assert.equal(readFileSync(outputPath, "utf8"), result.text);
    assert.deepEqual(readTranslationLedgerEntries(ledgerPath), [
      {
        schema_version: TRANSLATION_LEDGER_SCHEMA_VERSION,
        run_id: "run-success-001",
        started_at: "2026-02-20T10:00:00.000Z",
        log_path: logPath,
        output_path: outputPath,
        invocation: "xcodebuild -scheme App",
        completed_at: "2026-02-20T10:00:01.000Z",
        counts: { rules: 2, linked_products: 1, errors: 0, warnings: 1 },
        outcome: { status: "success" }
      }
    ]);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("runTranslation records a failed run and rethrows", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "logmake-ledger-"));
  const ledgerPath = join(tmpRoot, "ledger.ndjson");
  const logPath = join(tmpRoot, "missing.log");

  try {
    assert.throws(
      () =>
        runTranslation(
          { logPath, outputPath: join(tmpRoot, "Makefile") },
          { ledgerPath, runIdFactory: () => "run-failure-001" }
        ),
      /Cannot read build log/
    );

    const entries = readTranslationLedgerEntries(ledgerPath);
    assert.equal(entries.length, 1);
    assert.equal(entries[0].run_id, "run-failure-001");
    assert.deepEqual(entries[0].counts, { rules: 0, linked_products: 0, errors: 0, warnings: 0 });
    assert.equal(entries[0].outcome.status, "failure");
    if (entries[0].outcome.status === "failure") {
      assert.equal(entries[0].outcome.error.name, "TranslationError");
    }
    assert.equal(existsSync(join(tmpRoot, "Makefile")), false);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("runTranslation takes settings from config unless overridden", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "logmake-ledger-"));
  const logPath = join(tmpRoot, "build.log");
  const outputPath = join(tmpRoot, "Makefile");
  const configLedgerPath = join(tmpRoot, "config-ledger.ndjson");
  writeFileSync(logPath, BUILD_LOG, "utf8");

  try {
    const result = runTranslation(
      { logPath, outputPath },
      {
        aggregateTarget: "everything",
        config: {
          schema_version: "0.1.0",
          aggregate_target: "all",
          invocation: "xcodebuild -scheme FromConfig",
          ledger_path: configLedgerPath
        },
        runIdFactory: () => "run-config-001"
      }
    );

    assert.equal(result.text.split("\n")[2], "# invocation: xcodebuild -scheme FromConfig");
    assert.equal(result.text.endsWith("everything: /b/App\n"), true);
    assert.equal(readTranslationLedgerEntries(configLedgerPath)[0].run_id, "run-config-001");
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("runTranslation falls back to a generated run id when the factory returns blank", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "logmake-ledger-"));
  const logPath = join(tmpRoot, "build.log");
  writeFileSync(logPath, BUILD_LOG, "utf8");

  try {
    const result = runTranslation(
      { logPath, outputPath: join(tmpRoot, "Makefile") },
      { runIdFactory: () => "  " }
    );

    assert.match(result.runId, /^run-[0-9a-z]+$/);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

test("emitTranslationLedgerEntry appends one line per entry and skips without a path", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "logmake-ledger-"));
  const ledgerPath = join(tmpRoot, "ledger.ndjson");
  const entry: TranslationLedgerEntryV0 = {
    schema_version: TRANSLATION_LEDGER_SCHEMA_VERSION,
    run_id: "run-append",
    started_at: "2026-02-20T10:00:00.000Z",
    completed_at: "2026-02-20T10:00:00.000Z",
    log_path: "build.log",
    output_path: "Makefile",
    invocation: "",
    counts: { rules: 0, linked_products: 0, errors: 0, warnings: 0 },
    outcome: { status: "success" }
  };

  try {
    emitTranslationLedgerEntry(entry);
    assert.equal(existsSync(ledgerPath), false);

    emitTranslationLedgerEntry(entry, { outputPath: ledgerPath });
    emitTranslationLedgerEntry({ ...entry, run_id: "run-append-2" }, { outputPath: ledgerPath });

    assert.deepEqual(
      readTranslationLedgerEntries(ledgerPath).map((line) => line.run_id),
      ["run-append", "run-append-2"]
    );
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});

const LEDGER_RUN: TranslationLedgerRun = {
  run_id: "run-builder",
  started_at: "2026-02-20T10:00:00.000Z",
  log_path: "build.log",
  output_path: "Makefile",
  invocation: "xcodebuild -scheme App"
};

test("createSuccessLedgerEntry counts rules, linked products and diagnostics by severity", () => {
  const result = translateLog(BUILD_LOG, { capturedAt: "2026-02-20T09:00:00.000Z" });

  assert.deepEqual(createSuccessLedgerEntry(LEDGER_RUN, "2026-02-20T10:00:02.000Z", result), {
    schema_version: TRANSLATION_LEDGER_SCHEMA_VERSION,
    ...LEDGER_RUN,
    completed_at: "2026-02-20T10:00:02.000Z",
    counts: { rules: 2, linked_products: 1, errors: 0, warnings: 1 },
    outcome: { status: "success" }
  });
});

test("createFailureLedgerEntry names thrown values that are not errors", () => {
  const entry = createFailureLedgerEntry(LEDGER_RUN, "2026-02-20T10:00:02.000Z", "disk full");

  assert.deepEqual(entry.counts, { rules: 0, linked_products: 0, errors: 0, warnings: 0 });
  assert.deepEqual(entry.outcome, { status: "failure", error: { name: "NonErrorThrown", message: "disk full" } });
});
