import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { TranslationError, formatDiagnostic, unescapeMakeTarget } from "../../translator/src/index.ts";
import { ContractValidationError, readTranslatorConfigFile, type TranslatorConfigContract } from "./contracts.ts";
import { runTranslation, type RunTranslationOptions } from "./index.ts";

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliOptions {
  now?: () => Date;
  runIdFactory?: () => string;
}

export const CLI_USAGE =
  "usage: logmake --log <build.log> --out <Makefile> [--invocation <string>] [--config <logmake.json>] [--ledger <ledger.ndjson>] [--aggregate-target <name>]";

const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`)
};

function parseCliArguments(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      log: { type: "string" },
      out: { type: "string" },
      invocation: { type: "string" },
      config: { type: "string" },
      ledger: { type: "string" },
      "aggregate-target": { type: "string" },
      help: { type: "boolean", short: "h" }
    }
  });
}

/**
 * Exit codes: 0 translated (steps may have been skipped), 1 log or output
 * could not be opened, 2 bad arguments or configuration.
 */
export function runCli(argv: string[], io: CliIo = defaultIo, cliOptions: CliOptions = {}): number {
  let parsed: ReturnType<typeof parseCliArguments>;
  try {
    parsed = parseCliArguments(argv);
  } catch (error) {
    io.stderr(`logmake: ${error instanceof Error ? error.message : String(error)}`);
    io.stderr(CLI_USAGE);
    return 2;
  }

  const { values } = parsed;
  if (values.help === true) {
    io.stdout(CLI_USAGE);
    return 0;
  }

  if (values.log === undefined || values.out === undefined) {
    io.stderr("logmake: --log and --out are required");
    io.stderr(CLI_USAGE);
    return 2;
  }

  let config: TranslatorConfigContract | undefined;
  if (values.config !== undefined) {
    try {
      config = readTranslatorConfigFile(resolve(values.config));
    } catch (error) {
      if (error instanceof ContractValidationError) {
        io.stderr(`logmake: ${error.message}`);
        return 2;
      }
      throw error;
    }
  }

  const options: RunTranslationOptions = {
    invocation: values.invocation,
    aggregateTarget: values["aggregate-target"],
    ledgerPath: values.ledger,
    config,
    now: cliOptions.now,
    runIdFactory: cliOptions.runIdFactory
  };

  try {
    const result = runTranslation({ logPath: values.log, outputPath: values.out }, options);
    for (const diagnostic of result.diagnostics) {
      io.stderr(formatDiagnostic(diagnostic));
    }
    io.stdout(
      JSON.stringify({
        ok: true,
        run_id: result.runId,
        output_path: result.outputPath,
        rule_count: result.rules.length,
        linked_products: result.linkedProducts.map(unescapeMakeTarget),
        diagnostic_count: result.diagnostics.length
      })
    );
    return 0;
  } catch (error) {
    if (error instanceof TranslationError) {
      io.stderr(`logmake: ${error.message}`);
      return 1;
    }
    if (error instanceof ContractValidationError) {
      io.stderr(`logmake: ${error.message}`);
      return 2;
    }
    throw error;
  }
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = runCli(process.argv.slice(2));
}
