import { readFileSync } from "node:fs";
import path from "node:path";

import { findOptionValue, splitArguments } from "./arguments.ts";
import type { DiagnosticCode } from "./diagnostics.ts";
import { isRecord, validateAgainstSchema } from "./schema-validation.ts";

export interface OutputFileMapEntry {
  sourcePath: string;
  objectPath: string;
}

export type OutputFileMapResult =
  | { ok: true; entries: OutputFileMapEntry[] }
  | {
      ok: false;
      code: Extract<DiagnosticCode, "OUTPUT_FILE_MAP_UNREADABLE" | "OUTPUT_FILE_MAP_INVALID">;
      message: string;
    };

const SWIFT_SOURCE_SUFFIX = ".swift";
const SWIFT_DRIVER_PREFIX = /^builtin-SwiftDriver\s+--\s+/;
const PARSEABLE_OUTPUT_FLAG = /\s+-parseable-output(?=\s|$)/g;

/**
 * The compiler command a driver step actually ran: the build system's
 * `builtin-SwiftDriver --` wrapper is dropped, and so is
 * `-parseable-output`, which only matters while the build system is
 * reading the driver's output.
 */
export function extractSwiftDriverInvocation(driverLine: string): string {
  return driverLine.replace(SWIFT_DRIVER_PREFIX, "").replace(PARSEABLE_OUTPUT_FLAG, "");
}

export function findOutputFileMapPath(driverLine: string, invocation: string): string | null {
  return (
    findOptionValue(splitArguments(driverLine), "-output-file-map") ??
    findOptionValue(splitArguments(invocation), "-output-file-map")
  );
}

function compareBinary(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

export function resolveOutputFileMapPath(mapPath: string, workingDirectory: string): string {
  return path.resolve(workingDirectory, mapPath);
}

/**
 * Reads an output file map and returns its Swift source to object pairs in
 * source path order.
 */
export function readOutputFileMap(mapPath: string): OutputFileMapResult {
  let contents: string;
  try {
    contents = readFileSync(mapPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      code: "OUTPUT_FILE_MAP_UNREADABLE",
      message: `Cannot read output file map ${mapPath}: ${reason}`
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents) as unknown;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      code: "OUTPUT_FILE_MAP_INVALID",
      message: `Output file map ${mapPath} is not valid JSON: ${reason}`
    };
  }

  const validation = validateAgainstSchema("output-file-map-v0", parsed);
  if (!validation.valid || !isRecord(parsed)) {
    const firstIssue = validation.valid ? undefined : validation.issues[0];
    const issuePath = firstIssue?.instancePath || "/";
    const issueMessage = firstIssue?.message ?? "must be object";
    return {
      ok: false,
      code: "OUTPUT_FILE_MAP_INVALID",
      message: `Output file map ${mapPath} is not a mapping at ${issuePath}: ${issueMessage}`
    };
  }

  const entries: OutputFileMapEntry[] = [];
  for (const sourcePath of Object.keys(parsed).sort(compareBinary)) {
    const outputs = parsed[sourcePath];
    if (!sourcePath.endsWith(SWIFT_SOURCE_SUFFIX) || !isRecord(outputs)) {
      continue;
    }

    const objectPath = outputs.object;
    if (typeof objectPath !== "string" || objectPath.length === 0) {
      continue;
    }

    entries.push({ sourcePath, objectPath });
  }

  return { ok: true, entries };
}
