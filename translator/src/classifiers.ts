import { findOptionValue, findOptionValues, splitArguments } from "./arguments.ts";
import {
  createDiagnostic,
  createDiagnosticSpan,
  emitDiagnostic,
  type Diagnostic,
  type DiagnosticCode
} from "./diagnostics.ts";
import type { DirectoryChange, LineCursor, LogRecord } from "./line-cursor.ts";
import { extractSwiftDriverInvocation, findOutputFileMapPath } from "./output-file-map.ts";
import type {
  BuildStep,
  BuildStepKind,
  CodesignStep,
  CompileCStep,
  LinkStep,
  SourceObjectPair,
  SwiftCompileStep,
  SwiftDriverStep
} from "./steps.ts";

export interface ClassifierContext {
  cursor: LineCursor;
  diagnostics: Diagnostic[];
  file: string;
}

export interface StepClassifier {
  kind: BuildStepKind;
  matches(text: string): boolean;
  parse(marker: LogRecord, context: ClassifierContext): BuildStep | null;
}

export type ClassifyOutcome =
  | { status: "unclaimed" }
  | { status: "step"; step: BuildStep }
  | { status: "skipped"; kind: BuildStepKind };

const COMPILE_C_MARKER = /^CompileC\s/;
// `SwiftDriver\ Compilation\ Requirements` only emits the module and is not matched.
const SWIFT_DRIVER_MARKER = /^(?:SwiftDriver(?:\\ Compilation)?|CompileSwiftSources)\s/;
const SWIFT_COMPILE_MARKER = /^(?:CompileSwift|SwiftCompile)\s/;
const LINK_MARKER = /^Ld\s/;
const POST_LINK_COMMAND = /^\/usr\/bin\/(?:codesign|touch)\s/;

const RESPONSE_FILE_NOTICE = /^Using response file:/;
const SWIFT_FRONTEND_COMPILE = /(?:^|[/\s])swift(?:-frontend)?\s+-frontend\s+-c(?:\s|$)/;
const SWIFT_TASK_EXECUTION_PREFIX = /^builtin-swiftTaskExecution\s+--\s+/;

interface StepPrelude {
  directory: DirectoryChange;
  command: LogRecord;
}

function report(
  context: ClassifierContext,
  code: DiagnosticCode,
  message: string,
  record: LogRecord
): null {
  emitDiagnostic(context.diagnostics, createDiagnostic(code, message, createDiagnosticSpan(record.line, context.file)));
  return null;
}

function isResponseFileNotice(text: string): boolean {
  return RESPONSE_FILE_NOTICE.test(text);
}

/**
 * Reads the working directory and the command that follow a marker. On
 * failure the cursor is rewound to just after the marker and a diagnostic
 * names the marker's line.
 */
function readDirectoryAndCommand(
  marker: LogRecord,
  context: ClassifierContext,
  stepName: string,
  readCommand: () => LogRecord | null,
  acceptCommand: (text: string) => boolean = () => true
): StepPrelude | null {
  const afterMarker = context.cursor.mark();
  const directory = context.cursor.nextDirectoryChange();
  if (directory === null) {
    return report(
      context,
      "STEP_MISSING_DIRECTORY_CHANGE",
      `${stepName} step is not followed by a directory change`,
      marker
    );
  }

  const command = readCommand();
  if (
    command === null ||
    command.text.length === 0 ||
    isStepMarker(command.text) ||
    !acceptCommand(command.text)
  ) {
    context.cursor.reset(afterMarker);
    return report(context, "STEP_MISSING_COMMAND", `${stepName} step has no command line`, marker);
  }

  return { directory, command };
}

function readMarkerPaths(marker: LogRecord, context: ClassifierContext, count: number): string[] | null {
  const paths = splitArguments(marker.text)
    .slice(1, count + 1)
    .map((token) => token.value);
  if (paths.length < count) {
    return report(
      context,
      "STEP_MALFORMED_MARKER",
      `Expected ${count === 1 ? "an output path" : `${count} paths`} after "${marker.text.split(/\s/)[0]}"`,
      marker
    );
  }
  return paths;
}

function parseCompileC(marker: LogRecord, context: ClassifierContext): CompileCStep | null {
  const paths = readMarkerPaths(marker, context, 2);
  if (paths === null) {
    return null;
  }

  const read = readDirectoryAndCommand(marker, context, "CompileC", () =>
    context.cursor.nextNonBlankLine(isResponseFileNotice)
  );
  if (read === null) {
    return null;
  }

  return {
    kind: "compileC",
    records: [marker, read.directory.record, read.command],
    directory: read.directory,
    objectPath: paths[0],
    sourcePath: paths[1],
    command: read.command.text
  };
}

function parseSwiftDriver(marker: LogRecord, context: ClassifierContext): SwiftDriverStep | null {
  const read = readDirectoryAndCommand(marker, context, "SwiftDriver", () => context.cursor.nextLine());
  if (read === null) {
    return null;
  }

  const invocation = extractSwiftDriverInvocation(read.command.text);
  return {
    kind: "swiftDriver",
    records: [marker, read.directory.record, read.command],
    directory: read.directory,
    driverLine: read.command.text,
    invocation,
    outputFileMapPath: findOutputFileMapPath(read.command.text, invocation)
  };
}

function parseSwiftCompile(marker: LogRecord, context: ClassifierContext): SwiftCompileStep | null {
  const read = readDirectoryAndCommand(
    marker,
    context,
    "CompileSwift",
    () => context.cursor.nextLine(),
    (text) => SWIFT_FRONTEND_COMPILE.test(text)
  );
  if (read === null) {
    return null;
  }

  const command = read.command.text.replace(SWIFT_TASK_EXECUTION_PREFIX, "");
  const tokens = splitArguments(command);
  const sources = findOptionValues(tokens, "-primary-file");
  const objects = findOptionValues(tokens, "-o");
  if (sources.length !== objects.length) {
    return report(
      context,
      "SWIFT_PRIMARY_OUTPUT_MISMATCH",
      `Swift frontend invocation has ${sources.length} -primary-file and ${objects.length} -o options`,
      read.command
    );
  }

  const pairs: SourceObjectPair[] = sources.map((sourcePath, index) => ({
    sourcePath,
    objectPath: objects[index]
  }));

  return {
    kind: "swiftCompile",
    records: [marker, read.directory.record, read.command],
    directory: read.directory,
    command,
    pairs
  };
}

function parseLink(marker: LogRecord, context: ClassifierContext): LinkStep | null {
  const paths = readMarkerPaths(marker, context, 1);
  if (paths === null) {
    return null;
  }

  const read = readDirectoryAndCommand(marker, context, "Ld", () => context.cursor.nextLine());
  if (read === null) {
    return null;
  }

  const invocation = read.command.text;
  return {
    kind: "link",
    records: [marker, read.directory.record, read.command],
    directory: read.directory,
    outputPath: paths[0],
    invocation,
    fileListPath: findOptionValue(splitArguments(invocation), "-filelist", "-Xlinker")
  };
}

function parseCodesign(marker: LogRecord): CodesignStep {
  return {
    kind: "codesign",
    records: [marker],
    command: marker.text
  };
}

export const STEP_CLASSIFIERS: readonly StepClassifier[] = [
  { kind: "compileC", matches: (text) => COMPILE_C_MARKER.test(text), parse: parseCompileC },
  { kind: "swiftDriver", matches: (text) => SWIFT_DRIVER_MARKER.test(text), parse: parseSwiftDriver },
  { kind: "swiftCompile", matches: (text) => SWIFT_COMPILE_MARKER.test(text), parse: parseSwiftCompile },
  { kind: "link", matches: (text) => LINK_MARKER.test(text), parse: parseLink },
  { kind: "codesign", matches: (text) => POST_LINK_COMMAND.test(text), parse: parseCodesign }
];

export function isStepMarker(text: string): boolean {
  return STEP_CLASSIFIERS.some((classifier) => classifier.matches(text));
}

export function classifyRecord(record: LogRecord, context: ClassifierContext): ClassifyOutcome {
  const classifier = STEP_CLASSIFIERS.find((candidate) => candidate.matches(record.text));
  if (classifier === undefined) {
    return { status: "unclaimed" };
  }

  const step = classifier.parse(record, context);
  if (step === null) {
    return { status: "skipped", kind: classifier.kind };
  }

  return { status: "step", step };
}
