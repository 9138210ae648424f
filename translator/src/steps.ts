import type { DirectoryChange, LogRecord } from "./line-cursor.ts";

export type BuildStepKind = "compileC" | "swiftDriver" | "swiftCompile" | "link" | "codesign";

export interface SourceObjectPair {
  readonly sourcePath: string;
  readonly objectPath: string;
}

export interface CompileCStep {
  readonly kind: "compileC";
  readonly records: readonly LogRecord[];
  readonly directory: DirectoryChange;
  readonly objectPath: string;
  readonly sourcePath: string;
  readonly command: string;
}

export interface SwiftDriverStep {
  readonly kind: "swiftDriver";
  readonly records: readonly LogRecord[];
  readonly directory: DirectoryChange;
  readonly driverLine: string;
  readonly invocation: string;
  readonly outputFileMapPath: string | null;
}

export interface SwiftCompileStep {
  readonly kind: "swiftCompile";
  readonly records: readonly LogRecord[];
  readonly directory: DirectoryChange;
  readonly command: string;
  readonly pairs: readonly SourceObjectPair[];
}

export interface LinkStep {
  readonly kind: "link";
  readonly records: readonly LogRecord[];
  readonly directory: DirectoryChange;
  readonly outputPath: string;
  readonly invocation: string;
  readonly fileListPath: string | null;
}

export interface CodesignStep {
  readonly kind: "codesign";
  readonly records: readonly LogRecord[];
  readonly command: string;
}

export type BuildStep = CompileCStep | SwiftDriverStep | SwiftCompileStep | LinkStep | CodesignStep;
