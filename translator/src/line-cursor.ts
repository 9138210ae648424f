import { splitArguments } from "./arguments.ts";
import { recipePath, unescapeShell } from "./escaping.ts";

export interface LogRecord {
  text: string;
  line: number;
}

export interface DirectoryChange {
  record: LogRecord;
  directory: string;
  recipePrefix: string;
}

const DIRECTORY_CHANGE_PATTERN = /^(?:\/usr\/bin\/time\s+)?cd\s+(.+)$/;
const QUOTE_CHARACTER = /['"]/;

// The build log backslash-escapes spaces and shell metacharacters in the
// directory; a bare space is kept as part of the path.
function parseDirectoryOperand(operand: string): string {
  if (!QUOTE_CHARACTER.test(operand)) {
    return unescapeShell(operand);
  }

  const tokens = splitArguments(operand);
  return tokens.length === 1 ? tokens[0].value : operand;
}

export function parseDirectoryChange(record: LogRecord): DirectoryChange | null {
  const match = DIRECTORY_CHANGE_PATTERN.exec(record.text);
  if (match === null) {
    return null;
  }

  const directory = parseDirectoryOperand(match[1]);
  return {
    record,
    directory,
    recipePrefix: `cd ${recipePath(directory)}`
  };
}

/**
 * Forward-only reader over a captured log. Records are trimmed; the trailing
 * newline of the file does not produce an extra record.
 */
export class LineCursor {
  private readonly lines: string[];
  private index = 0;

  constructor(source: string) {
    const lines = source.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }
    this.lines = lines;
  }

  isAtEnd(): boolean {
    return this.index >= this.lines.length;
  }

  nextLine(): LogRecord | null {
    if (this.isAtEnd()) {
      return null;
    }

    const text = this.lines[this.index].trim();
    this.index += 1;
    return { text, line: this.index };
  }

  nextNonBlankLine(skip?: (text: string) => boolean): LogRecord | null {
    for (;;) {
      const record = this.nextLine();
      if (record === null) {
        return null;
      }
      if (record.text.length === 0 || skip?.(record.text) === true) {
        continue;
      }
      return record;
    }
  }

  /**
   * Reads a `cd <path>` record. Any other record is left unconsumed and
   * `null` is returned.
   */
  nextDirectoryChange(): DirectoryChange | null {
    const position = this.mark();
    const record = this.nextLine();
    if (record === null) {
      return null;
    }

    const directoryChange = parseDirectoryChange(record);
    if (directoryChange === null) {
      this.reset(position);
    }
    return directoryChange;
  }

  mark(): number {
    return this.index;
  }

  reset(position: number): void {
    this.index = Math.max(0, Math.min(position, this.lines.length));
  }
}
