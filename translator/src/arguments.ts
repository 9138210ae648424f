export interface ArgumentToken {
  value: string;
  lexeme: string;
  start: number;
  end: number;
}

function isWhitespace(value: string): boolean {
  return value === " " || value === "\t";
}

function decodeDoubleQuotedEscape(value: string): string | null {
  if (value === "\"" || value === "\\" || value === "$") {
    return value;
  }

  return null;
}

/**
 * Splits one command line from the build log into words.
 *
 * Xcode writes paths with backslash-escaped spaces and, for some tools,
 * inside quotes; each token's `value` is the unescaped word and `lexeme`
 * the text as written. An unterminated quote runs to end of line.
 */
export function splitArguments(input: string): ArgumentToken[] {
  const tokens: ArgumentToken[] = [];
  const source = input;

  let index = 0;

  function currentChar(): string | undefined {
    return source[index];
  }

  function advance(): string {
    const value = source[index] ?? "";
    index += 1;
    return value;
  }

  while (index < source.length) {
    const value = currentChar();
    if (value === undefined) {
      break;
    }

    if (isWhitespace(value)) {
      advance();
      continue;
    }

    const start = index;
    let parsedValue = "";

    while (index < source.length) {
      const char = currentChar();
      if (char === undefined || isWhitespace(char)) {
        break;
      }

      if (char === "\\") {
        advance();
        const escaped = currentChar();
        if (escaped === undefined) {
          parsedValue += "\\";
          break;
        }
        parsedValue += advance();
        continue;
      }

      if (char === "'") {
        advance();
        while (index < source.length && currentChar() !== "'") {
          parsedValue += advance();
        }
        if (currentChar() === "'") {
          advance();
        }
        continue;
      }

      if (char === "\"") {
        advance();
        while (index < source.length && currentChar() !== "\"") {
          const quoted = advance();
          const next = currentChar();
          if (quoted === "\\" && next !== undefined) {
            const decoded = decodeDoubleQuotedEscape(next);
            if (decoded !== null) {
              advance();
              parsedValue += decoded;
              continue;
            }
          }
          parsedValue += quoted;
        }
        if (currentChar() === "\"") {
          advance();
        }
        continue;
      }

      parsedValue += advance();
    }

    tokens.push({
      value: parsedValue,
      lexeme: source.slice(start, index),
      start,
      end: index
    });
  }

  return tokens;
}

/**
 * Values following each occurrence of `option`. An occurrence whose previous
 * word is `guard` belongs to a pass-through flag (`-Xlinker -filelist`) and
 * is skipped.
 */
export function findOptionValues(
  tokens: readonly ArgumentToken[],
  option: string,
  guard?: string
): string[] {
  const values: string[] = [];

  for (let index = 0; index < tokens.length - 1; index += 1) {
    if (tokens[index].value !== option) {
      continue;
    }

    if (guard !== undefined && index > 0 && tokens[index - 1].value === guard) {
      continue;
    }

    values.push(tokens[index + 1].value);
  }

  return values;
}

export function findOptionValue(
  tokens: readonly ArgumentToken[],
  option: string,
  guard?: string
): string | null {
  return findOptionValues(tokens, option, guard)[0] ?? null;
}
