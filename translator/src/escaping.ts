/**
 * Quoting dialects for paths taken from a build log.
 *
 * A path plays one of three roles in the emitted Makefile and each role has
 * its own dialect:
 * - make target or prerequisite token: {@link makeTargetEscape}
 * - word inside a shell recipe: {@link shellEscape}
 * - text copied verbatim into a recipe: {@link dollarEscape}
 *
 * A path embedded in a recipe goes through {@link recipePath}, which applies
 * `shellEscape` and then `dollarEscape`. No other composition is used, and
 * no transform is applied twice to the same value.
 */

const MAKE_TARGET_SPECIAL_CHARACTERS = /[$& ]/g;
const SHELL_SPECIAL_CHARACTERS = /[()#&$ ]/g;
const DOLLAR = /\$/g;

// Replacer functions keep `$` in the output literal; a replacement string
// would read "$$" as a single dollar.
export function makeTargetEscape(path: string): string {
  return path.replace(MAKE_TARGET_SPECIAL_CHARACTERS, (character) =>
    character === "$" ? "$$" : `\\${character}`
  );
}

export function shellEscape(value: string): string {
  return value.replace(SHELL_SPECIAL_CHARACTERS, (character) => `\\${character}`);
}

export function dollarEscape(value: string): string {
  return value.replace(DOLLAR, () => "$$");
}

export function recipePath(path: string): string {
  return dollarEscape(shellEscape(path));
}

/** Reads a canonical target back as the filesystem path it names. */
export function unescapeMakeTarget(token: string): string {
  return token.replace(/\$\$|\\([& ])/g, (_match, escaped: string | undefined) =>
    escaped === undefined ? "$" : escaped
  );
}

/** Undoes backslash escaping as the build log writes it for paths. */
export function unescapeShell(token: string): string {
  return token.replace(/\\(.)/g, (_match, escaped: string) => escaped);
}
