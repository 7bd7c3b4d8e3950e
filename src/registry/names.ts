/**
 * Argument name grammar
 *
 * Positional:  a word character, then word characters or hyphens
 * Flag:        `-` and one letter or underscore (`-f`)
 * Long option: `--name` or `-name`, the name at least two characters long and
 *              starting with a letter or underscore
 * Inline:      `--name=value`
 */

const POSITIONAL_NAME = /^\w[\w-]*$/;
const FLAG_NAME = /^-([A-Za-z_])$/;
const LONG_OPTION_NAME = /^-{1,2}([A-Za-z_][\w-]+)$/;
const INLINE_OPTION = /^--([A-Za-z_][\w-]+)=([\s\S]*)$/;

export function isValidPositionalName(name: string): boolean {
  return POSITIONAL_NAME.test(name);
}

/**
 * Strip the dash from a flag token
 * @returns the flag character, or null if the token is not a flag
 */
export function parseFlagName(token: string): string | null {
  const match = FLAG_NAME.exec(token);
  return match ? match[1] : null;
}

/**
 * Strip the leading dashes from a long option token
 * @returns the reference name, or null if the token is not a long option
 */
export function parseLongOptionName(token: string): string | null {
  const match = LONG_OPTION_NAME.exec(token);
  if (!match) {
    return null;
  }
  return match[1];
}

/**
 * Split `--name=value` into its parts
 */
export function parseInlineOption(token: string): { name: string; value: string } | null {
  const match = INLINE_OPTION.exec(token);
  return match ? { name: match[1], value: match[2] } : null;
}

/**
 * Whether a token would be read as an option reference rather than a value
 */
export function looksLikeOption(token: string): boolean {
  return (
    parseFlagName(token) !== null ||
    parseLongOptionName(token) !== null ||
    parseInlineOption(token) !== null
  );
}
