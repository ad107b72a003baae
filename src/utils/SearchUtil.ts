/**
 * Case insensitive substring search through SQL `LIKE`.
 *
 * Wildcards of the searched text are escaped with a backslash, so every
 * condition built on {@link contains} must declare `ESCAPE '\'`.
 */
export namespace SearchUtil {
  export const ESCAPE = "ESCAPE '\\'";

  export const contains = (value: string): string =>
    `%${value.toLowerCase().replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}
