/**
 * Characters that are illegal in file names on at least one common platform,
 * and in spreadsheet sheet names.
 */
const ILLEGAL_NAME_CHARS = /[\\/*?:"<>|]/g;

/**
 * Make an arbitrary string safe to use as a file or sheet name.
 * Each illegal character becomes `_`, so the length is unchanged.
 *
 * "a/b:c" → "a_b_c"
 */
export function sanitizeFilename(name: string): string {
    return name.replace(ILLEGAL_NAME_CHARS, '_');
}
