const ASCII_ALPHANUMERIC = /^[A-Za-z0-9]$/;
const SEPARATOR = /^[\p{White_Space}\-_]$/u;

export const UNKNOWN_TOKEN = "unknown";

/**
 * Reduces a tag value to a token that is safe inside a filename.
 * Separators (whitespace, `-`, `_`) each become `_`; every other
 * non-alphanumeric character is dropped.
 */
export function sanitizeForFilename(value: string): string {
    let out = "";
    for (const char of value) {
        if (ASCII_ALPHANUMERIC.test(char)) {
            out += char;
        } else if (SEPARATOR.test(char)) {
            out += "_";
        }
    }
    return out.length > 0 ? out : UNKNOWN_TOKEN;
}
