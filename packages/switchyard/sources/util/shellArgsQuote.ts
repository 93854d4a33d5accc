/**
 * Splits free-form user text on whitespace and single-quotes every word for `/bin/sh -c`.
 * Expects: text comes from an untrusted chat message; no shell syntax survives quoting.
 */
export function shellArgsQuote(text: string): string {
    return text
        .split(/\s+/)
        .filter((word) => word.length > 0)
        .map((word) => `'${word.replace(/'/g, `'"'"'`)}'`)
        .join(" ");
}
