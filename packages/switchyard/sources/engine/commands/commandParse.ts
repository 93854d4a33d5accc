export type ParsedCommand = {
    token: string;
    args: string;
};

/**
 * Splits chat text into a lowercase command token and the raw argument string.
 * Returns null for blank text.
 */
export function commandParse(text: string): ParsedCommand | null {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
        return null;
    }
    const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(trimmed);
    if (!match?.[1]) {
        return null;
    }
    return {
        token: match[1].toLowerCase(),
        args: (match[2] ?? "").trim()
    };
}
