const FENCE = /^\s*(`{3,}|~{3,})/;

/**
 * Splits a reply into one part per paragraph; fenced code blocks stay in one part.
 * Parts longer than maxLength are cut on paragraph, line or space boundaries.
 * Expects: maxLength > 0.
 */
export function messageSplit(text: string, maxLength: number): string[] {
    const parts = paragraphsSplit(text).flatMap((paragraph) => messageHardSplit(paragraph, maxLength));
    return parts.length > 0 ? parts : [text];
}

/**
 * Cuts text into chunks of at most maxLength, preferring the last blank line, newline or space.
 */
export function messageHardSplit(text: string, maxLength: number): string[] {
    if (maxLength <= 0) {
        throw new Error("maxLength must be greater than 0");
    }
    if (text.length <= maxLength) {
        return [text];
    }

    const chunks: string[] = [];
    let remaining = text;
    while (remaining.length > maxLength) {
        const window = remaining.slice(0, maxLength);
        const cutIndex = breakIndexFind(window) || maxLength;
        chunks.push(remaining.slice(0, cutIndex));
        remaining = remaining.slice(cutIndex);
    }
    chunks.push(remaining);
    return chunks;
}

function paragraphsSplit(text: string): string[] {
    const paragraphs: string[] = [];
    let current: string[] = [];
    let fence: string | null = null;

    const flush = () => {
        const paragraph = current.join("\n").trim();
        if (paragraph.length > 0) {
            paragraphs.push(paragraph);
        }
        current = [];
    };

    for (const line of text.split("\n")) {
        const marker = FENCE.exec(line)?.[1] ?? null;
        if (marker && fence === null) {
            fence = marker;
            current.push(line);
            continue;
        }
        // Closing fence: same character, at least as long, no info string.
        if (marker && fence !== null && marker[0] === fence[0] && marker.length >= fence.length && line.trim() === marker) {
            fence = null;
            current.push(line);
            continue;
        }
        if (fence === null && line.trim().length === 0) {
            flush();
            continue;
        }
        current.push(line);
    }
    flush();
    return paragraphs;
}

function breakIndexFind(window: string): number {
    const separators = ["\n\n", "\n", " "];
    for (const separator of separators) {
        const index = window.lastIndexOf(separator);
        if (index > 0) {
            return index + separator.length;
        }
    }
    return 0;
}

/**
 * Pause before the part after this one: chars/50 seconds, clamped to 2..15 seconds.
 */
export function partDelayMs(part: string): number {
    return Math.round(Math.min(Math.max(part.length / 50, 2), 15) * 1000);
}
