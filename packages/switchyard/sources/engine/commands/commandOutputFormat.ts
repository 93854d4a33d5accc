export const EMPTY_OUTPUT_TEXT = "Command executed successfully (no output)";

/**
 * Merges script streams into one fenced block, truncated to limit characters.
 * The fence is longer than any backtick run in the output.
 */
export function commandOutputFormat(stdout: string, stderr: string, limit: number): string {
    let output = stdout;
    if (stderr.length > 0) {
        output += `\n[stderr]\n${stderr}`;
    }
    if (output.length === 0) {
        output = EMPTY_OUTPUT_TEXT;
    }
    if (output.length > limit) {
        output = `${output.slice(0, limit)}\n\n[Output truncated, ${output.length - limit} characters omitted]`;
    }
    const fence = "`".repeat(Math.max(3, backtickRunLongest(output) + 1));
    return `${fence}\n${output}\n${fence}`;
}

function backtickRunLongest(text: string): number {
    let longest = 0;
    for (const run of text.match(/`+/g) ?? []) {
        longest = Math.max(longest, run.length);
    }
    return longest;
}
