import type { ZodError } from "zod";

/**
 * Flattens zod issues into one `path: message` list for operator-facing errors.
 */
export function zodIssuesFormat(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
}
