import type { SecurityEventPayload, SecuritySeverity } from "../events/eventTypes.js";

const SEVERITY_MARKERS: Record<SecuritySeverity, string> = {
    info: "ℹ️",
    warning: "⚠️",
    critical: "🚨"
};

export function securityAlertFormat(payload: SecurityEventPayload, at: Date): string {
    const lines = [`${SEVERITY_MARKERS[payload.severity]} **${payload.title}**`];
    if (payload.details.length > 0) {
        lines.push(payload.details.map((detail) => `• **${detail.label}:** ${detail.value}`).join("\n"));
    }
    lines.push(`_Time: ${at.toISOString()}_`);
    return lines.join("\n\n");
}
