import { z } from "zod";

import { ConfigParseError, type TriggerConfig, type UserEntry, type UserTable } from "./registryTypes.js";
import { zodIssuesFormat } from "./zodIssuesFormat.js";

export const DEFAULT_MAX_HISTORY = 10;

const triggerSchema = z
    .object({
        api_key: z.string().nullable().optional(),
        model: z.string().min(1).nullable().optional(),
        system_prompt: z.string().nullable().optional(),
        max_history: z.number().int().min(0).optional()
    })
    .passthrough();

const userSchema = z
    .object({
        ai_enabled: z.boolean().optional(),
        triggers: z.record(triggerSchema).optional(),
        api_key: z.string().nullable().optional(),
        realdebrid_api_key: z.string().nullable().optional()
    })
    .passthrough();

const userFileSchema = z.object({
    users: z.record(userSchema)
});

/**
 * Validates a users.json document; trigger names are matched case-insensitively so they are lowercased here.
 * Expects: filePath is only used for error reporting.
 */
export function userTableParse(raw: unknown, filePath: string): UserTable {
    const parsed = userFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigParseError(filePath, zodIssuesFormat(parsed.error));
    }

    const table: Record<string, UserEntry> = {};
    for (const [userId, entry] of Object.entries(parsed.data.users)) {
        const triggers: Record<string, TriggerConfig> = {};
        for (const [name, trigger] of Object.entries(entry.triggers ?? {})) {
            const key = name.trim().toLowerCase();
            if (key.length === 0) {
                throw new ConfigParseError(filePath, `users.${userId}.triggers: empty trigger name`);
            }
            triggers[key] = {
                apiKey: blankToNull(trigger.api_key),
                model: trigger.model ?? null,
                systemPrompt: blankToNull(trigger.system_prompt),
                maxHistory: trigger.max_history ?? DEFAULT_MAX_HISTORY
            };
        }
        table[userId] = {
            userId,
            aiEnabled: entry.ai_enabled ?? false,
            triggers,
            apiKey: blankToNull(entry.api_key),
            debridApiKey: blankToNull(entry.realdebrid_api_key)
        };
    }
    return table;
}

function blankToNull(value: string | null | undefined): string | null {
    const trimmed = value?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : null;
}
