import { z } from "zod";

import { BUILTIN_KINDS, type BuiltinKind, type CommandDefinition, type CommandTable, ConfigParseError } from "./registryTypes.js";
import { zodIssuesFormat } from "./zodIssuesFormat.js";

const BUILTIN_ALIASES: Readonly<Record<string, BuiltinKind>> = {
    espacio: "disk_usage",
    disk: "disk_usage"
};

const commandEntrySchema = z
    .object({
        description: z.string().optional(),
        allowed_users: z.array(z.string().min(1)).optional(),
        type: z.enum(["builtin", "shell", "script"]),
        script: z.string().min(1).nullable().optional(),
        builtin: z.string().min(1).optional()
    })
    .passthrough();

const commandFileSchema = z.object({
    commands: z.record(commandEntrySchema)
});

/**
 * Validates a commands.json document into a command table keyed by lowercase token.
 * Expects: filePath is only used for error reporting; scripts stay operator-written shell command lines.
 */
export function commandTableParse(raw: unknown, filePath: string): CommandTable {
    const parsed = commandFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigParseError(filePath, zodIssuesFormat(parsed.error));
    }

    const table: Record<string, CommandDefinition> = {};
    const problems: string[] = [];
    for (const [rawToken, entry] of Object.entries(parsed.data.commands)) {
        const token = rawToken.trim().toLowerCase();
        if (token.length === 0 || /\s/.test(token)) {
            problems.push(`commands.${rawToken}: token must be a single word`);
            continue;
        }
        if (Object.hasOwn(table, token)) {
            problems.push(`commands.${rawToken}: duplicate token ${token}`);
            continue;
        }

        const base = {
            token,
            description: entry.description ?? "",
            allowedUsers: [...new Set(entry.allowed_users ?? [])]
        };
        if (entry.type === "builtin") {
            const builtin = builtinKindResolve(entry.builtin ?? token);
            if (!builtin) {
                problems.push(`commands.${rawToken}: unknown builtin ${entry.builtin ?? token}`);
                continue;
            }
            table[token] = { ...base, kind: "builtin", builtin, script: null };
            continue;
        }
        if (!entry.script) {
            problems.push(`commands.${rawToken}: script is required for ${entry.type} commands`);
            continue;
        }
        table[token] = {
            ...base,
            kind: "script",
            builtin: null,
            script: entry.script.trim()
        };
    }

    if (problems.length > 0) {
        throw new ConfigParseError(filePath, problems.join("; "));
    }
    return table;
}

/**
 * Maps `!magnet-list`, `magnet_list` or an alias like `espacio` to its builtin kind.
 */
export function builtinKindResolve(name: string): BuiltinKind | null {
    const normalized = name
        .trim()
        .toLowerCase()
        .replace(/^[^a-z0-9]+/, "")
        .replace(/-/g, "_");
    const alias = BUILTIN_ALIASES[normalized];
    if (alias) {
        return alias;
    }
    return BUILTIN_KINDS.find((kind) => kind === normalized) ?? null;
}
