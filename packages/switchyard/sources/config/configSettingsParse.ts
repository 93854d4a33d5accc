import { z } from "zod";

const positiveInt = z.number().int().positive();

const matrixSettings = z
    .object({
        homeserverUrl: z.string().url(),
        userId: z.string().regex(/^@[^:\s]+:\S+$/, "Expected a Matrix user id like @bot:example.org"),
        accessToken: z.string().min(1),
        deviceId: z.string().min(1).optional(),
        defaultRoomId: z.string().min(1).optional(),
        auditRoomId: z.string().min(1).optional(),
        autoJoin: z.boolean().optional(),
        greeting: z.string().optional()
    })
    .passthrough();

export const settingsSchema = z
    .object({
        matrix: matrixSettings,
        webhook: z
            .object({
                enabled: z.boolean().optional(),
                host: z.string().min(1).optional(),
                port: z.number().int().min(0).max(65_535).optional(),
                discordToken: z.string().min(1).optional()
            })
            .passthrough()
            .optional(),
        dispatcher: z
            .object({
                queueCapacity: positiveInt.optional(),
                sendAttempts: positiveInt.optional(),
                sendBackoffMs: z.number().int().min(0).optional(),
                shutdownGraceMs: z.number().int().min(0).optional(),
                partDelay: z.boolean().optional(),
                commandPrefix: z.string().min(1).optional(),
                auditCommands: z.boolean().optional()
            })
            .passthrough()
            .optional(),
        ai: z
            .object({
                defaultTrigger: z.string().min(1).optional(),
                defaultModel: z.string().min(1).optional(),
                timeoutMs: positiveInt.optional(),
                endpoint: z.string().url().optional()
            })
            .passthrough()
            .optional(),
        downloads: z
            .object({
                pollIntervalMs: positiveInt.optional(),
                maxAgeMs: positiveInt.optional(),
                endpoint: z.string().url().optional()
            })
            .passthrough()
            .optional(),
        commands: z
            .object({
                scriptTimeoutMs: positiveInt.optional(),
                outputLimit: positiveInt.optional()
            })
            .passthrough()
            .optional(),
        loginMonitor: z
            .object({
                enabled: z.boolean().optional(),
                path: z.string().min(1).optional(),
                intervalMs: positiveInt.optional()
            })
            .passthrough()
            .optional(),
        paths: z
            .object({
                commands: z.string().min(1).optional(),
                users: z.string().min(1).optional(),
                sessions: z.string().min(1).optional(),
                downloads: z.string().min(1).optional()
            })
            .passthrough()
            .optional()
    })
    .passthrough();

/**
 * Parses raw settings data into validated settings.
 * Expects: raw is JSON-compatible; throws ZodError on mismatch.
 */
export function configSettingsParse(raw: unknown): z.infer<typeof settingsSchema> {
    return settingsSchema.parse(raw);
}
