import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
    environment: string;
};

const DEFAULT_REDACT = [
    "token",
    "password",
    "secret",
    "apiKey",
    "accessToken",
    "*.token",
    "*.password",
    "*.secret",
    "*.apiKey",
    "*.accessToken"
];

const MODULE_WIDTH = 20;
const PRETTY_RESERVED_FIELDS = new Set([
    "pid",
    "hostname",
    "level",
    "time",
    "__time",
    "__level",
    "service",
    "environment",
    "module",
    "msg"
]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("SWITCHYARD_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination =
        overrides.destination ??
        envValue("SWITCHYARD_LOG_DEST") ??
        envValue("LOG_DEST") ??
        (process.stdout.isTTY ? "stderr" : "stdout");
    const forceJson = parseBooleanFlag(envValue("SWITCHYARD_LOG_JSON")) ?? parseBooleanFlag(envValue("LOG_JSON")) ?? false;
    let format =
        overrides.format ??
        parseFormat(envValue("SWITCHYARD_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        redact: overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("SWITCHYARD_LOG_REDACT")),
        service: overrides.service ?? envValue("SWITCHYARD_LOG_SERVICE") ?? "switchyard",
        environment: overrides.environment ?? envValue("NODE_ENV") ?? "development"
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: true,
                translateTime: false,
                ignore: "pid,hostname,level,service,environment,module",
                hideObject: true,
                levelKey: "__level",
                timestampKey: "__time",
                messageFormat: formatPrettyMessage,
                singleLine: false,
                destination: config.destination === "stderr" ? 2 : 1
            });
            return pino(options, prettyStream);
        }
    }

    const destination = resolveDestination(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders one log record as `[HH:MM:SS] [module] message key=value`.
 * Expects: log is the raw record pino-pretty hands to messageFormat.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = formatLogTime(log.time ?? Date.now());
    const module = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const label = `[${module.length > MODULE_WIDTH ? module.slice(0, MODULE_WIDTH) : module.padEnd(MODULE_WIDTH, " ")}]`;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details = formatPrettyDetails(log, messageKey);
    const content = [label, message, details].filter((part) => part.length > 0).join(" ");
    return `[${time}] ${content}`;
}

function formatPrettyDetails(log: Record<string, unknown>, messageKey: string): string {
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatPrettyValue(value)}`);
    }
    return details.join(" ");
}

function formatPrettyValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (value instanceof Error) {
        return quoteIfNeeded(value.message);
    }
    if (typeof value === "object") {
        const record = value as Record<string, unknown>;
        if (typeof record.message === "string" && (typeof record.type === "string" || typeof record.stack === "string")) {
            return quoteIfNeeded(record.message);
        }
        try {
            return quoteIfNeeded(JSON.stringify(value));
        } catch {
            return quoteIfNeeded(String(value));
        }
    }
    return quoteIfNeeded(String(value));
}

function quoteIfNeeded(value: string): string {
    const MAX_LENGTH = 180;
    const truncated = value.length > MAX_LENGTH ? `${value.slice(0, MAX_LENGTH)}...` : value;
    if (truncated.length === 0) {
        return '""';
    }
    return /[=\s]/.test(truncated) ? JSON.stringify(truncated) : truncated;
}

function formatLogTime(value: unknown): string {
    let date = typeof value === "number" || typeof value === "string" ? new Date(value) : new Date();
    if (Number.isNaN(date.getTime())) {
        date = new Date();
    }
    return [date.getHours(), date.getMinutes(), date.getSeconds()]
        .map((part) => String(part).padStart(2, "0"))
        .join(":");
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    return normalized === "pretty" || normalized === "json" ? normalized : null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
    }
    if (["0", "false", "no", "off"].includes(normalized)) {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value && value.length > 0 ? value : null;
}

function mergeRedactList(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }
    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
