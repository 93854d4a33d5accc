import { getLogger } from "../../log.js";
import type { SecurityEventPayload } from "../events/eventTypes.js";
import type { ConfigRegistry } from "../registry/configRegistry.js";
import type { CommandDefinition } from "../registry/registryTypes.js";
import { commandOutputFormat } from "./commandOutputFormat.js";
import { commandParse } from "./commandParse.js";
import { commandScriptRun } from "./commandScriptRun.js";
import type { BuiltinHandlers, CommandContext, CommandResult } from "./commandTypes.js";

const logger = getLogger("commands.router");

export type CommandRouterRegistry = Pick<ConfigRegistry, "command" | "isAllowed">;

export type CommandRouterOptions = {
    registry: CommandRouterRegistry;
    handlers: BuiltinHandlers;
    scriptTimeoutMs: number;
    outputLimit: number;
    /** Working directory for scripts; relative script paths resolve here. */
    scriptCwd: string;
    onSecurityEvent: (payload: SecurityEventPayload) => void;
    /** Emit an info security event for every executed command. */
    auditCommands?: boolean;
};

/**
 * Resolves a chat command against the live command table, checks the allow-list and runs it.
 */
export class CommandRouter {
    private readonly registry: CommandRouterRegistry;
    private readonly handlers: BuiltinHandlers;
    private readonly scriptTimeoutMs: number;
    private readonly outputLimit: number;
    private readonly scriptCwd: string;
    private readonly onSecurityEvent: (payload: SecurityEventPayload) => void;
    private readonly auditCommands: boolean;

    constructor(options: CommandRouterOptions) {
        this.registry = options.registry;
        this.handlers = options.handlers;
        this.scriptTimeoutMs = options.scriptTimeoutMs;
        this.outputLimit = options.outputLimit;
        this.scriptCwd = options.scriptCwd;
        this.onSecurityEvent = options.onSecurityEvent;
        this.auditCommands = options.auditCommands ?? false;
    }

    /**
     * True when the first token of text names a command in the current table.
     */
    matches(text: string): boolean {
        const parsed = commandParse(text);
        return parsed !== null && this.registry.command(parsed.token) !== null;
    }

    async route(userId: string, text: string, context: Partial<Omit<CommandContext, "userId">> = {}): Promise<CommandResult> {
        const parsed = commandParse(text);
        if (!parsed) {
            return { type: "not_found", token: "" };
        }
        const { token, args } = parsed;
        const definition = this.registry.command(token);
        if (!definition) {
            logger.debug({ userId, token }, "skip: Unknown command");
            return { type: "not_found", token };
        }

        if (!this.registry.isAllowed(userId, token)) {
            logger.warn({ userId, token }, "event: Command permission denied");
            this.onSecurityEvent({
                kind: "permission_denied",
                severity: "warning",
                title: "Command Permission Denied",
                details: [
                    { label: "User", value: userId },
                    { label: "Command", value: token },
                    { label: "Room", value: context.roomId ?? "direct" }
                ]
            });
            return { type: "permission_denied", token, text: `You don't have permission to use ${token}` };
        }

        logger.info({ userId, token, kind: definition.kind }, "execute: Running command");
        const result = await this.execute(definition, {
            userId,
            roomId: context.roomId ?? null,
            token,
            args
        });
        if (this.auditCommands && result.type === "ok") {
            this.onSecurityEvent({
                kind: "command_executed",
                severity: "info",
                title: "Command Executed",
                details: [
                    { label: "User", value: userId },
                    { label: "Command", value: args.length > 0 ? `${token} ${args}` : token }
                ]
            });
        }
        return result;
    }

    private async execute(
        definition: CommandDefinition,
        input: CommandContext & { token: string; args: string }
    ): Promise<CommandResult> {
        if (definition.kind === "builtin") {
            if (!definition.builtin) {
                return { type: "config_parse_error", token: input.token, text: "Error: builtin command has no kind" };
            }
            return this.handlers[definition.builtin]({ ...input, definition });
        }

        if (!definition.script) {
            return { type: "config_parse_error", token: input.token, text: "Error: No script configured for this command" };
        }
        try {
            const run = await commandScriptRun(definition.script, input.args, {
                timeoutMs: this.scriptTimeoutMs,
                cwd: this.scriptCwd
            });
            if (run.type === "timeout") {
                logger.warn({ token: input.token, pid: run.pid, timeoutMs: this.scriptTimeoutMs }, "error: Script timed out");
                return {
                    type: "execution_timeout",
                    token: input.token,
                    timeoutMs: this.scriptTimeoutMs,
                    text: `Error: Command execution timed out (${this.scriptTimeoutMs / 1000}s)`
                };
            }
            return { type: "ok", token: input.token, text: commandOutputFormat(run.stdout, run.stderr, this.outputLimit) };
        } catch (error) {
            logger.warn({ token: input.token, error }, "error: Script failed to start");
            return {
                type: "backend_unavailable",
                token: input.token,
                text: `Error executing command: ${error instanceof Error ? error.message : String(error)}`
            };
        }
    }
}

/**
 * Chat reply for a routed command; null when nothing should be sent.
 */
export function commandResultText(result: CommandResult): string | null {
    return result.type === "not_found" ? null : result.text;
}
