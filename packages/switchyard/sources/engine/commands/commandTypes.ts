import type { BuiltinKind, CommandDefinition } from "../registry/registryTypes.js";

export type CommandContext = {
    userId: string;
    /** Room the command was typed in; null when it did not come from a room. */
    roomId: string | null;
};

export type CommandResult =
    | { type: "ok"; token: string; text: string }
    | { type: "not_found"; token: string }
    | { type: "permission_denied"; token: string; text: string }
    | { type: "execution_timeout"; token: string; timeoutMs: number; text: string }
    | { type: "backend_unavailable"; token: string; text: string }
    | { type: "config_parse_error"; token: string; text: string };

export type BuiltinInput = CommandContext & {
    token: string;
    args: string;
    definition: CommandDefinition;
};

export type BuiltinHandler = (input: BuiltinInput) => Promise<CommandResult>;

export type BuiltinHandlers = Readonly<Record<BuiltinKind, BuiltinHandler>>;
