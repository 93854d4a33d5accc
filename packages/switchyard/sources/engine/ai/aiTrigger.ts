import { getLogger } from "../../log.js";
import type { SessionStore } from "../sessions/sessionStore.js";
import type { Session } from "../sessions/sessionTypes.js";
import { AiBackendError, type GeminiClient } from "./geminiClient.js";

const logger = getLogger("ai.trigger");

const PROMPT_ALIAS = "!prompt";
const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

export type AiTriggerHandlerOptions = {
    sessions: Pick<SessionStore, "ensure" | "withUser">;
    client: Pick<GeminiClient, "generate">;
    defaultTrigger: string;
    defaultModel: string;
};

type TriggerMatch = {
    name: string;
    message: string;
};

/**
 * Answers chat messages that mention one of the user's AI triggers.
 */
export class AiTriggerHandler {
    private readonly sessions: Pick<SessionStore, "ensure" | "withUser">;
    private readonly client: Pick<GeminiClient, "generate">;
    private readonly defaultTrigger: string;
    private readonly defaultModel: string;

    constructor(options: AiTriggerHandlerOptions) {
        this.sessions = options.sessions;
        this.client = options.client;
        this.defaultTrigger = options.defaultTrigger.toLowerCase();
        this.defaultModel = options.defaultModel;
    }

    /**
     * Returns the reply for text, or null when AI does not apply to this user or message.
     * Expects: caller is not already inside sessions.withUser for this user.
     */
    async maybeRespond(userId: string, text: string): Promise<string | null> {
        const session = this.sessions.ensure(userId);
        if (!session.aiEnabled) {
            return null;
        }
        const match = this.triggerMatch(session, text);
        if (!match) {
            return null;
        }

        const trigger = session.triggers[match.name];
        if (!trigger) {
            return `⚠️ Trigger '${match.name}' is not configured for your user.`;
        }
        const apiKey = trigger.apiKey ?? session.apiKey;
        if (!apiKey) {
            return `⚠️ AI is enabled but no valid API key is configured for trigger '${match.name}'. Please contact the administrator.`;
        }
        if (match.message.length === 0) {
            return null;
        }

        return this.sessions.withUser(userId, async (handle) => {
            const history = trigger.maxHistory > 0 ? handle.session.history.slice(-trigger.maxHistory) : [];
            const model = trigger.model ?? this.defaultModel;
            logger.info({ userId, trigger: match.name, model, history: history.length }, "execute: AI request");
            try {
                const reply = await this.client.generate({
                    apiKey,
                    model,
                    systemPrompt: trigger.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
                    history: history.map((entry) => ({ role: entry.role, text: entry.text })),
                    message: match.message
                });
                handle.historyAppend([
                    { role: "user", text: match.message },
                    { role: "assistant", text: reply }
                ]);
                handle.usageIncrement("aiRequests");
                return reply;
            } catch (error) {
                logger.warn({ userId, trigger: match.name, error }, "error: AI request failed");
                return aiFailureText(error);
            }
        });
    }

    private triggerMatch(session: Session, text: string): TriggerMatch | null {
        const lowered = text.toLowerCase();
        if (lowered.startsWith(`${PROMPT_ALIAS} `)) {
            const name = Object.hasOwn(session.triggers, PROMPT_ALIAS) ? PROMPT_ALIAS : this.defaultTrigger;
            return { name, message: text.slice(PROMPT_ALIAS.length).trim() };
        }
        const configured = Object.keys(session.triggers).filter((name) => !name.startsWith("!"));
        const names = configured.length > 0 ? configured : [this.defaultTrigger];
        const name = names.find((candidate) => lowered.includes(candidate.toLowerCase()));
        return name ? { name, message: text.trim() } : null;
    }
}

export function aiFailureText(error: unknown): string {
    if (error instanceof AiBackendError && error.kind === "timeout") {
        return "⏱️ The AI took too long to answer. Please try a simpler question.";
    }
    return `❌ Error generating AI response: ${error instanceof Error ? error.message : String(error)}`;
}
