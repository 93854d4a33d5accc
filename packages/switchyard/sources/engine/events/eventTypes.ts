import type { DownloadJob } from "../downloads/downloadTypes.js";

export type Destination = { type: "room"; roomId: string } | { type: "user"; userId: string };

export type EventSource = "matrix" | "webhook" | "downloads" | "login-monitor" | "commands";

export type SecuritySeverity = "info" | "warning" | "critical";

export type SecurityEventKind =
    | "ssh_login"
    | "ssh_failed"
    | "sudo_command"
    | "console_login"
    | "permission_denied"
    | "webhook_token_rejected"
    | "command_executed";

export type SecurityDetail = {
    label: string;
    value: string;
};

export type SecurityEventPayload = {
    kind: SecurityEventKind;
    severity: SecuritySeverity;
    title: string;
    details: readonly SecurityDetail[];
};

export type DiscordEmbed = {
    title?: string;
    description?: string;
};

type EventBase<TType extends string, TPayload> = {
    id: string;
    type: TType;
    source: EventSource;
    /** null routes to the default room. */
    target: Destination | null;
    payload: TPayload;
    receivedAt: number;
};

export type ChatMessageEvent = EventBase<"chat-message", { roomId: string; senderId: string; text: string }>;
export type WebhookMessageEvent = EventBase<"webhook-message", { text: string }>;
export type WebhookNotifyEvent = EventBase<"webhook-notify", { text: string; kind: "log" | "notify" }>;
export type WebhookDiscordEvent = EventBase<
    "webhook-discord-compat",
    { targetId: string; content: string; username: string | null; embeds: readonly DiscordEmbed[] }
>;
export type JobStatusEvent = EventBase<"job-status-change", { job: DownloadJob }>;
export type SecurityEvent = EventBase<"security-event", SecurityEventPayload>;
export type RoomGreetingEvent = EventBase<"room-greeting", { roomId: string; text: string }>;

export type InboundEvent =
    | ChatMessageEvent
    | WebhookMessageEvent
    | WebhookNotifyEvent
    | WebhookDiscordEvent
    | JobStatusEvent
    | SecurityEvent
    | RoomGreetingEvent;

type DraftOf<T> = T extends InboundEvent ? Omit<T, "id" | "receivedAt"> : never;

export type InboundEventDraft = DraftOf<InboundEvent>;
