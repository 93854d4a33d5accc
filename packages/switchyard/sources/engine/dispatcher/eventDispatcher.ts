import { matrixUserIdIs } from "../../connectors/matrix/matrixUserIdIs.js";
import { getLogger } from "../../log.js";
import { KeyedLock } from "../../util/keyedLock.js";
import { sleep as sleepDefault } from "../../util/sleep.js";
import type { AiTriggerHandler } from "../ai/aiTrigger.js";
import { type CommandRouter, commandResultText } from "../commands/commandRouter.js";
import { downloadMessageBuild } from "../downloads/downloadMessageBuild.js";
import type { DownloadTracker } from "../downloads/downloadTracker.js";
import { downloadStateIsTerminal } from "../downloads/downloadTypes.js";
import type {
    ChatMessageEvent,
    Destination,
    InboundEvent,
    JobStatusEvent,
    SecurityEvent,
    WebhookDiscordEvent
} from "../events/eventTypes.js";
import type { ConfigRegistry } from "../registry/configRegistry.js";
import { securityAlertFormat } from "../security/securityAlertFormat.js";
import type { SessionStore } from "../sessions/sessionStore.js";
import type { ChatTransport } from "../transport/transportTypes.js";
import { webhookDiscordFormat } from "../webhook/webhookFormat.js";
import { DestinationQueues } from "./destinationQueues.js";
import { EventQueue } from "./eventQueue.js";
import { messageHardSplit, messageSplit } from "./messageSplit.js";

const logger = getLogger("dispatcher");

export type EventDispatcherOptions = {
    transport: Pick<ChatTransport, "sendMessage" | "directRoomResolve" | "maxMessageLength">;
    registry: Pick<ConfigRegistry, "reloadIfChanged">;
    ai: Pick<AiTriggerHandler, "maybeRespond">;
    router: Pick<CommandRouter, "matches" | "route">;
    downloads: Pick<DownloadTracker, "acknowledge" | "release">;
    sessions: Pick<SessionStore, "usageIncrement">;
    defaultRoomId: string | null;
    auditRoomId: string | null;
    queueCapacity: number;
    sendAttempts: number;
    sendBackoffMs: number;
    partDelay: boolean;
    commandPrefix: string;
    render: (text: string) => string | null;
    now?: () => Date;
    sleep?: (delayMs: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Single consumer of every inbound event: chat messages, webhooks, download updates and security alerts.
 * Replies go out through per-destination ordered send queues.
 */
export class EventDispatcher {
    private readonly options: EventDispatcherOptions;
    private readonly queue: EventQueue<InboundEvent>;
    private readonly sends: DestinationQueues;
    private readonly chatLocks = new KeyedLock();
    private readonly chatTasks = new Set<Promise<void>>();
    private readonly now: () => Date;
    private readonly sleep: (delayMs: number, signal?: AbortSignal) => Promise<void>;
    private loop: Promise<void> | null = null;
    private abandoned = false;

    constructor(options: EventDispatcherOptions) {
        this.options = options;
        this.queue = new EventQueue<InboundEvent>(options.queueCapacity);
        this.now = options.now ?? (() => new Date());
        this.sleep = options.sleep ?? sleepDefault;
        this.sends = new DestinationQueues({
            transport: options.transport,
            sendAttempts: options.sendAttempts,
            sendBackoffMs: options.sendBackoffMs,
            render: options.render,
            sleep: this.sleep
        });
    }

    /**
     * Enqueues an event; waits only while the queue is full.
     */
    async submit(event: InboundEvent): Promise<void> {
        await this.queue.push(event);
        logger.debug({ eventId: event.id, type: event.type, source: event.source }, "receive: Event queued");
    }

    start(): void {
        if (this.loop) {
            return;
        }
        this.loop = this.run();
        logger.info({ queueCapacity: this.options.queueCapacity }, "start: Dispatcher started");
    }

    /**
     * Consumes events until the queue is closed and empty.
     */
    async run(): Promise<void> {
        for (let event = await this.queue.shift(); event; event = await this.queue.shift()) {
            if (this.abandoned) {
                break;
            }
            try {
                await this.dispatch(event);
            } catch (error) {
                logger.warn({ eventId: event.id, type: event.type, error }, "error: Event handling failed");
            }
        }
    }

    /**
     * Stops intake, processes what is queued until graceMs passes, then abandons the rest.
     */
    async stop(graceMs: number): Promise<void> {
        const deadline = Date.now() + graceMs;
        const remaining = () => Math.max(0, deadline - Date.now());
        this.queue.close();
        logger.info({ queued: this.queue.size, graceMs }, "stop: Draining dispatcher");

        const drained =
            (await this.within(remaining(), this.loop ?? Promise.resolve())) &&
            (await this.within(remaining(), this.chatTasksSettled())) &&
            (await this.sends.drain(remaining()));
        if (drained) {
            logger.info("stop: Dispatcher drained");
            return;
        }

        this.abandoned = true;
        const events = this.queue.drainRemaining();
        const sends = this.sends.abandon();
        logger.warn(
            { events: events.length, sends, chatTasks: this.chatTasks.size },
            "stop: Grace period over, abandoning pending work"
        );
    }

    private async dispatch(event: InboundEvent): Promise<void> {
        switch (event.type) {
            case "chat-message":
                this.chatSchedule(event);
                return;
            case "webhook-message":
                this.deliverHard(event.target ?? this.defaultRoom(), event.payload.text, event);
                return;
            case "webhook-notify":
                this.deliverHard(this.defaultRoom(), event.payload.text, event);
                return;
            case "webhook-discord-compat":
                this.discordHandle(event);
                return;
            case "job-status-change":
                this.jobHandle(event);
                return;
            case "security-event":
                this.securityHandle(event);
                return;
            case "room-greeting":
                this.deliverHard({ type: "room", roomId: event.payload.roomId }, event.payload.text, event);
                return;
        }
    }

    // Chat handling may wait on AI or scripts; it runs beside the loop, serialized per room and sender.
    private chatSchedule(event: ChatMessageEvent): void {
        const key = `${event.payload.roomId}\u0000${event.payload.senderId}`;
        const task = this.chatLocks
            .inLock(key, () => this.chatHandle(event))
            .catch((error: unknown) => {
                logger.warn({ eventId: event.id, roomId: event.payload.roomId, error }, "error: Chat message handling failed");
            })
            .finally(() => {
                this.chatTasks.delete(task);
            });
        this.chatTasks.add(task);
    }

    private async chatHandle(event: ChatMessageEvent): Promise<void> {
        if (this.abandoned) {
            return;
        }
        const { roomId, senderId, text } = event.payload;
        try {
            await this.options.registry.reloadIfChanged();
        } catch (error) {
            logger.warn({ error }, "error: Config change check failed");
        }

        const aiReply = await this.options.ai.maybeRespond(senderId, text);
        if (aiReply !== null) {
            this.reply(roomId, aiReply, this.options.partDelay);
            return;
        }

        if (!text.trimStart().startsWith(this.options.commandPrefix) && !this.options.router.matches(text)) {
            logger.debug({ eventId: event.id, roomId }, "skip: Chat message needs no reply");
            return;
        }
        const result = await this.options.router.route(senderId, text, { roomId });
        const reply = commandResultText(result);
        if (reply !== null) {
            this.reply(roomId, reply, false);
        }
        if (result.type === "ok") {
            try {
                await this.options.sessions.usageIncrement(senderId, "commands");
            } catch (error) {
                logger.warn({ userId: senderId, error }, "error: Usage counter not saved");
            }
        }
    }

    private reply(roomId: string, text: string, partDelay: boolean): void {
        this.sends.enqueue({
            destination: { type: "room", roomId },
            parts: messageSplit(text, this.options.transport.maxMessageLength),
            partDelay
        });
    }

    private discordHandle(event: WebhookDiscordEvent): void {
        const targetId = event.payload.targetId;
        const destination: Destination | null = matrixUserIdIs(targetId)
            ? { type: "user", userId: targetId }
            : this.defaultRoom();
        this.deliverHard(destination, webhookDiscordFormat(event.payload), event);
    }

    private jobHandle(event: JobStatusEvent): void {
        const job = event.payload.job;
        if (!downloadStateIsTerminal(job.state)) {
            logger.debug({ jobId: job.id, state: job.state }, "skip: Job is not terminal");
            return;
        }
        const destination: Destination = job.roomId ? { type: "room", roomId: job.roomId } : { type: "user", userId: job.ownerId };
        const downloads = this.options.downloads;
        this.sends.enqueue({
            destination,
            parts: messageHardSplit(downloadMessageBuild(job), this.options.transport.maxMessageLength),
            partDelay: false,
            onDelivered: () => downloads.acknowledge(job.id),
            onDropped: () => downloads.release(job.id)
        });
    }

    private securityHandle(event: SecurityEvent): void {
        const destination: Destination | null = this.options.auditRoomId
            ? { type: "room", roomId: this.options.auditRoomId }
            : this.defaultRoom();
        logger.info({ kind: event.payload.kind, severity: event.payload.severity }, "event: Security alert");
        this.deliverHard(destination, securityAlertFormat(event.payload, this.now()), event);
    }

    private deliverHard(destination: Destination | null, text: string, event: InboundEvent): void {
        if (!destination) {
            logger.warn({ eventId: event.id, type: event.type }, "skip: No destination and no default room configured");
            return;
        }
        this.sends.enqueue({
            destination,
            parts: messageHardSplit(text, this.options.transport.maxMessageLength),
            partDelay: false
        });
    }

    private defaultRoom(): Destination | null {
        return this.options.defaultRoomId ? { type: "room", roomId: this.options.defaultRoomId } : null;
    }

    private async chatTasksSettled(): Promise<void> {
        while (this.chatTasks.size > 0) {
            await Promise.all(this.chatTasks);
        }
    }

    private async within(timeoutMs: number, work: Promise<void>): Promise<boolean> {
        const timer = new AbortController();
        const done = work.then(() => true as const);
        const deadline = this.sleep(timeoutMs, timer.signal).then(() => false as const);
        const result = await Promise.race([done, deadline]);
        timer.abort();
        return result;
    }
}
