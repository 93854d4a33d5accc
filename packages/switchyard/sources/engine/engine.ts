import os from "node:os";

import type { Config } from "../config/configTypes.js";
import { markdownToMatrixHtml } from "../connectors/matrix/markdownToMatrixHtml.js";
import { MatrixTransport } from "../connectors/matrix/matrixTransport.js";
import { getLogger } from "../log.js";
import { AiTriggerHandler } from "./ai/aiTrigger.js";
import { GeminiClient } from "./ai/geminiClient.js";
import { commandBuiltinsBuild } from "./commands/commandBuiltins.js";
import { CommandRouter } from "./commands/commandRouter.js";
import { magnetCommandsBuild } from "./commands/magnetCommands.js";
import { EventDispatcher } from "./dispatcher/eventDispatcher.js";
import { DebridClient } from "./downloads/debridClient.js";
import { DownloadTracker } from "./downloads/downloadTracker.js";
import { eventBuild, securityEventBuild } from "./events/eventBuild.js";
import type { EventSource, SecurityEventPayload } from "./events/eventTypes.js";
import { ConfigRegistry } from "./registry/configRegistry.js";
import { AuthLogMonitor } from "./security/authLogMonitor.js";
import { SessionStore } from "./sessions/sessionStore.js";
import type { ChatTransport, InboundChatMessage } from "./transport/transportTypes.js";
import { type WebhookServer, webhookServerStart } from "./webhook/webhookServer.js";

const logger = getLogger("engine");

export type EngineOptions = {
    config: Config;
    /** Defaults to a Matrix connection built from config.matrix. */
    transport?: ChatTransport;
    fetch?: typeof fetch;
};

/**
 * Wires producers (chat transport, webhook server, download poller, auth log monitor) into the dispatcher.
 */
export class Engine {
    readonly config: Config;
    readonly registry: ConfigRegistry;
    readonly sessions: SessionStore;
    readonly transport: ChatTransport;
    readonly downloads: DownloadTracker;
    readonly router: CommandRouter;
    readonly ai: AiTriggerHandler;
    readonly dispatcher: EventDispatcher;
    private readonly loginMonitor: AuthLogMonitor | null;
    private webhookServer: WebhookServer | null = null;
    private unsubscribers: Array<() => void> = [];
    private started = false;

    constructor(options: EngineOptions) {
        const config = options.config;
        this.config = config;
        this.registry = new ConfigRegistry({ commandsPath: config.paths.commands, usersPath: config.paths.users });
        this.sessions = new SessionStore({
            persistPath: config.paths.sessions,
            resolveUser: (userId) => this.registry.user(userId)
        });
        this.transport = options.transport ?? new MatrixTransport({ config: config.matrix });

        const debrid = new DebridClient({ endpoint: config.downloads.endpoint, fetch: options.fetch });
        this.downloads = new DownloadTracker({
            client: debrid,
            persistPath: config.paths.downloads,
            pollIntervalMs: config.downloads.pollIntervalMs,
            maxAgeMs: config.downloads.maxAgeMs,
            apiKeyResolve: (ownerId) => this.sessions.ensure(ownerId).debridApiKey,
            onTerminal: (job) =>
                this.dispatcher.submit(
                    eventBuild({ type: "job-status-change", source: "downloads", target: null, payload: { job } })
                )
        });

        const startedAt = Date.now();
        this.router = new CommandRouter({
            registry: this.registry,
            handlers: commandBuiltinsBuild({
                registry: this.registry,
                aiEnabled: (userId) => this.sessions.ensure(userId).aiEnabled,
                magnet: magnetCommandsBuild({ debrid, downloads: this.downloads, sessions: this.sessions }),
                startedAt,
                systemUptimeSeconds: () => os.uptime()
            }),
            scriptTimeoutMs: config.commands.scriptTimeoutMs,
            outputLimit: config.commands.outputLimit,
            scriptCwd: config.rootDir,
            onSecurityEvent: (payload) => this.securityReport("commands", payload),
            auditCommands: config.dispatcher.auditCommands
        });

        this.ai = new AiTriggerHandler({
            sessions: this.sessions,
            client: new GeminiClient({ endpoint: config.ai.endpoint, timeoutMs: config.ai.timeoutMs, fetch: options.fetch }),
            defaultTrigger: config.ai.defaultTrigger,
            defaultModel: config.ai.defaultModel
        });

        this.dispatcher = new EventDispatcher({
            transport: this.transport,
            registry: this.registry,
            ai: this.ai,
            router: this.router,
            downloads: this.downloads,
            sessions: this.sessions,
            defaultRoomId: config.matrix.defaultRoomId,
            auditRoomId: config.matrix.auditRoomId,
            queueCapacity: config.dispatcher.queueCapacity,
            sendAttempts: config.dispatcher.sendAttempts,
            sendBackoffMs: config.dispatcher.sendBackoffMs,
            partDelay: config.dispatcher.partDelay,
            commandPrefix: config.dispatcher.commandPrefix,
            render: (text) => markdownToMatrixHtml(text)
        });

        this.loginMonitor = config.loginMonitor.enabled
            ? new AuthLogMonitor({
                  path: config.loginMonitor.path,
                  intervalMs: config.loginMonitor.intervalMs,
                  onEvent: (payload) => this.dispatcher.submit(securityEventBuild("login-monitor", payload))
              })
            : null;
    }

    /**
     * Loads persisted state, then starts the dispatcher before any producer.
     * Throws when the command or user table cannot be parsed.
     */
    async start(): Promise<void> {
        if (this.started) {
            return;
        }
        this.started = true;
        const reload = await this.registry.load();
        if (!reload.ok) {
            throw reload.error;
        }
        this.unsubscribers.push(this.registry.onChange((snapshot) => this.sessions.syncUsers(snapshot.users)));
        const sessions = await this.sessions.load();
        const jobs = await this.downloads.load();
        logger.info({ commands: reload.commandCount, users: reload.userCount, sessions, jobs }, "start: State loaded");

        this.dispatcher.start();
        this.unsubscribers.push(this.transport.onMessage((message) => this.chatSubmit(message)));
        const greeting = this.config.matrix.greeting;
        if (greeting) {
            this.unsubscribers.push(
                this.transport.onRoomJoined((roomId) =>
                    this.dispatcher.submit(
                        eventBuild({
                            type: "room-greeting",
                            source: "matrix",
                            target: { type: "room", roomId },
                            payload: { roomId, text: greeting }
                        })
                    )
                )
            );
        }
        await this.transport.start();
        this.downloads.start();
        await this.loginMonitor?.start();
        if (this.config.webhook.enabled) {
            this.webhookServer = await webhookServerStart({
                host: this.config.webhook.host,
                port: this.config.webhook.port,
                discordToken: this.config.webhook.discordToken,
                submit: (event) => this.dispatcher.submit(event)
            });
        }
        logger.info({ userId: this.transport.userId }, "start: Engine started");
    }

    /**
     * Stops producers, drains the dispatcher for the grace period and persists state.
     */
    async shutdown(): Promise<void> {
        logger.info("stop: Engine shutting down");
        for (const unsubscribe of this.unsubscribers.splice(0)) {
            unsubscribe();
        }
        await this.webhookServer?.close();
        this.webhookServer = null;
        this.downloads.stop();
        this.loginMonitor?.stop();

        await this.dispatcher.stop(this.config.dispatcher.shutdownGraceMs);
        await this.transport.shutdown("shutdown");
        await Promise.all([this.sessions.persist(), this.downloads.persist()]);
        logger.info("stop: Engine stopped");
    }

    private async chatSubmit(message: InboundChatMessage): Promise<void> {
        await this.dispatcher.submit(
            eventBuild({
                type: "chat-message",
                source: "matrix",
                target: { type: "room", roomId: message.roomId },
                payload: { roomId: message.roomId, senderId: message.senderId, text: message.text }
            })
        );
    }

    private securityReport(source: EventSource, payload: SecurityEventPayload): void {
        this.dispatcher.submit(securityEventBuild(source, payload)).catch((error: unknown) => {
            logger.warn({ kind: payload.kind, error }, "error: Security event not queued");
        });
    }
}
