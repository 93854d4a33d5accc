import {
    ClientEvent,
    createClient,
    EventType,
    type MatrixClient,
    type MatrixEvent,
    MsgType,
    Preset,
    type Room,
    type RoomMember,
    RoomEvent,
    RoomMemberEvent,
    SyncState
} from "matrix-js-sdk";

import { getLogger } from "../../log.js";
import type { MatrixConfig } from "../../config/configTypes.js";
import type {
    ChatMessageHandler,
    ChatTransport,
    InboundChatMessage,
    OutboundMessage,
    RoomJoinedHandler
} from "../../engine/transport/transportTypes.js";

const logger = getLogger("connector.matrix");

const MATRIX_MESSAGE_MAX_LENGTH = 16_000;
const TEXT_MSGTYPES = new Set<string>([MsgType.Text, MsgType.Notice, MsgType.Emote]);

export type MatrixTransportOptions = {
    config: MatrixConfig;
    /** Overrides client creation; used by tests. */
    client?: MatrixClient;
    now?: () => number;
};

/**
 * Matrix account connection: receives room text messages and sends markdown-rendered replies.
 */
export class MatrixTransport implements ChatTransport {
    readonly userId: string;
    readonly maxMessageLength = MATRIX_MESSAGE_MAX_LENGTH;

    private readonly client: MatrixClient;
    private readonly autoJoin: boolean;
    private readonly now: () => number;
    private readonly handlers = new Set<ChatMessageHandler>();
    private readonly joinHandlers = new Set<RoomJoinedHandler>();
    private readonly directRooms = new Map<string, string>();
    private startedAt = Number.POSITIVE_INFINITY;
    private started = false;
    private shuttingDown = false;

    constructor(options: MatrixTransportOptions) {
        this.userId = options.config.userId;
        this.autoJoin = options.config.autoJoin;
        this.now = options.now ?? Date.now;
        this.client =
            options.client ??
            createClient({
                baseUrl: options.config.homeserverUrl,
                accessToken: options.config.accessToken,
                userId: options.config.userId,
                deviceId: options.config.deviceId ?? undefined
            });
    }

    async start(): Promise<void> {
        if (this.started) {
            return;
        }
        this.started = true;
        this.startedAt = this.now();
        this.client.on(RoomEvent.Timeline, this.handleTimeline);
        this.client.on(RoomMemberEvent.Membership, this.handleMembership);

        const prepared = new Promise<void>((resolve, reject) => {
            const onSync = (state: SyncState) => {
                if (state === SyncState.Prepared || state === SyncState.Syncing) {
                    this.client.off(ClientEvent.Sync, onSync);
                    resolve();
                } else if (state === SyncState.Error) {
                    this.client.off(ClientEvent.Sync, onSync);
                    reject(new Error("Matrix initial sync failed"));
                }
            };
            this.client.on(ClientEvent.Sync, onSync);
        });
        await this.client.startClient({ initialSyncLimit: 0 });
        await prepared;
        logger.info({ userId: this.userId }, "start: Matrix client synced");
    }

    onMessage(handler: ChatMessageHandler): () => void {
        this.handlers.add(handler);
        return () => {
            this.handlers.delete(handler);
        };
    }

    onRoomJoined(handler: RoomJoinedHandler): () => void {
        this.joinHandlers.add(handler);
        return () => {
            this.joinHandlers.delete(handler);
        };
    }

    async sendMessage(roomId: string, message: OutboundMessage): Promise<void> {
        if (message.html) {
            await this.client.sendMessage(roomId, {
                msgtype: MsgType.Text,
                body: message.text,
                format: "org.matrix.custom.html",
                formatted_body: message.html
            });
            return;
        }
        await this.client.sendMessage(roomId, { msgtype: MsgType.Text, body: message.text });
    }

    async directRoomResolve(userId: string): Promise<string> {
        const cached = this.directRooms.get(userId);
        if (cached && this.client.getRoom(cached)?.getMyMembership() === "join") {
            return cached;
        }
        const existing = this.client.getRooms().find((room) => this.isDirectWith(room, userId));
        if (existing) {
            this.directRooms.set(userId, existing.roomId);
            return existing.roomId;
        }
        const created = await this.client.createRoom({
            invite: [userId],
            is_direct: true,
            preset: Preset.TrustedPrivateChat
        });
        logger.info({ userId, roomId: created.room_id }, "event: Created direct room");
        this.directRooms.set(userId, created.room_id);
        return created.room_id;
    }

    async shutdown(reason = "shutdown"): Promise<void> {
        if (this.shuttingDown) {
            return;
        }
        this.shuttingDown = true;
        this.client.off(RoomEvent.Timeline, this.handleTimeline);
        this.client.off(RoomMemberEvent.Membership, this.handleMembership);
        this.handlers.clear();
        this.joinHandlers.clear();
        this.client.stopClient();
        logger.info({ reason }, "stop: Matrix client stopped");
    }

    private isDirectWith(room: Room, userId: string): boolean {
        if (room.getMyMembership() !== "join") {
            return false;
        }
        const member = room.getMember(userId);
        if (!member || (member.membership !== "join" && member.membership !== "invite")) {
            return false;
        }
        return room.getJoinedMemberCount() + room.getInvitedMemberCount() === 2;
    }

    private readonly handleTimeline = (
        event: MatrixEvent,
        room: Room | undefined,
        toStartOfTimeline: boolean | undefined
    ): void => {
        if (toStartOfTimeline || this.shuttingDown) {
            return;
        }
        if (event.getType() !== EventType.RoomMessage) {
            return;
        }
        const senderId = event.getSender();
        const roomId = room?.roomId ?? event.getRoomId();
        const eventId = event.getId();
        if (!senderId || !roomId || !eventId || senderId === this.userId) {
            return;
        }
        if (event.getTs() < this.startedAt) {
            return;
        }
        const content = event.getContent();
        const body: unknown = content.body;
        const msgtype: unknown = content.msgtype;
        if (typeof body !== "string" || typeof msgtype !== "string" || !TEXT_MSGTYPES.has(msgtype)) {
            return;
        }
        const message: InboundChatMessage = { eventId, roomId, senderId, text: body, timestamp: event.getTs() };
        logger.debug({ roomId, senderId }, "receive: Matrix message");
        for (const handler of this.handlers) {
            Promise.resolve()
                .then(() => handler(message))
                .catch((error: unknown) => {
                    logger.warn({ roomId, senderId, error }, "error: Matrix message handler failed");
                });
        }
    };

    private readonly handleMembership = (_event: MatrixEvent, member: RoomMember): void => {
        if (!this.autoJoin || this.shuttingDown || member.userId !== this.userId || member.membership !== "invite") {
            return;
        }
        void this.joinInvite(member.roomId);
    };

    private async joinInvite(roomId: string): Promise<void> {
        try {
            await this.client.joinRoom(roomId);
        } catch (error) {
            logger.warn({ roomId, error }, "error: Failed to join invited room");
            return;
        }
        logger.info({ roomId }, "event: Joined room after invite");
        for (const handler of this.joinHandlers) {
            Promise.resolve()
                .then(() => handler(roomId))
                .catch((error: unknown) => {
                    logger.warn({ roomId, error }, "error: Room join handler failed");
                });
        }
    }
}
