export type OutboundMessage = {
    text: string;
    /** Rendered HTML body; plain text only when null. */
    html: string | null;
};

export type InboundChatMessage = {
    eventId: string;
    roomId: string;
    senderId: string;
    text: string;
    timestamp: number;
};

export type ChatMessageHandler = (message: InboundChatMessage) => void | Promise<void>;
export type RoomJoinedHandler = (roomId: string) => void | Promise<void>;

/**
 * The outbound and inbound surface of a chat network account.
 */
export interface ChatTransport {
    readonly userId: string;
    readonly maxMessageLength: number;
    start(): Promise<void>;
    onMessage(handler: ChatMessageHandler): () => void;
    /** Called after the account joins a room it was invited to. */
    onRoomJoined(handler: RoomJoinedHandler): () => void;
    sendMessage(roomId: string, message: OutboundMessage): Promise<void>;
    /** Returns an existing two-member room with userId or creates a direct chat. */
    directRoomResolve(userId: string): Promise<string>;
    shutdown(reason?: string): Promise<void>;
}
