import { getLogger } from "../../log.js";
import { sleep as sleepDefault } from "../../util/sleep.js";
import type { Destination } from "../events/eventTypes.js";
import type { ChatTransport } from "../transport/transportTypes.js";
import { partDelayMs } from "./messageSplit.js";

const logger = getLogger("dispatcher.send");

export type SendItem = {
    destination: Destination;
    parts: readonly string[];
    /** Pause between parts like a person typing. */
    partDelay: boolean;
    onDelivered?: () => void | Promise<void>;
    onDropped?: () => void;
};

export type DestinationQueuesOptions = {
    transport: Pick<ChatTransport, "sendMessage" | "directRoomResolve">;
    sendAttempts: number;
    sendBackoffMs: number;
    /** Markdown to HTML for formatted bodies. */
    render: (text: string) => string | null;
    sleep?: (delayMs: number, signal?: AbortSignal) => Promise<void>;
};

type DestinationQueue = {
    items: SendItem[];
    running: boolean;
};

/**
 * One ordered send queue per destination, each drained by a single loop.
 * A failing destination retries with exponential backoff and never blocks the others.
 */
export class DestinationQueues {
    private readonly transport: Pick<ChatTransport, "sendMessage" | "directRoomResolve">;
    private readonly sendAttempts: number;
    private readonly sendBackoffMs: number;
    private readonly render: (text: string) => string | null;
    private readonly sleep: (delayMs: number, signal?: AbortSignal) => Promise<void>;
    private readonly queues = new Map<string, DestinationQueue>();
    private readonly idleWaiters: Array<() => void> = [];
    private readonly abort = new AbortController();

    constructor(options: DestinationQueuesOptions) {
        this.transport = options.transport;
        this.sendAttempts = Math.max(1, options.sendAttempts);
        this.sendBackoffMs = options.sendBackoffMs;
        this.render = options.render;
        this.sleep = options.sleep ?? sleepDefault;
    }

    enqueue(item: SendItem): void {
        if (this.abort.signal.aborted) {
            logger.warn({ destination: item.destination }, "skip: Send queues abandoned, dropping message");
            droppedNotify(item);
            return;
        }
        const key = destinationKey(item.destination);
        let queue = this.queues.get(key);
        if (!queue) {
            queue = { items: [], running: false };
            this.queues.set(key, queue);
        }
        queue.items.push(item);
        if (!queue.running) {
            queue.running = true;
            void this.drainLoop(key, queue);
        }
    }

    pending(): number {
        let total = 0;
        for (const queue of this.queues.values()) {
            total += queue.items.length;
        }
        return total;
    }

    /**
     * Waits until every queue is empty or the deadline passes; true when everything was sent.
     */
    async drain(timeoutMs: number): Promise<boolean> {
        if (this.queues.size === 0) {
            return true;
        }
        const idle = new Promise<true>((resolve) => {
            this.idleWaiters.push(() => resolve(true));
        });
        const timer = new AbortController();
        const deadline = this.sleep(timeoutMs, timer.signal).then(() => false as const);
        const result = await Promise.race([idle, deadline]);
        timer.abort();
        return result;
    }

    /**
     * Drops everything still queued and interrupts backoff waits; returns the number of dropped items.
     */
    abandon(): number {
        this.abort.abort();
        let dropped = 0;
        for (const [key, queue] of this.queues) {
            // The first item of a running queue is in flight and reports itself.
            const queued = queue.running ? queue.items.splice(1) : queue.items.splice(0);
            for (const item of queued) {
                dropped += 1;
                droppedNotify(item);
            }
            if (queued.length > 0) {
                logger.warn({ destination: key, dropped: queued.length }, "stop: Abandoned pending sends");
            }
        }
        return dropped;
    }

    private async drainLoop(key: string, queue: DestinationQueue): Promise<void> {
        try {
            for (let item = queue.items[0]; item; item = queue.items[0]) {
                const delivered = await this.deliver(key, item);
                queue.items.shift();
                if (delivered) {
                    await deliveredNotify(item);
                } else {
                    droppedNotify(item);
                }
            }
        } catch (error) {
            logger.warn({ destination: key, error }, "error: Send loop failed");
            for (const item of queue.items.splice(0)) {
                droppedNotify(item);
            }
        } finally {
            queue.running = false;
            if (queue.items.length === 0 && this.queues.get(key) === queue) {
                this.queues.delete(key);
            }
            if (this.queues.size === 0) {
                for (const waiter of this.idleWaiters.splice(0)) {
                    waiter();
                }
            }
        }
    }

    private async deliver(key: string, item: SendItem): Promise<boolean> {
        const roomId = await this.withRetry(key, "resolve", () => roomIdResolve(this.transport, item.destination));
        if (roomId === null) {
            return false;
        }
        for (let index = 0; index < item.parts.length; index += 1) {
            const part = item.parts[index] ?? "";
            const sent = await this.withRetry(key, "send", () =>
                this.transport.sendMessage(roomId, { text: part, html: this.render(part) })
            );
            if (sent === null) {
                logger.warn(
                    { destination: key, part: index + 1, parts: item.parts.length },
                    "error: TransportSendFailure, message dropped"
                );
                return false;
            }
            if (item.partDelay && index < item.parts.length - 1) {
                await this.sleep(partDelayMs(part), this.abort.signal);
            }
        }
        logger.debug({ destination: key, parts: item.parts.length }, "send: Message delivered");
        return true;
    }

    private async withRetry<T>(key: string, action: string, fn: () => Promise<T>): Promise<T | null> {
        for (let attempt = 1; attempt <= this.sendAttempts; attempt += 1) {
            try {
                return await fn();
            } catch (error) {
                logger.warn({ destination: key, action, attempt, attempts: this.sendAttempts, error }, "error: Send failed");
                if (attempt === this.sendAttempts || this.abort.signal.aborted) {
                    return null;
                }
                await this.sleep(this.sendBackoffMs * 2 ** (attempt - 1), this.abort.signal);
            }
        }
        return null;
    }
}

export function destinationKey(destination: Destination): string {
    return destination.type === "room" ? `room:${destination.roomId}` : `user:${destination.userId}`;
}

async function roomIdResolve(
    transport: Pick<ChatTransport, "directRoomResolve">,
    destination: Destination
): Promise<string> {
    return destination.type === "room" ? destination.roomId : transport.directRoomResolve(destination.userId);
}

async function deliveredNotify(item: SendItem): Promise<void> {
    try {
        await item.onDelivered?.();
    } catch (error) {
        logger.warn({ destination: item.destination, error }, "error: Delivery callback failed");
    }
}

function droppedNotify(item: SendItem): void {
    try {
        item.onDropped?.();
    } catch (error) {
        logger.warn({ destination: item.destination, error }, "error: Drop callback failed");
    }
}
