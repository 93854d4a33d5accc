import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
export type ShutdownReason = NodeJS.Signals | "fatal";

const DEFAULT_FORCE_EXIT_MS = 10_000;

const shutdownHandlers = new Map<string, ShutdownHandler[]>();
const shutdownController = new AbortController();
const logger = getLogger("shutdown");

let forceExitMs = DEFAULT_FORCE_EXIT_MS;
let shutdownPromise: Promise<ShutdownReason> | null = null;
let resolveShutdown: ((reason: ShutdownReason) => void) | null = null;
let requestedReason: ShutdownReason | null = null;
let completion: Promise<void> | null = null;
let signalsAttached = false;

/**
 * Registers a named handler that runs once when shutdown starts.
 * Returns an unsubscribe function.
 */
export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    if (shutdownController.signal.aborted) {
        Promise.resolve()
            .then(handler)
            .catch((error) => {
                logger.warn({ error, name }, "error: Late shutdown handler failed");
            });
        return () => {};
    }

    const handlers = shutdownHandlers.get(name) ?? [];
    handlers.push(handler);
    shutdownHandlers.set(name, handlers);

    return () => {
        const list = shutdownHandlers.get(name);
        if (!list) {
            return;
        }
        const index = list.indexOf(handler);
        if (index !== -1) {
            list.splice(index, 1);
        }
        if (list.length === 0) {
            shutdownHandlers.delete(name);
        }
    };
}

/**
 * Sets how long handlers may run before the process is force-exited.
 * Expects: the dispatcher grace period plus some margin for closing transports.
 */
export function shutdownForceExitSet(timeoutMs: number): void {
    forceExitMs = Math.max(0, timeoutMs);
}

export async function awaitShutdown(): Promise<ShutdownReason> {
    if (!shutdownPromise) {
        shutdownPromise = new Promise((resolve) => {
            resolveShutdown = resolve;
            if (!signalsAttached) {
                signalsAttached = true;
                const handler = (signal: NodeJS.Signals) => requestShutdown(signal);
                process.once("SIGINT", handler);
                process.once("SIGTERM", handler);
            }
            if (requestedReason) {
                resolveWhenComplete(requestedReason);
            }
        });
    }
    return shutdownPromise;
}

export function requestShutdown(reason: ShutdownReason = "SIGTERM"): void {
    if (requestedReason) {
        return;
    }
    requestedReason = reason;
    completion = runHandlers(reason);
    resolveWhenComplete(reason);
}

function resolveWhenComplete(reason: ShutdownReason): void {
    if (!resolveShutdown) {
        return;
    }
    const resolve = resolveShutdown;
    void (completion ?? Promise.resolve()).then(() => resolve(reason));
}

async function runHandlers(reason: ShutdownReason): Promise<void> {
    shutdownController.abort();

    const forceExit = setTimeout(() => {
        logger.warn({ forceExitMs }, "event: Shutdown handlers still running, forcing exit");
        process.exit(1);
    }, forceExitMs);
    forceExit.unref();

    const snapshot = Array.from(shutdownHandlers.entries()).map(([name, handlers]) => [name, [...handlers]] as const);
    const total = snapshot.reduce((sum, [, handlers]) => sum + handlers.length, 0);
    logger.info({ reason, handlers: total }, "stop: Running shutdown handlers");

    const startedAt = Date.now();
    const tasks = snapshot.flatMap(([name, handlers]) =>
        handlers.map((handler, index) =>
            Promise.resolve()
                .then(handler)
                .catch((error) => {
                    logger.warn({ error }, `error: Shutdown handler ${name}[${index + 1}] failed`);
                })
        )
    );
    await Promise.all(tasks);

    logger.info({ elapsedMs: Date.now() - startedAt }, "stop: Shutdown handlers completed");
    clearTimeout(forceExit);
}
