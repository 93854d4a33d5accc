import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { Engine } from "../engine/engine.js";
import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../paths.js";
import { awaitShutdown, onShutdown, shutdownForceExitSet } from "../util/shutdown.js";

const logger = getLogger("command.start");

const SHUTDOWN_MARGIN_MS = 5_000;

export type StartOptions = {
    settings?: string;
};

export async function startCommand(options: StartOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath);
    logger.info({ settings: config.settingsPath }, "start: Starting Switchyard");

    const engine = new Engine({ config });
    shutdownForceExitSet(config.dispatcher.shutdownGraceMs + SHUTDOWN_MARGIN_MS);
    onShutdown("engine", () => engine.shutdown());

    try {
        await engine.start();
    } catch (error) {
        logger.error({ error }, "error: Engine failed to start");
        await engine.shutdown();
        process.exit(1);
    }

    logger.info("start: Ready. Listening for events.");
    const signal = await awaitShutdown();
    logger.info({ signal }, "stop: Shutdown complete");
    process.exit(0);
}
