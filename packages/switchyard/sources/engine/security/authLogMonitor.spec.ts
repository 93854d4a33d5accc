import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { SecurityEventPayload } from "../events/eventTypes.js";
import { AuthLogMonitor } from "./authLogMonitor.js";

const SSH_LINE = "Nov  7 17:00:00 host sshd[1234]: Accepted password for deploy from 192.0.2.10 port 52144 ssh2\n";
const SUDO_LINE = "Nov  7 17:02:00 host sudo:    alice : TTY=pts/0 ; USER=root ; COMMAND=/usr/bin/id\n";

describe("AuthLogMonitor", () => {
    let dir: string;
    let logPath: string;
    let events: SecurityEventPayload[];
    let monitor: AuthLogMonitor;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "switchyard-authlog-"));
        logPath = path.join(dir, "auth.log");
        events = [];
        monitor = new AuthLogMonitor({
            path: logPath,
            intervalMs: 60_000,
            onEvent: async (payload) => {
                events.push(payload);
            }
        });
    });

    afterEach(async () => {
        monitor.stop();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("reports only lines appended after start", async () => {
        await fs.writeFile(logPath, SSH_LINE);
        await monitor.start();

        expect(await monitor.pollOnce()).toBe(0);
        await fs.appendFile(logPath, SUDO_LINE);

        expect(await monitor.pollOnce()).toBe(1);
        expect(events.map((event) => event.kind)).toEqual(["sudo_command"]);
    });

    it("waits for a partial line to complete", async () => {
        await fs.writeFile(logPath, "");
        await monitor.start();

        await fs.appendFile(logPath, SSH_LINE.slice(0, 40));
        expect(await monitor.pollOnce()).toBe(0);
        await fs.appendFile(logPath, SSH_LINE.slice(40));

        expect(await monitor.pollOnce()).toBe(1);
        expect(events[0]?.kind).toBe("ssh_login");
    });

    it("reads a rotated file from the start", async () => {
        await fs.writeFile(logPath, "Nov  7 16:00:00 host CRON[1]: noise\n".repeat(5));
        await monitor.start();

        await fs.rename(logPath, `${logPath}.1`);
        await fs.writeFile(logPath, SSH_LINE);

        expect(await monitor.pollOnce()).toBe(1);
        expect(events[0]?.kind).toBe("ssh_login");
    });

    it("reads a truncated file from the start", async () => {
        await fs.writeFile(logPath, "Nov  7 16:00:00 host CRON[1]: noise\n".repeat(5));
        await monitor.start();

        await fs.writeFile(logPath, SUDO_LINE);

        expect(await monitor.pollOnce()).toBe(1);
        expect(events[0]?.kind).toBe("sudo_command");
    });

    it("picks up a log that appears after start", async () => {
        await monitor.start();
        expect(await monitor.pollOnce()).toBe(0);

        await fs.writeFile(logPath, SSH_LINE);

        expect(await monitor.pollOnce()).toBe(1);
    });
});
