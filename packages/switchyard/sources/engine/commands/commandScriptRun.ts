import { spawn } from "node:child_process";

import { getLogger } from "../../log.js";
import { shellArgsQuote } from "../../util/shellArgsQuote.js";

const logger = getLogger("commands.script");

export type CommandScriptRunOptions = {
    timeoutMs: number;
    cwd?: string;
};

export type CommandScriptRunResult =
    | { type: "completed"; exitCode: number | null; stdout: string; stderr: string }
    | { type: "timeout"; pid: number | null; stdout: string; stderr: string };

/**
 * Runs a configured command line through `/bin/sh -c` with quoted user arguments.
 * On timeout the whole process group is killed with SIGKILL and reaped before resolving.
 * Expects: script comes from commands.json; argsText comes from chat and is quoted word by word.
 */
export function commandScriptRun(
    script: string,
    argsText: string,
    options: CommandScriptRunOptions
): Promise<CommandScriptRunResult> {
    const quoted = shellArgsQuote(argsText);
    const commandLine = quoted.length > 0 ? `${script} ${quoted}` : script;

    return new Promise((resolve, reject) => {
        const child = spawn("/bin/sh", ["-c", commandLine], {
            cwd: options.cwd,
            detached: true,
            stdio: ["ignore", "pipe", "pipe"],
            windowsHide: true
        });
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let timedOut = false;
        let settled = false;

        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

        const timer = setTimeout(() => {
            timedOut = true;
            groupKill(child.pid);
        }, options.timeoutMs);

        child.once("error", (error) => {
            clearTimeout(timer);
            if (settled) {
                return;
            }
            settled = true;
            reject(error);
        });

        child.once("close", (exitCode) => {
            clearTimeout(timer);
            if (settled) {
                return;
            }
            settled = true;
            const out = Buffer.concat(stdout).toString("utf8");
            const err = Buffer.concat(stderr).toString("utf8");
            if (timedOut) {
                resolve({ type: "timeout", pid: child.pid ?? null, stdout: out, stderr: err });
                return;
            }
            resolve({ type: "completed", exitCode, stdout: out, stderr: err });
        });
    });
}

function groupKill(pid: number | undefined): void {
    if (pid === undefined) {
        return;
    }
    try {
        process.kill(-pid, "SIGKILL");
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== "ESRCH") {
            logger.warn({ pid, error }, "error: Failed to kill timed out script");
        }
    }
}
