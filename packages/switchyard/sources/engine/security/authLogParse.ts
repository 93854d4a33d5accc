import type { SecurityDetail, SecurityEventPayload } from "../events/eventTypes.js";

const SSH_ACCEPTED = /sshd\[\d+\]: Accepted .+ for (\S+) from (\S+) port (\d+)/;
const SSH_FAILED = /sshd\[\d+\]: Failed .+ for (?:invalid user )?(\S+) from (\S+) port (\d+)/;
const SUDO_COMMAND = /sudo:\s+(\S+)\s+:.*COMMAND=(.+)/;
const SESSION_OPENED = /systemd-logind\[\d+\]: New session .+ of user (\S+?)\.?$/;

const SYSTEM_USERS = new Set(["root", "gdm", "lightdm"]);

/**
 * Maps one auth log line to a security event; null for lines that are not logins or sudo.
 */
export function authLogParse(line: string): SecurityEventPayload | null {
    const text = line.trimEnd();

    const accepted = SSH_ACCEPTED.exec(text);
    if (accepted) {
        return {
            kind: "ssh_login",
            severity: "warning",
            title: "SSH Login Detected",
            details: [
                ...remoteDetails(accepted[1], accepted[2], accepted[3]),
                { label: "Status", value: "✅ Success" },
                ...loggedAt(text)
            ]
        };
    }

    const failed = SSH_FAILED.exec(text);
    if (failed) {
        return {
            kind: "ssh_failed",
            severity: "critical",
            title: "SSH Login Failed",
            details: [
                ...remoteDetails(failed[1], failed[2], failed[3]),
                { label: "Status", value: "❌ Failed" },
                ...loggedAt(text)
            ]
        };
    }

    const sudo = SUDO_COMMAND.exec(text);
    if (sudo) {
        return {
            kind: "sudo_command",
            severity: "info",
            title: "Sudo Command Executed",
            details: [
                { label: "User", value: code(sudo[1]) },
                { label: "Command", value: code(sudo[2]) },
                ...loggedAt(text)
            ]
        };
    }

    const session = SESSION_OPENED.exec(text);
    const sessionUser = session?.[1];
    if (sessionUser && !SYSTEM_USERS.has(sessionUser)) {
        return {
            kind: "console_login",
            severity: "info",
            title: "Console Login",
            details: [{ label: "User", value: code(sessionUser) }, ...loggedAt(text)]
        };
    }

    return null;
}

function remoteDetails(user: string | undefined, ip: string | undefined, port: string | undefined): SecurityDetail[] {
    return [
        { label: "User", value: code(user) },
        { label: "IP", value: code(ip) },
        { label: "Port", value: code(port) }
    ];
}

// syslog lines start with "Mon DD HH:MM:SS"
function loggedAt(line: string): SecurityDetail[] {
    const parts = line.split(/\s+/);
    if (parts.length < 3 || !/^\d{2}:\d{2}:\d{2}$/.test(parts[2] ?? "")) {
        return [];
    }
    return [{ label: "Logged", value: code(parts.slice(0, 3).join(" ")) }];
}

function code(value: string | undefined): string {
    return `\`${value ?? "unknown"}\``;
}
