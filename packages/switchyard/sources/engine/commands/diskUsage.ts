import { execFile } from "node:child_process";

export type DiskUsage = {
    filesystem: string;
    size: string;
    used: string;
    available: string;
    usePercent: string;
    mountpoint: string;
};

const DISK_USAGE_TIMEOUT_MS = 5_000;

/**
 * Parses the first data row of `df -h` output; null when the output has no usable row.
 */
export function diskUsageParse(output: string): DiskUsage | null {
    const lines = output.trim().split("\n");
    const data = lines[1]?.trim().split(/\s+/) ?? [];
    const [filesystem, size, used, available, usePercent, mountpoint] = data;
    if (!filesystem || !size || !used || !available || !usePercent || !mountpoint) {
        return null;
    }
    return { filesystem, size, used, available, usePercent, mountpoint };
}

export function diskUsageFormat(usage: DiskUsage): string {
    return [
        `💾 **Disk usage (${usage.mountpoint}):**`,
        "",
        `• **Total:** ${usage.size}`,
        `• **Used:** ${usage.used} (${usage.usePercent})`,
        `• **Available:** ${usage.available}`,
        `• **Filesystem:** ${usage.filesystem}`
    ].join("\n");
}

/**
 * Runs `df -h /` and returns the chat reply for the disk_usage builtin.
 */
export function diskUsageRead(): Promise<string> {
    return new Promise((resolve) => {
        execFile("df", ["-h", "/"], { timeout: DISK_USAGE_TIMEOUT_MS, windowsHide: true }, (error, stdout, stderr) => {
            if (error) {
                if (error.killed) {
                    resolve("❌ Timeout getting disk space information");
                    return;
                }
                resolve(`❌ Error getting disk space: ${stderr.trim() || error.message}`);
                return;
            }
            const usage = diskUsageParse(stdout);
            resolve(usage ? diskUsageFormat(usage) : "❌ Unable to parse disk space information");
        });
    });
}
