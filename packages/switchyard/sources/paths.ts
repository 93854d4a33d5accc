import os from "node:os";
import path from "node:path";

function resolveSwitchyardRoot(): string {
    const root = process.env.SWITCHYARD_ROOT_DIR?.trim();
    if (root) {
        return path.resolve(root);
    }
    return path.join(os.homedir(), ".switchyard");
}

export const DEFAULT_SWITCHYARD_DIR = resolveSwitchyardRoot();

export function resolveSwitchyardPath(...segments: string[]): string {
    return path.join(DEFAULT_SWITCHYARD_DIR, ...segments);
}

export const DEFAULT_SETTINGS_PATH = resolveSwitchyardPath("settings.json");
