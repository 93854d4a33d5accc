/**
 * Written to disk when commands.json does not exist yet.
 */
export function commandTableDefault(): Record<string, unknown> {
    return {
        commands: {
            "!help": { description: "Show the commands you can use", allowed_users: [], type: "builtin", script: null },
            "!ping": { description: "Check that the bot is alive", allowed_users: [], type: "builtin", script: null },
            "!uptime": { description: "Show how long the bot has been running", allowed_users: [], type: "builtin", script: null },
            "!date": { description: "Show the server date and time", allowed_users: [], type: "builtin", script: null },
            "!reload": { description: "Reload commands and users", allowed_users: [], type: "builtin", script: null }
        }
    };
}

export function userTableDefault(): Record<string, unknown> {
    return { users: {} };
}

/**
 * Debrid commands that exist without a commands.json entry; a configured entry with the same token wins.
 */
export function commandTableIntrinsic(): Record<string, unknown> {
    return {
        commands: {
            magnet: { description: "Add a magnet link to your debrid account", type: "builtin" },
            "magnet-config": { description: "Store your debrid API key", type: "builtin" },
            "magnet-list": { description: "List your debrid torrents and links", type: "builtin" },
            "magnet-info": { description: "Show one torrent or download", type: "builtin" }
        }
    };
}
