#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { Command } from "commander";

import { checkCommand } from "./commands/check.js";
import { startCommand } from "./commands/start.js";
import { webhookSendCommand } from "./commands/webhookSend.js";
import { initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./paths.js";

const pkg = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")) as { version: string };

const program = new Command();

initLogging();

program.name("switchyard").description("Matrix bridge for chat commands, AI replies, webhooks and alerts").version(pkg.version);

program
    .command("start")
    .description("Connect to Matrix and start every event source")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(startCommand);

program
    .command("check")
    .description("Validate settings, commands.json and users.json")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(checkCommand);

program
    .command("webhook-send")
    .description("Send a message through a running webhook server")
    .argument("<target>", "Matrix user id for a direct message, or any id for the default room")
    .argument("<message>", "Message text")
    .option("--url <url>", "Webhook server base URL")
    .option("--token <token>", "Webhook token")
    .action(webhookSendCommand);

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);
