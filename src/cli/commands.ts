import type { MqttClient } from "../client/types";
import { logInfo } from "../util/logger";
import type { MessageLog } from "./message-log";

export type MonitorCommand =
    | { kind: "quit" }
    | { kind: "help" }
    | { kind: "stats" }
    | { kind: "save"; path?: string }
    | { kind: "filter"; pattern: string }
    | { kind: "publish"; topic: string; message: string }
    | { kind: "invalid"; reason: string };

export const COMMAND_HELP = [
    "Available commands:",
    "- 'stats': Show statistics",
    "- 'save [file]': Save log",
    "- 'filter <topic>': Filter messages",
    "- 'publish <topic> <message>': Send message",
    "- 'quit': Exit"
];

/** Entries shown by `filter`, newest last. */
const FILTER_PREVIEW = 5;
const PREVIEW_CHARS = 50;

/**
 * The verb is case-insensitive; arguments are kept as typed. `publish`
 * takes everything after the topic as the message.
 */
export function parseCommand(line: string): MonitorCommand {
    const trimmed = line.trim();
    const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(trimmed);
    if (!match) return { kind: "invalid", reason: "Invalid command" };

    const verb = (match[1] ?? "").toLowerCase();
    const rest = match[2]?.trim() ?? "";

    switch (verb) {
        case "quit":
        case "exit":
            return { kind: "quit" };
        case "help":
            return { kind: "help" };
        case "stats":
            return { kind: "stats" };
        case "save":
            return rest ? { kind: "save", path: rest } : { kind: "save" };
        case "filter":
            return rest ? { kind: "filter", pattern: rest } : { kind: "invalid", reason: "Format: filter <topic>" };
        case "publish": {
            const parts = /^(\S+)\s+([\s\S]+)$/.exec(rest);
            if (!parts?.[1] || parts[2] === undefined) {
                return { kind: "invalid", reason: "Format: publish <topic> <message>" };
            }
            return { kind: "publish", topic: parts[1], message: parts[2] };
        }
        default:
            return { kind: "invalid", reason: "Invalid command" };
    }
}

const errorText = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Runs console commands against a connected client and its message log.
 * Output goes through `print`, one line per call.
 */
export class MonitorConsole {
    constructor(
        private readonly client: MqttClient,
        private readonly log: MessageLog,
        private readonly print: (line: string) => void = logInfo
    ) { }

    /** Returns false once the console should stop. */
    async run(command: MonitorCommand): Promise<boolean> {
        switch (command.kind) {
            case "quit":
                return false;
            case "help":
                for (const line of COMMAND_HELP) this.print(line);
                break;
            case "stats":
                this.print(JSON.stringify(this.log.statistics(), null, 2));
                break;
            case "save":
                await this.save(command.path);
                break;
            case "filter":
                this.filter(command.pattern);
                break;
            case "publish":
                await this.publish(command.topic, command.message);
                break;
            case "invalid":
                this.print(command.reason);
                break;
        }
        return true;
    }

    async save(path?: string): Promise<boolean> {
        try {
            const written = await this.log.save(path);
            this.print(`Message log saved to ${written}`);
            return true;
        } catch (err) {
            this.print(`Error saving log: ${errorText(err)}`);
            return false;
        }
    }

    private filter(pattern: string): void {
        const matched = this.log.filter(pattern);
        this.print(`Messages related to '${pattern}': ${matched.length}`);
        for (const m of matched.slice(-FILTER_PREVIEW)) {
            const preview = m.payload.length > PREVIEW_CHARS ? `${m.payload.slice(0, PREVIEW_CHARS)}...` : m.payload;
            this.print(`  ${m.timestamp}: ${m.topic} -> ${preview}`);
        }
    }

    private async publish(topic: string, message: string): Promise<void> {
        try {
            const receipt = await this.client.publish(topic, message);
            await receipt.confirmed;
            this.print(`Message published to ${topic}`);
        } catch (err) {
            this.print(`Error: ${errorText(err)}`);
        }
    }
}
