import { writeFile } from "node:fs/promises";
import type { IncomingMessage, QoS } from "../client/types";
import { decodeUtf8 } from "../codec/binary";

export const DEFAULT_MAX_LOG_SIZE = 1000;

export type LoggedMessage = {
    /** ISO-8601 receive time. */
    timestamp: string;
    topic: string;
    /** Payload as UTF-8; undecodable bytes become U+FFFD. */
    payload: string;
    qos: QoS;
    retain: boolean;
};

export type MessageStatistics = {
    totalMessages: number;
    uniqueTopics: number;
    topicsCount: Record<string, number>;
    firstMessageTime: string | null;
    lastMessageTime: string | null;
};

function pad(n: number): string {
    return String(n).padStart(2, "0");
}

/** mqtt_messages_YYYYMMDD_HHMMSS.json in local time. */
export function defaultLogFileName(at: Date): string {
    const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
    const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
    return `mqtt_messages_${date}_${time}.json`;
}

/**
 * Received messages, oldest first. Once `maxSize` entries are held the
 * oldest is dropped for each new one.
 */
export class MessageLog {
    private readonly messages: LoggedMessage[] = [];

    constructor(readonly maxSize = DEFAULT_MAX_LOG_SIZE) {
        if (!Number.isInteger(maxSize) || maxSize < 1) {
            throw new RangeError(`Invalid log size: ${maxSize}`);
        }
    }

    get size(): number {
        return this.messages.length;
    }

    entries(): LoggedMessage[] {
        return [...this.messages];
    }

    record(msg: IncomingMessage): LoggedMessage {
        const entry: LoggedMessage = {
            timestamp: msg.receivedAt.toISOString(),
            topic: msg.topic,
            payload: decodeUtf8(msg.payload),
            qos: msg.qos,
            retain: msg.retain
        };
        this.messages.push(entry);
        if (this.messages.length > this.maxSize) {
            this.messages.splice(0, this.messages.length - this.maxSize);
        }
        return entry;
    }

    statistics(): MessageStatistics {
        const counts = new Map<string, number>();
        for (const m of this.messages) {
            counts.set(m.topic, (counts.get(m.topic) ?? 0) + 1);
        }
        return {
            totalMessages: this.messages.length,
            uniqueTopics: counts.size,
            topicsCount: Object.fromEntries(counts),
            firstMessageTime: this.messages[0]?.timestamp ?? null,
            lastMessageTime: this.messages.at(-1)?.timestamp ?? null
        };
    }

    /** Entries whose topic contains `pattern`; `*` selects everything. */
    filter(pattern: string): LoggedMessage[] {
        if (pattern === "*") return this.entries();
        return this.messages.filter((m) => m.topic.includes(pattern));
    }

    /** Writes the log as indented JSON and returns the path written. */
    async save(path: string = defaultLogFileName(new Date())): Promise<string> {
        await writeFile(path, JSON.stringify(this.messages, null, 2), "utf8");
        return path;
    }
}
