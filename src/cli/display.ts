import { decodeUtf8Strict } from "../codec/binary";
import type { IncomingMessage } from "../client/types";

/**
 * Pretty JSON when the payload parses, the text when it is UTF-8, a byte
 * count otherwise.
 */
export function formatPayload(payload: Uint8Array): string {
    let text: string;
    try {
        text = decodeUtf8Strict(payload);
    } catch {
        return `[Binary Data - ${payload.length} bytes]`;
    }
    try {
        return JSON.stringify(JSON.parse(text), null, 2);
    } catch {
        return text;
    }
}

function pad(n: number): string {
    return String(n).padStart(2, "0");
}

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(d: Date): string {
    return (
        `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
        `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
    );
}

export function formatMessage(count: number, msg: IncomingMessage): string {
    return [
        `New Message #${count}`,
        `Time: ${formatTimestamp(msg.receivedAt)}`,
        `Topic: ${msg.topic}`,
        `QoS: ${msg.qos}`,
        `Retain: ${msg.retain}`,
        "Message Content:",
        formatPayload(msg.payload),
        "-".repeat(60)
    ].join("\n");
}
