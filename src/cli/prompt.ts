import { createInterface, type Interface } from "node:readline/promises";
import type { QoS } from "../codec/packets";

export type Ask = (question: string) => Promise<string>;

/**
 * Line prompter on stdin. Ctrl+C while a question is open aborts it, and
 * every later question, with an AbortError.
 */
export class Prompter {
    private readonly rl: Interface;
    private readonly abort = new AbortController();

    constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
        this.rl = createInterface({ input, output });
        this.rl.on("SIGINT", () => this.abort.abort());
    }

    get interrupted(): boolean {
        return this.abort.signal.aborted;
    }

    readonly ask: Ask = async (question) =>
        (await this.rl.question(question, { signal: this.abort.signal })).trim();

    close(): void {
        this.rl.close();
    }
}

/** Anything but 0, 1 or 2 falls back to 0. */
export function parseQos(input: string | undefined): QoS {
    switch (input?.trim()) {
        case "1":
            return 1;
        case "2":
            return 2;
        default:
            return 0;
    }
}

export function parseYesNo(input: string | undefined): boolean {
    const v = input?.trim().toLowerCase();
    return v === "y" || v === "yes";
}

export function parsePort(input: string | undefined, fallback: number): number {
    const v = input?.trim();
    if (!v) return fallback;
    const port = Number(v);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new RangeError(`Invalid port: ${v}`);
    }
    return port;
}

export function withDefault(label: string, fallback: string | undefined): string {
    return fallback === undefined ? `${label}: ` : `${label} (default: ${fallback}): `;
}
