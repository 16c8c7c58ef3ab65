import { readFile } from "node:fs/promises";

export const DEFAULT_PAYLOAD_FILE = "payload.json";

export class PayloadError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "PayloadError";
    }
}

/**
 * Reads a JSON document and returns it re-serialised without whitespace.
 */
export async function loadPayload(path: string = DEFAULT_PAYLOAD_FILE): Promise<string> {
    let raw: string;
    try {
        raw = await readFile(path, "utf8");
    } catch (err) {
        throw new PayloadError(`${path} file not found or unreadable`, { cause: err });
    }
    try {
        return JSON.stringify(JSON.parse(raw));
    } catch (err) {
        throw new PayloadError(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`, {
            cause: err
        });
    }
}
