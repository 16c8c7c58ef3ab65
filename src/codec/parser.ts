import { ByteQueue } from "../util/byte-queue";
import { decodeVarintAt } from "./varint";
import { decodeBody } from "./decoder";
import { ProtocolError, toError } from "../errors";
import type { Packet } from "./packets";

/**
 * Incremental decoder for the receive loop. Chunks may split or join packets
 * arbitrarily; bytes that do not yet form a full packet stay queued.
 *
 * A malformed frame behind packets that already decoded in the same chunk
 * does not throw: those packets are returned and the error is parked on
 * `failure`. Every later `push` throws it until `reset`.
 */
export class MqttParser {
    private readonly q = new ByteQueue();
    private _failure: Error | null = null;

    constructor(private readonly maxPacketBytes = 1024 * 1024) { }

    get failure(): Error | null {
        return this._failure;
    }

    push(chunk: Uint8Array): Packet[] {
        if (this._failure) {
            throw this._failure;
        }
        this.q.push(chunk);
        const out: Packet[] = [];

        try {
            this.drain(out);
        } catch (err) {
            if (out.length === 0) throw err;
            this._failure = toError(err);
        }
        return out;
    }

    private drain(out: Packet[]): void {
        for (; ;) {
            if (this.q.length < 2) {
                break;
            }

            const byte1 = this.q.peek(0)!;
            const type = byte1 >> 4;
            const flags = byte1 & 0x0f;

            const rl = decodeVarintAt((i) => this.q.peek(i), 1);
            if (!rl) {
                break;
            }

            const headerBytes = 1 + rl.bytes;
            const totalBytes = headerBytes + rl.value;

            if (rl.value > this.maxPacketBytes) {
                throw new ProtocolError(`Packet too large: ${rl.value}`);
            }
            if (this.q.length < totalBytes) {
                break;
            }

            this.q.skip(headerBytes);
            const body = this.q.readSlice(rl.value);
            out.push(decodeBody(type, flags, body));
        }
    }

    reset(): void {
        this.q.clear();
        this._failure = null;
    }
}
