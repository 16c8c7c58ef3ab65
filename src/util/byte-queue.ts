/**
 * FIFO of received chunks. Reads copy out of the chunk list without
 * concatenating everything that was buffered.
 */
export class ByteQueue {
    private chunks: Uint8Array[] = [];
    private headOffset = 0;
    private _length = 0;

    get length(): number {
        return this._length;
    }

    push(chunk: Uint8Array): void {
        if (chunk.length === 0) {
            return;
        }
        this.chunks.push(chunk);
        this._length += chunk.length;
    }

    peek(i: number): number | null {
        if (i < 0 || i >= this._length) return null;
        let idx = i + this.headOffset;

        for (const chunk of this.chunks) {
            if (idx < chunk.length) return chunk[idx]!;
            idx -= chunk.length;
        }
        return null;
    }

    readSlice(count: number): Uint8Array {
        if (count > this._length) throw new RangeError("ByteQueue underflow");
        const out = new Uint8Array(count);

        let written = 0;
        while (written < count) {
            const head = this.chunks[0]!;
            const take = Math.min(head.length - this.headOffset, count - written);

            out.set(head.subarray(this.headOffset, this.headOffset + take), written);
            written += take;
            this.advance(take);
        }

        return out;
    }

    skip(count: number): void {
        if (count > this._length) throw new RangeError("ByteQueue underflow");
        let remaining = count;

        while (remaining > 0) {
            const head = this.chunks[0]!;
            const take = Math.min(head.length - this.headOffset, remaining);
            remaining -= take;
            this.advance(take);
        }
    }

    clear(): void {
        this.chunks = [];
        this.headOffset = 0;
        this._length = 0;
    }

    private advance(n: number): void {
        this.headOffset += n;
        this._length -= n;

        const head = this.chunks[0];
        if (head && this.headOffset >= head.length) {
            this.chunks.shift();
            this.headOffset = 0;
        }
    }
}
