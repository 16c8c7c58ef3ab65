import { ProtocolError } from "../errors";

const te = new TextEncoder();
const td = new TextDecoder();
const strictTd = new TextDecoder("utf-8", { fatal: true });

const MAX_STRING_BYTES = 0xffff;
// With the u flag a surrogate class only matches unpaired halves.
const LONE_SURROGATE = /[\uD800-\uDFFF]/u;

export function u16be(n: number): Uint8Array {
    return Uint8Array.from([(n >> 8) & 0xff, n & 0xff]);
}

export function encodeUtf8(str: string): Uint8Array {
    return te.encode(str);
}

export function decodeUtf8(buf: Uint8Array): string {
    return td.decode(buf);
}

/**
 * Strict UTF-8 decode: throws on malformed sequences instead of substituting U+FFFD.
 */
export function decodeUtf8Strict(buf: Uint8Array): string {
    try {
        return strictTd.decode(buf);
    } catch (err) {
        throw new ProtocolError("Invalid UTF-8 in string field", { cause: err });
    }
}

export function encodeBinary(bytes: Uint8Array): Uint8Array {
    if (bytes.length > MAX_STRING_BYTES) {
        throw new ProtocolError(`Field too long: ${bytes.length} bytes`);
    }
    const out = new Uint8Array(2 + bytes.length);
    out[0] = (bytes.length >> 8) & 0xff;
    out[1] = bytes.length & 0xff;
    out.set(bytes, 2);
    return out;
}

export function encodeString(str: string): Uint8Array {
    if (str.includes("\u0000")) {
        throw new ProtocolError("String contains NUL character");
    }
    if (LONE_SURROGATE.test(str)) {
        throw new ProtocolError("String is not well-formed UTF-16");
    }
    return encodeBinary(encodeUtf8(str));
}

export function readU16BE(buf: Uint8Array, offset: number): number {
    if (offset + 2 > buf.length) {
        throw new ProtocolError("Unexpected end of packet");
    }
    return (buf[offset]! << 8) | buf[offset + 1]!;
}

export function readBinary(buf: Uint8Array, offset: number): { value: Uint8Array; bytes: number } {
    const len = readU16BE(buf, offset);
    const start = offset + 2;
    const end = start + len;
    if (end > buf.length) {
        throw new ProtocolError("String out of bounds");
    }
    return { value: buf.slice(start, end), bytes: 2 + len };
}

export function readString(buf: Uint8Array, offset: number): { value: string; bytes: number } {
    const raw = readBinary(buf, offset);
    const value = decodeUtf8Strict(raw.value);
    if (value.includes("\u0000")) {
        throw new ProtocolError("String contains NUL character");
    }
    return { value, bytes: raw.bytes };
}

export function concat(parts: Uint8Array[]): Uint8Array {
    let total = 0;
    for (const p of parts) total += p.length;
    const out = new Uint8Array(total);
    let o = 0;
    for (const p of parts) {
        out.set(p, o);
        o += p.length;
    }
    return out;
}
