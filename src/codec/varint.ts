import { ProtocolError } from "../errors";

export const MAX_REMAINING_LENGTH = 268_435_455;

export function encodeVarint(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0) {
        throw new ProtocolError("Invalid varint");
    }
    if (n > MAX_REMAINING_LENGTH) {
        throw new ProtocolError(`Remaining length too large: ${n}`);
    }
    const out: number[] = [];
    do {
        let digit = n % 128;
        n = Math.floor(n / 128);
        if (n > 0) {
            digit |= 0x80;
        }
        out.push(digit);
    } while (n > 0);
    return Uint8Array.from(out);
}

/**
 * Returns null when more bytes are needed. A trailing zero continuation digit
 * (e.g. 0x80 0x00) is rejected: it does not encode the value its length implies.
 */
export function decodeVarintAt(
    peek: (i: number) => number | null,
    offset: number
): { value: number; bytes: number } | null {
    let multiplier = 1;
    let value = 0;

    for (let i = 0; i < 4; i++) {
        const b = peek(offset + i);
        if (b == null) {
            return null;
        }

        value += (b & 0x7f) * multiplier;
        multiplier *= 128;

        if ((b & 0x80) === 0) {
            if (i > 0 && b === 0) {
                throw new ProtocolError("Malformed Remaining Length varint");
            }
            return { value, bytes: i + 1 };
        }
    }

    throw new ProtocolError("Malformed Remaining Length varint");
}
