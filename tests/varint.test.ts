import { describe, expect, it } from "vitest";
import { MAX_REMAINING_LENGTH, decodeVarintAt, encodeVarint } from "../src/codec/varint";

const peekFrom = (buf: Uint8Array) => (i: number) => (i < buf.length ? buf[i]! : null);

describe("varint encode/decode", () => {
    it("encodes integers into MQTT remaining length varints", () => {
        expect(Array.from(encodeVarint(0))).toEqual([0x00]);
        expect(Array.from(encodeVarint(127))).toEqual([0x7f]);
        expect(Array.from(encodeVarint(128))).toEqual([0x80, 0x01]);
        expect(Array.from(encodeVarint(321))).toEqual([0xc1, 0x02]);
    });

    it("switches width at each boundary", () => {
        expect(Array.from(encodeVarint(16_383))).toEqual([0xff, 0x7f]);
        expect(Array.from(encodeVarint(16_384))).toEqual([0x80, 0x80, 0x01]);
        expect(Array.from(encodeVarint(2_097_151))).toEqual([0xff, 0xff, 0x7f]);
        expect(Array.from(encodeVarint(2_097_152))).toEqual([0x80, 0x80, 0x80, 0x01]);
        expect(Array.from(encodeVarint(MAX_REMAINING_LENGTH))).toEqual([0xff, 0xff, 0xff, 0x7f]);
    });

    it("decodes each width boundary", () => {
        const cases: [number[], number][] = [
            [[0x7f], 127],
            [[0x80, 0x01], 128],
            [[0xff, 0x7f], 16_383],
            [[0x80, 0x80, 0x01], 16_384],
            [[0xff, 0xff, 0x7f], 2_097_151],
            [[0x80, 0x80, 0x80, 0x01], 2_097_152]
        ];
        for (const [raw, value] of cases) {
            expect(decodeVarintAt(peekFrom(Uint8Array.from(raw)), 0)).toEqual({ value, bytes: raw.length });
        }
    });

    it("decodes the largest four-byte value", () => {
        const buf = Uint8Array.from([0xff, 0xff, 0xff, 0x7f]);
        expect(decodeVarintAt(peekFrom(buf), 0)).toEqual({ value: 268_435_455, bytes: 4 });
    });

    it("decodes varints with offsets", () => {
        const buf = Uint8Array.from([0x00, 0x80, 0x01, 0x7f]);
        expect(decodeVarintAt(peekFrom(buf), 0)).toEqual({ value: 0, bytes: 1 });
        expect(decodeVarintAt(peekFrom(buf), 1)).toEqual({ value: 128, bytes: 2 });
        expect(decodeVarintAt(peekFrom(buf), 3)).toEqual({ value: 127, bytes: 1 });
    });

    it("returns null when the buffer is truncated", () => {
        expect(decodeVarintAt(peekFrom(Uint8Array.from([0x80])), 0)).toBeNull();
        expect(decodeVarintAt(peekFrom(Uint8Array.from([0xff, 0xff, 0xff])), 0)).toBeNull();
    });

    it("throws on a fifth length byte", () => {
        const buf = Uint8Array.from([0x80, 0x80, 0x80, 0x80, 0x01]);
        expect(() => decodeVarintAt(peekFrom(buf), 0)).toThrowError("Malformed Remaining Length varint");
    });

    it("throws on a non-minimal encoding", () => {
        const buf = Uint8Array.from([0x80, 0x00]);
        expect(() => decodeVarintAt(peekFrom(buf), 0)).toThrowError("Malformed Remaining Length varint");
    });

    it("rejects invalid inputs when encoding", () => {
        expect(() => encodeVarint(-1)).toThrowError("Invalid varint");
        expect(() => encodeVarint(1.5)).toThrowError("Invalid varint");
        expect(() => encodeVarint(268_435_456)).toThrowError("Remaining length too large: 268435456");
    });
});
