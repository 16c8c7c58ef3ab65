import { describe, expect, it } from "vitest";
import { connectPacket, publishPacket } from "../src/codec/packet";
import { encodeUtf8 } from "../src/codec/binary";
import { MqttParser } from "../src/codec/parser";
import type { Packet } from "../src/codec/packets";
import { ProtocolError } from "../src/errors";
import { ByteQueue } from "../src/util/byte-queue";

describe("ByteQueue", () => {
    it("tracks length, peek, and readSlice correctly", () => {
        const q = new ByteQueue();
        q.push(Uint8Array.from([0x01, 0x02, 0x03]));
        q.push(Uint8Array.from([0x04]));

        expect(q.length).toBe(4);
        expect(q.peek(0)).toBe(0x01);
        expect(q.peek(3)).toBe(0x04);
        expect(q.peek(4)).toBeNull();

        const firstTwo = q.readSlice(2);
        expect(Array.from(firstTwo)).toEqual([0x01, 0x02]);
        expect(q.length).toBe(2);

        q.skip(1);
        expect(q.length).toBe(1);
        expect(q.peek(0)).toBe(0x04);
    });

    it("reads across chunk boundaries", () => {
        const q = new ByteQueue();
        q.push(Uint8Array.from([0x01]));
        q.push(new Uint8Array());
        q.push(Uint8Array.from([0x02, 0x03]));

        expect(Array.from(q.readSlice(3))).toEqual([0x01, 0x02, 0x03]);
        expect(q.length).toBe(0);
    });

    it("throws on underflow when reading or skipping too much", () => {
        const q = new ByteQueue();
        q.push(Uint8Array.from([0xaa]));
        expect(() => q.readSlice(2)).toThrowError(new RangeError("ByteQueue underflow"));
        expect(() => q.skip(5)).toThrowError("ByteQueue underflow");
    });
});

describe("MqttParser", () => {
    it("waits for full headers before emitting packets", () => {
        const parser = new MqttParser();
        const connect = connectPacket({ clientId: "c1", cleanSession: true, keepAliveSec: 60 });

        expect(parser.push(connect.subarray(0, 1))).toHaveLength(0);
        expect(parser.push(connect.subarray(1))).toEqual([
            { type: "connect", clientId: "c1", cleanSession: true, keepAliveSec: 60 }
        ]);
    });

    it("parses multiple packets even when chunks are concatenated", () => {
        const parser = new MqttParser();
        const packets = parser.push(Uint8Array.from([0xc0, 0x00, 0xd0, 0x00, 0xe0]));

        expect(packets).toEqual([{ type: "pingreq" }, { type: "pingresp" }]);
        expect(parser.push(Uint8Array.from([0x00]))).toEqual([{ type: "disconnect" }]);
    });

    it("yields one packet when fed a byte at a time", () => {
        const parser = new MqttParser();
        const bytes = publishPacket("a/b", encodeUtf8("hello"), { qos: 1, packetId: 4 });

        const seen: Packet[] = [];
        for (const b of bytes) {
            seen.push(...parser.push(Uint8Array.from([b])));
        }

        expect(seen).toEqual([
            { type: "publish", topic: "a/b", payload: encodeUtf8("hello"), qos: 1, retain: false, dup: false, packetId: 4 }
        ]);
    });

    it("rejects packets larger than configured maximum", () => {
        const parser = new MqttParser(1);
        const oversized = Uint8Array.from([0x30, 0x02, 0x00, 0x00]);
        expect(() => parser.push(oversized)).toThrowError("Packet too large: 2");
    });

    it("returns packets decoded ahead of a malformed frame and then fails", () => {
        const parser = new MqttParser();

        // PINGRESP, then PUBLISH with QoS bits 11
        expect(parser.push(Uint8Array.from([0xd0, 0x00, 0x36, 0x00]))).toEqual([{ type: "pingresp" }]);
        expect(parser.failure).toEqual(new ProtocolError("Malformed PUBLISH (QoS 3)"));
        expect(() => parser.push(Uint8Array.from([0xd0, 0x00]))).toThrowError("Malformed PUBLISH (QoS 3)");

        parser.reset();
        expect(parser.failure).toBeNull();
        expect(parser.push(Uint8Array.from([0xd0, 0x00]))).toEqual([{ type: "pingresp" }]);
    });

    it("throws straight away when the first frame is malformed", () => {
        const parser = new MqttParser();
        expect(() => parser.push(Uint8Array.from([0x36, 0x00]))).toThrowError("Malformed PUBLISH (QoS 3)");
        expect(parser.failure).toBeNull();
    });

    it("drops partial input on reset", () => {
        const parser = new MqttParser();
        parser.push(Uint8Array.from([0x30, 0x05, 0x00]));
        parser.reset();

        expect(parser.push(Uint8Array.from([0xd0, 0x00]))).toEqual([{ type: "pingresp" }]);
    });
});
