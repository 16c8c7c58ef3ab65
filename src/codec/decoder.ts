import { decodeUtf8, readBinary, readString, readU16BE } from "./binary";
import { decodeVarintAt } from "./varint";
import { ProtocolError } from "../errors";
import {
    SUBACK_FAILURE,
    isQoS,
    packetTypeName,
    type ConnackPacket,
    type ConnectPacket,
    type Packet,
    type PacketTypeName,
    type PublishPacket,
    type SubackPacket,
    type SubackReturnCode,
    type SubscribePacket,
    type UnsubscribePacket,
    type Will
} from "./packets";

function readPacketId(body: Uint8Array, offset: number): number {
    const id = readU16BE(body, offset);
    if (id === 0) {
        throw new ProtocolError("Packet identifier must be non-zero");
    }
    return id;
}

function expectLength(name: string, body: Uint8Array, len: number): void {
    if (body.length !== len) {
        throw new ProtocolError(`Malformed ${name}: expected ${len} bytes, got ${body.length}`);
    }
}

export function decodeConnect(body: Uint8Array): ConnectPacket {
    let offset = 0;
    const protocol = readString(body, offset);
    offset += protocol.bytes;
    if (protocol.value !== "MQTT") {
        throw new ProtocolError(`Unsupported protocol name: ${protocol.value}`);
    }
    if (offset + 4 > body.length) {
        throw new ProtocolError("Malformed CONNECT");
    }
    const level = body[offset++]!;
    if (level !== 0x04) {
        throw new ProtocolError(`Unsupported protocol level: ${level}`);
    }
    const flags = body[offset++]!;
    if ((flags & 0x01) !== 0) {
        throw new ProtocolError("Malformed CONNECT: reserved flag set");
    }
    const keepAliveSec = readU16BE(body, offset);
    offset += 2;

    const clientId = readString(body, offset);
    offset += clientId.bytes;

    const packet: ConnectPacket = {
        type: "connect",
        clientId: clientId.value,
        cleanSession: (flags & 0x02) !== 0,
        keepAliveSec
    };

    if (flags & 0x04) {
        const willQos = (flags >> 3) & 0x03;
        if (!isQoS(willQos)) {
            throw new ProtocolError("Malformed CONNECT: invalid will QoS");
        }
        const topic = readString(body, offset);
        offset += topic.bytes;
        const payload = readBinary(body, offset);
        offset += payload.bytes;
        const will: Will = { topic: topic.value, payload: payload.value, qos: willQos, retain: (flags & 0x20) !== 0 };
        packet.will = will;
    }
    if (flags & 0x80) {
        const username = readString(body, offset);
        offset += username.bytes;
        packet.username = username.value;
    }
    if (flags & 0x40) {
        const password = readBinary(body, offset);
        offset += password.bytes;
        packet.password = decodeUtf8(password.value);
    }
    if (offset !== body.length) {
        throw new ProtocolError("Malformed CONNECT: trailing bytes");
    }
    return packet;
}

export function decodeConnack(body: Uint8Array): ConnackPacket {
    if (body.length !== 2) {
        throw new ProtocolError("Malformed CONNACK");
    }
    return { type: "connack", sessionPresent: (body[0]! & 0x01) === 0x01, returnCode: body[1]! };
}

export function decodeSuback(body: Uint8Array): SubackPacket {
    if (body.length < 3) {
        throw new ProtocolError("Malformed SUBACK");
    }
    const packetId = readPacketId(body, 0);
    const returnCodes: SubackReturnCode[] = [];
    for (const code of body.slice(2)) {
        if (code === SUBACK_FAILURE || isQoS(code)) {
            returnCodes.push(code);
        } else {
            throw new ProtocolError(`Malformed SUBACK: invalid return code ${code}`);
        }
    }
    return { type: "suback", packetId, returnCodes };
}

export function decodeSubscribe(body: Uint8Array): SubscribePacket {
    const packetId = readPacketId(body, 0);
    let offset = 2;
    const subscriptions: SubscribePacket["subscriptions"] = [];
    while (offset < body.length) {
        const filter = readString(body, offset);
        offset += filter.bytes;
        const qos = body[offset++];
        if (qos === undefined || !isQoS(qos)) {
            throw new ProtocolError("Malformed SUBSCRIBE: invalid requested QoS");
        }
        subscriptions.push({ filter: filter.value, qos });
    }
    if (subscriptions.length === 0) {
        throw new ProtocolError("Malformed SUBSCRIBE: no topic filters");
    }
    return { type: "subscribe", packetId, subscriptions };
}

export function decodeUnsubscribe(body: Uint8Array): UnsubscribePacket {
    const packetId = readPacketId(body, 0);
    let offset = 2;
    const filters: string[] = [];
    while (offset < body.length) {
        const filter = readString(body, offset);
        offset += filter.bytes;
        filters.push(filter.value);
    }
    if (filters.length === 0) {
        throw new ProtocolError("Malformed UNSUBSCRIBE: no topic filters");
    }
    return { type: "unsubscribe", packetId, filters };
}

export function decodePublish(flags: number, body: Uint8Array): PublishPacket {
    const retain = (flags & 0x01) === 0x01;
    const qos = (flags >> 1) & 0x03;
    const dup = (flags & 0x08) === 0x08;

    if (!isQoS(qos)) {
        throw new ProtocolError("Malformed PUBLISH (QoS 3)");
    }
    if (qos === 0 && dup) {
        throw new ProtocolError("Malformed PUBLISH (DUP set on QoS 0)");
    }

    let offset = 0;
    const topic = readString(body, offset);
    offset += topic.bytes;
    if (topic.value.includes("+") || topic.value.includes("#")) {
        throw new ProtocolError(`Malformed PUBLISH (wildcard in topic "${topic.value}")`);
    }

    const packet: PublishPacket = { type: "publish", topic: topic.value, payload: new Uint8Array(), qos, retain, dup };
    if (qos > 0) {
        if (offset + 2 > body.length) {
            throw new ProtocolError("Malformed PUBLISH (missing packet id)");
        }
        packet.packetId = readPacketId(body, offset);
        offset += 2;
    }

    packet.payload = body.slice(offset);
    return packet;
}

function requiredFlags(type: PacketTypeName): number | null {
    switch (type) {
        case "publish":
            return null;
        case "pubrel":
        case "subscribe":
        case "unsubscribe":
            return 0x02;
        default:
            return 0x00;
    }
}

/**
 * Decodes a packet body once the fixed header has been split off.
 */
export function decodeBody(typeCode: number, flags: number, body: Uint8Array): Packet {
    const type = packetTypeName(typeCode);
    if (!type) {
        throw new ProtocolError(`Unknown packet type: ${typeCode}`);
    }
    const expected = requiredFlags(type);
    if (expected !== null && flags !== expected) {
        throw new ProtocolError(`Malformed ${type.toUpperCase()}: invalid fixed header flags 0x${flags.toString(16)}`);
    }

    switch (type) {
        case "connect":
            return decodeConnect(body);
        case "connack":
            return decodeConnack(body);
        case "publish":
            return decodePublish(flags, body);
        case "puback":
        case "pubrec":
        case "pubrel":
        case "pubcomp":
        case "unsuback":
            expectLength(type.toUpperCase(), body, 2);
            return { type, packetId: readPacketId(body, 0) };
        case "subscribe":
            return decodeSubscribe(body);
        case "suback":
            return decodeSuback(body);
        case "unsubscribe":
            return decodeUnsubscribe(body);
        case "pingreq":
        case "pingresp":
        case "disconnect":
            expectLength(type.toUpperCase(), body, 0);
            return { type };
    }
}

/**
 * Decodes one packet starting at `offset`. Returns null while the buffer holds
 * less than a full packet; the buffer itself is never modified.
 */
export function decodePacket(
    buf: Uint8Array,
    offset = 0,
    maxPacketBytes = Number.MAX_SAFE_INTEGER
): { packet: Packet; bytes: number } | null {
    if (buf.length - offset < 2) {
        return null;
    }
    const byte1 = buf[offset]!;
    const rl = decodeVarintAt((i) => (i < buf.length ? buf[i]! : null), offset + 1);
    if (!rl) {
        return null;
    }
    if (rl.value > maxPacketBytes) {
        throw new ProtocolError(`Packet too large: ${rl.value}`);
    }
    const headerBytes = 1 + rl.bytes;
    const total = headerBytes + rl.value;
    if (buf.length - offset < total) {
        return null;
    }
    const body = buf.subarray(offset + headerBytes, offset + total);
    return { packet: decodeBody(byte1 >> 4, byte1 & 0x0f, body), bytes: total };
}
