import { concat, encodeBinary, encodeString, u16be, encodeUtf8 } from "./binary";
import { encodeVarint } from "./varint";
import { ProtocolError } from "../errors";
import type {
    ConnectPacket,
    Packet,
    PublishPacket,
    QoS,
    SubackReturnCode,
    Will
} from "./packets";

export type ConnectOptions = {
    clientId: string;
    cleanSession: boolean;
    keepAliveSec: number;
    username?: string;
    password?: string;
    will?: Will;
};

function packet(typeAndFlags: number, body: Uint8Array): Uint8Array {
    const rl = encodeVarint(body.length);
    return concat([Uint8Array.from([typeAndFlags]), rl, body]);
}

function assertPacketId(packetId: number): void {
    if (!Number.isInteger(packetId) || packetId < 1 || packetId > 0xffff) {
        throw new ProtocolError(`Invalid packet identifier: ${packetId}`);
    }
}

function ackPacket(typeAndFlags: number, packetId: number): Uint8Array {
    assertPacketId(packetId);
    return packet(typeAndFlags, u16be(packetId));
}

export function connectPacket(opts: ConnectOptions): Uint8Array {
    const protocolName = encodeString("MQTT");
    const protocolLevel = Uint8Array.from([0x04]); // MQTT 3.1.1

    const { username, password, will } = opts;

    if (password !== undefined && username === undefined) {
        throw new ProtocolError("Password flag requires a username");
    }

    let flags = 0;
    if (username !== undefined) {
        flags |= 0x80;
    }
    if (password !== undefined) {
        flags |= 0x40;
    }
    if (will) {
        flags |= 0x04 | (will.qos << 3);
        if (will.retain) {
            flags |= 0x20;
        }
    }
    if (opts.cleanSession) {
        flags |= 0x02;
    }

    const keepAlive = u16be(opts.keepAliveSec);
    const vh = concat([protocolName, protocolLevel, Uint8Array.from([flags]), keepAlive]);

    const payloadParts: Uint8Array[] = [encodeString(opts.clientId)];
    if (will) {
        payloadParts.push(encodeString(will.topic), encodeBinary(will.payload));
    }
    if (username !== undefined) {
        payloadParts.push(encodeString(username));
    }
    if (password !== undefined) {
        payloadParts.push(encodeBinary(encodeUtf8(password)));
    }

    return packet(0x10, concat([vh, concat(payloadParts)]));
}

export function connackPacket(sessionPresent: boolean, returnCode: number): Uint8Array {
    return packet(0x20, Uint8Array.from([sessionPresent ? 0x01 : 0x00, returnCode & 0xff]));
}

export function pingreqPacket(): Uint8Array {
    return Uint8Array.from([0xc0, 0x00]);
}

export function pingrespPacket(): Uint8Array {
    return Uint8Array.from([0xd0, 0x00]);
}

export function disconnectPacket(): Uint8Array {
    return Uint8Array.from([0xe0, 0x00]);
}

export function subscribePacket(packetId: number, topics: Array<{ topic: string; qos: QoS }>): Uint8Array {
    assertPacketId(packetId);
    if (topics.length === 0) {
        throw new ProtocolError("SUBSCRIBE requires at least one topic filter");
    }
    const pid = u16be(packetId);
    const items: Uint8Array[] = [];
    for (const t of topics) {
        items.push(concat([encodeString(t.topic), Uint8Array.from([t.qos])]));
    }
    return packet(0x82, concat([pid, ...items]));
}

export function subackPacket(packetId: number, returnCodes: SubackReturnCode[]): Uint8Array {
    assertPacketId(packetId);
    return packet(0x90, concat([u16be(packetId), Uint8Array.from(returnCodes)]));
}

export function unsubscribePacket(packetId: number, topics: string[]): Uint8Array {
    assertPacketId(packetId);
    if (topics.length === 0) {
        throw new ProtocolError("UNSUBSCRIBE requires at least one topic filter");
    }
    const pid = u16be(packetId);
    const items: Uint8Array[] = topics.map(encodeString);
    return packet(0xa2, concat([pid, ...items]));
}

export function publishPacket(
    topic: string,
    payload: Uint8Array,
    opts: { qos?: QoS; retain?: boolean; dup?: boolean; packetId?: number } = {}
): Uint8Array {
    const qos = opts.qos ?? 0;
    const retain = !!opts.retain;
    const dup = !!opts.dup;

    if (qos === 0 && dup) {
        throw new ProtocolError("DUP flag must be 0 for QoS 0 PUBLISH");
    }

    let flags = 0;
    if (dup) {
        flags |= 0x08;
    }
    flags |= (qos & 0x03) << 1;
    if (retain) {
        flags |= 0x01;
    }

    const topicName = encodeString(topic);
    let pid = new Uint8Array();
    if (qos > 0) {
        if (opts.packetId === undefined) {
            throw new ProtocolError("QoS > 0 PUBLISH requires a packet identifier");
        }
        assertPacketId(opts.packetId);
        pid = u16be(opts.packetId);
    }

    return packet(0x30 | flags, concat([topicName, pid, payload]));
}

export const pubackPacket = (packetId: number) => ackPacket(0x40, packetId);
export const pubrecPacket = (packetId: number) => ackPacket(0x50, packetId);
export const pubrelPacket = (packetId: number) => ackPacket(0x62, packetId);
export const pubcompPacket = (packetId: number) => ackPacket(0x70, packetId);
export const unsubackPacket = (packetId: number) => ackPacket(0xb0, packetId);

function encodeConnect(p: ConnectPacket): Uint8Array {
    return connectPacket({
        clientId: p.clientId,
        cleanSession: p.cleanSession,
        keepAliveSec: p.keepAliveSec,
        username: p.username,
        password: p.password,
        will: p.will
    });
}

function encodePublish(p: PublishPacket): Uint8Array {
    return publishPacket(p.topic, p.payload, { qos: p.qos, retain: p.retain, dup: p.dup, packetId: p.packetId });
}

export function encodePacket(p: Packet): Uint8Array {
    switch (p.type) {
        case "connect":
            return encodeConnect(p);
        case "connack":
            return connackPacket(p.sessionPresent, p.returnCode);
        case "publish":
            return encodePublish(p);
        case "puback":
            return pubackPacket(p.packetId);
        case "pubrec":
            return pubrecPacket(p.packetId);
        case "pubrel":
            return pubrelPacket(p.packetId);
        case "pubcomp":
            return pubcompPacket(p.packetId);
        case "subscribe":
            return subscribePacket(p.packetId, p.subscriptions.map((s) => ({ topic: s.filter, qos: s.qos })));
        case "suback":
            return subackPacket(p.packetId, p.returnCodes);
        case "unsubscribe":
            return unsubscribePacket(p.packetId, p.filters);
        case "unsuback":
            return unsubackPacket(p.packetId);
        case "pingreq":
            return pingreqPacket();
        case "pingresp":
            return pingrespPacket();
        case "disconnect":
            return disconnectPacket();
    }
}

export function normalizePayload(payload: string | Uint8Array): Uint8Array {
    return typeof payload === "string" ? encodeUtf8(payload) : payload;
}
