export type QoS = 0 | 1 | 2;

/** SUBACK return code: granted QoS, or 0x80 for a rejected filter. */
export type SubackReturnCode = QoS | 0x80;

export const SUBACK_FAILURE = 0x80;

export const PacketType = {
    connect: 1,
    connack: 2,
    publish: 3,
    puback: 4,
    pubrec: 5,
    pubrel: 6,
    pubcomp: 7,
    subscribe: 8,
    suback: 9,
    unsubscribe: 10,
    unsuback: 11,
    pingreq: 12,
    pingresp: 13,
    disconnect: 14
} as const;

export type PacketTypeName = keyof typeof PacketType;

const PACKET_TYPE_NAMES: readonly PacketTypeName[] = [
    "connect",
    "connack",
    "publish",
    "puback",
    "pubrec",
    "pubrel",
    "pubcomp",
    "subscribe",
    "suback",
    "unsubscribe",
    "unsuback",
    "pingreq",
    "pingresp",
    "disconnect"
];

export function packetTypeName(code: number): PacketTypeName | undefined {
    return PACKET_TYPE_NAMES[code - 1];
}

export type Will = {
    topic: string;
    payload: Uint8Array;
    qos: QoS;
    retain: boolean;
};

export type ConnectPacket = {
    type: "connect";
    clientId: string;
    cleanSession: boolean;
    keepAliveSec: number;
    username?: string;
    password?: string;
    will?: Will;
};

export type ConnackPacket = {
    type: "connack";
    sessionPresent: boolean;
    returnCode: number;
};

export type PublishPacket = {
    type: "publish";
    topic: string;
    payload: Uint8Array;
    qos: QoS;
    retain: boolean;
    dup: boolean;
    /** Present iff qos > 0. */
    packetId?: number;
};

export type PubackPacket = { type: "puback"; packetId: number };
export type PubrecPacket = { type: "pubrec"; packetId: number };
export type PubrelPacket = { type: "pubrel"; packetId: number };
export type PubcompPacket = { type: "pubcomp"; packetId: number };

export type SubscribePacket = {
    type: "subscribe";
    packetId: number;
    subscriptions: Array<{ filter: string; qos: QoS }>;
};

export type SubackPacket = {
    type: "suback";
    packetId: number;
    returnCodes: SubackReturnCode[];
};

export type UnsubscribePacket = {
    type: "unsubscribe";
    packetId: number;
    filters: string[];
};

export type UnsubackPacket = { type: "unsuback"; packetId: number };
export type PingreqPacket = { type: "pingreq" };
export type PingrespPacket = { type: "pingresp" };
export type DisconnectPacket = { type: "disconnect" };

export type Packet =
    | ConnectPacket
    | ConnackPacket
    | PublishPacket
    | PubackPacket
    | PubrecPacket
    | PubrelPacket
    | PubcompPacket
    | SubscribePacket
    | SubackPacket
    | UnsubscribePacket
    | UnsubackPacket
    | PingreqPacket
    | PingrespPacket
    | DisconnectPacket;

export function isQoS(n: number): n is QoS {
    return n === 0 || n === 1 || n === 2;
}

/** CONNACK return codes 1-5 as defined by MQTT 3.1.1. */
export const CONNACK_MESSAGES: Readonly<Record<number, string>> = {
    1: "Connection refused - Invalid protocol version",
    2: "Connection refused - Invalid client identifier",
    3: "Connection refused - Server unavailable",
    4: "Connection refused - Bad username or password",
    5: "Connection refused - Not authorized"
};

export function describeConnackCode(code: number): string {
    return CONNACK_MESSAGES[code] ?? `Unknown error - Code: ${code}`;
}
