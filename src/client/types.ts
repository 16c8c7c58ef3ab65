import type { QoS, SubackReturnCode } from "../codec/packets";
import type { MqttError } from "../errors";
import type { SubscriptionEntry } from "./subscriptions";

export type { QoS, SubackReturnCode, SubscriptionEntry };

export type SessionState = "disconnected" | "connecting" | "connected" | "reconnecting" | "disconnecting";

export type IncomingMessage = {
    topic: string;
    payload: Uint8Array;
    qos: QoS;
    retain: boolean;
    dup: boolean;
    /** Set for QoS 1 and 2; callers deduplicating QoS 1 redeliveries key on it. */
    packetId?: number;
    /** Subscribed filters that match `topic`. Empty when the broker routed it otherwise. */
    matches: string[];
    receivedAt: Date;
};

export type MessageHandler = (msg: IncomingMessage) => void;

export type SubscriptionRequest = {
    filter: string;
    qos: QoS;
};

export type SubscriptionResult = {
    filter: string;
    requestedQos: QoS;
    /** Granted QoS, or null when the broker rejected this filter. */
    grantedQos: QoS | null;
};

export type PublishOptions = {
    qos?: QoS;
    retain?: boolean;
};

export type PublishReceipt = {
    /** Absent for QoS 0. */
    packetId?: number;
    /**
     * Settles on the terminal acknowledgment (PUBACK for QoS 1, PUBCOMP for
     * QoS 2); already resolved for QoS 0.
     */
    confirmed: Promise<void>;
};

export type DisconnectReason =
    | "requested"
    | "socket_closed"
    | "timeout"
    | "protocol_error"
    | "auth_failed"
    | "error";

export type SessionEventMap = {
    state: { from: SessionState; to: SessionState };
    connect: { sessionPresent: boolean };
    reconnect: { attempt: number; delayMs: number };
    disconnect: { reason: DisconnectReason; error?: MqttError };
    error: { error: MqttError };
    message: IncomingMessage;
};

export type MqttClient = {
    readonly state: SessionState;
    readonly connected: boolean;
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    /** Resolves with the QoS the broker granted; rejects if it refused the filter. */
    subscribe(filter: string, qos?: QoS): Promise<QoS>;
    /** Per-filter outcome; a refused filter does not fail the others. */
    subscribeMany(requests: SubscriptionRequest[]): Promise<SubscriptionResult[]>;
    unsubscribe(filter: string | string[]): Promise<void>;
    publish(topic: string, payload: string | Uint8Array, opts?: PublishOptions): Promise<PublishReceipt>;
    /** Replaces the inbound message handler; null removes it. */
    onMessage(handler: MessageHandler | null): void;
    subscriptions(): SubscriptionEntry[];
    on<K extends keyof SessionEventMap>(event: K, handler: (e: SessionEventMap[K]) => void): () => void;
};
