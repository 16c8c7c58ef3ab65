export { connect, createClient } from "./client/client";
export type { ClientOptions } from "./client/client";
export { MqttSession } from "./client/core";
export type { SessionOptions } from "./client/core";
export { connectionConfigSchema, resolveConfig } from "./client/config";
export type { ConnectionConfig, ResolvedConnectionConfig } from "./client/config";
export type {
    MqttClient,
    IncomingMessage,
    MessageHandler,
    QoS,
    PublishOptions,
    PublishReceipt,
    SessionEventMap,
    SessionState,
    SubscriptionEntry,
    SubscriptionRequest,
    SubscriptionResult
} from "./client/types";
export { encodePacket } from "./codec/packet";
export { decodePacket } from "./codec/decoder";
export { MqttParser } from "./codec/parser";
export type { Packet } from "./codec/packets";
export { matchTopic } from "./util/topic-match";
export { TcpTransport } from "./transport/tcp";
export type { Transport, TransportFactory, TransportOptions } from "./transport/interface";
export * from "./errors";
