import { normalizePayload } from "../codec/packet";
import { SubscriptionRejectedError } from "../errors";
import type { ConnectionConfig } from "./config";
import { MqttSession, type SessionOptions } from "./core";
import type {
    MessageHandler,
    MqttClient,
    PublishOptions,
    QoS,
    SessionEventMap,
    SubscriptionRequest
} from "./types";

export type ClientOptions = SessionOptions & {
    onMessage?: MessageHandler;
};

/**
 * Creates a client that owns one session. Nothing is sent until connect().
 */
export function createClient(config: ConnectionConfig, options: ClientOptions = {}): MqttClient {
    const { onMessage, ...sessionOptions } = options;
    const session = new MqttSession(config, sessionOptions);
    if (onMessage) {
        session.setMessageHandler(onMessage);
    }

    return {
        get state() {
            return session.state;
        },

        get connected() {
            return session.connected;
        },

        connect() {
            return session.connect();
        },

        disconnect() {
            return session.disconnect();
        },

        async subscribe(filter: string, qos: QoS = 0) {
            const [result] = await session.subscribe([{ filter, qos }]);
            if (!result || result.grantedQos === null) {
                throw new SubscriptionRejectedError(filter);
            }
            return result.grantedQos;
        },

        subscribeMany(requests: SubscriptionRequest[]) {
            return session.subscribe(requests);
        },

        unsubscribe(filter: string | string[]) {
            return session.unsubscribe(Array.isArray(filter) ? filter : [filter]);
        },

        publish(topic: string, payload: string | Uint8Array, opts?: PublishOptions) {
            return session.publish(topic, normalizePayload(payload), opts);
        },

        onMessage(handler: MessageHandler | null) {
            session.setMessageHandler(handler);
        },

        subscriptions() {
            return session.listSubscriptions();
        },

        on<K extends keyof SessionEventMap>(event: K, handler: (e: SessionEventMap[K]) => void) {
            return session.on(event, handler);
        }
    };
}

/**
 * Creates a client and waits for CONNACK. Rejects with ConnectError,
 * AuthError, ProtocolError or TimeoutError.
 */
export async function connect(config: ConnectionConfig, options: ClientOptions = {}): Promise<MqttClient> {
    const client = createClient(config, options);
    await client.connect();
    return client;
}
