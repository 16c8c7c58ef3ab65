export type MqttErrorKind =
    | "connect"
    | "auth"
    | "protocol"
    | "timeout"
    | "delivery"
    | "transport"
    | "disconnected"
    | "invalid_topic"
    | "subscription_rejected";

export class MqttError extends Error {
    readonly kind: MqttErrorKind;

    constructor(kind: MqttErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.kind = kind;
        this.name = new.target.name;
    }
}

/** Network unreachable, TLS handshake failure, broker unavailable. */
export class ConnectError extends MqttError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("connect", message, options);
    }
}

export class AuthError extends MqttError {
    constructor(message: string, readonly returnCode: number) {
        super("auth", message);
    }
}

/** Malformed packet or protocol violation. Always fatal to the current connection. */
export class ProtocolError extends MqttError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("protocol", message, options);
    }
}

export class TimeoutError extends MqttError {
    constructor(message: string) {
        super("timeout", message);
    }
}

/** QoS retry budget exhausted. The session stays up. */
export class DeliveryError extends MqttError {
    constructor(message: string, readonly packetId: number) {
        super("delivery", message);
    }
}

export class TransportError extends MqttError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("transport", message, options);
    }
}

export class DisconnectedError extends MqttError {
    constructor(message = "Disconnected") {
        super("disconnected", message);
    }
}

export class InvalidTopicError extends MqttError {
    constructor(message: string, readonly topic: string) {
        super("invalid_topic", message);
    }
}

export class SubscriptionRejectedError extends MqttError {
    constructor(readonly filter: string) {
        super("subscription_rejected", `Broker rejected subscription to "${filter}"`);
    }
}

export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
