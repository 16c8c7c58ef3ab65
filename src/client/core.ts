import { MqttParser } from "../codec/parser";
import { encodePacket } from "../codec/packet";
import { SUBACK_FAILURE, describeConnackCode, type ConnackPacket, type Packet, type PublishPacket, type SubackPacket } from "../codec/packets";
import {
    AuthError,
    ConnectError,
    DeliveryError,
    DisconnectedError,
    MqttError,
    ProtocolError,
    TimeoutError,
    TransportError,
    toError
} from "../errors";
import { tcpTransport } from "../transport/tcp";
import type { Transport, TransportFactory } from "../transport/interface";
import { backoff } from "../util/backoff";
import { Deferred } from "../util/deferred";
import defaultLogger, { type Logger } from "../util/logger";
import { validateTopicFilter, validateTopicName } from "../util/topic-match";
import { TypedEvent } from "../util/typed-event";
import { exceedsStrictClientId, resolveConfig, type ConnectionConfig, type ResolvedConnectionConfig } from "./config";
import { InboundQos2, OutboundInflight, PacketIdAllocator, type OutboundMessage } from "./inflight";
import { SubscriptionTable, type SubscriptionEntry } from "./subscriptions";
import type {
    DisconnectReason,
    IncomingMessage,
    MessageHandler,
    PublishOptions,
    PublishReceipt,
    QoS,
    SessionEventMap,
    SessionState,
    SubscriptionRequest,
    SubscriptionResult
} from "./types";

type PendingSubscribe = {
    requests: SubscriptionRequest[];
    deferred: Deferred<SubscriptionResult[]>;
    timer: ReturnType<typeof setTimeout>;
};

type PendingUnsubscribe = {
    filters: string[];
    deferred: Deferred<void>;
    timer: ReturnType<typeof setTimeout>;
};

export type SessionOptions = {
    transport?: TransportFactory;
    logger?: Logger;
    /** Source of jitter for reconnect backoff. */
    random?: () => number;
};

const now = () => Date.now();

function connackError(code: number): MqttError {
    const message = describeConnackCode(code);
    switch (code) {
        case 2:
        case 4:
        case 5:
            return new AuthError(message, code);
        case 3:
            return new ConnectError(message);
        default:
            return new ProtocolError(message);
    }
}

function reasonFor(error: MqttError): DisconnectReason {
    if (error instanceof AuthError) return "auth_failed";
    if (error instanceof TimeoutError) return "timeout";
    if (error instanceof ProtocolError) return "protocol_error";
    return "error";
}

/**
 * MQTT 3.1.1 session: connection phases, keepalive, packet identifiers,
 * in-flight QoS exchanges, the subscription table and reconnection.
 *
 * All state lives on the event loop: caller methods and transport callbacks
 * run to completion one at a time, so nothing here needs locking.
 */
export class MqttSession {
    readonly config: ResolvedConnectionConfig;

    private readonly logger: Logger;
    private readonly events: TypedEvent<SessionEventMap>;
    private readonly transportFactory: TransportFactory;
    private readonly random: () => number;

    private transport: Transport | null = null;
    private _state: SessionState = "disconnected";
    private readonly parser: MqttParser;

    private connectDeferred: Deferred<void> | null = null;
    private connectTimer: ReturnType<typeof setTimeout> | null = null;

    private lastSentAt = 0;
    private keepAliveTimer: ReturnType<typeof setTimeout> | null = null;
    private pingOutstanding = false;
    private pingTimeoutTimer: ReturnType<typeof setTimeout> | null = null;

    private reconnectAttempt = 0;
    private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
    /** True while connection attempts are driven by the reconnect loop. */
    private reconnecting = false;

    private readonly ids = new PacketIdAllocator();
    private readonly outbound = new OutboundInflight();
    private readonly inbound = new InboundQos2();
    private readonly subscriptions = new SubscriptionTable();

    private pendingSub = new Map<number, PendingSubscribe>();
    private pendingUnsub = new Map<number, PendingUnsubscribe>();

    private messageHandler: MessageHandler | null = null;

    constructor(config: ConnectionConfig, opts: SessionOptions = {}) {
        this.config = resolveConfig(config);
        this.logger = (opts.logger ?? defaultLogger).child({ clientId: this.config.clientId });
        this.events = new TypedEvent<SessionEventMap>(this.logger);
        this.transportFactory = opts.transport ?? tcpTransport;
        this.random = opts.random ?? Math.random;
        this.parser = new MqttParser(this.config.maxPacketBytes);

        if (exceedsStrictClientId(this.config.clientId)) {
            this.logger.warn(
                "Client identifier is longer than 23 bytes; strict MQTT 3.1.1 brokers may reject it"
            );
        }
    }

    // ----- Public state -----

    get state(): SessionState {
        return this._state;
    }

    get connected(): boolean {
        return this._state === "connected";
    }

    get inflightCount(): number {
        return this.outbound.size;
    }

    listSubscriptions(): SubscriptionEntry[] {
        return this.subscriptions.list();
    }

    setMessageHandler(handler: MessageHandler | null): void {
        this.messageHandler = handler;
    }

    on<K extends keyof SessionEventMap>(event: K, handler: (e: SessionEventMap[K]) => void): () => void {
        return this.events.on(event, handler);
    }

    // ----- Connect / Disconnect -----

    connect(): Promise<void> {
        if (this._state === "connected") return Promise.resolve();
        if (this._state === "connecting" && this.connectDeferred) return this.connectDeferred.promise;

        // An explicit connect during backoff takes over from the reconnect loop.
        this.clearReconnect();
        this.reconnecting = false;
        this.setState("connecting");
        return this.attempt();
    }

    disconnect(): Promise<void> {
        if (this._state === "disconnected") return Promise.resolve();

        this.setState("disconnecting");

        const transport = this.transport;
        if (transport?.isOpen) {
            try {
                transport.send(encodePacket({ type: "disconnect" }));
            } catch (err) {
                this.logger.debug({ err }, "DISCONNECT not sent");
            }
        }

        this.enterDisconnected("requested");
        return Promise.resolve();
    }

    // ----- Publish -----

    async publish(topic: string, payload: Uint8Array, opts: PublishOptions = {}): Promise<PublishReceipt> {
        validateTopicName(topic);
        const qos: QoS = opts.qos ?? 0;
        const retain = !!opts.retain;

        this.ensureConnected();

        if (qos === 0) {
            this.send({ type: "publish", topic, payload, qos, retain, dup: false });
            return { confirmed: Promise.resolve() };
        }

        const packetId = this.allocPacketId();
        const packet: PublishPacket = { type: "publish", topic, payload, qos, retain, dup: false, packetId };
        const confirmation = new Deferred<void>();
        // The caller may never look at `confirmed`; failures also go out on the error event.
        void confirmation.promise.catch((err: unknown) => {
            this.logger.debug({ err, packetId }, "Publish not confirmed");
        });

        const entry: OutboundMessage = {
            packetId,
            packet,
            stage: qos === 1 ? "awaiting_puback" : "awaiting_pubrec",
            retries: 0,
            lastSentAt: now(),
            confirmation,
            timer: null
        };
        this.outbound.add(entry);

        try {
            this.send(packet);
        } catch (err) {
            this.outbound.delete(packetId);
            throw err;
        }
        this.armRetry(entry);

        return { packetId, confirmed: confirmation.promise };
    }

    // ----- Subscribe / Unsubscribe -----

    async subscribe(requests: SubscriptionRequest[]): Promise<SubscriptionResult[]> {
        if (requests.length === 0) {
            throw new RangeError("subscribe() needs at least one filter");
        }
        for (const r of requests) validateTopicFilter(r.filter);
        this.ensureConnected();
        return this.sendSubscribe(requests);
    }

    async unsubscribe(filters: string[]): Promise<void> {
        if (filters.length === 0) {
            throw new RangeError("unsubscribe() needs at least one filter");
        }
        for (const f of filters) validateTopicFilter(f);
        this.ensureConnected();

        const packetId = this.allocPacketId();
        const deferred = new Deferred<void>();
        const timer = setTimeout(() => {
            this.pendingUnsub.delete(packetId);
            deferred.reject(new TimeoutError(`UNSUBACK timeout (packetId=${packetId})`));
        }, this.ackTimeoutMs());

        this.pendingUnsub.set(packetId, { filters, deferred, timer });
        try {
            this.send({ type: "unsubscribe", packetId, filters });
        } catch (err) {
            clearTimeout(timer);
            this.pendingUnsub.delete(packetId);
            throw err;
        }
        return deferred.promise;
    }

    private sendSubscribe(requests: SubscriptionRequest[]): Promise<SubscriptionResult[]> {
        const packetId = this.allocPacketId();
        const deferred = new Deferred<SubscriptionResult[]>();
        const timer = setTimeout(() => {
            this.pendingSub.delete(packetId);
            deferred.reject(new TimeoutError(`SUBACK timeout (packetId=${packetId})`));
        }, this.ackTimeoutMs());

        this.pendingSub.set(packetId, { requests, deferred, timer });
        try {
            this.send({ type: "subscribe", packetId, subscriptions: requests });
        } catch (err) {
            clearTimeout(timer);
            this.pendingSub.delete(packetId);
            throw err;
        }
        return deferred.promise;
    }

    // ----- Connection attempts -----

    private attempt(): Promise<void> {
        const deferred = new Deferred<void>();
        this.connectDeferred = deferred;

        const transport = this.transportFactory({
            host: this.config.host,
            port: this.config.port,
            tls: this.config.tls
        });
        this.transport = transport;
        this.parser.reset();
        this.pingOutstanding = false;

        transport.onData((chunk) => this.onData(transport, chunk));
        transport.onClose((err) => this.onTransportClosed(transport, err));

        this.connectTimer = setTimeout(() => {
            this.connectTimer = null;
            this.failConnect(new TimeoutError(`CONNACK timeout after ${this.config.connectTimeoutMs}ms`));
        }, this.config.connectTimeoutMs);

        this.logger.info({ host: this.config.host, port: this.config.port }, "Connecting");

        void transport.open().then(
            () => {
                if (this.transport !== transport || this._state !== "connecting") {
                    transport.close();
                    return;
                }
                this.sendConnect();
            },
            (err: unknown) => {
                if (this.transport !== transport) return;
                const error = err instanceof MqttError ? err : new ConnectError(toError(err).message, { cause: err });
                this.failConnect(error);
            }
        );

        return deferred.promise;
    }

    private sendConnect(): void {
        const { clientId, cleanSession, keepAliveSec, username, password, will } = this.config;
        try {
            this.send({ type: "connect", clientId, cleanSession, keepAliveSec, username, password, will });
        } catch (err) {
            this.failConnect(err instanceof MqttError ? err : new TransportError(toError(err).message, { cause: err }));
        }
    }

    private failConnect(error: MqttError): void {
        if (this._state !== "connecting") return;

        const deferred = this.connectDeferred;
        this.connectDeferred = null;
        this.clearConnectTimer();
        this.dropTransport();

        const retryable = !(error instanceof AuthError) && !(error instanceof ProtocolError);
        if (this.reconnecting && retryable && this.config.reconnect.enabled) {
            this.logger.warn({ err: error }, "Reconnect attempt failed");
            this.scheduleReconnect();
        } else {
            if (this.reconnecting) {
                this.events.emit("error", { error });
            }
            this.enterDisconnected(reasonFor(error), error);
        }

        deferred?.reject(error);
    }

    private onConnack(p: ConnackPacket): void {
        if (p.returnCode !== 0) {
            this.failConnect(connackError(p.returnCode));
            return;
        }

        const deferred = this.connectDeferred;
        this.connectDeferred = null;
        this.clearConnectTimer();
        this.reconnecting = false;
        this.reconnectAttempt = 0;

        if (this.config.cleanSession) {
            this.discardSessionState(new DisconnectedError("Session discarded by clean start"));
        }

        this.setState("connected");
        this.logger.info({ sessionPresent: p.sessionPresent }, "Connected");
        this.startKeepAlive();

        if (!this.config.cleanSession) {
            this.restoreSession(p.sessionPresent);
        }

        this.events.emit("connect", { sessionPresent: p.sessionPresent });
        deferred?.resolve();
    }

    /**
     * Persistent session resume: re-issue subscriptions the broker forgot and
     * retransmit every unacknowledged outbound message with DUP set.
     */
    private restoreSession(sessionPresent: boolean): void {
        const filters = this.subscriptions.list();
        if (!sessionPresent && filters.length > 0) {
            void this.sendSubscribe(filters.map((s) => ({ filter: s.filter, qos: s.requestedQos }))).catch((err: unknown) => {
                this.logger.warn({ err }, "Restoring subscriptions failed");
            });
        }

        for (const entry of this.outbound.values()) {
            this.retransmit(entry);
            this.armRetry(entry);
        }
    }

    // ----- Inbound -----

    private onData(transport: Transport, chunk: Uint8Array): void {
        if (transport !== this.transport) return;

        let packets: Packet[];
        try {
            packets = this.parser.push(chunk);
        } catch (err) {
            this.protocolViolation(err);
            return;
        }

        for (const p of packets) {
            if (transport !== this.transport) return;
            try {
                this.handlePacket(p);
            } catch (err) {
                this.protocolViolation(err);
                return;
            }
        }

        const failure = this.parser.failure;
        if (failure && transport === this.transport) {
            this.protocolViolation(failure);
        }
    }

    private handlePacket(p: Packet): void {
        if (this._state === "connecting") {
            if (p.type !== "connack") {
                throw new ProtocolError(`Expected CONNACK, got ${p.type.toUpperCase()}`);
            }
            this.onConnack(p);
            return;
        }

        switch (p.type) {
            case "publish":
                this.onPublish(p);
                break;
            case "puback":
                this.onPuback(p.packetId);
                break;
            case "pubrec":
                this.onPubrec(p.packetId);
                break;
            case "pubrel":
                this.inbound.release(p.packetId);
                this.post({ type: "pubcomp", packetId: p.packetId });
                break;
            case "pubcomp":
                this.onPubcomp(p.packetId);
                break;
            case "suback":
                this.onSuback(p);
                break;
            case "unsuback":
                this.onUnsuback(p.packetId);
                break;
            case "pingresp":
                this.onPingresp();
                break;
            default:
                throw new ProtocolError(`Unexpected ${p.type.toUpperCase()} from broker`);
        }
    }

    private onPublish(p: PublishPacket): void {
        switch (p.qos) {
            case 0:
                this.deliver(p);
                break;
            case 1:
                this.post({ type: "puback", packetId: this.requirePacketId(p) });
                this.deliver(p);
                break;
            case 2: {
                const packetId = this.requirePacketId(p);
                const first = this.inbound.record(packetId);
                this.post({ type: "pubrec", packetId });
                if (first) {
                    this.deliver(p);
                } else {
                    this.logger.debug({ packetId }, "QoS 2 PUBLISH replayed before PUBREL; not redelivered");
                }
                break;
            }
        }
    }

    private deliver(p: PublishPacket): void {
        const msg: IncomingMessage = {
            topic: p.topic,
            payload: p.payload,
            qos: p.qos,
            retain: p.retain,
            dup: p.dup,
            packetId: p.packetId,
            matches: this.subscriptions.match(p.topic),
            receivedAt: new Date()
        };

        if (msg.matches.length === 0) {
            this.logger.debug({ topic: p.topic }, "PUBLISH matches no local subscription");
        }

        this.events.emit("message", msg);
        const handler = this.messageHandler;
        if (!handler) return;
        try {
            handler(msg);
        } catch (err) {
            this.logger.error({ err, topic: p.topic }, "Message handler threw");
        }
    }

    private onPuback(packetId: number): void {
        const entry = this.outbound.get(packetId);
        if (!entry || entry.stage !== "awaiting_puback") {
            this.logger.debug({ packetId }, "PUBACK for unknown packet id ignored");
            return;
        }
        this.outbound.delete(packetId);
        entry.confirmation.resolve();
    }

    private onPubrec(packetId: number): void {
        const entry = this.outbound.get(packetId);
        if (!entry || entry.stage === "awaiting_puback") {
            this.logger.debug({ packetId }, "PUBREC for unknown packet id ignored");
            return;
        }
        if (entry.stage === "awaiting_pubrec") {
            entry.stage = "awaiting_pubcomp";
            entry.retries = 0;
        }
        this.post({ type: "pubrel", packetId });
        entry.lastSentAt = now();
        this.armRetry(entry);
    }

    private onPubcomp(packetId: number): void {
        const entry = this.outbound.get(packetId);
        if (!entry || entry.stage !== "awaiting_pubcomp") {
            this.logger.debug({ packetId }, "PUBCOMP for unknown packet id ignored");
            return;
        }
        this.outbound.delete(packetId);
        entry.confirmation.resolve();
    }

    private onSuback(p: SubackPacket): void {
        const pending = this.pendingSub.get(p.packetId);
        if (!pending) {
            this.logger.debug({ packetId: p.packetId }, "SUBACK for unknown packet id ignored");
            return;
        }
        if (p.returnCodes.length !== pending.requests.length) {
            throw new ProtocolError(
                `SUBACK carries ${p.returnCodes.length} return codes for ${pending.requests.length} filters`
            );
        }
        clearTimeout(pending.timer);
        this.pendingSub.delete(p.packetId);

        const results = pending.requests.map((r, i): SubscriptionResult => {
            const code = p.returnCodes[i];
            if (code === undefined || code === SUBACK_FAILURE) {
                this.subscriptions.remove(r.filter);
                return { filter: r.filter, requestedQos: r.qos, grantedQos: null };
            }
            this.subscriptions.grant(r.filter, r.qos, code);
            return { filter: r.filter, requestedQos: r.qos, grantedQos: code };
        });
        pending.deferred.resolve(results);
    }

    private onUnsuback(packetId: number): void {
        const pending = this.pendingUnsub.get(packetId);
        if (!pending) {
            this.logger.debug({ packetId }, "UNSUBACK for unknown packet id ignored");
            return;
        }
        clearTimeout(pending.timer);
        this.pendingUnsub.delete(packetId);
        for (const f of pending.filters) this.subscriptions.remove(f);
        pending.deferred.resolve();
    }

    private requirePacketId(p: PublishPacket): number {
        if (p.packetId === undefined) {
            throw new ProtocolError("QoS > 0 PUBLISH without packet identifier");
        }
        return p.packetId;
    }

    // ----- Failure handling -----

    private protocolViolation(err: unknown): void {
        const error = err instanceof MqttError ? err : new ProtocolError(toError(err).message, { cause: err });
        this.logger.error({ err: error }, "Protocol violation; dropping connection");
        if (this._state === "connecting") {
            this.failConnect(error);
        } else {
            this.handleConnectionLoss(error);
        }
    }

    private onTransportClosed(transport: Transport, err?: TransportError): void {
        if (transport !== this.transport) return;
        this.transport = null;

        if (this._state === "connecting") {
            const cause = err ?? new TransportError("Connection closed by broker");
            this.failConnect(new ConnectError(`Connection closed before CONNACK: ${cause.message}`, { cause }));
            return;
        }
        this.handleConnectionLoss(err ?? new TransportError("Connection closed by broker"));
    }

    private handleConnectionLoss(error: MqttError): void {
        if (this._state !== "connected") return;

        this.logger.warn({ err: error }, "Connection lost");
        this.stopKeepAlive();
        this.outbound.stopTimers();
        this.dropTransport();
        this.failPendingAcks(new DisconnectedError("Connection lost"));

        const reason: DisconnectReason = error instanceof TransportError && !error.cause ? "socket_closed" : reasonFor(error);
        this.events.emit("error", { error });
        this.events.emit("disconnect", { reason, error });

        if (this.config.cleanSession) {
            this.discardSessionState(new DisconnectedError("Session discarded after connection loss"));
        }

        if (this.config.reconnect.enabled) {
            this.reconnecting = true;
            this.scheduleReconnect();
        } else {
            this.enterDisconnected(reason, error, false);
        }
    }

    /**
     * Terminal transition. Pending operations fail with DisconnectedError;
     * a persistent session keeps its subscription table for the next connect().
     */
    private enterDisconnected(reason: DisconnectReason, error?: MqttError, announce = true): void {
        this.reconnecting = false;
        this.clearReconnect();
        this.stopKeepAlive();
        this.clearConnectTimer();
        this.dropTransport();

        const disconnected = new DisconnectedError();
        this.connectDeferred?.reject(error ?? disconnected);
        this.connectDeferred = null;

        this.failPendingAcks(disconnected);
        for (const entry of this.outbound.drain()) {
            entry.confirmation.reject(disconnected);
        }
        this.inbound.clear();
        if (this.config.cleanSession) {
            this.subscriptions.clear();
        }

        this.setState("disconnected");
        if (announce) {
            this.events.emit("disconnect", { reason, error });
        }
        this.logger.info({ reason }, "Disconnected");
    }

    private discardSessionState(err: DisconnectedError): void {
        for (const entry of this.outbound.drain()) {
            entry.confirmation.reject(err);
        }
        this.inbound.clear();
        this.subscriptions.clear();
        this.ids.reset();
    }

    private failPendingAcks(err: Error): void {
        for (const [, p] of this.pendingSub) {
            clearTimeout(p.timer);
            p.deferred.reject(err);
        }
        for (const [, p] of this.pendingUnsub) {
            clearTimeout(p.timer);
            p.deferred.reject(err);
        }
        this.pendingSub.clear();
        this.pendingUnsub.clear();
    }

    // ----- QoS retries -----

    private armRetry(entry: OutboundMessage): void {
        if (entry.timer != null) clearTimeout(entry.timer);
        entry.timer = setTimeout(() => this.onRetryDue(entry.packetId), this.config.retry.intervalMs);
    }

    private onRetryDue(packetId: number): void {
        const entry = this.outbound.get(packetId);
        if (!entry) return;
        entry.timer = null;
        // Offline entries are retransmitted by restoreSession().
        if (!this.connected) return;

        if (entry.retries >= this.config.retry.maxAttempts) {
            this.outbound.delete(packetId);
            const awaited = entry.stage.replace("awaiting_", "").toUpperCase();
            const error = new DeliveryError(
                `No ${awaited} for packet ${packetId} after ${entry.retries} retransmissions`,
                packetId
            );
            this.logger.warn({ packetId }, error.message);
            entry.confirmation.reject(error);
            this.events.emit("error", { error });
            return;
        }

        entry.retries++;
        this.retransmit(entry);
        this.armRetry(entry);
    }

    private retransmit(entry: OutboundMessage): void {
        if (entry.stage === "awaiting_pubcomp") {
            this.post({ type: "pubrel", packetId: entry.packetId });
        } else {
            this.post({ ...entry.packet, dup: true });
        }
        entry.lastSentAt = now();
    }

    // ----- Keepalive -----

    private startKeepAlive(): void {
        this.stopKeepAlive();
        if (this.config.keepAliveSec <= 0) return;
        this.armKeepAlive();
    }

    private armKeepAlive(): void {
        const keepAliveMs = this.config.keepAliveSec * 1000;
        const due = Math.max(0, this.lastSentAt + keepAliveMs - now());
        this.keepAliveTimer = setTimeout(() => this.onKeepAliveDue(), due);
    }

    private onKeepAliveDue(): void {
        this.keepAliveTimer = null;
        if (!this.connected) return;

        const keepAliveMs = this.config.keepAliveSec * 1000;
        if (now() - this.lastSentAt >= keepAliveMs && !this.pingOutstanding) {
            this.pingOutstanding = true;
            this.post({ type: "pingreq" });
            this.pingTimeoutTimer = setTimeout(() => {
                this.pingTimeoutTimer = null;
                if (!this.pingOutstanding) return;
                this.handleConnectionLoss(
                    new TimeoutError(`No PINGRESP within ${this.config.pingTimeoutMs}ms`)
                );
            }, this.config.pingTimeoutMs);
            // Re-armed from PINGRESP.
            return;
        }
        this.armKeepAlive();
    }

    private onPingresp(): void {
        if (!this.pingOutstanding) return;
        this.pingOutstanding = false;
        if (this.pingTimeoutTimer != null) {
            clearTimeout(this.pingTimeoutTimer);
            this.pingTimeoutTimer = null;
        }
        if (this.keepAliveTimer == null && this.config.keepAliveSec > 0) {
            this.armKeepAlive();
        }
    }

    private stopKeepAlive(): void {
        if (this.keepAliveTimer != null) {
            clearTimeout(this.keepAliveTimer);
            this.keepAliveTimer = null;
        }
        if (this.pingTimeoutTimer != null) {
            clearTimeout(this.pingTimeoutTimer);
            this.pingTimeoutTimer = null;
        }
        this.pingOutstanding = false;
    }

    // ----- Reconnect -----

    private scheduleReconnect(): void {
        this.clearReconnect();
        this.setState("reconnecting");

        const delay = backoff(this.reconnectAttempt++, this.config.reconnect, this.random);
        this.logger.info({ attempt: this.reconnectAttempt, delayMs: delay }, "Reconnecting");
        this.events.emit("reconnect", { attempt: this.reconnectAttempt, delayMs: delay });

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            this.setState("connecting");
            void this.attempt().catch((err: unknown) => {
                this.logger.debug({ err }, "Reconnect attempt rejected");
            });
        }, delay);
    }

    private clearReconnect(): void {
        if (this.reconnectTimer != null) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
    }

    // ----- Helpers -----

    private send(packet: Packet): void {
        const transport = this.transport;
        if (!transport || !transport.isOpen) {
            throw new DisconnectedError("Not connected");
        }
        transport.send(encodePacket(packet));
        this.lastSentAt = now();
    }

    /** Send from inside the receive path; a dead transport is reported by its close event. */
    private post(packet: Packet): void {
        try {
            this.send(packet);
        } catch (err) {
            this.logger.debug({ err, type: packet.type }, "Packet not sent");
        }
    }

    private ensureConnected(): void {
        if (!this.connected) {
            throw new DisconnectedError(`Not connected (state: ${this._state})`);
        }
    }

    private allocPacketId(): number {
        return this.ids.allocate(
            (id) => this.outbound.has(id) || this.pendingSub.has(id) || this.pendingUnsub.has(id)
        );
    }

    private ackTimeoutMs(): number {
        return Math.max(1000, this.config.connectTimeoutMs);
    }

    private dropTransport(): void {
        const transport = this.transport;
        this.transport = null;
        transport?.close();
    }

    private clearConnectTimer(): void {
        if (this.connectTimer != null) {
            clearTimeout(this.connectTimer);
            this.connectTimer = null;
        }
    }

    private setState(to: SessionState): void {
        const from = this._state;
        if (from === to) return;
        this._state = to;
        this.events.emit("state", { from, to });
    }
}
