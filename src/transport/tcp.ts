import net from "node:net";
import tls from "node:tls";
import { ConnectError, TransportError } from "../errors";
import defaultLogger, { type Logger } from "../util/logger";
import type { Transport, TransportOptions } from "./interface";

/**
 * MQTT over plain TCP, or over TLS when `tls.enabled` is set.
 */
export class TcpTransport implements Transport {
    private socket: net.Socket | null = null;
    private dataHandler: ((data: Uint8Array) => void) | null = null;
    private closeHandler: ((error?: TransportError) => void) | null = null;
    private closedLocally = false;

    constructor(private readonly opts: TransportOptions, private readonly logger: Logger = defaultLogger) { }

    get isOpen(): boolean {
        return this.socket !== null && !this.socket.destroyed && this.socket.writable;
    }

    open(): Promise<void> {
        if (this.socket) {
            return Promise.reject(new ConnectError("Transport already opened"));
        }
        this.closedLocally = false;

        return new Promise<void>((resolve, reject) => {
            const socket = this.createSocket();
            const readyEvent = this.opts.tls?.enabled ? "secureConnect" : "connect";
            this.socket = socket;
            socket.setNoDelay(true);

            const onReady = () => {
                socket.off("error", onEarlyError);
                this.attach(socket);
                resolve();
            };
            const onEarlyError = (err: Error) => {
                socket.off(readyEvent, onReady);
                socket.destroy();
                this.socket = null;
                reject(new ConnectError(`Cannot connect to ${this.opts.host}:${this.opts.port}: ${err.message}`, { cause: err }));
            };

            socket.once(readyEvent, onReady);
            socket.once("error", onEarlyError);
        });
    }

    send(data: Uint8Array): void {
        const socket = this.socket;
        if (!socket || !this.isOpen) {
            throw new TransportError("Transport is not open");
        }
        socket.write(data);
    }

    close(): void {
        this.closedLocally = true;
        const socket = this.socket;
        this.socket = null;
        if (socket) {
            socket.end();
            socket.destroy();
        }
    }

    onData(handler: (data: Uint8Array) => void): void {
        this.dataHandler = handler;
    }

    onClose(handler: (error?: TransportError) => void): void {
        this.closeHandler = handler;
    }

    private createSocket(): net.Socket {
        const { host, port } = this.opts;
        const t = this.opts.tls;
        if (!t?.enabled) {
            return net.connect({ host, port });
        }
        if (!t.rejectUnauthorized) {
            this.logger.warn({ host, port }, "TLS certificate validation is disabled");
        }
        return tls.connect({
            host,
            port,
            ca: t.ca,
            cert: t.cert,
            key: t.key,
            servername: t.servername ?? (net.isIP(host) ? undefined : host),
            rejectUnauthorized: t.rejectUnauthorized
        });
    }

    private attach(socket: net.Socket): void {
        let failure: TransportError | undefined;

        socket.on("data", (chunk: Buffer) => {
            this.dataHandler?.(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
        });
        socket.on("error", (err: Error) => {
            failure = new TransportError(err.message, { cause: err });
        });
        socket.on("close", () => {
            if (this.socket === socket) {
                this.socket = null;
            }
            if (this.closedLocally) {
                return;
            }
            this.closeHandler?.(failure);
        });
    }
}

export const tcpTransport = (opts: TransportOptions): Transport => new TcpTransport(opts);
