import type { TransportError } from "../errors";

/**
 * Byte-stream connection to a broker. Implementations never retry: every
 * failure after `open()` resolves is reported once through `onClose`.
 */
export interface Transport {
    /** Resolves once the stream is writable; rejects with ConnectError. */
    open(): Promise<void>;

    /** Hand bytes to the stream. Throws TransportError when not open. */
    send(data: Uint8Array): void;

    /** Close without waiting for the peer. Does not invoke the close handler. */
    close(): void;

    readonly isOpen: boolean;

    onData(handler: (data: Uint8Array) => void): void;

    /** `error` is absent when the peer closed the stream cleanly. */
    onClose(handler: (error?: TransportError) => void): void;
}

export type TlsOptions = {
    enabled: boolean;
    ca?: string | Buffer;
    cert?: string | Buffer;
    key?: string | Buffer;
    servername?: string;
    rejectUnauthorized: boolean;
};

export type TransportOptions = {
    host: string;
    port: number;
    tls?: TlsOptions;
};

export type TransportFactory = (opts: TransportOptions) => Transport;
