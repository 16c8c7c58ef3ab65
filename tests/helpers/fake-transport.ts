import { encodePacket } from "../../src/codec/packet";
import { MqttParser } from "../../src/codec/parser";
import type { Packet } from "../../src/codec/packets";
import { ConnectError, TransportError } from "../../src/errors";
import type { Transport, TransportFactory, TransportOptions } from "../../src/transport/interface";

/**
 * In-process stand-in for a broker connection. Tests read what the session
 * wrote through `sentPackets()` and play the broker with `receive()`.
 */
export class FakeTransport implements Transport {
    isOpen = false;
    closed = false;
    sent: Uint8Array[] = [];

    private dataHandler: ((data: Uint8Array) => void) | null = null;
    private closeHandler: ((error?: TransportError) => void) | null = null;

    constructor(readonly opts: TransportOptions, private readonly failOpen: boolean) { }

    open(): Promise<void> {
        if (this.failOpen) {
            return Promise.reject(new ConnectError(`Cannot connect to ${this.opts.host}:${this.opts.port}: ECONNREFUSED`));
        }
        this.isOpen = true;
        return Promise.resolve();
    }

    send(data: Uint8Array): void {
        if (!this.isOpen) throw new TransportError("Transport is not open");
        this.sent.push(data);
    }

    close(): void {
        this.isOpen = false;
        this.closed = true;
    }

    onData(handler: (data: Uint8Array) => void): void {
        this.dataHandler = handler;
    }

    onClose(handler: (error?: TransportError) => void): void {
        this.closeHandler = handler;
    }

    receive(packet: Packet | Uint8Array): void {
        this.dataHandler?.(packet instanceof Uint8Array ? packet : encodePacket(packet));
    }

    /** Broker side hangs up; without `error` this is a clean close. */
    drop(error?: TransportError): void {
        this.isOpen = false;
        this.closeHandler?.(error);
    }

    sentPackets(): Packet[] {
        const parser = new MqttParser();
        return this.sent.flatMap((chunk) => parser.push(chunk));
    }

    lastSent(): Packet | undefined {
        return this.sentPackets().at(-1);
    }
}

export type FakeNetwork = {
    factory: TransportFactory;
    transports: FakeTransport[];
    /** Most recently created transport. */
    readonly current: FakeTransport;
    /** Number of upcoming open() calls that fail. */
    failNextOpens: number;
};

export function fakeNetwork(): FakeNetwork {
    const net: FakeNetwork = {
        transports: [],
        failNextOpens: 0,
        get current(): FakeTransport {
            const t = net.transports.at(-1);
            if (!t) throw new Error("No transport created yet");
            return t;
        },
        factory: (opts) => {
            const fail = net.failNextOpens > 0;
            if (fail) net.failNextOpens--;
            const t = new FakeTransport(opts, fail);
            net.transports.push(t);
            return t;
        }
    };
    return net;
}

/** Lets pending promise callbacks (transport open, async facade calls) run. */
export async function flush(): Promise<void> {
    for (let i = 0; i < 10; i++) {
        await Promise.resolve();
    }
}
