import type { PublishPacket } from "../codec/packets";
import type { Deferred } from "../util/deferred";

export type OutboundStage = "awaiting_puback" | "awaiting_pubrec" | "awaiting_pubcomp";

export type OutboundMessage = {
    packetId: number;
    packet: PublishPacket;
    stage: OutboundStage;
    /** Retransmissions so far; the first send is not counted. */
    retries: number;
    lastSentAt: number;
    confirmation: Deferred<void>;
    timer: ReturnType<typeof setTimeout> | null;
};

/**
 * Hands out packet identifiers 1..65535, skipping ids still held by an
 * outstanding exchange.
 */
export class PacketIdAllocator {
    private next = 1;

    allocate(inUse: (id: number) => boolean): number {
        for (let i = 0; i < 0xffff; i++) {
            const id = this.next;
            this.next = id === 0xffff ? 1 : id + 1;
            if (!inUse(id)) {
                return id;
            }
        }
        throw new RangeError("No free packet identifier");
    }

    reset(): void {
        this.next = 1;
    }
}

export class OutboundInflight {
    private messages = new Map<number, OutboundMessage>();

    get size(): number {
        return this.messages.size;
    }

    has(packetId: number): boolean {
        return this.messages.has(packetId);
    }

    get(packetId: number): OutboundMessage | undefined {
        return this.messages.get(packetId);
    }

    add(msg: OutboundMessage): void {
        this.messages.set(msg.packetId, msg);
    }

    delete(packetId: number): OutboundMessage | undefined {
        const msg = this.messages.get(packetId);
        if (msg) {
            if (msg.timer != null) clearTimeout(msg.timer);
            this.messages.delete(packetId);
        }
        return msg;
    }

    /** Oldest first, which is the order they must be retransmitted in. */
    values(): OutboundMessage[] {
        return Array.from(this.messages.values());
    }

    stopTimers(): void {
        for (const msg of this.messages.values()) {
            if (msg.timer != null) {
                clearTimeout(msg.timer);
                msg.timer = null;
            }
        }
    }

    drain(): OutboundMessage[] {
        const all = this.values();
        this.stopTimers();
        this.messages.clear();
        return all;
    }
}

/** Inbound QoS 2 ids for which PUBREC was sent and PUBREL is still due. */
export class InboundQos2 {
    private ids = new Set<number>();

    /** Returns false when the id was already recorded, i.e. the PUBLISH is a replay. */
    record(packetId: number): boolean {
        if (this.ids.has(packetId)) return false;
        this.ids.add(packetId);
        return true;
    }

    release(packetId: number): boolean {
        return this.ids.delete(packetId);
    }

    clear(): void {
        this.ids.clear();
    }
}
