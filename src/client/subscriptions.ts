import { matchTopic } from "../util/topic-match";
import type { QoS } from "./types";

export type SubscriptionEntry = {
    filter: string;
    /** QoS asked for in SUBSCRIBE; re-requested when a session is restored. */
    requestedQos: QoS;
    grantedQos: QoS;
};

/**
 * Filters the broker has granted, keyed by filter. Entries are added per
 * SUBACK return code and removed on UNSUBACK or session reset.
 */
export class SubscriptionTable {
    private entries = new Map<string, SubscriptionEntry>();

    grant(filter: string, requestedQos: QoS, grantedQos: QoS): void {
        this.entries.set(filter, { filter, requestedQos, grantedQos });
    }

    remove(filter: string): boolean {
        return this.entries.delete(filter);
    }

    list(): SubscriptionEntry[] {
        return Array.from(this.entries.values());
    }

    match(topic: string): string[] {
        const out: string[] = [];
        for (const filter of this.entries.keys()) {
            if (matchTopic(filter, topic)) out.push(filter);
        }
        return out;
    }

    clear(): void {
        this.entries.clear();
    }
}
