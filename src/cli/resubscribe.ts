import type { MqttClient, SubscriptionRequest } from "../client/types";
import { logInfo, logWarn } from "../util/logger";

/**
 * Re-issues `requests` after every reconnect for filters missing from the
 * client's table. A clean session loses its table on each connection loss;
 * a persistent one keeps it and the session restores the broker side itself.
 *
 * Returns the unsubscribe function of the underlying listener.
 */
export function resubscribeOnReconnect(client: MqttClient, requests: SubscriptionRequest[]): () => void {
    return client.on("connect", () => {
        const active = new Set(client.subscriptions().map((s) => s.filter));
        const missing = requests.filter((r) => !active.has(r.filter));
        if (missing.length === 0) return;

        logInfo(`Reconnected; subscribing again to ${missing.map((r) => r.filter).join(", ")}`);
        void client.subscribeMany(missing).then(
            (results) => {
                for (const r of results) {
                    if (r.grantedQos === null) logWarn(`Broker rejected subscription to ${r.filter}`);
                }
            },
            (err: unknown) => {
                logWarn(`Subscribing again failed: ${err instanceof Error ? err.message : String(err)}`);
            }
        );
    });
}
