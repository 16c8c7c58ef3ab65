#!/usr/bin/env node
import { createClient } from "../client/client";
import type { MqttClient } from "../client/types";
import { logInfo, logWarn } from "../util/logger";
import { promptConnection } from "./connection";
import { formatMessage } from "./display";
import { loadEnv } from "./env";
import { reportFailure } from "./errors";
import { Prompter, parseQos, withDefault } from "./prompt";
import { resubscribeOnReconnect } from "./resubscribe";
import { waitForSignal } from "./signals";

async function main(): Promise<number> {
    logInfo("MQTT Client - press Ctrl+C to exit");

    const env = loadEnv();
    const prompter = new Prompter();
    let client: MqttClient | null = null;

    try {
        const config = await promptConnection(prompter.ask, env, "sub");

        let count = 0;
        client = createClient(config, {
            onMessage: (msg) => {
                count++;
                logInfo(formatMessage(count, msg));
            }
        });
        client.on("disconnect", ({ reason }) => {
            if (reason !== "requested") logWarn(`Connection unexpectedly lost (${reason})`);
        });
        client.on("reconnect", ({ attempt, delayMs }) => logInfo(`Reconnect attempt ${attempt} in ${delayMs}ms`));

        if (config.username) logInfo("Authentication with username configured");
        logInfo(`Connecting to ${config.host}:${config.port ?? ""}...`);
        await client.connect();
        logInfo("Successfully connected to MQTT server!");

        const topic = env.MQTT_NO_PROMPT
            ? env.MQTT_TOPIC
            : (await prompter.ask(withDefault("Topic to subscribe (example: test/topic)", env.MQTT_TOPIC))) ||
              env.MQTT_TOPIC;

        if (topic) {
            const qos = env.MQTT_NO_PROMPT
                ? env.MQTT_QOS ?? 0
                : parseQos((await prompter.ask(withDefault("QoS (0, 1, 2)", String(env.MQTT_QOS ?? 0)))) || String(env.MQTT_QOS ?? 0));
            logInfo(`Subscribing to topic: ${topic}`);
            const granted = await client.subscribe(topic, qos);
            resubscribeOnReconnect(client, [{ filter: topic, qos }]);
            logInfo(`Successfully subscribed to topic (QoS: ${granted})`);
            logInfo("Ready to receive messages... Press Ctrl+C to exit");
        } else {
            logWarn("No topic entered, only connection established. Press Ctrl+C to exit");
        }
        prompter.close();

        await waitForSignal();
        logInfo("Received exit signal...");
        return 0;
    } catch (err) {
        return reportFailure("Connection error", err);
    } finally {
        prompter.close();
        if (client?.connected) {
            logInfo("Disconnecting...");
        }
        await client?.disconnect();
        logInfo("Goodbye!");
    }
}

main().then(
    (code) => process.exit(code),
    (err: unknown) => process.exit(reportFailure("Unexpected error", err))
);
