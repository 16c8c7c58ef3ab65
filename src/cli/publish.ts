#!/usr/bin/env node
import { createClient } from "../client/client";
import type { MqttClient } from "../client/types";
import { logInfo, logWarn } from "../util/logger";
import { promptConnection } from "./connection";
import { loadEnv } from "./env";
import { reportFailure } from "./errors";
import { loadPayload } from "./payload";
import { Prompter, parseQos, parseYesNo, withDefault } from "./prompt";

async function main(): Promise<number> {
    logInfo("MQTT Publisher");

    const env = loadEnv();

    let payload: string;
    try {
        payload = await loadPayload(env.MQTT_PAYLOAD_FILE);
    } catch (err) {
        reportFailure("Cannot proceed without valid payload", err);
        return 1;
    }
    logInfo(`Payload to be sent:\n${payload}`);

    const prompter = new Prompter();
    let client: MqttClient | null = null;

    try {
        const config = await promptConnection(prompter.ask, env, "pub");
        client = createClient(config);
        client.on("disconnect", ({ reason }) => {
            if (reason !== "requested") logWarn(`Connection unexpectedly lost (${reason})`);
        });

        logInfo(`Connecting to ${config.host}:${config.port ?? ""}...`);
        await client.connect();
        logInfo("Successfully connected to MQTT server!");

        let topic: string | undefined;
        let qos = env.MQTT_QOS ?? 0;
        let retain = false;
        if (env.MQTT_NO_PROMPT) {
            topic = env.MQTT_TOPIC;
        } else {
            topic = (await prompter.ask(withDefault("Topic to publish to (example: test/topic)", env.MQTT_TOPIC))) || env.MQTT_TOPIC;
            qos = parseQos((await prompter.ask(withDefault("QoS (0, 1, 2)", String(qos)))) || String(qos));
            retain = parseYesNo(await prompter.ask(withDefault("Retain message? (y/n)", "n")));
        }
        prompter.close();

        if (!topic) {
            logWarn("Topic is required for publishing");
            return 1;
        }

        logInfo("Publishing message...");
        const receipt = await client.publish(topic, payload, { qos, retain });
        await receipt.confirmed;
        logInfo(
            receipt.packetId === undefined
                ? "Message published successfully!"
                : `Message successfully published (Message ID: ${receipt.packetId})`
        );
        logInfo(`Topic: ${topic} | QoS: ${qos} | Retain: ${retain}`);
        return 0;
    } catch (err) {
        return reportFailure("Failed to publish message", err);
    } finally {
        prompter.close();
        await client?.disconnect();
    }
}

main().then(
    (code) => process.exit(code),
    (err: unknown) => process.exit(reportFailure("Unexpected error", err))
);
