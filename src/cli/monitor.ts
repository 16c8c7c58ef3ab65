#!/usr/bin/env node
import { createClient } from "../client/client";
import type { MqttClient, SubscriptionRequest } from "../client/types";
import { logInfo, logWarn } from "../util/logger";
import { COMMAND_HELP, MonitorConsole, parseCommand } from "./commands";
import { promptConnection } from "./connection";
import { formatMessage } from "./display";
import { loadEnv, type CliEnv } from "./env";
import { reportFailure } from "./errors";
import { MessageLog } from "./message-log";
import { Prompter, parseYesNo } from "./prompt";
import { resubscribeOnReconnect } from "./resubscribe";
import { waitForSignal } from "./signals";

const MONITOR_FILTERS = ["sensors/+/temperature", "sensors/+/humidity", "alerts/#", "status/#"];
const DEFAULT_TOPIC = "test/topic";

/** Subscribes to every request, warning about the filters the broker refuses. */
async function subscribeAll(client: MqttClient, requests: SubscriptionRequest[]): Promise<void> {
    for (const r of requests) logInfo(`Subscribing to topic: ${r.filter}`);
    const results = await client.subscribeMany(requests);
    for (const r of results) {
        if (r.grantedQos === null) logWarn(`Broker rejected subscription to ${r.filter}`);
        else logInfo(`Subscribed to ${r.filter} (QoS: ${r.grantedQos})`);
    }
    resubscribeOnReconnect(client, requests);
}

/** Passive mode: watch the monitor filters until a signal, then save what arrived. */
async function monitoring(client: MqttClient, log: MessageLog, env: CliEnv): Promise<void> {
    const filters = env.MQTT_MONITOR_TOPICS ?? MONITOR_FILTERS;
    await subscribeAll(client, filters.map((filter) => ({ filter, qos: env.MQTT_QOS ?? 0 })));

    logInfo("Monitoring mode active - receiving messages... Press Ctrl+C to exit");
    await waitForSignal();
    logInfo("Exiting monitoring mode...");

    const { totalMessages } = log.statistics();
    logInfo(`Total messages received: ${totalMessages}`);
    if (totalMessages > 0) {
        await new MonitorConsole(client, log).save();
    }
}

/** Command console over the default topic; offers to save the log on the way out. */
async function interactive(client: MqttClient, log: MessageLog, env: CliEnv, prompter: Prompter): Promise<void> {
    await subscribeAll(client, [{ filter: env.MQTT_TOPIC ?? DEFAULT_TOPIC, qos: env.MQTT_QOS ?? 0 }]);

    const commands = new MonitorConsole(client, log);
    logInfo("Monitoring mode activated");
    for (const line of COMMAND_HELP) logInfo(line);

    for (; ;) {
        let line: string;
        try {
            line = await prompter.ask("> ");
        } catch (err) {
            if (prompter.interrupted) break;
            throw err;
        }
        if (!(await commands.run(parseCommand(line)))) break;
    }

    if (log.size > 0 && !prompter.interrupted) {
        if (parseYesNo(await prompter.ask("Do you want to save the message log? (y/n) "))) {
            await commands.save();
        }
    }
}

async function main(argv: string[]): Promise<number> {
    const passive = argv[0] === "monitor";
    logInfo(passive ? "MQTT Monitor" : "MQTT Monitor - interactive console");

    const env = loadEnv();
    const prompter = new Prompter();
    const log = new MessageLog();
    let client: MqttClient | null = null;
    let count = 0;

    try {
        const config = await promptConnection(prompter.ask, passive ? { ...env, MQTT_NO_PROMPT: true } : env, "sub");
        client = createClient(config, {
            onMessage: (msg) => {
                count++;
                log.record(msg);
                logInfo(formatMessage(count, msg));
            }
        });
        client.on("disconnect", ({ reason }) => {
            if (reason !== "requested") logWarn(`Connection unexpectedly lost (${reason})`);
        });
        client.on("reconnect", ({ attempt, delayMs }) => logInfo(`Reconnect attempt ${attempt} in ${delayMs}ms`));

        logInfo(`Connecting to ${config.host}:${config.port ?? ""}`);
        logInfo(`Client ID: ${config.clientId}`);
        await client.connect();
        logInfo("Successfully connected to MQTT server!");

        if (passive) {
            prompter.close();
            await monitoring(client, log, env);
        } else {
            await interactive(client, log, env, prompter);
        }
        return 0;
    } catch (err) {
        return reportFailure("Monitor error", err);
    } finally {
        prompter.close();
        await client?.disconnect();
        logInfo("Goodbye!");
    }
}

main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => process.exit(reportFailure("Unexpected error", err))
);
