import { readFileSync } from "node:fs";
import { randomUUID } from "node:crypto";
import type { ConnectionConfig } from "../client/config";
import type { CliEnv } from "./env";
import { parsePort, withDefault, type Ask } from "./prompt";

export const DEFAULT_HOST = "broker.hivemq.com";
export const DEFAULT_PORT = 1883;

export type ClientRole = "sub" | "pub";

function tlsFromEnv(env: CliEnv): ConnectionConfig["tls"] {
    if (!env.MQTT_USE_SSL) return undefined;
    const read = (path: string | undefined) => (path === undefined ? undefined : readFileSync(path));
    return {
        enabled: true,
        ca: read(env.MQTT_CA_CERT_PATH),
        cert: read(env.MQTT_CERT_FILE_PATH),
        key: read(env.MQTT_KEY_FILE_PATH),
        rejectUnauthorized: true
    };
}

/**
 * Client ids get a role suffix so a subscriber and a publisher started with
 * the same id do not take over each other's session.
 */
export function roleClientId(base: string | undefined, role: ClientRole): string {
    const id = base && base.length > 0 ? base : `mqtt-console-${randomUUID().slice(0, 8)}`;
    return `${id}-${role}`;
}

/**
 * Builds the connection config from the environment, asking for every value
 * unless prompting is switched off. Answers left blank keep the env value or
 * the built-in default.
 */
export async function promptConnection(ask: Ask, env: CliEnv, role: ClientRole): Promise<ConnectionConfig> {
    const tls = tlsFromEnv(env);
    const defaultPort = env.MQTT_PORT ?? (tls ? 8883 : DEFAULT_PORT);

    if (env.MQTT_NO_PROMPT) {
        return {
            host: env.MQTT_HOST ?? DEFAULT_HOST,
            port: defaultPort,
            username: env.MQTT_USERNAME,
            password: env.MQTT_USERNAME ? env.MQTT_PASSWORD : undefined,
            clientId: roleClientId(env.MQTT_CLIENT_ID, role),
            tls
        };
    }

    const host = (await ask(withDefault("Server address", env.MQTT_HOST ?? DEFAULT_HOST))) || env.MQTT_HOST || DEFAULT_HOST;
    const port = parsePort(await ask(withDefault("Port", String(defaultPort))), defaultPort);
    const username = (await ask(withDefault("Username (optional)", env.MQTT_USERNAME))) || env.MQTT_USERNAME;
    const password = (await ask("Password (optional): ")) || env.MQTT_PASSWORD;
    const clientId = (await ask(withDefault("Client ID (optional)", env.MQTT_CLIENT_ID))) || env.MQTT_CLIENT_ID;

    return {
        host,
        port,
        username: username || undefined,
        // MQTT 3.1.1 has no password without a username.
        password: username ? password || undefined : undefined,
        clientId: roleClientId(clientId, role),
        tls
    };
}
