import { z } from "zod";

const flag = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((v) => v === "true" || v === "1" || v === "yes");

const optionalText = z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

export const envSchema = z.object({
    MQTT_HOST: optionalText,
    MQTT_PORT: z.coerce.number().int().min(1).max(65535).optional(),
    MQTT_USERNAME: optionalText,
    MQTT_PASSWORD: optionalText,
    MQTT_CLIENT_ID: optionalText,
    MQTT_TOPIC: optionalText,
    MQTT_QOS: z.coerce.number().pipe(z.union([z.literal(0), z.literal(1), z.literal(2)])).optional(),
    MQTT_USE_SSL: flag.default("false"),
    MQTT_CA_CERT_PATH: optionalText,
    MQTT_CERT_FILE_PATH: optionalText,
    MQTT_KEY_FILE_PATH: optionalText,
    MQTT_PAYLOAD_FILE: optionalText,
    /** Comma-separated filters for `mqtt-monitor monitor`. */
    MQTT_MONITOR_TOPICS: optionalText.transform((v) =>
        v === undefined
            ? undefined
            : v
                .split(",")
                .map((t) => t.trim())
                .filter((t) => t.length > 0)
    ),
    MQTT_NO_PROMPT: flag.default("false")
});

export type CliEnv = z.output<typeof envSchema>;

/**
 * Reads the MQTT_* variables. Empty strings count as unset.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
    const picked: Record<string, string> = {};
    for (const key of Object.keys(envSchema.shape)) {
        const value = env[key];
        if (value !== undefined && value !== "") picked[key] = value;
    }
    return envSchema.parse(picked);
}
