import { z } from "zod";
import { encodeUtf8 } from "../codec/binary";
import { validateTopicName } from "../util/topic-match";

/** Longest client identifier every MQTT 3.1.1 broker must accept. */
export const STRICT_CLIENT_ID_BYTES = 23;

const qosSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

const pemSchema = z.union([z.string(), z.instanceof(Buffer)]);

export const tlsSchema = z.object({
    enabled: z.boolean().default(true),
    ca: pemSchema.optional(),
    cert: pemSchema.optional(),
    key: pemSchema.optional(),
    servername: z.string().optional(),
    rejectUnauthorized: z.boolean().default(true)
});

export const willSchema = z.object({
    topic: z.string().superRefine((topic, ctx) => {
        try {
            validateTopicName(topic);
        } catch (err) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
        }
    }),
    payload: z.union([z.string(), z.instanceof(Uint8Array)]).transform((p) => (typeof p === "string" ? encodeUtf8(p) : p)),
    qos: qosSchema.default(0),
    retain: z.boolean().default(false)
});

export const connectionConfigSchema = z
    .object({
        host: z.string().min(1),
        port: z.number().int().min(1).max(65535).optional(),
        username: z.string().optional(),
        password: z.string().optional(),
        clientId: z.string().min(1).refine((id) => !id.includes("\u0000"), "clientId must not contain NUL"),
        keepAliveSec: z.number().int().min(0).max(65535).default(60),
        cleanSession: z.boolean().default(true),
        connectTimeoutMs: z.number().int().positive().default(30_000),
        /** Wait for PINGRESP; defaults to one keepalive interval. */
        pingTimeoutMs: z.number().int().positive().optional(),
        tls: tlsSchema.optional(),
        will: willSchema.optional(),
        reconnect: z
            .object({
                enabled: z.boolean().default(true),
                minDelayMs: z.number().int().nonnegative().default(1_000),
                maxDelayMs: z.number().int().nonnegative().default(30_000),
                multiplier: z.number().min(1).default(2),
                jitterRatio: z.number().min(0).max(1).default(0)
            })
            .default({}),
        retry: z
            .object({
                intervalMs: z.number().int().positive().default(10_000),
                maxAttempts: z.number().int().nonnegative().default(3)
            })
            .default({}),
        maxPacketBytes: z.number().int().positive().max(268_435_455).default(1024 * 1024)
    })
    .refine((c) => c.password === undefined || c.username !== undefined, {
        message: "password requires username",
        path: ["password"]
    })
    .transform((c) => ({
        ...c,
        port: c.port ?? (c.tls?.enabled ? 8883 : 1883),
        pingTimeoutMs: c.pingTimeoutMs ?? c.keepAliveSec * 1000
    }));

/** What callers pass in. */
export type ConnectionConfig = z.input<typeof connectionConfigSchema>;

/** Validated config with every default applied. */
export type ResolvedConnectionConfig = z.output<typeof connectionConfigSchema>;

export function resolveConfig(config: ConnectionConfig): ResolvedConnectionConfig {
    return connectionConfigSchema.parse(config);
}

export function exceedsStrictClientId(clientId: string): boolean {
    return encodeUtf8(clientId).length > STRICT_CLIENT_ID_BYTES;
}
