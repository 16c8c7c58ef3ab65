import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { encodeUtf8 } from "../src/codec/binary";
import { DEFAULT_HOST, promptConnection, roleClientId } from "../src/cli/connection";
import { formatMessage, formatPayload, formatTimestamp } from "../src/cli/display";
import { loadEnv } from "../src/cli/env";
import { reportFailure } from "../src/cli/errors";
import { PayloadError, loadPayload } from "../src/cli/payload";
import { parsePort, parseQos, parseYesNo, withDefault, type Ask } from "../src/cli/prompt";

function scripted(answers: string[]): { ask: Ask; questions: string[] } {
    const questions: string[] = [];
    const queue = [...answers];
    return {
        questions,
        ask: async (question) => {
            questions.push(question);
            return queue.shift() ?? "";
        }
    };
}

describe("display", () => {
    it("pretty-prints JSON payloads", () => {
        expect(formatPayload(encodeUtf8('{"temp":21.5,"tags":["a"]}'))).toBe(
            '{\n  "temp": 21.5,\n  "tags": [\n    "a"\n  ]\n}'
        );
    });

    it("shows text and binary payloads", () => {
        expect(formatPayload(encodeUtf8("hello world"))).toBe("hello world");
        expect(formatPayload(Uint8Array.from([0xff, 0xfe, 0x00]))).toBe("[Binary Data - 3 bytes]");
    });

    it("formats local timestamps", () => {
        expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe("2024-01-05 09:03:07");
    });

    it("lays out a received message", () => {
        const text = formatMessage(3, {
            topic: "sensors/kitchen",
            payload: encodeUtf8("on"),
            qos: 1,
            retain: false,
            dup: false,
            packetId: 9,
            matches: ["sensors/#"],
            receivedAt: new Date(2024, 11, 31, 23, 59, 0)
        });

        expect(text.split("\n")).toEqual([
            "New Message #3",
            "Time: 2024-12-31 23:59:00",
            "Topic: sensors/kitchen",
            "QoS: 1",
            "Retain: false",
            "Message Content:",
            "on",
            "-".repeat(60)
        ]);
    });
});

describe("prompt parsing", () => {
    it("parses QoS answers", () => {
        expect([parseQos("1"), parseQos(" 2 "), parseQos("3"), parseQos(""), parseQos(undefined)]).toEqual([
            1, 2, 0, 0, 0
        ]);
    });

    it("parses yes/no answers", () => {
        expect([parseYesNo("y"), parseYesNo("YES"), parseYesNo("n"), parseYesNo(undefined)]).toEqual([
            true,
            true,
            false,
            false
        ]);
    });

    it("parses ports with a fallback", () => {
        expect(parsePort("", 1883)).toBe(1883);
        expect(parsePort("8883", 1883)).toBe(8883);
        expect(() => parsePort("abc", 1883)).toThrowError("Invalid port: abc");
        expect(() => parsePort("70000", 1883)).toThrowError("Invalid port: 70000");
    });

    it("shows the default in the question", () => {
        expect(withDefault("Port", "1883")).toBe("Port (default: 1883): ");
        expect(withDefault("Username (optional)", undefined)).toBe("Username (optional): ");
    });
});

describe("loadEnv", () => {
    it("reads and converts MQTT_* variables", () => {
        const env = loadEnv({
            MQTT_HOST: "broker.test",
            MQTT_PORT: "8883",
            MQTT_QOS: "1",
            MQTT_USE_SSL: "yes",
            MQTT_TOPIC: "",
            PATH: "/usr/bin"
        });

        expect(env).toEqual({
            MQTT_HOST: "broker.test",
            MQTT_PORT: 8883,
            MQTT_QOS: 1,
            MQTT_USE_SSL: true,
            MQTT_NO_PROMPT: false
        });
    });

    it("splits the monitor filter list on commas", () => {
        expect(loadEnv({ MQTT_MONITOR_TOPICS: " alerts/#, ,sensors/+/temperature " }).MQTT_MONITOR_TOPICS).toEqual([
            "alerts/#",
            "sensors/+/temperature"
        ]);
        expect(loadEnv({}).MQTT_MONITOR_TOPICS).toBeUndefined();
    });

    it("rejects values it cannot use", () => {
        expect(() => loadEnv({ MQTT_QOS: "3" })).toThrowError(ZodError);
        expect(() => loadEnv({ MQTT_PORT: "0" })).toThrowError(ZodError);
        expect(() => loadEnv({ MQTT_NO_PROMPT: "maybe" })).toThrowError(ZodError);
    });
});

describe("promptConnection", () => {
    it("uses the environment without asking when prompting is off", async () => {
        const { ask, questions } = scripted([]);
        const env = loadEnv({ MQTT_NO_PROMPT: "1", MQTT_HOST: "broker.test", MQTT_CLIENT_ID: "dev" });

        await expect(promptConnection(ask, env, "sub")).resolves.toEqual({
            host: "broker.test",
            port: 1883,
            clientId: "dev-sub"
        });
        expect(questions).toEqual([]);
    });

    it("asks for each setting in order", async () => {
        const { ask, questions } = scripted(["", "8883", "user", "test-secret", "dev"]);

        const config = await promptConnection(ask, loadEnv({}), "pub");

        expect(questions).toEqual([
            `Server address (default: ${DEFAULT_HOST}): `,
            "Port (default: 1883): ",
            "Username (optional): ",
            "Password (optional): ",
            "Client ID (optional): "
        ]);
        expect(config).toEqual({
            host: DEFAULT_HOST,
            port: 8883,
            username: "user",
            password: "test-secret",
            clientId: "dev-pub"
        });
    });

    it("drops a password given without a username", async () => {
        const { ask } = scripted(["broker.test", "", "", "test-secret", ""]);

        const config = await promptConnection(ask, loadEnv({}), "pub");

        expect(config.password).toBeUndefined();
        expect(config.clientId).toMatch(/^mqtt-console-[0-9a-f]{8}-pub$/);
    });

    it("suffixes the role onto client identifiers", () => {
        expect(roleClientId("dev", "sub")).toBe("dev-sub");
        expect(roleClientId("", "pub")).toMatch(/^mqtt-console-[0-9a-f]{8}-pub$/);
    });
});

describe("loadPayload", () => {
    let dir = "";

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), "mqtt-console-"));
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("returns compact JSON", async () => {
        const path = join(dir, "payload.json");
        await writeFile(path, '{\n  "temp": 21.5,\n  "unit": "C"\n}\n');

        await expect(loadPayload(path)).resolves.toBe('{"temp":21.5,"unit":"C"}');
    });

    it("reports a missing file", async () => {
        const path = join(dir, "missing.json");

        await expect(loadPayload(path)).rejects.toThrowError(new PayloadError(`${path} file not found or unreadable`));
    });

    it("reports invalid JSON", async () => {
        const path = join(dir, "broken.json");
        await writeFile(path, "{ not json");

        await expect(loadPayload(path)).rejects.toThrowError(`Invalid JSON in ${path}: `);
    });
});

describe("reportFailure", () => {
    it("returns a failing exit code", () => {
        expect(reportFailure("Connection error", new Error("boom"))).toBe(1);
    });
});
