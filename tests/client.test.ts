import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { connect, createClient } from "../src/client/client";
import type { IncomingMessage } from "../src/client/types";
import { decodeUtf8, encodeUtf8 } from "../src/codec/binary";
import { SubscriptionRejectedError } from "../src/errors";
import { fakeNetwork, flush, type FakeNetwork } from "./helpers/fake-transport";

let net: FakeNetwork;

const config = { host: "broker.test", clientId: "facade", keepAliveSec: 0, reconnect: { enabled: false } };

beforeEach(() => {
    vi.useFakeTimers();
    net = fakeNetwork();
});

afterEach(() => {
    vi.useRealTimers();
});

describe("createClient", () => {
    it("sends nothing until connect()", () => {
        const client = createClient(config, { transport: net.factory });

        expect(client.state).toBe("disconnected");
        expect(net.transports).toHaveLength(0);
    });

    it("subscribes, publishes and receives through one session", async () => {
        const handler = vi.fn<(msg: IncomingMessage) => void>();
        const pending = connect(config, { transport: net.factory, onMessage: handler });
        await flush();
        net.current.receive({ type: "connack", sessionPresent: false, returnCode: 0 });
        const client = await pending;
        expect(client.connected).toBe(true);

        const subscribing = client.subscribe("a/b", 1);
        await flush();
        net.current.receive({ type: "suback", packetId: 1, returnCodes: [1] });
        await expect(subscribing).resolves.toBe(1);
        expect(client.subscriptions()).toEqual([{ filter: "a/b", requestedQos: 1, grantedQos: 1 }]);

        const receipt = await client.publish("a/b", "x", { qos: 1 });
        expect(net.current.lastSent()).toMatchObject({ type: "publish", topic: "a/b", qos: 1, packetId: 2 });

        net.current.receive({
            type: "publish",
            topic: "a/b",
            payload: encodeUtf8("x"),
            qos: 1,
            retain: false,
            dup: false,
            packetId: 2
        });
        expect(net.current.lastSent()).toEqual({ type: "puback", packetId: 2 });
        expect(handler).toHaveBeenCalledTimes(1);
        expect(decodeUtf8(handler.mock.calls[0]![0].payload)).toBe("x");

        net.current.receive({ type: "puback", packetId: 2 });
        await expect(receipt.confirmed).resolves.toBeUndefined();
    });

    it("rejects a refused subscription with the filter", async () => {
        const client = createClient(config, { transport: net.factory });
        const connecting = client.connect();
        await flush();
        net.current.receive({ type: "connack", sessionPresent: false, returnCode: 0 });
        await connecting;

        const subscribing = client.subscribe("private/#", 2);
        await flush();
        net.current.receive({ type: "suback", packetId: 1, returnCodes: [0x80] });

        await expect(subscribing).rejects.toThrowError(new SubscriptionRejectedError("private/#"));
        await expect(subscribing).rejects.toMatchObject({ filter: "private/#" });
        expect(client.subscriptions()).toEqual([]);
    });

    it("accepts a single filter or a list for unsubscribe", async () => {
        const client = createClient(config, { transport: net.factory });
        const connecting = client.connect();
        await flush();
        net.current.receive({ type: "connack", sessionPresent: false, returnCode: 0 });
        await connecting;

        void client.unsubscribe("a");
        expect(net.current.lastSent()).toEqual({ type: "unsubscribe", packetId: 1, filters: ["a"] });
        net.current.receive({ type: "unsuback", packetId: 1 });

        void client.unsubscribe(["b", "c"]);
        expect(net.current.lastSent()).toEqual({ type: "unsubscribe", packetId: 2, filters: ["b", "c"] });
        net.current.receive({ type: "unsuback", packetId: 2 });
    });

    it("swaps the message handler and stops listening", async () => {
        const first = vi.fn();
        const second = vi.fn();
        const onConnect = vi.fn();
        const client = createClient(config, { transport: net.factory, onMessage: first });
        const off = client.on("connect", onConnect);

        const connecting = client.connect();
        await flush();
        net.current.receive({ type: "connack", sessionPresent: true, returnCode: 0 });
        await connecting;
        off();

        client.onMessage(second);
        net.current.receive({ type: "publish", topic: "t", payload: encodeUtf8("1"), qos: 0, retain: true, dup: false });
        client.onMessage(null);
        net.current.receive({ type: "publish", topic: "t", payload: encodeUtf8("2"), qos: 0, retain: false, dup: false });

        expect(onConnect).toHaveBeenCalledWith({ sessionPresent: true });
        expect(first).not.toHaveBeenCalled();
        expect(second).toHaveBeenCalledTimes(1);
        expect(second.mock.calls[0]![0]).toMatchObject({ topic: "t", retain: true });
    });
});
