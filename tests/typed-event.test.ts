import { afterEach, describe, expect, it, vi } from "vitest";
import logger from "../src/util/logger";
import { TypedEvent } from "../src/util/typed-event";

type Events = {
    tick: number;
    done: { ok: boolean };
};

afterEach(() => {
    vi.restoreAllMocks();
});

describe("TypedEvent", () => {
    it("delivers payloads to every listener of an event", () => {
        const events = new TypedEvent<Events>();
        const a = vi.fn();
        const b = vi.fn();
        events.on("tick", a);
        events.on("tick", b);

        events.emit("tick", 3);
        events.emit("done", { ok: true });

        expect(a).toHaveBeenCalledWith(3);
        expect(b).toHaveBeenCalledWith(3);
    });

    it("stops delivering after off or the returned disposer", () => {
        const events = new TypedEvent<Events>();
        const a = vi.fn();
        const b = vi.fn();
        const dispose = events.on("tick", a);
        events.on("tick", b);

        dispose();
        events.off("tick", b);
        events.emit("tick", 1);

        expect(a).not.toHaveBeenCalled();
        expect(b).not.toHaveBeenCalled();
    });

    it("fires once listeners a single time", () => {
        const events = new TypedEvent<Events>();
        const a = vi.fn();
        events.once("done", a);

        events.emit("done", { ok: true });
        events.emit("done", { ok: false });

        expect(a).toHaveBeenCalledTimes(1);
        expect(a).toHaveBeenCalledWith({ ok: true });
    });

    it("logs a throwing listener and keeps going", () => {
        const spy = vi.spyOn(logger, "error");
        const events = new TypedEvent<Events>(logger);
        const after = vi.fn();
        events.on("tick", () => {
            throw new Error("listener failed");
        });
        events.on("tick", after);

        events.emit("tick", 1);

        expect(after).toHaveBeenCalledWith(1);
        expect(spy).toHaveBeenCalledTimes(1);
    });
});
