import { describe, it, expect, vi } from "vitest";
import { EventBus } from "../src/event-bus.js";

describe("EventBus", () => {
    it("emits typed events and delivers them to subscribers", () => {
        const bus = new EventBus();
        const handler = vi.fn();

        bus.on("tool:registered", handler);
        bus.emit("tool:registered", { name: "add_numbers" });

        expect(handler).toHaveBeenCalledOnce();
        expect(handler.mock.calls[0][0].name).toBe("add_numbers");
    });

    it("auto-injects correlationId and timestamp", () => {
        const bus = new EventBus();
        const handler = vi.fn();

        bus.on("generator:analyzed", handler);
        bus.emit("generator:analyzed", { subject: "greet", cached: false });

        const payload = handler.mock.calls[0][0];
        expect(payload.correlationId).toBeTypeOf("string");
        expect(payload.correlationId.length).toBeGreaterThan(10);
        expect(Number.isNaN(Date.parse(payload.timestamp))).toBe(false);
    });

    it("uses a provided correlationId when given", () => {
        const bus = new EventBus();
        const handler = vi.fn();

        bus.on("tool:called", handler);
        bus.emit("tool:called", { name: "get_weather", callId: "call_1" }, "custom-id-123");

        expect(handler.mock.calls[0][0].correlationId).toBe("custom-id-123");
    });

    it("off() unsubscribes a handler", () => {
        const bus = new EventBus();
        const handler = vi.fn();

        bus.on("tool:error", handler);
        bus.off("tool:error", handler);
        bus.emit("tool:error", { name: "x", callId: "c", error: "boom" });

        expect(handler).not.toHaveBeenCalled();
    });

    it("onAny() receives all events with their type", () => {
        const bus = new EventBus();
        const handler = vi.fn();

        bus.onAny(handler);
        bus.emit("tool:registered", { name: "a" });
        bus.emit("conversation:turn", { role: "user", length: 5 });

        expect(handler.mock.calls.map((call) => call[0])).toEqual([
            "tool:registered",
            "conversation:turn",
        ]);
    });

    it("offAny() and clear() remove handlers", () => {
        const bus = new EventBus();
        const wildcard = vi.fn();
        const specific = vi.fn();

        bus.onAny(wildcard);
        bus.offAny(wildcard);
        bus.on("tool:registered", specific);
        bus.clear();
        bus.emit("tool:registered", { name: "a" });

        expect(wildcard).not.toHaveBeenCalled();
        expect(specific).not.toHaveBeenCalled();
    });
});
