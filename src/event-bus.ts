import mitt, { type Handler } from "mitt";
import { randomUUID } from "node:crypto";
import type { EventMeta, ToolsmithEvents } from "./types.js";

/** Receives every event together with its name. */
export type AnyEventHandler = <K extends keyof ToolsmithEvents>(
    type: K,
    event: ToolsmithEvents[K],
) => void;

/**
 * Where the registry, runner, conversation, generator and LLM client
 * report what they do. Nothing in the library logs to the console; attach
 * a handler here (or `onAny`) to trace registrations, tool calls and
 * model round-trips.
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 * bus.on("tool:rejected", (e) => console.warn(e.name, e.reasons));
 * const registry = new ToolRegistry(bus);
 * ```
 */
export class EventBus {
    private emitter = mitt<ToolsmithEvents>();

    /**
     * Emit an event. Pass `correlationId` to tie related events together
     * (e.g. a tool call and its error); otherwise a fresh UUID is used.
     */
    emit<K extends keyof ToolsmithEvents>(
        type: K,
        payload: Omit<ToolsmithEvents[K], keyof EventMeta>,
        correlationId?: string,
    ): void {
        const meta: EventMeta = {
            correlationId: correlationId ?? randomUUID(),
            timestamp: new Date().toISOString(),
        };
        this.emitter.emit(type, { ...meta, ...payload } as ToolsmithEvents[K]);
    }

    on<K extends keyof ToolsmithEvents>(type: K, handler: Handler<ToolsmithEvents[K]>): void {
        this.emitter.on(type, handler);
    }

    off<K extends keyof ToolsmithEvents>(type: K, handler: Handler<ToolsmithEvents[K]>): void {
        this.emitter.off(type, handler);
    }

    onAny(handler: AnyEventHandler): void {
        this.emitter.on("*", handler as Handler);
    }

    offAny(handler: AnyEventHandler): void {
        this.emitter.off("*", handler as Handler);
    }

    /** Drop every handler, wildcard ones included. */
    clear(): void {
        this.emitter.all.clear();
    }
}
