import type { EventBus } from "./event-bus.js";
import type { LLMClient } from "./llm-client.js";
import type { ToolRegistry } from "./registry.js";
import type { ChatMessage, ChatRequest, ToolCall } from "./types.js";

export interface ToolRunnerOptions {
    /** Model requests allowed before giving up (default 5). */
    maxRounds?: number;
    /** Extra request parameters applied to every round. */
    request?: Omit<ChatRequest, "messages" | "tools">;
    eventBus?: EventBus;
}

export interface ToolRunResult {
    /** The model's final answer. */
    content: string;
    /** Full transcript, including assistant tool calls and tool results. */
    messages: ChatMessage[];
    /** Number of model requests made. */
    rounds: number;
}

/**
 * Drives a tool-calling exchange: the model's tool calls are dispatched to
 * the registry and their results sent back until the model answers in text.
 */
export class ToolRunner {
    private readonly maxRounds: number;

    constructor(
        private readonly client: LLMClient,
        private readonly registry: ToolRegistry,
        private readonly model: string,
        private readonly options: ToolRunnerOptions = {},
    ) {
        this.maxRounds = options.maxRounds ?? 5;
        if (this.maxRounds < 1) {
            throw new Error(`maxRounds must be at least 1, got ${this.maxRounds}.`);
        }
    }

    /**
     * Run a prompt (or an existing transcript) to completion.
     * @throws if the model is still calling tools after `maxRounds` requests.
     */
    async run(input: string | ChatMessage[]): Promise<ToolRunResult> {
        const messages: ChatMessage[] =
            typeof input === "string" ? [{ role: "user", content: input }] : [...input];
        const tools = this.registry.toToolDefinitions();

        for (let round = 1; round <= this.maxRounds; round++) {
            const response = await this.client.chat(this.model, {
                ...this.options.request,
                messages,
                tools,
            });

            if (response.toolCalls.length === 0) {
                messages.push({ role: "assistant", content: response.content });
                return { content: response.content, messages, rounds: round };
            }

            messages.push({
                role: "assistant",
                content: response.content,
                toolCalls: response.toolCalls,
            });
            for (const call of response.toolCalls) {
                messages.push({
                    role: "tool",
                    toolCallId: call.id,
                    content: await this.dispatch(call),
                });
            }
        }

        throw new Error(
            `Model "${this.model}" was still calling tools after ${this.maxRounds} rounds.`,
        );
    }

    /**
     * Execute one tool call and render its result as message content.
     * Failures are reported back to the model as text so it can recover.
     */
    async dispatch(call: ToolCall): Promise<string> {
        const bus = this.options.eventBus;
        const tool = this.registry.get(call.name);
        if (!tool) {
            const error = `Unknown tool "${call.name}".`;
            bus?.emit("tool:error", { name: call.name, callId: call.id, error });
            return `Error: ${error}`;
        }

        bus?.emit("tool:called", { name: call.name, callId: call.id });
        try {
            const args: unknown = call.arguments.trim() ? JSON.parse(call.arguments) : {};
            const result = await tool.execute(args);
            if (result === undefined) return "";
            return typeof result === "string" ? result : JSON.stringify(result);
        } catch (err) {
            const error = err instanceof Error ? err.message : String(err);
            bus?.emit("tool:error", { name: call.name, callId: call.id, error });
            return `Error: ${error}`;
        }
    }
}
