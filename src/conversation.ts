import type { EventBus } from "./event-bus.js";
import type { LLMClient } from "./llm-client.js";
import type { ChatMessage, ChatRequest } from "./types.js";

export interface ConversationOptions {
    /** Hidden system prompt sent with every turn; never stored in the history. */
    systemPrompt?: string;
    /** Token budget for the history sent per turn (unbounded if omitted). */
    maxContextTokens?: number;
    /** Extra request parameters applied to every turn. */
    request?: Omit<ChatRequest, "messages" | "systemPrompt">;
    eventBus?: EventBus;
}

/**
 * Multi-turn chat that retains context between turns.
 *
 * Each `send()` appends the user turn, sends the history (trimmed to the
 * token budget), and records the assistant's reply.
 */
export class Conversation {
    private messages: ChatMessage[] = [];

    /** Average chars per token for estimation (GPT-family heuristic). */
    private static readonly CHARS_PER_TOKEN = 4;

    constructor(
        private readonly client: LLMClient,
        private readonly model: string,
        private readonly options: ConversationOptions = {},
    ) {}

    append(message: ChatMessage): void {
        this.messages.push(message);
        this.options.eventBus?.emit("conversation:turn", {
            role: message.role,
            length: message.content.length,
        });
    }

    /** Get all messages in order. */
    getMessages(): ChatMessage[] {
        return [...this.messages];
    }

    get messageCount(): number {
        return this.messages.length;
    }

    // ── Token Estimation ─────────────────────────────────────────────────

    /** Estimate the token count for a string. */
    static estimateTokens(text: string): number {
        return Math.ceil(text.length / Conversation.CHARS_PER_TOKEN);
    }

    estimateTotalTokens(): number {
        return this.messages.reduce(
            (sum, msg) => sum + Conversation.estimateTokens(msg.content),
            0,
        );
    }

    // ── Context Window ───────────────────────────────────────────────────

    /**
     * The most recent messages that fit within `maxTokens`, oldest first.
     * A tool result is never sent without the assistant turn that requested it.
     */
    getContextWindow(maxTokens: number): ChatMessage[] {
        const window: ChatMessage[] = [];
        let remainingTokens = maxTokens;

        for (let i = this.messages.length - 1; i >= 0; i--) {
            const msg = this.messages[i];
            const tokens = Conversation.estimateTokens(msg.content);
            if (tokens > remainingTokens) break;
            window.unshift(msg);
            remainingTokens -= tokens;
        }

        while (window.length > 0 && window[0].role === "tool") {
            window.shift();
        }
        return window;
    }

    // ── Turns ────────────────────────────────────────────────────────────

    /**
     * Send a user turn and return the assistant's reply.
     * The user turn stays in the history even if the request fails.
     */
    async send(text: string): Promise<string> {
        this.append({ role: "user", content: text });

        const budget = this.options.maxContextTokens;
        const messages =
            budget === undefined ? this.getMessages() : this.getContextWindow(budget);

        const response = await this.client.chat(this.model, {
            ...this.options.request,
            messages,
            systemPrompt: this.options.systemPrompt,
        });

        this.append({ role: "assistant", content: response.content });
        return response.content;
    }

    /** Clear all messages. */
    clear(): void {
        this.messages = [];
    }
}
