import { z } from "zod";
import type {
    ChatMessage,
    ChatRequest,
    ChatResponse,
    LLMClientConfig,
    LLMProviderName,
    OpenAIReasoningEffort,
    TokenUsage,
    ToolCall,
    ToolChoice,
} from "./types.js";
import type { EventBus } from "./event-bus.js";

// ─── Validation Constants ────────────────────────────────────────────────────

const OPENAI_REASONING_EFFORTS = new Set<OpenAIReasoningEffort>([
    "minimal",
    "low",
    "medium",
    "high",
]);

const PROVIDERS: readonly LLMProviderName[] = ["openai", "deepseek"];

/** Environment variable names for API keys. */
const ENV_KEYS: Record<LLMProviderName, string> = {
    openai: "OPENAI_API_KEY",
    deepseek: "DEEPSEEK_API_KEY",
};

/** Environment variable names for base URL overrides. */
const ENV_BASE_URLS: Record<LLMProviderName, string> = {
    openai: "OPENAI_BASE_URL",
    deepseek: "DEEPSEEK_BASE_URL",
};

/** Default base URLs for each provider's API. */
const BASE_URLS: Record<LLMProviderName, string> = {
    openai: "https://api.openai.com/v1",
    deepseek: "https://api.deepseek.com/v1",
};

// ─── Wire Format ─────────────────────────────────────────────────────────────

const completionSchema = z.object({
    choices: z
        .array(
            z.object({
                finish_reason: z.string().nullish(),
                message: z
                    .object({
                        content: z.string().nullish(),
                        tool_calls: z
                            .array(
                                z.object({
                                    id: z.string(),
                                    type: z.literal("function").optional(),
                                    function: z.object({
                                        name: z.string(),
                                        arguments: z.string(),
                                    }),
                                }),
                            )
                            .nullish(),
                    })
                    .optional(),
            }),
        )
        .default([]),
    usage: z
        .object({
            prompt_tokens: z.number().optional(),
            completion_tokens: z.number().optional(),
            total_tokens: z.number().optional(),
            completion_tokens_details: z
                .object({ reasoning_tokens: z.number().optional() })
                .nullish(),
        })
        .nullish(),
});

function toWireMessage(message: ChatMessage): Record<string, unknown> {
    switch (message.role) {
        case "assistant":
            return {
                role: "assistant",
                content: message.content,
                ...(message.toolCalls?.length
                    ? {
                          tool_calls: message.toolCalls.map((call) => ({
                              id: call.id,
                              type: "function",
                              function: { name: call.name, arguments: call.arguments },
                          })),
                      }
                    : {}),
            };
        case "tool":
            return {
                role: "tool",
                tool_call_id: message.toolCallId,
                content: message.content,
            };
        default:
            return { role: message.role, content: message.content };
    }
}

function toWireToolChoice(choice: ToolChoice): unknown {
    return typeof choice === "string"
        ? choice
        : { type: "function", function: { name: choice.name } };
}

/** Request body for the Chat Completions endpoint. */
export function buildCompletionBody(
    provider: LLMProviderName,
    model: string,
    req: ChatRequest,
): Record<string, unknown> {
    if (req.reasoningEffort) {
        if (provider !== "openai") {
            throw new Error(`reasoningEffort is only supported for openai, not "${provider}".`);
        }
        if (!OPENAI_REASONING_EFFORTS.has(req.reasoningEffort)) {
            throw new Error(
                `Invalid OpenAI reasoning_effort "${req.reasoningEffort}". ` +
                `Must be one of: ${[...OPENAI_REASONING_EFFORTS].join(", ")}`,
            );
        }
    }

    const messages: Array<Record<string, unknown>> = [];
    if (req.systemPrompt) {
        messages.push({ role: "system", content: req.systemPrompt });
    }
    messages.push(...req.messages.map(toWireMessage));

    const body: Record<string, unknown> = { model, messages };
    if (req.temperature !== undefined) body.temperature = req.temperature;
    if (req.maxTokens !== undefined) body.max_tokens = req.maxTokens;
    if (req.topP !== undefined) body.top_p = req.topP;
    if (req.stopSequences?.length) body.stop = req.stopSequences;
    if (req.reasoningEffort) body.reasoning_effort = req.reasoningEffort;
    if (req.store !== undefined) body.store = req.store;
    if (req.tools?.length) body.tools = req.tools;
    if (req.toolChoice !== undefined) body.tool_choice = toWireToolChoice(req.toolChoice);
    return body;
}

/** Map a Chat Completions payload to content, tool calls and usage. */
export function parseCompletion(raw: unknown): {
    content: string;
    toolCalls: ToolCall[];
    finishReason?: string;
    usage?: TokenUsage;
} {
    const parsed = completionSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Unexpected completion payload: ${parsed.error.message}`);
    }
    const r = parsed.data;
    const choice = r.choices[0];
    const toolCalls: ToolCall[] = (choice?.message?.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
    }));
    const usage: TokenUsage | undefined = r.usage
        ? {
              promptTokens: r.usage.prompt_tokens ?? 0,
              completionTokens: r.usage.completion_tokens ?? 0,
              totalTokens: r.usage.total_tokens ?? 0,
              reasoningTokens: r.usage.completion_tokens_details?.reasoning_tokens,
          }
        : undefined;
    return {
        content: choice?.message?.content ?? "",
        toolCalls,
        finishReason: choice?.finish_reason ?? undefined,
        usage,
    };
}

// ─── LLM Client ──────────────────────────────────────────────────────────────

/**
 * Chat Completions client for OpenAI and DeepSeek.
 *
 * Model names follow the `provider/model-name` convention
 * (`openai/gpt-4o`, `deepseek/deepseek-chat`). API keys and base URLs come
 * from the constructor or the environment (`OPENAI_API_KEY`,
 * `DEEPSEEK_API_KEY`, `OPENAI_BASE_URL`, `DEEPSEEK_BASE_URL`).
 *
 * @example
 * ```ts
 * const client = new LLMClient({ apiKeys: { openai: "test-key" } });
 * const response = await client.chat("openai/gpt-4o", {
 *     messages: [{ role: "user", content: "write a haiku about ai" }],
 * });
 * ```
 */
export class LLMClient {
    private config: LLMClientConfig;
    private eventBus?: EventBus;

    constructor(config: LLMClientConfig = {}, eventBus?: EventBus) {
        this.config = config;
        this.eventBus = eventBus;
    }

    /**
     * Parse a `provider/model` string into its components.
     * @throws if the format is invalid or the provider is unsupported.
     */
    parseModel(modelString: string): { provider: LLMProviderName; model: string } {
        const slashIdx = modelString.indexOf("/");
        if (slashIdx === -1) {
            throw new Error(
                `Invalid model format "${modelString}". Expected "provider/model-name" ` +
                `(e.g. "openai/gpt-4o").`,
            );
        }
        const providerName = modelString.slice(0, slashIdx);
        const model = modelString.slice(slashIdx + 1);

        const provider = PROVIDERS.find((p) => p === providerName);
        if (!provider) {
            throw new Error(
                `Unsupported provider "${providerName}". Must be one of: ${PROVIDERS.join(", ")}.`,
            );
        }
        if (!model) {
            throw new Error(`Model name is empty in "${modelString}".`);
        }
        return { provider, model };
    }

    /** Resolve the API key for a provider. */
    resolveApiKey(provider: LLMProviderName): string {
        const key =
            this.config.apiKeys?.[provider] ?? process.env[ENV_KEYS[provider]];
        if (!key) {
            throw new Error(
                `No API key for "${provider}". Provide it in the constructor ` +
                `or set the ${ENV_KEYS[provider]} environment variable.`,
            );
        }
        return key;
    }

    /** Resolve the base URL for a provider, without a trailing slash. */
    resolveBaseUrl(provider: LLMProviderName): string {
        const url =
            this.config.baseUrls?.[provider] ||
            process.env[ENV_BASE_URLS[provider]] ||
            BASE_URLS[provider];
        return url.replace(/\/+$/, "");
    }

    /** Validate common parameters. */
    private validateRequest(req: ChatRequest): void {
        if (!req.messages.length) {
            throw new Error("messages array must not be empty.");
        }
        if (req.temperature !== undefined) {
            if (req.temperature < 0 || req.temperature > 2) {
                throw new Error(
                    `temperature must be between 0 and 2, got ${req.temperature}.`,
                );
            }
        }
        if (req.topP !== undefined) {
            if (req.topP < 0 || req.topP > 1) {
                throw new Error(
                    `topP must be between 0 and 1, got ${req.topP}.`,
                );
            }
        }
        if (req.maxTokens !== undefined && req.maxTokens <= 0) {
            throw new Error(
                `maxTokens must be positive, got ${req.maxTokens}.`,
            );
        }
    }

    /**
     * Send a chat completion request to the specified model.
     *
     * @param modelString - Model in `provider/model-name` format.
     * @returns The response text, any tool calls, and usage info.
     */
    async chat(
        modelString: string,
        request: ChatRequest,
    ): Promise<ChatResponse> {
        const { provider, model } = this.parseModel(modelString);
        const apiKey = this.resolveApiKey(provider);

        // Merge defaults
        const merged: ChatRequest = {
            ...request,
            temperature:
                request.temperature ?? this.config.defaults?.temperature,
            maxTokens: request.maxTokens ?? this.config.defaults?.maxTokens,
            topP: request.topP ?? this.config.defaults?.topP,
        };

        this.validateRequest(merged);
        const body = buildCompletionBody(provider, model, merged);

        this.eventBus?.emit("llm:request", { model: modelString, provider });

        try {
            const response = await fetch(
                `${this.resolveBaseUrl(provider)}/chat/completions`,
                {
                    method: "POST",
                    headers: {
                        "Content-Type": "application/json",
                        Authorization: `Bearer ${apiKey}`,
                    },
                    body: JSON.stringify(body),
                },
            );

            if (!response.ok) {
                const errorText = await response.text();
                throw new Error(
                    `${provider} API error (${response.status}): ${errorText}`,
                );
            }

            const raw: unknown = await response.json();
            const parsed = parseCompletion(raw);

            this.eventBus?.emit("llm:response", {
                model: modelString,
                provider,
                usage: parsed.usage,
            });

            return { ...parsed, model: modelString, provider, raw };
        } catch (err) {
            const errorMsg =
                err instanceof Error ? err.message : String(err);
            this.eventBus?.emit("llm:error", {
                model: modelString,
                provider,
                error: errorMsg,
            });
            throw err;
        }
    }
}
