// ─── Type Annotations ────────────────────────────────────────────────────────

/** JSON-schema type names a parameter can be declared as. */
export type SchemaType =
    | "string"
    | "integer"
    | "number"
    | "boolean"
    | "array"
    | "object"
    | "null";

/** Primitive semantic types understood by the converter. */
export type PrimitiveType = SchemaType;

/** Types that are never serializable into a tool schema. */
export type UnsupportedType = "tuple" | "set" | "complex" | "datetime";

/**
 * A parameter or return type annotation.
 *
 * - `primitive`: one of the closed set in `TYPE_MAP`.
 * - `unsupported`: a known type on the reject-list.
 * - `class`: a named object type (a class or interface).
 * - `expression`: anything that is not a plain type (generic alias, union, literal).
 */
export type TypeAnnotation =
    | { kind: "primitive"; name: PrimitiveType }
    | { kind: "unsupported"; name: UnsupportedType }
    | { kind: "class"; name: string }
    | { kind: "expression"; text: string };

// ─── Function Descriptors ────────────────────────────────────────────────────

export type ParameterKind =
    | "normal"
    | "variadic-positional"
    | "variadic-keyword";

/** One entry of a function's ordered parameter list. */
export interface ParameterDescriptor {
    name: string;
    /** Absent when the parameter is unannotated. */
    annotation?: TypeAnnotation;
    hasDefault: boolean;
    kind: ParameterKind;
}

/** Explicit description of a callable's signature. */
export interface FunctionDescriptor {
    /** Identifier the model will call the function by. */
    name: string;
    /** Free text, used verbatim (trimmed) as the schema description. */
    docstring: string;
    parameters: ParameterDescriptor[];
    returnAnnotation?: TypeAnnotation;
    /** Raw source of the function body; only read by the interactive-call check. */
    sourceText?: string;
}

// ─── Schemas ─────────────────────────────────────────────────────────────────

export interface ParameterSchema {
    type: SchemaType;
}

/** JSON-schema-shaped description of a callable, the `function` field of a tool. */
export interface FunctionSchema {
    name: string;
    description: string;
    parameters: {
        type: "object";
        properties: Record<string, ParameterSchema>;
        required: string[];
    };
}

/** A tool entry for a chat-completion request. */
export interface ToolDefinition {
    type: "function";
    function: FunctionSchema;
}

/** Result of the strict compatibility gate. */
export interface CompatibilityReport {
    compatible: boolean;
    /** Distinct, ordered; empty iff `compatible`. */
    reasons: string[];
    /** Present only when requested with `andParse` and the function is compatible. */
    schema?: FunctionSchema;
}

export interface CompatibilityOptions {
    /** Also build the schema when the function passes. */
    andParse?: boolean;
    /** Return the full report instead of a boolean (projection only). */
    verbose?: boolean;
}

// ─── Tools ───────────────────────────────────────────────────────────────────

/** Arguments a tool receives after validation, keyed by parameter name. */
export type ToolArguments = Record<string, unknown>;

/** A described function paired with its implementation. */
export interface FunctionToolDefinition<TOutput = unknown> {
    descriptor: FunctionDescriptor;
    execute: (args: ToolArguments) => TOutput | Promise<TOutput>;
}

// ─── Events ──────────────────────────────────────────────────────────────────

/** Base payload included in every event. */
export interface EventMeta {
    correlationId: string;
    timestamp: string;
}

/** All events the library can emit, keyed by event name. */
export interface ToolsmithEvents {
    // Index signatures for mitt compatibility (EventType = string | symbol)
    [key: string]: unknown;
    [key: symbol]: unknown;

    // Tools
    "tool:registered": EventMeta & { name: string };
    "tool:rejected": EventMeta & { name: string; reasons: string[] };
    "tool:called": EventMeta & { name: string; callId: string };
    "tool:error": EventMeta & { name: string; callId: string; error: string };

    // Conversation
    "conversation:turn": EventMeta & { role: ChatRole; length: number };

    // Tool generation
    "generator:analyzed": EventMeta & { subject: string; cached: boolean };
    "generator:tool-accepted": EventMeta & { name: string };
    "generator:tool-rejected": EventMeta & { name: string; reasons: string[] };
    "generator:written": EventMeta & { path: string; toolCount: number };

    // LLM
    "llm:request": EventMeta & { model: string; provider: LLMProviderName };
    "llm:response": EventMeta & {
        model: string;
        provider: LLMProviderName;
        usage?: TokenUsage;
    };
    "llm:error": EventMeta & {
        model: string;
        provider: LLMProviderName;
        error: string;
    };
}

// ─── LLM ─────────────────────────────────────────────────────────────────────

/** Supported LLM provider identifiers. Both speak the Chat Completions wire format. */
export type LLMProviderName = "openai" | "deepseek";

/** Chat message role. */
export type ChatRole = "system" | "user" | "assistant" | "tool";

/** A function call requested by the model. */
export interface ToolCall {
    id: string;
    name: string;
    /** JSON-encoded argument object, as sent by the model. */
    arguments: string;
}

/** A single message in a chat conversation. */
export type ChatMessage =
    | { role: "system" | "user"; content: string }
    | { role: "assistant"; content: string; toolCalls?: ToolCall[] }
    | { role: "tool"; content: string; toolCallId: string };

/** Token usage statistics from an LLM response. */
export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
    /** Reasoning tokens used (if applicable). */
    reasoningTokens?: number;
}

/**
 * OpenAI reasoning_effort values.
 * @see https://platform.openai.com/docs/api-reference/chat/create
 */
export type OpenAIReasoningEffort = "minimal" | "low" | "medium" | "high";

export type ToolChoice =
    | "auto"
    | "none"
    | "required"
    | { name: string };

// ── Chat Request / Response ──────────────────────────────────────────────────

/** Options for a chat completion request. */
export interface ChatRequest {
    /** Messages forming the conversation. */
    messages: ChatMessage[];
    /** OpenAI reasoning effort; rejected for other providers. */
    reasoningEffort?: OpenAIReasoningEffort;
    /** Sampling temperature (0–2). */
    temperature?: number;
    /** Maximum tokens to generate. */
    maxTokens?: number;
    /** Nucleus sampling threshold (0–1). */
    topP?: number;
    /** Stop sequences. */
    stopSequences?: string[];
    /** System prompt (prepended as a system message if provided). */
    systemPrompt?: string;
    /** Ask the provider to retain the completion. */
    store?: boolean;
    /** Functions the model may call. */
    tools?: ToolDefinition[];
    toolChoice?: ToolChoice;
}

/** Response from a chat completion. */
export interface ChatResponse {
    /** The model's response text ("" when it only called tools). */
    content: string;
    /** Tool calls requested by the model, in order. */
    toolCalls: ToolCall[];
    finishReason?: string;
    /** Token usage statistics. */
    usage?: TokenUsage;
    /** The model identifier used. */
    model: string;
    /** Provider name. */
    provider: LLMProviderName;
    /** The raw provider response (for advanced use). */
    raw?: unknown;
}

/** Per-provider API key configuration. */
export interface LLMApiKeys {
    openai?: string;
    deepseek?: string;
}

/** Configuration for the LLM client. */
export interface LLMClientConfig {
    /** API keys per provider. Falls back to env vars if not set. */
    apiKeys?: LLMApiKeys;
    /** Base URL overrides per provider. Falls back to env vars, then the public endpoint. */
    baseUrls?: Partial<Record<LLMProviderName, string>>;
    /** Default request parameters applied to every call. */
    defaults?: Partial<Pick<ChatRequest, "temperature" | "maxTokens" | "topP">>;
}

// ─── Tool Generation ─────────────────────────────────────────────────────────

/** A tool proposed from a script analysis. */
export interface ToolSuggestion {
    name: string;
    description: string;
    /** Input declarations, e.g. `"data: array"`. */
    inputs: string[];
    /** Expected output, in prose. */
    output: string;
    /** What the analyzed script is meant to achieve. */
    scriptPurpose: string;
}

/** A generated tool implementation as returned by the model. */
export interface GeneratedTool {
    source: string;
    descriptor: FunctionDescriptor;
}

export interface RejectedTool {
    name: string;
    reasons: string[];
}

export interface GenerationReport {
    accepted: GeneratedTool[];
    rejected: RejectedTool[];
    /** Where the accepted sources were written, if any were. */
    outputPath?: string;
}
