// ─── Public API ──────────────────────────────────────────────────────────────

// Schema conversion
export {
    convert,
    checkCompatibility,
    isFunctionSchemaCompatible,
    containsInteractiveCall,
    toToolDefinition,
} from "./function-schema.js";
export {
    FunctionBuilder,
    describeFunction,
    getFunctionDescriptor,
    functionDescriptorSchema,
    parseFunctionDescriptor,
    resolveSignature,
} from "./function-descriptor.js";
export type { AnyFunction, ParameterOptions } from "./function-descriptor.js";
export {
    TYPE_MAP,
    UNSUPPORTED_TYPES,
    parseAnnotation,
    annotationLabel,
    schemaTypeOf,
    isAcceptedAnnotation,
} from "./type-map.js";
export {
    SignatureUnavailableError,
    ToolRegistrationError,
    ToolExecutionError,
} from "./errors.js";

// Tools
export { FunctionTool, zodFromDescriptor } from "./tool.js";
export { ToolRegistry } from "./registry.js";
export { ToolRunner } from "./tool-runner.js";
export type { ToolRunnerOptions, ToolRunResult } from "./tool-runner.js";

// Chat
export { LLMClient, buildCompletionBody, parseCompletion } from "./llm-client.js";
export { Conversation } from "./conversation.js";
export type { ConversationOptions } from "./conversation.js";
export { EventBus } from "./event-bus.js";
export type { AnyEventHandler } from "./event-bus.js";

// Tool generation
export {
    AnalysisCache,
    ToolGenerator,
    parseGeneratedTool,
    placeholderToolExtractor,
    toolsOutputPath,
} from "./tool-generator.js";
export type {
    GenerateToolsOptions,
    ToolExtractor,
    ToolGeneratorOptions,
} from "./tool-generator.js";

// Types
export type {
    ChatMessage,
    ChatRequest,
    ChatResponse,
    ChatRole,
    CompatibilityOptions,
    CompatibilityReport,
    EventMeta,
    FunctionDescriptor,
    FunctionSchema,
    FunctionToolDefinition,
    GeneratedTool,
    GenerationReport,
    LLMApiKeys,
    LLMClientConfig,
    LLMProviderName,
    OpenAIReasoningEffort,
    ParameterDescriptor,
    ParameterKind,
    ParameterSchema,
    PrimitiveType,
    RejectedTool,
    SchemaType,
    TokenUsage,
    ToolArguments,
    ToolCall,
    ToolChoice,
    ToolDefinition,
    ToolsmithEvents,
    ToolSuggestion,
    TypeAnnotation,
    UnsupportedType,
} from "./types.js";
