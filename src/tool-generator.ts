import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import hashIt from "hash-it";
import { z } from "zod";
import type { EventBus } from "./event-bus.js";
import { functionDescriptorSchema, resolveSignature } from "./function-descriptor.js";
import { checkCompatibility } from "./function-schema.js";
import type { LLMClient } from "./llm-client.js";
import type {
    GeneratedTool,
    GenerationReport,
    RejectedTool,
    ToolSuggestion,
} from "./types.js";

// ─── Prompts ─────────────────────────────────────────────────────────────────

const SCHEMA_RULES =
    "- A tool is described by its name, docstring, ordered parameters and return type.\n" +
    "- Parameter types map to JSON schema types: string, integer, number, boolean, array, object, null.\n" +
    "- Every parameter needs a type annotation; named object types are accepted.\n" +
    "- Rest parameters, keyword spreads, interactive input (prompt(), readline questions, stdin) " +
    "and non-serializable types (Date, Set, tuples, complex numbers) are not supported.\n";

const FUNCTION_REVIEW_PROMPT =
    "You are an expert TypeScript developer with deep knowledge of LLM function calling.\n" +
    "First, explain how a function is converted into a tool schema:\n" +
    SCHEMA_RULES +
    "\nThen:\n" +
    "1. Determine the function's purpose.\n" +
    "2. Check whether it is compatible with the rules above.\n" +
    "3. If it is not, explain why and suggest improvements.\n" +
    "4. Provide a fully revised, compatible function that keeps the original intent.\n" +
    "Keep the output structured and readable.";

const SCRIPT_REVIEW_PROMPT =
    "You are an expert TypeScript developer and tool orchestration specialist.\n" +
    "Analyze the script, determine its overall purpose, and extract the functions that could become LLM tools.\n\n" +
    "1. Identify the overall goal of the script.\n" +
    "2. Summarize its major functions.\n" +
    "3. Describe how it could be broken into separate tools.\n" +
    "4. Give a pseudocode outline of those tools.\n" +
    "5. Recommend whether the script should be modularized into tools.\n" +
    "Keep the output structured and readable.";

const GENERATION_PROMPT =
    "You are a developer assistant that turns tool proposals into TypeScript functions.\n" +
    "The generated function must follow these rules:\n" +
    SCHEMA_RULES +
    "- It must return JSON-compatible output.\n\n" +
    'Reply with a single JSON object: {"source": "<the function source>", "descriptor": ' +
    '{"name": "...", "docstring": "...", "parameters": [{"name": "...", "annotation": "<type>", ' +
    '"hasDefault": false}], "returnAnnotation": "<type>"}}. No other text.';

// ─── Analysis Cache ──────────────────────────────────────────────────────────

/**
 * In-memory cache for model analyses, keyed by a hash of the analyzed
 * source, the model and the prompt, so repeated reviews cost nothing.
 */
export class AnalysisCache {
    private cache = new Map<string, string>();

    computeKey(source: string, model: string, prompt: string): string {
        return `${hashIt(source)}-${hashIt(model)}-${hashIt(prompt)}`;
    }

    get(key: string): string | undefined {
        return this.cache.get(key);
    }

    set(key: string, analysis: string): void {
        this.cache.set(key, analysis);
    }

    has(key: string): boolean {
        return this.cache.has(key);
    }

    clear(): void {
        this.cache.clear();
    }
}

// ─── Tool Extraction ─────────────────────────────────────────────────────────

/** Turns a script analysis into tool proposals. */
export type ToolExtractor = (analysis: string) => ToolSuggestion[] | Promise<ToolSuggestion[]>;

/**
 * Fixed proposals, independent of the analysis text. Stands in until a
 * real extractor is supplied.
 */
export const placeholderToolExtractor = (_analysis: string): ToolSuggestion[] => [
    {
        name: "process_data",
        description: "Processes and cleans raw data inputs.",
        inputs: ["data: array"],
        output: "object with cleaned data",
        scriptPurpose:
            "This script processes user-provided data and formats it for further analysis.",
    },
    {
        name: "generate_summary",
        description: "Generates a textual summary from structured data.",
        inputs: ["data: object"],
        output: "string with a summary",
        scriptPurpose:
            "This script generates a natural language summary of structured data.",
    },
];

// ─── Generated Tool Parsing ──────────────────────────────────────────────────

const generatedToolSchema = z.object({
    source: z.string().min(1),
    descriptor: functionDescriptorSchema,
});

/**
 * Parse a model reply holding a `{ source, descriptor }` object,
 * optionally wrapped in a fenced code block.
 * @throws if the reply is not valid JSON of that shape.
 */
export function parseGeneratedTool(reply: string): GeneratedTool {
    const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(reply);
    const text = (fenced ? fenced[1] : reply).trim();
    const json: unknown = JSON.parse(text);
    return generatedToolSchema.parse(json);
}

/** `<dir>/<name>_tools<ext>` beside the analyzed script. */
export function toolsOutputPath(scriptPath: string): string {
    const { dir, name, ext } = path.parse(scriptPath);
    return path.join(dir, `${name}_tools${ext || ".ts"}`);
}

// ─── Generator ───────────────────────────────────────────────────────────────

export interface ToolGeneratorOptions {
    cache?: AnalysisCache;
    extractor?: ToolExtractor;
    eventBus?: EventBus;
}

export interface GenerateToolsOptions {
    /** Asked once with the analysis; returning false aborts without generating. */
    confirm?: (analysis: string) => boolean | Promise<boolean>;
}

/**
 * Reviews functions and scripts with a model and generates
 * schema-compatible tools from a script analysis.
 */
export class ToolGenerator {
    private readonly cache: AnalysisCache;
    private readonly extractor: ToolExtractor;
    private readonly eventBus?: EventBus;

    constructor(
        private readonly client: LLMClient,
        private readonly model: string,
        options: ToolGeneratorOptions = {},
    ) {
        this.cache = options.cache ?? new AnalysisCache();
        this.extractor = options.extractor ?? placeholderToolExtractor;
        this.eventBus = options.eventBus;
    }

    private async review(
        subject: string,
        source: string,
        systemPrompt: string,
        userPrompt: string,
        maxTokens: number,
    ): Promise<string> {
        const key = this.cache.computeKey(source, this.model, systemPrompt);
        const cached = this.cache.get(key);
        if (cached !== undefined) {
            this.eventBus?.emit("generator:analyzed", { subject, cached: true });
            return cached;
        }

        const response = await this.client.chat(this.model, {
            messages: [{ role: "user", content: userPrompt }],
            systemPrompt,
            temperature: 0.3,
            maxTokens,
        });
        this.cache.set(key, response.content);
        this.eventBus?.emit("generator:analyzed", { subject, cached: false });
        return response.content;
    }

    /**
     * Ask the model whether a described function is schema-compatible
     * and for a revised version if it is not.
     * @throws SignatureUnavailableError if the target has no descriptor.
     * @throws if the descriptor carries no source text.
     */
    async analyzeFunction(target: unknown): Promise<string> {
        const descriptor = resolveSignature(target);
        const source = descriptor.sourceText;
        if (source === undefined) {
            throw new Error(`No source text available for function "${descriptor.name}".`);
        }
        return this.review(
            descriptor.name,
            source,
            FUNCTION_REVIEW_PROMPT,
            `Here is the function:\n\`\`\`ts\n${source}\n\`\`\``,
            1000,
        );
    }

    /**
     * Read a script and ask the model for its purpose and a tool breakdown.
     * @throws if the file cannot be read.
     */
    async analyzeScript(filePath: string): Promise<string> {
        const source = await readFile(filePath, "utf-8");
        return this.review(
            filePath,
            source,
            SCRIPT_REVIEW_PROMPT,
            `Here is the script:\n\`\`\`ts\n${source}\n\`\`\``,
            1500,
        );
    }

    /** Tool proposals for an analysis, from the configured extractor. */
    async extractTools(analysis: string): Promise<ToolSuggestion[]> {
        return this.extractor(analysis);
    }

    /**
     * Generate each proposed tool, gate it with the compatibility check,
     * and write the accepted sources beside the script.
     * Generated code is only inspected, never executed.
     */
    async generateTools(
        analysis: string,
        scriptPath: string,
        options: GenerateToolsOptions = {},
    ): Promise<GenerationReport> {
        if (options.confirm && !(await options.confirm(analysis))) {
            return { accepted: [], rejected: [] };
        }

        const accepted: GeneratedTool[] = [];
        const rejected: RejectedTool[] = [];

        for (const suggestion of await this.extractTools(analysis)) {
            const outcome = await this.generateTool(suggestion);
            if ("reasons" in outcome) {
                rejected.push(outcome);
                this.eventBus?.emit("generator:tool-rejected", outcome);
            } else {
                accepted.push(outcome);
                this.eventBus?.emit("generator:tool-accepted", { name: suggestion.name });
            }
        }

        if (accepted.length === 0) {
            return { accepted, rejected };
        }

        const outputPath = toolsOutputPath(scriptPath);
        await writeFile(
            outputPath,
            accepted.map((tool) => tool.source.trim()).join("\n\n") + "\n",
            "utf-8",
        );
        this.eventBus?.emit("generator:written", {
            path: outputPath,
            toolCount: accepted.length,
        });
        return { accepted, rejected, outputPath };
    }

    private async generateTool(
        suggestion: ToolSuggestion,
    ): Promise<GeneratedTool | RejectedTool> {
        const response = await this.client.chat(this.model, {
            messages: [
                {
                    role: "user",
                    content:
                        `The script is intended to achieve the following goal:\n${suggestion.scriptPurpose}\n\n` +
                        `Here is a tool that should be created:\n` +
                        `- Tool Name: ${suggestion.name}\n` +
                        `- Description: ${suggestion.description}\n` +
                        `- Inputs: ${suggestion.inputs.join(", ")}\n` +
                        `- Expected Output: ${suggestion.output}\n` +
                        "Generate a complete function that meets these requirements.",
                },
            ],
            systemPrompt: GENERATION_PROMPT,
            temperature: 0.2,
            maxTokens: 1000,
        });

        let generated: GeneratedTool;
        try {
            generated = parseGeneratedTool(response.content);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            return {
                name: suggestion.name,
                reasons: [`Could not parse generated tool: ${message}`],
            };
        }

        const report = checkCompatibility({
            ...generated.descriptor,
            sourceText: generated.descriptor.sourceText ?? generated.source,
        });
        if (!report.compatible) {
            return { name: generated.descriptor.name, reasons: report.reasons };
        }
        return generated;
    }
}
