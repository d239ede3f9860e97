import { z } from "zod";
import { ToolExecutionError } from "./errors.js";
import { parseFunctionDescriptor } from "./function-descriptor.js";
import { convert, toToolDefinition } from "./function-schema.js";
import type {
    FunctionDescriptor,
    FunctionToolDefinition,
    ToolArguments,
    ToolDefinition,
    TypeAnnotation,
} from "./types.js";

/**
 * FunctionTool pairs a descriptor with its implementation: it validates
 * model-supplied arguments with a Zod schema derived from the descriptor
 * and serializes itself for LLM function-calling.
 */
export class FunctionTool<TOutput = unknown> {
    public readonly descriptor: FunctionDescriptor;
    public readonly inputSchema: z.ZodType<ToolArguments>;
    private readonly executeFn: (args: ToolArguments) => TOutput | Promise<TOutput>;

    /** @throws ZodError if the descriptor is malformed. */
    constructor(def: FunctionToolDefinition<TOutput>) {
        this.descriptor = parseFunctionDescriptor(def.descriptor);
        this.inputSchema = zodFromDescriptor(this.descriptor);
        this.executeFn = def.execute;
    }

    get name(): string {
        return this.descriptor.name;
    }

    /**
     * Validate arguments and run the implementation.
     * @throws ToolExecutionError if validation fails or the implementation throws.
     */
    async execute(args: unknown): Promise<TOutput> {
        const parsed = this.inputSchema.safeParse(args);
        if (!parsed.success) {
            const detail = parsed.error.issues
                .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
                .join("; ");
            throw new ToolExecutionError(this.name, `invalid arguments (${detail})`, {
                cause: parsed.error,
            });
        }
        try {
            return await this.executeFn(parsed.data);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new ToolExecutionError(this.name, message, { cause: err });
        }
    }

    /** Serialize for LLM function-calling. */
    toJSON(): ToolDefinition {
        return toToolDefinition(convert(this.descriptor));
    }
}

/** Zod type for a single annotation; non-primitive annotations accept anything. */
function zodFromAnnotation(annotation: TypeAnnotation | undefined): z.ZodTypeAny {
    if (annotation?.kind !== "primitive") {
        return z.unknown();
    }
    switch (annotation.name) {
        case "string":
            return z.string();
        case "integer":
            return z.number().int();
        case "number":
            return z.number();
        case "boolean":
            return z.boolean();
        case "array":
            return z.array(z.unknown());
        case "object":
            return z.record(z.unknown());
        case "null":
            return z.null();
    }
}

/**
 * Object schema for a descriptor's arguments. Parameters with a default
 * are optional; unknown keys are stripped.
 */
export function zodFromDescriptor(descriptor: FunctionDescriptor): z.ZodType<ToolArguments> {
    const shape: Record<string, z.ZodTypeAny> = {};
    for (const param of descriptor.parameters) {
        const base = zodFromAnnotation(param.annotation);
        shape[param.name] = param.hasDefault ? base.optional() : base;
    }
    return z.object(shape);
}
