import { z } from "zod";
import { SignatureUnavailableError } from "./errors.js";
import { parseAnnotation } from "./type-map.js";
import type {
    FunctionDescriptor,
    ParameterDescriptor,
    ParameterKind,
    TypeAnnotation,
} from "./types.js";

// ─── Validation Schemas ──────────────────────────────────────────────────────

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

const typeAnnotationSchema: z.ZodType<TypeAnnotation, z.ZodTypeDef, unknown> = z.union([
    z.discriminatedUnion("kind", [
        z.object({
            kind: z.literal("primitive"),
            name: z.enum(["string", "integer", "number", "boolean", "array", "object", "null"]),
        }),
        z.object({
            kind: z.literal("unsupported"),
            name: z.enum(["tuple", "set", "complex", "datetime"]),
        }),
        z.object({ kind: z.literal("class"), name: z.string().min(1) }),
        z.object({ kind: z.literal("expression"), text: z.string().min(1) }),
    ]),
    // Shorthand text, e.g. "number" or "Date"
    z.string().min(1).transform(parseAnnotation),
]);

const parameterSchema = z.object({
    // "__proto__" would set the prototype of the schema's `properties` map
    name: z
        .string()
        .regex(IDENTIFIER, "Parameter name must be an identifier")
        .refine((name) => name !== "__proto__", "Parameter name cannot be __proto__"),
    annotation: typeAnnotationSchema.optional(),
    hasDefault: z.boolean().default(false),
    kind: z
        .enum(["normal", "variadic-positional", "variadic-keyword"])
        .default("normal"),
});

/** Zod schema for a `FunctionDescriptor` supplied as plain data (e.g. JSON from a model). */
export const functionDescriptorSchema = z
    .object({
        name: z.string().regex(IDENTIFIER, "Function name must be a non-empty identifier"),
        docstring: z.string().default(""),
        parameters: z.array(parameterSchema).default([]),
        returnAnnotation: typeAnnotationSchema.optional(),
        sourceText: z.string().optional(),
    })
    .superRefine((fn, ctx) => {
        const seen = new Set<string>();
        fn.parameters.forEach((param, index) => {
            if (seen.has(param.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Duplicate parameter name "${param.name}"`,
                    path: ["parameters", index, "name"],
                });
            }
            seen.add(param.name);
        });
    });

/**
 * Validate a plain value as a function descriptor.
 * @throws ZodError if the value is not a well-formed descriptor.
 */
export function parseFunctionDescriptor(value: unknown): FunctionDescriptor {
    return functionDescriptorSchema.parse(value);
}

// ─── Described Functions ─────────────────────────────────────────────────────

/** Any function; parameters are irrelevant here since the descriptor carries them. */
export type AnyFunction = (...args: never[]) => unknown;

const descriptors = new WeakMap<object, FunctionDescriptor>();

/**
 * Attach a descriptor to a live function so it can be converted or gated later.
 * `sourceText` defaults to the function's own source.
 * @throws ZodError if the descriptor is malformed; nothing is attached then.
 */
export function describeFunction<F extends AnyFunction>(
    fn: F,
    descriptor: FunctionDescriptor,
): F {
    descriptors.set(
        fn,
        parseFunctionDescriptor({
            ...descriptor,
            sourceText: descriptor.sourceText ?? fn.toString(),
        }),
    );
    return fn;
}

/** The descriptor attached to `fn`, if any. */
export function getFunctionDescriptor(fn: AnyFunction): FunctionDescriptor | undefined {
    return descriptors.get(fn);
}

/**
 * Resolve a target (a described function or a descriptor value) to its descriptor.
 * @throws SignatureUnavailableError if the target is not callable or was never described.
 */
export function resolveSignature(target: unknown): FunctionDescriptor {
    if (typeof target === "function") {
        const descriptor = descriptors.get(target);
        if (!descriptor) {
            throw new SignatureUnavailableError(
                "no-signature",
                `Could not retrieve signature for ${target.name || "anonymous function"}.`,
            );
        }
        return descriptor;
    }
    const parsed = functionDescriptorSchema.safeParse(target);
    if (!parsed.success) {
        throw new SignatureUnavailableError(
            "not-callable",
            "Provided object is not a function.",
        );
    }
    return parsed.data;
}

// ─── Builder ─────────────────────────────────────────────────────────────────

export interface ParameterOptions {
    hasDefault?: boolean;
    kind?: ParameterKind;
}

/**
 * Fluent builder for function descriptors.
 *
 * @example
 * ```ts
 * const add = new FunctionBuilder("add_numbers")
 *     .doc("Adds two numbers.")
 *     .param("a", "number")
 *     .param("b", "number")
 *     .returns("number")
 *     .implement((a: number, b: number) => a + b);
 * ```
 */
export class FunctionBuilder {
    private docstring = "";
    private parameters: ParameterDescriptor[] = [];
    private returnAnnotation?: TypeAnnotation;
    private sourceText?: string;

    constructor(private readonly name: string) {}

    /** Set the docstring used as the schema description. */
    doc(text: string): this {
        this.docstring = text;
        return this;
    }

    /**
     * Append a parameter.
     * @param annotation - Annotation or shorthand text; omit for an unannotated parameter.
     */
    param(
        name: string,
        annotation?: TypeAnnotation | string,
        options: ParameterOptions = {},
    ): this {
        this.parameters.push({
            name,
            annotation:
                typeof annotation === "string" ? parseAnnotation(annotation) : annotation,
            hasDefault: options.hasDefault ?? false,
            kind: options.kind ?? "normal",
        });
        return this;
    }

    /** Append a parameter that has a default value. */
    optional(name: string, annotation?: TypeAnnotation | string): this {
        return this.param(name, annotation, { hasDefault: true });
    }

    /** Append a rest parameter (`...args`). */
    rest(name: string, annotation?: TypeAnnotation | string): this {
        return this.param(name, annotation, { kind: "variadic-positional" });
    }

    /** Append a keyword spread (`...options` collected as a bag of named values). */
    keywords(name: string, annotation?: TypeAnnotation | string): this {
        return this.param(name, annotation, { kind: "variadic-keyword" });
    }

    returns(annotation: TypeAnnotation | string): this {
        this.returnAnnotation =
            typeof annotation === "string" ? parseAnnotation(annotation) : annotation;
        return this;
    }

    /** Override the source text inspected by the interactive-call check. */
    source(text: string): this {
        this.sourceText = text;
        return this;
    }

    /**
     * Build and validate the descriptor.
     * @throws ZodError on an invalid name or duplicate parameter names.
     */
    build(): FunctionDescriptor {
        return parseFunctionDescriptor({
            name: this.name,
            docstring: this.docstring,
            parameters: this.parameters,
            returnAnnotation: this.returnAnnotation,
            sourceText: this.sourceText,
        });
    }

    /** Build the descriptor and attach it to `fn`. */
    implement<F extends AnyFunction>(fn: F): F {
        return describeFunction(fn, this.build());
    }
}
