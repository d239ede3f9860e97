import { SignatureUnavailableError } from "./errors.js";
import { resolveSignature } from "./function-descriptor.js";
import { annotationLabel, isAcceptedAnnotation, schemaTypeOf } from "./type-map.js";
import type {
    CompatibilityOptions,
    CompatibilityReport,
    FunctionDescriptor,
    FunctionSchema,
    ParameterSchema,
    ToolDefinition,
} from "./types.js";

/**
 * Calls that wait on a user. A textual check over the source, not control-flow
 * analysis: a call built dynamically or hidden behind a helper is not caught.
 * `input(` matches as a substring, so `read_input(` and `raw_input(` count too.
 */
const INTERACTIVE_CALLS: RegExp[] = [
    /input\s*\(/,
    /\bprompt\s*\(/,
    /\bconfirm\s*\(/,
    /\.question\s*\(/,
    /\bprocess\.stdin\b/,
];

/** Whether `source` contains a call that reads from the user. */
export function containsInteractiveCall(source: string): boolean {
    return INTERACTIVE_CALLS.some((pattern) => pattern.test(source));
}

// ─── Permissive Conversion ───────────────────────────────────────────────────

/**
 * Convert a described function (or a descriptor) to a tool schema.
 *
 * Unannotated and unmapped parameter types become `"string"`; variadic
 * parameters are listed like any other. Use `checkCompatibility` before
 * exposing a function the model will call.
 *
 * @throws SignatureUnavailableError if the target has no descriptor.
 */
export function convert(target: unknown): FunctionSchema {
    return buildSchema(resolveSignature(target));
}

function buildSchema(descriptor: FunctionDescriptor): FunctionSchema {
    const properties: Record<string, ParameterSchema> = {};
    const required: string[] = [];

    for (const param of descriptor.parameters) {
        properties[param.name] = { type: schemaTypeOf(param.annotation) };
        if (!param.hasDefault) {
            required.push(param.name);
        }
    }

    return {
        name: descriptor.name,
        description: descriptor.docstring.trim(),
        parameters: { type: "object", properties, required },
    };
}

/** Wrap a schema as a chat-completion tool entry. */
export function toToolDefinition(schema: FunctionSchema): ToolDefinition {
    return { type: "function", function: schema };
}

// ─── Strict Compatibility ────────────────────────────────────────────────────

/**
 * Gate a function before registering it for automated calling.
 *
 * Every applicable reason is collected, in checklist order; only an
 * unresolvable target stops the check early. With `andParse`, a compatible
 * function also gets its schema, and a conversion failure turns the
 * report negative instead of throwing.
 */
export function checkCompatibility(
    target: unknown,
    options: Pick<CompatibilityOptions, "andParse"> = {},
): CompatibilityReport {
    let descriptor: FunctionDescriptor;
    try {
        descriptor = resolveSignature(target);
    } catch (err) {
        if (err instanceof SignatureUnavailableError) {
            return { compatible: false, reasons: [err.message] };
        }
        throw err;
    }

    const reasons = new Set<string>();

    for (const param of descriptor.parameters) {
        if (!param.annotation) {
            reasons.add(`Parameter '${param.name}' is missing a type annotation.`);
        } else if (param.annotation.kind === "expression") {
            reasons.add(
                `Parameter '${param.name}' has an unrecognized type annotation: ${param.annotation.text}.`,
            );
        } else if (param.annotation.kind === "unsupported") {
            reasons.add(
                `Parameter '${param.name}' has an unsupported type: ${param.annotation.name}.`,
            );
        }
    }

    if (descriptor.parameters.some((param) => param.kind !== "normal")) {
        reasons.add("Function uses variadic parameters, which are not supported.");
    }

    if (descriptor.sourceText !== undefined && containsInteractiveCall(descriptor.sourceText)) {
        reasons.add("Function contains an interactive input call, which requires user interaction.");
    }

    const returns = descriptor.returnAnnotation;
    if (returns && !isAcceptedAnnotation(returns)) {
        reasons.add(`Return type '${annotationLabel(returns)}' is unsupported.`);
    }

    if (reasons.size > 0) {
        return { compatible: false, reasons: [...reasons] };
    }

    if (!options.andParse) {
        return { compatible: true, reasons: [] };
    }

    try {
        return { compatible: true, reasons: [], schema: buildSchema(descriptor) };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return {
            compatible: false,
            reasons: [`Function is structurally valid but failed to convert: ${message}`],
        };
    }
}

// ─── Projections ─────────────────────────────────────────────────────────────

/**
 * Flag-driven view over `checkCompatibility`:
 * - `verbose` + `andParse`: the report, with the schema when compatible
 * - `verbose`: the report without a schema
 * - `andParse`: the schema, or `false`
 * - neither: a boolean
 */
export function isFunctionSchemaCompatible(
    target: unknown,
    options: { verbose: true; andParse?: boolean },
): CompatibilityReport;
export function isFunctionSchemaCompatible(
    target: unknown,
    options: { verbose?: false; andParse: true },
): FunctionSchema | false;
export function isFunctionSchemaCompatible(
    target: unknown,
    options?: { verbose?: false; andParse?: false },
): boolean;
export function isFunctionSchemaCompatible(
    target: unknown,
    options: CompatibilityOptions = {},
): CompatibilityReport | FunctionSchema | boolean {
    const report = checkCompatibility(target, { andParse: options.andParse });
    if (options.verbose) {
        return report;
    }
    if (options.andParse) {
        return report.schema ?? false;
    }
    return report.compatible;
}
