import type {
    PrimitiveType,
    SchemaType,
    TypeAnnotation,
    UnsupportedType,
} from "./types.js";

// ─── Lookup Tables ───────────────────────────────────────────────────────────

/** Closed mapping from primitive semantic types to schema type names. */
export const TYPE_MAP = {
    string: "string",
    integer: "integer",
    number: "number",
    boolean: "boolean",
    array: "array",
    object: "object",
    null: "null",
} as const satisfies Record<PrimitiveType, SchemaType>;

/** Types that can never appear in a tool signature. */
export const UNSUPPORTED_TYPES = {
    tuple: true,
    set: true,
    complex: true,
    datetime: true,
} as const satisfies Record<UnsupportedType, true>;

/** Alternate spellings accepted by `parseAnnotation`. */
const UNSUPPORTED_ALIASES = new Map<string, UnsupportedType>([
    ["Date", "datetime"],
    ["Set", "set"],
]);

const CLASS_NAME = /^[A-Z][A-Za-z0-9_]*$/;

function isPrimitiveType(text: string): text is PrimitiveType {
    return Object.prototype.hasOwnProperty.call(TYPE_MAP, text);
}

function isUnsupportedType(text: string): text is UnsupportedType {
    return Object.prototype.hasOwnProperty.call(UNSUPPORTED_TYPES, text);
}

// ─── Annotation Helpers ──────────────────────────────────────────────────────

/**
 * Resolve shorthand annotation text.
 *
 * @example
 * parseAnnotation("number");         // { kind: "primitive", name: "number" }
 * parseAnnotation("Date");           // { kind: "unsupported", name: "datetime" }
 * parseAnnotation("Invoice");        // { kind: "class", name: "Invoice" }
 * parseAnnotation("Array<string>");  // { kind: "expression", text: "Array<string>" }
 */
export function parseAnnotation(text: string): TypeAnnotation {
    const trimmed = text.trim();
    if (isPrimitiveType(trimmed)) {
        return { kind: "primitive", name: trimmed };
    }
    if (isUnsupportedType(trimmed)) {
        return { kind: "unsupported", name: trimmed };
    }
    const alias = UNSUPPORTED_ALIASES.get(trimmed);
    if (alias) {
        return { kind: "unsupported", name: alias };
    }
    if (CLASS_NAME.test(trimmed)) {
        return { kind: "class", name: trimmed };
    }
    return { kind: "expression", text: trimmed };
}

/** Human-readable form of an annotation, as used in compatibility reasons. */
export function annotationLabel(annotation: TypeAnnotation): string {
    return annotation.kind === "expression" ? annotation.text : annotation.name;
}

/**
 * Permissive mapping: anything outside the primitive table becomes `"string"`.
 */
export function schemaTypeOf(annotation: TypeAnnotation | undefined): SchemaType {
    if (annotation?.kind === "primitive") {
        return TYPE_MAP[annotation.name];
    }
    return "string";
}

/**
 * Strict acceptance: primitives and named object types pass; the
 * reject-list and non-type expressions do not.
 */
export function isAcceptedAnnotation(annotation: TypeAnnotation): boolean {
    switch (annotation.kind) {
        case "primitive":
        case "class":
            return true;
        case "unsupported":
        case "expression":
            return false;
    }
}
