import { describe, it, expect } from "vitest";
import { SignatureUnavailableError } from "../src/errors.js";
import { FunctionBuilder, describeFunction } from "../src/function-descriptor.js";
import {
    checkCompatibility,
    containsInteractiveCall,
    convert,
    isFunctionSchemaCompatible,
    toToolDefinition,
} from "../src/function-schema.js";
import type { FunctionDescriptor } from "../src/types.js";

function addNumbers(): FunctionDescriptor {
    return new FunctionBuilder("add_numbers")
        .doc("Adds two numbers.")
        .param("a", "number")
        .param("b", "number")
        .build();
}

const opaque = function opaque() {
    return 1;
};

describe("convert()", () => {
    it("converts a two-number function", () => {
        expect(convert(addNumbers())).toEqual({
            name: "add_numbers",
            description: "Adds two numbers.",
            parameters: {
                type: "object",
                properties: { a: { type: "number" }, b: { type: "number" } },
                required: ["a", "b"],
            },
        });
    });

    it("keeps parameter order and requires only parameters without defaults", () => {
        const schema = convert(
            new FunctionBuilder("search")
                .param("query", "string")
                .optional("limit", "integer")
                .param("exact", "boolean")
                .optional("tags", "array")
                .param("filters", "object")
                .build(),
        );

        expect(Object.keys(schema.parameters.properties)).toEqual([
            "query",
            "limit",
            "exact",
            "tags",
            "filters",
        ]);
        expect(schema.parameters.required).toEqual(["query", "exact", "filters"]);
        expect(schema.parameters.properties.limit).toEqual({ type: "integer" });
        expect(schema.parameters.properties.tags).toEqual({ type: "array" });
        expect(schema.parameters.properties.filters).toEqual({ type: "object" });
    });

    it("trims the docstring and defaults it to an empty description", () => {
        const described = new FunctionBuilder("greet")
            .doc("\n    Greets someone.\n  ")
            .param("name", "string")
            .build();
        expect(convert(described).description).toBe("Greets someone.");
        expect(convert(new FunctionBuilder("noop").build()).description).toBe("");
    });

    it("falls back to string for unannotated and unmapped types", () => {
        const schema = convert(
            new FunctionBuilder("loose")
                .param("x")
                .param("when", "Date")
                .param("tags", "Array<string>")
                .param("invoice", "Invoice")
                .build(),
        );
        expect(schema.parameters.properties).toEqual({
            x: { type: "string" },
            when: { type: "string" },
            tags: { type: "string" },
            invoice: { type: "string" },
        });
    });

    it("lists variadic parameters like normal ones", () => {
        const schema = convert(
            new FunctionBuilder("sum").param("first", "number").rest("rest", "number").build(),
        );
        expect(schema.parameters.properties).toEqual({
            first: { type: "number" },
            rest: { type: "number" },
        });
        expect(schema.parameters.required).toEqual(["first", "rest"]);
    });

    it("converts a described function", () => {
        const add = new FunctionBuilder("add_numbers")
            .doc("Adds two numbers.")
            .param("a", "number")
            .param("b", "number")
            .implement((a: number, b: number) => a + b);

        expect(convert(add)).toEqual(convert(addNumbers()));
    });

    it("does not mutate the descriptor", () => {
        const descriptor = addNumbers();
        const before = structuredClone(descriptor);
        convert(descriptor);
        expect(descriptor).toEqual(before);
    });

    it("throws SignatureUnavailableError for an undescribed function", () => {
        expect(() => convert(opaque)).toThrow(SignatureUnavailableError);
        expect(() => convert(opaque)).toThrow("Could not retrieve signature for opaque.");
    });

    it("throws SignatureUnavailableError for a value that is not a function", () => {
        expect(() => convert(42)).toThrow("Provided object is not a function.");
    });

    it("wraps a schema as a tool definition", () => {
        expect(toToolDefinition(convert(addNumbers()))).toEqual({
            type: "function",
            function: convert(addNumbers()),
        });
    });
});

describe("checkCompatibility()", () => {
    it("accepts a fully typed function", () => {
        expect(checkCompatibility(addNumbers())).toEqual({ compatible: true, reasons: [] });
    });

    it("flags an unannotated parameter", () => {
        const described = new FunctionBuilder("echo").param("x").build();
        expect(checkCompatibility(described)).toEqual({
            compatible: false,
            reasons: ["Parameter 'x' is missing a type annotation."],
        });
    });

    it("rejects reject-listed parameter types", () => {
        const report = checkCompatibility(
            new FunctionBuilder("pairs").param("pair", "tuple").param("count", "integer").build(),
        );
        expect(report.compatible).toBe(false);
        expect(report.reasons).toEqual(["Parameter 'pair' has an unsupported type: tuple."]);
    });

    it("rejects annotations that are not types", () => {
        const report = checkCompatibility(
            new FunctionBuilder("tagged").param("tags", "Array<string>").build(),
        );
        expect(report.reasons).toEqual([
            "Parameter 'tags' has an unrecognized type annotation: Array<string>.",
        ]);
    });

    it("accepts named object types", () => {
        const report = checkCompatibility(
            new FunctionBuilder("bill").param("invoice", "Invoice").returns("Receipt").build(),
        );
        expect(report).toEqual({ compatible: true, reasons: [] });
    });

    it("reports variadic parameters exactly once", () => {
        const report = checkCompatibility(
            new FunctionBuilder("spread")
                .param("a", "number")
                .rest("values", "number")
                .keywords("options", "object")
                .build(),
        );
        expect(report.reasons).toEqual([
            "Function uses variadic parameters, which are not supported.",
        ]);
    });

    it("flags interactive functions even when well typed", () => {
        const described = new FunctionBuilder("ask")
            .param("question", "string")
            .returns("string")
            .source("return rl.question(question);")
            .build();
        expect(checkCompatibility(described)).toEqual({
            compatible: false,
            reasons: [
                "Function contains an interactive input call, which requires user interaction.",
            ],
        });
    });

    it("inspects the source of a described function", () => {
        const readAll = describeFunction(
            function readAll(): string {
                return String(process.stdin.read());
            },
            { name: "read_all", docstring: "", parameters: [] },
        );
        expect(checkCompatibility(readAll).reasons).toEqual([
            "Function contains an interactive input call, which requires user interaction.",
        ]);
    });

    it("rejects unsupported return types and accepts a missing one", () => {
        const dated = new FunctionBuilder("now").returns("Date").build();
        const mapped = new FunctionBuilder("index").returns("Map<string, number>").build();
        const bare = new FunctionBuilder("tick").build();

        expect(checkCompatibility(dated).reasons).toEqual([
            "Return type 'datetime' is unsupported.",
        ]);
        expect(checkCompatibility(mapped).reasons).toEqual([
            "Return type 'Map<string, number>' is unsupported.",
        ]);
        expect(checkCompatibility(bare).compatible).toBe(true);
    });

    it("accumulates every reason in checklist order", () => {
        const described = new FunctionBuilder("messy")
            .param("x")
            .param("when", "Date")
            .rest("args", "number")
            .returns("tuple")
            .source("const answer = prompt('continue?');")
            .build();

        expect(checkCompatibility(described).reasons).toEqual([
            "Parameter 'x' is missing a type annotation.",
            "Parameter 'when' has an unsupported type: datetime.",
            "Function uses variadic parameters, which are not supported.",
            "Function contains an interactive input call, which requires user interaction.",
            "Return type 'tuple' is unsupported.",
        ]);
    });

    it("stops at a target that is not callable", () => {
        expect(checkCompatibility(42)).toEqual({
            compatible: false,
            reasons: ["Provided object is not a function."],
        });
        expect(checkCompatibility({ foo: 1 })).toEqual({
            compatible: false,
            reasons: ["Provided object is not a function."],
        });
    });

    it("stops at a function without a signature", () => {
        expect(checkCompatibility(opaque)).toEqual({
            compatible: false,
            reasons: ["Could not retrieve signature for opaque."],
        });
    });

    it("attaches the schema with andParse", () => {
        expect(checkCompatibility(addNumbers(), { andParse: true })).toEqual({
            compatible: true,
            reasons: [],
            schema: convert(addNumbers()),
        });
    });

    it("omits the schema for an incompatible function even with andParse", () => {
        const report = checkCompatibility(new FunctionBuilder("f").param("x").build(), {
            andParse: true,
        });
        expect(report.schema).toBeUndefined();
    });

    it("refuses a __proto__ parameter the same way on every path", () => {
        const descriptor = {
            name: "proto",
            parameters: [{ name: "__proto__", annotation: "string" }],
        };

        expect(() => new FunctionBuilder("proto").param("__proto__", "string").build()).toThrow(
            "Parameter name cannot be __proto__",
        );
        expect(() => convert(descriptor)).toThrow(SignatureUnavailableError);
        expect(checkCompatibility(descriptor, { andParse: true })).toEqual({
            compatible: false,
            reasons: ["Provided object is not a function."],
        });
    });

    it("lists a constructor parameter as an ordinary property", () => {
        const schema = convert(new FunctionBuilder("make").param("constructor", "string").build());
        expect(Object.keys(schema.parameters.properties)).toEqual(["constructor"]);
        expect(schema.parameters.properties.constructor).toEqual({ type: "string" });
        expect(schema.parameters.required).toEqual(["constructor"]);
    });

    it("is idempotent", () => {
        const described = new FunctionBuilder("f").param("x").rest("ys", "number").build();
        expect(checkCompatibility(described)).toEqual(checkCompatibility(described));
    });

    it("reports compatible exactly when there are no reasons", () => {
        const targets: unknown[] = [
            addNumbers(),
            new FunctionBuilder("a").param("x").build(),
            new FunctionBuilder("b").keywords("kw", "object").build(),
            new FunctionBuilder("c").returns("set").build(),
            new FunctionBuilder("d").param("n", "Invoice").build(),
            opaque,
            "not a function",
        ];
        for (const target of targets) {
            const report = checkCompatibility(target);
            expect(report.compatible).toBe(report.reasons.length === 0);
        }
    });
});

describe("isFunctionSchemaCompatible()", () => {
    const untyped = new FunctionBuilder("echo").param("x").build();

    it("returns a boolean without flags", () => {
        expect(isFunctionSchemaCompatible(addNumbers())).toBe(true);
        expect(isFunctionSchemaCompatible(untyped)).toBe(false);
    });

    it("returns the report when verbose", () => {
        expect(isFunctionSchemaCompatible(untyped, { verbose: true })).toEqual({
            compatible: false,
            reasons: ["Parameter 'x' is missing a type annotation."],
        });
        expect(isFunctionSchemaCompatible(addNumbers(), { verbose: true })).toEqual({
            compatible: true,
            reasons: [],
        });
    });

    it("returns the schema or false with andParse", () => {
        expect(isFunctionSchemaCompatible(addNumbers(), { andParse: true })).toEqual(
            convert(addNumbers()),
        );
        expect(isFunctionSchemaCompatible(untyped, { andParse: true })).toBe(false);
    });

    it("returns the report with the schema when verbose and andParse", () => {
        expect(
            isFunctionSchemaCompatible(addNumbers(), { verbose: true, andParse: true }),
        ).toEqual({ compatible: true, reasons: [], schema: convert(addNumbers()) });
    });
});

describe("containsInteractiveCall()", () => {
    it("matches calls that wait on a user", () => {
        expect(containsInteractiveCall("const v = input('name');")).toBe(true);
        expect(containsInteractiveCall("if (confirm ('ok?')) {}")).toBe(true);
        expect(containsInteractiveCall("await readline.question('x')")).toBe(true);
        expect(containsInteractiveCall("process.stdin.on('data', f)")).toBe(true);
    });

    it("matches input( inside longer names", () => {
        expect(containsInteractiveCall("const line = read_input();")).toBe(true);
        expect(containsInteractiveCall("raw_input ('> ')")).toBe(true);
    });

    it("ignores mentions that are not calls", () => {
        expect(containsInteractiveCall("return validateInput(x);")).toBe(false);
        expect(containsInteractiveCall("const input = 3;")).toBe(false);
    });
});
