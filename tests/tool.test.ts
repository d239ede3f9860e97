import { describe, it, expect, vi } from "vitest";
import { FunctionBuilder } from "../src/function-descriptor.js";
import { ToolExecutionError } from "../src/errors.js";
import { FunctionTool, zodFromDescriptor } from "../src/tool.js";
import type { ToolArguments } from "../src/types.js";

function makeAddTool(): FunctionTool<number> {
    return new FunctionTool({
        descriptor: new FunctionBuilder("add_numbers")
            .doc("Adds two numbers together.")
            .param("a", "number")
            .param("b", "number")
            .build(),
        execute: (args: ToolArguments) => Number(args.a) + Number(args.b),
    });
}

describe("FunctionTool", () => {
    it("validates arguments and executes", async () => {
        const tool = makeAddTool();
        await expect(tool.execute({ a: 5, b: 7 })).resolves.toBe(12);
    });

    it("rejects arguments of the wrong type", async () => {
        const tool = makeAddTool();
        await expect(tool.execute({ a: "5", b: 7 })).rejects.toThrow(
            'Tool "add_numbers" failed: invalid arguments (a: Expected number, received string)',
        );
    });

    it("rejects missing required arguments", async () => {
        const tool = makeAddTool();
        await expect(tool.execute({ a: 1 })).rejects.toThrow("(b: Required)");
    });

    it("wraps implementation failures in ToolExecutionError", async () => {
        const tool = new FunctionTool({
            descriptor: new FunctionBuilder("explode").build(),
            execute: () => {
                throw new Error("boom");
            },
        });
        const failure = tool.execute({});
        await expect(failure).rejects.toBeInstanceOf(ToolExecutionError);
        await expect(failure).rejects.toThrow('Tool "explode" failed: boom');
    });

    it("passes parsed arguments and drops unknown keys", async () => {
        const execute = vi.fn().mockResolvedValue("ok");
        const tool = new FunctionTool({
            descriptor: new FunctionBuilder("lookup")
                .param("id", "integer")
                .optional("verbose", "boolean")
                .build(),
            execute,
        });

        await tool.execute({ id: 3, extra: true });
        expect(execute).toHaveBeenCalledWith({ id: 3 });
    });

    it("toJSON() yields a tool definition", () => {
        expect(makeAddTool().toJSON()).toEqual({
            type: "function",
            function: {
                name: "add_numbers",
                description: "Adds two numbers together.",
                parameters: {
                    type: "object",
                    properties: { a: { type: "number" }, b: { type: "number" } },
                    required: ["a", "b"],
                },
            },
        });
    });
});

describe("zodFromDescriptor()", () => {
    const schema = zodFromDescriptor(
        new FunctionBuilder("mixed")
            .param("count", "integer")
            .param("items", "array")
            .param("meta", "object")
            .param("nothing", "null")
            .param("invoice", "Invoice")
            .optional("note", "string")
            .build(),
    );
    const valid = { count: 2, items: [1, "a"], meta: { k: 1 }, nothing: null, invoice: { id: 1 } };

    it("accepts matching values and omitted optionals", () => {
        expect(schema.safeParse(valid).success).toBe(true);
    });

    it("enforces integers and nulls", () => {
        expect(schema.safeParse({ ...valid, count: 1.5 }).success).toBe(false);
        expect(schema.safeParse({ ...valid, nothing: 0 }).success).toBe(false);
    });

    it("accepts anything for named object types", () => {
        expect(schema.safeParse({ ...valid, invoice: "INV-1" }).success).toBe(true);
    });
});
