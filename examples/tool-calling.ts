/**
 * Tool Calling Example
 *
 * Describes a function, checks it against the tool-schema rules,
 * and lets the model call it.
 *
 * Usage: npx tsx examples/tool-calling.ts
 */
import {
    EventBus,
    FunctionTool,
    LLMClient,
    ToolRegistry,
    ToolRunner,
    FunctionBuilder,
    convert,
    isFunctionSchemaCompatible,
    resolveSignature,
} from "../src/index.js";

const addNumbers = new FunctionBuilder("add_numbers")
    .doc("Adds two numbers together.")
    .param("a", "number")
    .param("b", "number")
    .returns("number")
    .implement((a: number, b: number): number => a + b);

async function main() {
    console.log("Schema:", JSON.stringify(convert(addNumbers), null, 2));
    console.log("Compatible:", isFunctionSchemaCompatible(addNumbers, { verbose: true }));

    const bus = new EventBus();
    bus.onAny((type) => console.log(`  [${String(type)}]`));

    const registry = new ToolRegistry(bus);
    registry.register(
        new FunctionTool({
            descriptor: resolveSignature(addNumbers),
            execute: (args) => addNumbers(Number(args.a), Number(args.b)),
        }),
    );

    const runner = new ToolRunner(new LLMClient(), registry, "openai/gpt-4o-mini", {
        eventBus: bus,
    });
    const result = await runner.run("What is 5 + 7?");
    console.log(`\n${result.content} (${result.rounds} rounds)`);
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
