/**
 * Weather Tool Example
 *
 * Registers a `get_weather` tool backed by canned data and shows how
 * the registry rejects functions the model cannot call.
 *
 * Usage: npx tsx examples/weather-tool.ts
 */
import {
    FunctionBuilder,
    FunctionTool,
    LLMClient,
    ToolRegistrationError,
    ToolRegistry,
    ToolRunner,
} from "../src/index.js";

const FORECASTS: Record<string, { celsius: number; sky: string }> = {
    tokyo: { celsius: 22, sky: "sunny" },
    paris: { celsius: 14, sky: "overcast" },
};

async function main() {
    const registry = new ToolRegistry();

    registry.register(
        new FunctionTool({
            descriptor: new FunctionBuilder("get_weather")
                .doc("Retrieve the current weather for a location.")
                .param("location", "string")
                .returns("object")
                .build(),
            execute: (args) => {
                const location = String(args.location);
                return { location, ...(FORECASTS[location.toLowerCase()] ?? { sky: "unknown" }) };
            },
        }),
    );

    // Date parameters are not serializable, so this one is refused.
    try {
        registry.register(
            new FunctionTool({
                descriptor: new FunctionBuilder("get_forecast")
                    .param("location", "string")
                    .param("day", "Date")
                    .build(),
                execute: () => null,
            }),
        );
    } catch (err) {
        if (!(err instanceof ToolRegistrationError)) throw err;
        console.log(`Rejected ${err.toolName}:\n  ${err.reasons.join("\n  ")}\n`);
    }

    const runner = new ToolRunner(new LLMClient(), registry, "deepseek/deepseek-chat");
    const result = await runner.run("What's the weather like in Tokyo?");
    console.log(result.content);
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
