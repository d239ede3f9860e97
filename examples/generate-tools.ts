/**
 * Tool Generation Example
 *
 * Analyzes a script with a model, asks for confirmation, then writes
 * schema-compatible tools to `<script>_tools.ts` beside it.
 *
 * Usage: npx tsx examples/generate-tools.ts <script> [provider/model]
 */
import { createInterface } from "node:readline/promises";
import { EventBus, LLMClient, ToolGenerator } from "../src/index.js";

async function main() {
    const [scriptPath, model = "openai/gpt-4o-mini"] = process.argv.slice(2);
    if (!scriptPath) {
        console.error("Usage: generate-tools <script> [provider/model]");
        process.exitCode = 1;
        return;
    }

    const bus = new EventBus();
    bus.on("generator:analyzed", (e) =>
        console.log(`  analyzed ${e.subject}${e.cached ? " (cached)" : ""}`),
    );
    bus.on("generator:tool-accepted", (e) => console.log(`  ✓ ${e.name}`));
    bus.on("generator:tool-rejected", (e) =>
        console.log(`  ✗ ${e.name}: ${e.reasons.join("; ")}`),
    );

    const generator = new ToolGenerator(new LLMClient({}, bus), model, { eventBus: bus });
    const analysis = await generator.analyzeScript(scriptPath);
    console.log(`\n${analysis}\n`);

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        const report = await generator.generateTools(analysis, scriptPath, {
            confirm: async () =>
                (await rl.question("Generate tools from this analysis? [y/N] "))
                    .trim()
                    .toLowerCase() === "y",
        });
        console.log(
            report.outputPath
                ? `\nWrote ${report.accepted.length} tool(s) to ${report.outputPath}`
                : "\nNo tools written.",
        );
    } finally {
        rl.close();
    }
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
