/**
 * Chat Completion Example
 *
 * Sends a single prompt to OpenAI or DeepSeek and prints the reply
 * with its token usage.
 *
 * Usage: npx tsx examples/chat-completion.ts [provider/model]
 *
 * Before running, set an API key:
 *   export OPENAI_API_KEY="..."
 *   export DEEPSEEK_API_KEY="..."
 */
import { EventBus, LLMClient } from "../src/index.js";

async function main() {
    const model = process.argv[2] ?? "openai/gpt-4o-mini";
    const bus = new EventBus();
    bus.on("llm:request", (e) => console.log(`  → ${e.provider} request`));
    bus.on("llm:response", (e) => console.log(`  ← tokens: ${JSON.stringify(e.usage)}`));

    const client = new LLMClient({ defaults: { temperature: 0.7 } }, bus);
    const response = await client.chat(model, {
        messages: [{ role: "user", content: "write a haiku about ai" }],
        // The stored-completion flag is an OpenAI option.
        store: model.startsWith("openai/") ? true : undefined,
    });

    console.log(`\n${response.content}`);
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
