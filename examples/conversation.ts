/**
 * Conversation Example
 *
 * A terminal chat that keeps context across turns.
 * Type "exit" or "quit" to leave.
 *
 * Usage: npx tsx examples/conversation.ts [provider/model]
 */
import { createInterface } from "node:readline/promises";
import { Conversation, LLMClient } from "../src/index.js";

async function main() {
    const model = process.argv[2] ?? "deepseek/deepseek-chat";
    const convo = new Conversation(new LLMClient(), model, {
        systemPrompt: "You are a concise, friendly assistant.",
        maxContextTokens: 4000,
    });

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        for (;;) {
            const line = (await rl.question("You: ")).trim();
            if (line === "exit" || line === "quit") break;
            if (!line) continue;
            console.log(`AI: ${await convo.send(line)}\n`);
        }
    } finally {
        rl.close();
    }
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
