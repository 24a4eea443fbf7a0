import { textOf } from "@/lib/domain/schema";
import { loadEnv } from "@/lib/env";
import { errorMessage } from "@/lib/errors";
import { createGeminiClient } from "@/lib/llm/gemini";
import { SessionOrchestrator } from "@/lib/orchestrator";

// Minimal call: one prompt, one answer.
async function main(): Promise<void> {
    const env = loadEnv();
    const orchestrator = new SessionOrchestrator(createGeminiClient(env.GEMINI_API_KEY), {
        config: { streamingEnabled: false },
    });

    const result = await orchestrator.sendMessage({ text: "Explain how AI works in a few words" });
    if (result.kind === "complete") {
        console.log(textOf(result.message.parts).trim());
    }
}

main().catch((error) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
});
