import { textOf } from "@/lib/domain/schema";
import { loadEnv } from "@/lib/env";
import { errorMessage } from "@/lib/errors";
import type { LLMClient } from "@/lib/llm/common";
import { createGeminiClient } from "@/lib/llm/gemini";
import { SessionOrchestrator, type SendResult } from "@/lib/orchestrator";

/**
 * Tour of the API features the playground exposes. Every section uses a fresh
 * session so earlier answers do not leak into later prompts, except the chat
 * section, which is about exactly that.
 */

const replyText = async (result: SendResult): Promise<string> => {
    if (result.kind === "complete") return textOf(result.message.parts).trim();

    let text = "";
    for await (const fragment of result.stream) text += fragment;
    return text.trim();
};

async function basicText(client: LLMClient): Promise<void> {
    console.log("# Basic text generation");
    const session = new SessionOrchestrator(client, { config: { streamingEnabled: false } });
    console.log(await replyText(await session.sendMessage({ text: "How does AI work?" })), "\n");
}

async function thinkingDisabled(client: LLMClient): Promise<void> {
    console.log("# Thinking disabled");
    const session = new SessionOrchestrator(client, { config: { streamingEnabled: false, thinkingEnabled: false } });
    const result = await session.sendMessage({ text: "Summarize the difference between AI and ML." });
    console.log(await replyText(result), "\n");
}

async function systemInstruction(client: LLMClient): Promise<void> {
    console.log("# System instruction (role-play)");
    const session = new SessionOrchestrator(client, {
        config: {
            streamingEnabled: false,
            systemInstruction: "You are a cat named Neko. Respond playfully.",
        },
    });
    console.log(await replyText(await session.sendMessage({ text: "Introduce yourself to a new friend." })), "\n");
}

async function streaming(client: LLMClient): Promise<void> {
    console.log("# Streaming response");
    const session = new SessionOrchestrator(client, { config: { streamingEnabled: true } });
    const result = await session.sendMessage({ text: "Write a haiku about sunrise over the ocean." });
    if (result.kind !== "stream") return;

    for await (const fragment of result.stream) {
        process.stdout.write(fragment);
    }
    process.stdout.write("\n\n");
}

async function multiTurnChat(client: LLMClient): Promise<void> {
    console.log("# Multi-turn chat");
    const session = new SessionOrchestrator(client, { config: { streamingEnabled: false } });

    console.log(`Model: ${await replyText(await session.sendMessage({ text: "I have 2 dogs in my house." }))}`);
    console.log(`Model: ${await replyText(await session.sendMessage({ text: "How many paws are in my house?" }))}`);

    console.log("History:");
    for (const message of session.history()) {
        console.log(`  ${message.role}: ${textOf(message.parts).trim()}`);
    }
    console.log();
}

async function main(): Promise<void> {
    const env = loadEnv();
    const client = createGeminiClient(env.GEMINI_API_KEY);

    await basicText(client);
    await thinkingDisabled(client);
    await systemInstruction(client);
    await streaming(client);
    await multiTurnChat(client);
}

main().catch((error) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
});
