import { loadEnv } from "@/lib/env";
import { errorMessage, isPlaygroundError } from "@/lib/errors";
import { loadImage } from "@/lib/images";
import { textOf, type ImagePart } from "@/lib/domain/schema";
import { createGeminiClient } from "@/lib/llm/gemini";
import { ReplyStream, SessionOrchestrator } from "@/lib/orchestrator";
import { saveTranscript } from "@/lib/persistence";
import readline from "readline/promises";
import { HELP_TEXT, parseCommand, type Command } from "./commands";
import { formatConfig, formatHistory } from "./format";

type PlaygroundState = {
    pendingImage?: { path: string; part: ImagePart };
    activeStream?: ReplyStream;
};

const write = (text: string) => {
    process.stdout.write(text);
};

async function send(orchestrator: SessionOrchestrator, state: PlaygroundState, text: string): Promise<void> {
    const image = state.pendingImage?.part;
    state.pendingImage = undefined;
    const result = await orchestrator.sendMessage({ text, image });

    if (result.kind === "complete") {
        write(`\nmodel: ${textOf(result.message.parts).trim()}\n\n`);
        return;
    }

    state.activeStream = result.stream;
    write("\nmodel: ");
    try {
        for await (const fragment of result.stream) {
            write(fragment);
        }
    } finally {
        state.activeStream = undefined;
    }

    const message = await result.stream.result();
    write(message?.incomplete ? "\n(reply cancelled)\n\n" : "\n\n");
}

async function run(orchestrator: SessionOrchestrator, state: PlaygroundState, command: Command): Promise<boolean> {
    switch (command.type) {
        case "empty":
            return true;
        case "quit":
            return false;
        case "help":
            console.log(HELP_TEXT);
            return true;
        case "error":
            console.log(command.message);
            return true;
        case "configure":
            orchestrator.configure(command.patch);
            console.log(formatConfig(orchestrator.getConfig(), orchestrator.retentionLimit));
            return true;
        case "config":
            console.log(formatConfig(orchestrator.getConfig(), orchestrator.retentionLimit));
            return true;
        case "history":
            console.log(formatHistory(orchestrator.history()));
            return true;
        case "clear":
            orchestrator.clearHistory();
            console.log("History cleared.");
            return true;
        case "image":
            state.pendingImage = { path: command.path, part: await loadImage(command.path) };
            console.log(`Attached ${command.path} to the next prompt.`);
            return true;
        case "save": {
            const transcript = await saveTranscript(command.path, {
                config: orchestrator.getConfig(),
                messages: orchestrator.history(),
            });
            console.log(`Saved ${transcript.messages.length} message(s) to ${command.path}.`);
            return true;
        }
        case "send":
            await send(orchestrator, state, command.text);
            return true;
    }
}

async function main(): Promise<void> {
    const env = loadEnv();
    const orchestrator = new SessionOrchestrator(createGeminiClient(env.GEMINI_API_KEY), {
        config: env.GEMINI_MODEL ? { model: env.GEMINI_MODEL } : {},
        retentionLimit: env.GEMINI_HISTORY_LIMIT,
    });

    const state: PlaygroundState = {};
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    let closed = false;
    rl.on("close", () => {
        closed = true;
    });

    // Ctrl-C stops a streaming reply (keeping what arrived) or leaves the prompt.
    rl.on("SIGINT", () => {
        const stream = state.activeStream;
        if (!stream) {
            rl.close();
            return;
        }
        stream.cancel().catch((error) => {
            console.error("Failed to cancel stream:", error);
        });
    });

    console.log("Gemini Playground. Type /help for commands.\n");
    console.log(formatConfig(orchestrator.getConfig(), orchestrator.retentionLimit), "\n");

    while (!closed) {
        let line: string;
        try {
            line = await rl.question(state.pendingImage ? "[image] > " : "> ");
        } catch (error) {
            if (closed) break;
            throw error;
        }

        try {
            const keepGoing = await run(orchestrator, state, parseCommand(line));
            if (!keepGoing) break;
        } catch (error) {
            // Every error leaves the session usable; report and prompt again.
            if (!isPlaygroundError(error)) console.error(error);
            console.log(`Error: ${errorMessage(error)}\n`);
        }
    }

    rl.close();
}

main().catch((error) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
});
