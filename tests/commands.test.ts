import { parseCommand } from "@/app/commands";
import { formatConfig, formatHistory } from "@/app/format";
import { DEFAULT_SESSION_CONFIG } from "@/lib/constants";
import { createMessage } from "@/lib/llm/history";
import { describe, expect, it } from "vitest";

describe("parseCommand", () => {
    it("sends plain lines unchanged", () => {
        expect(parseCommand("  How does AI work? ")).toEqual({ type: "send", text: "  How does AI work? " });
        expect(parseCommand("   ")).toEqual({ type: "empty" });
    });

    it("unescapes a leading double slash", () => {
        expect(parseCommand("//etc/hosts is a file")).toEqual({ type: "send", text: "/etc/hosts is a file" });
    });

    it("parses configuration commands", () => {
        expect(parseCommand("/model gemini-1.5-flash")).toEqual({ type: "configure", patch: { model: "gemini-1.5-flash" } });
        expect(parseCommand("/temp 0.25")).toEqual({ type: "configure", patch: { temperature: 0.25 } });
        expect(parseCommand("/system You are a helpful medical assistant.")).toEqual({
            type: "configure",
            patch: { systemInstruction: "You are a helpful medical assistant." },
        });
        expect(parseCommand("/system")).toEqual({ type: "configure", patch: { systemInstruction: undefined } });
        expect(parseCommand("/thinking OFF")).toEqual({ type: "configure", patch: { thinkingEnabled: false } });
        expect(parseCommand("/stream on")).toEqual({ type: "configure", patch: { streamingEnabled: true } });
    });

    it("leaves range checks to the orchestrator", () => {
        expect(parseCommand("/temp 5")).toEqual({ type: "configure", patch: { temperature: 5 } });
    });

    it("reports malformed arguments", () => {
        expect(parseCommand("/temp warm")).toEqual({ type: "error", message: "Usage: /temp <number between 0 and 2>" });
        expect(parseCommand("/temp")).toEqual({ type: "error", message: "Usage: /temp <number between 0 and 2>" });
        expect(parseCommand("/thinking maybe")).toEqual({ type: "error", message: "Usage: /thinking on|off" });
        expect(parseCommand("/model")).toEqual({ type: "error", message: "Usage: /model <id>" });
        expect(parseCommand("/image")).toEqual({ type: "error", message: "Usage: /image <path>" });
    });

    it("parses session commands", () => {
        expect(parseCommand("/image ./cat photo.png")).toEqual({ type: "image", path: "./cat photo.png" });
        expect(parseCommand("/save out/run.json")).toEqual({ type: "save", path: "out/run.json" });
        expect(parseCommand("/history")).toEqual({ type: "history" });
        expect(parseCommand("/CLEAR")).toEqual({ type: "clear" });
        expect(parseCommand("/config")).toEqual({ type: "config" });
        expect(parseCommand("/help")).toEqual({ type: "help" });
        expect(parseCommand("/exit")).toEqual({ type: "quit" });
    });

    it("rejects unknown commands", () => {
        expect(parseCommand("/frobnicate now")).toEqual({
            type: "error",
            message: 'Unknown command "/frobnicate". Type /help for the list.',
        });
    });
});

describe("format", () => {
    it("renders history with images and incomplete replies", () => {
        const messages = [
            createMessage({
                role: "user",
                parts: [
                    { kind: "image", mimeType: "image/jpeg", data: "aGVsbG8=" },
                    { kind: "text", text: "What is this?" },
                ],
            }),
            createMessage({ role: "model", parts: [{ kind: "text", text: "A cat" }], incomplete: true }),
        ];

        expect(formatHistory(messages)).toBe("user: [image image/jpeg] What is this?\nmodel: A cat (incomplete)");
        expect(formatHistory([])).toBe("(no messages yet)");
    });

    it("renders the configuration", () => {
        expect(formatConfig({ ...DEFAULT_SESSION_CONFIG, thinkingEnabled: false }, 3)).toBe(
            [
                "model:        gemini-2.5-flash",
                "temperature:  1",
                "system:       (none)",
                "thinking:     off",
                "streaming:    on",
                "history:      last 3 exchange(s)",
            ].join("\n")
        );
    });
});
