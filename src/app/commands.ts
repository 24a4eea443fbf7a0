import { AVAILABLE_MODELS } from "@/lib/constants";
import type { SessionConfigPatch } from "@/lib/domain/schema";

export type Command =
    | { type: "send"; text: string }
    | { type: "configure"; patch: SessionConfigPatch }
    | { type: "image"; path: string }
    | { type: "history" }
    | { type: "clear" }
    | { type: "config" }
    | { type: "save"; path: string }
    | { type: "help" }
    | { type: "quit" }
    | { type: "empty" }
    | { type: "error"; message: string };

export const HELP_TEXT = `Type a prompt and press enter to send it. Commands:
  /model <id>          switch model (${AVAILABLE_MODELS.join(", ")})
  /temp <0-2>          set temperature
  /system [text]       set the system instruction (no text clears it)
  /thinking on|off     enable or disable thinking
  /stream on|off       stream replies or wait for the full answer
  /image <path>        attach an image (png, jpg, jpeg, webp) to the next prompt
  /history             show the conversation
  /clear               forget the conversation
  /config              show the current settings
  /save <file>         write the conversation to a JSON file
  /help                show this help
  /quit                exit`;

const parseToggle = (value: string): boolean | undefined => {
    const normalized = value.toLowerCase();
    if (normalized === "on" || normalized === "true" || normalized === "yes") return true;
    if (normalized === "off" || normalized === "false" || normalized === "no") return false;
    return undefined;
};

/**
 * Turns one input line into a command. Lines not starting with `/` are
 * prompts; `//` escapes a prompt that really starts with a slash.
 */
export const parseCommand = (line: string): Command => {
    const trimmed = line.trim();
    if (!trimmed) return { type: "empty" };

    if (trimmed.startsWith("//")) return { type: "send", text: trimmed.slice(1) };
    if (!trimmed.startsWith("/")) return { type: "send", text: line };

    const match = /^\/(\S+)\s*(.*)$/s.exec(trimmed);
    const name = (match?.[1] ?? "").toLowerCase();
    const arg = (match?.[2] ?? "").trim();

    switch (name) {
        case "model":
            if (!arg) return { type: "error", message: "Usage: /model <id>" };
            return { type: "configure", patch: { model: arg } };

        case "temp":
        case "temperature": {
            const value = Number(arg);
            if (!arg || !Number.isFinite(value)) return { type: "error", message: "Usage: /temp <number between 0 and 2>" };
            return { type: "configure", patch: { temperature: value } };
        }

        case "system":
            return { type: "configure", patch: { systemInstruction: arg || undefined } };

        case "thinking": {
            const enabled = parseToggle(arg);
            if (enabled === undefined) return { type: "error", message: "Usage: /thinking on|off" };
            return { type: "configure", patch: { thinkingEnabled: enabled } };
        }

        case "stream": {
            const enabled = parseToggle(arg);
            if (enabled === undefined) return { type: "error", message: "Usage: /stream on|off" };
            return { type: "configure", patch: { streamingEnabled: enabled } };
        }

        case "image":
            if (!arg) return { type: "error", message: "Usage: /image <path>" };
            return { type: "image", path: arg };

        case "save":
            if (!arg) return { type: "error", message: "Usage: /save <file>" };
            return { type: "save", path: arg };

        case "history":
            return { type: "history" };
        case "clear":
            return { type: "clear" };
        case "config":
            return { type: "config" };
        case "help":
            return { type: "help" };
        case "quit":
        case "exit":
            return { type: "quit" };

        default:
            return { type: "error", message: `Unknown command "/${name}". Type /help for the list.` };
    }
};
