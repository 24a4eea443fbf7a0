import type { Message, Part, SessionConfig } from "@/lib/domain/schema";

const formatPart = (part: Part): string => {
    if (part.kind === "image") return `[image ${part.mimeType}]`;
    return part.text;
};

export const formatMessage = (message: Message): string => {
    const body = message.parts.map(formatPart).join(" ");
    const suffix = message.incomplete ? " (incomplete)" : "";
    return `${message.role}: ${body}${suffix}`;
};

export const formatHistory = (messages: readonly Message[]): string => {
    if (messages.length === 0) return "(no messages yet)";
    return messages.map(formatMessage).join("\n");
};

export const formatConfig = (config: SessionConfig, retentionLimit: number): string => {
    return [
        `model:        ${config.model}`,
        `temperature:  ${config.temperature}`,
        `system:       ${config.systemInstruction ?? "(none)"}`,
        `thinking:     ${config.thinkingEnabled ? "on" : "off"}`,
        `streaming:    ${config.streamingEnabled ? "on" : "off"}`,
        `history:      last ${retentionLimit} exchange(s)`,
    ].join("\n");
};
