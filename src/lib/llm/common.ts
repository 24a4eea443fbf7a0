import type { Message, Part } from "@/lib/domain/schema";

// ==========================================
// Types
// ==========================================

/**
 * Everything the upstream needs for one turn. Built fresh per call from the
 * session config and history, never stored.
 */
export type GenerationRequest = {
    model: string;
    temperature: number;
    systemInstruction?: string;
    thinkingEnabled: boolean;
    history: readonly Message[];
    input: readonly Part[];
};

export type LLMReply = {
    text: string;
};

/**
 * Upstream generative API. Implementations reject with `UpstreamFailureError`.
 */
export interface LLMClient {
    generate(request: GenerationRequest): Promise<LLMReply>;

    /** Lazy, finite, forward-only sequence of text fragments. */
    generateStream(request: GenerationRequest): AsyncIterable<string>;
}

// ==========================================
// Utilities
// ==========================================

export const normalizeSystemInstruction = (value: string | undefined): string | undefined => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
};
