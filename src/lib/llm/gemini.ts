import type { Message, Part } from "@/lib/domain/schema";
import { UpstreamFailureError, toUpstreamFailure } from "@/lib/errors";
import { GoogleGenAI, type Content as geminiContent, type GenerateContentConfig, type GenerateContentResponse, type Part as geminiPart } from "@google/genai";
import { normalizeSystemInstruction, type GenerationRequest, type LLMClient, type LLMReply } from "./common";

const roleToGemini = (role: Message["role"]): "user" | "model" => {
    if (role === "user") return "user";
    if (role === "model") return "model";
    throw new Error(`Unknown role: ${role}`);
};

export const partsToGemini = (parts: readonly Part[]): geminiPart[] => {
    return parts.map((part) => {
        if (part.kind === "image") {
            return {
                inlineData: {
                    mimeType: part.mimeType,
                    data: part.data,
                },
            };
        }
        return { text: part.text };
    });
};

/**
 * History first, then the new input as the final user turn. Images go ahead of
 * the prompt text inside that turn.
 */
export const buildGeminiContents = (request: GenerationRequest): geminiContent[] => {
    const history = request.history.map((message) => ({
        role: roleToGemini(message.role),
        parts: partsToGemini(message.parts),
    }));

    const images = request.input.filter((part) => part.kind === "image");
    const texts = request.input.filter((part) => part.kind === "text");

    return [...history, { role: "user", parts: partsToGemini([...images, ...texts]) }];
};

export const buildGenerationConfig = (request: GenerationRequest): GenerateContentConfig => {
    const config: GenerateContentConfig = { temperature: request.temperature };

    const systemInstruction = normalizeSystemInstruction(request.systemInstruction);
    if (systemInstruction) {
        config.systemInstruction = systemInstruction;
    }

    // A zero budget switches thinking off; otherwise the model decides.
    if (!request.thinkingEnabled) {
        config.thinkingConfig = { thinkingBudget: 0 };
    }

    return config;
};

export const createGeminiClient = (apiKey: string): LLMClient => {
    const genai = new GoogleGenAI({ apiKey });

    const paramsFor = (request: GenerationRequest) => ({
        model: request.model,
        contents: buildGeminiContents(request),
        config: buildGenerationConfig(request),
    });

    return {
        async generate(request: GenerationRequest): Promise<LLMReply> {
            let text: string | undefined;
            try {
                const res = await genai.models.generateContent(paramsFor(request));
                text = res.text;
            } catch (error) {
                throw toUpstreamFailure(error);
            }

            if (!text) {
                throw new UpstreamFailureError("Gemini returned a malformed response without text");
            }
            return { text };
        },

        async *generateStream(request: GenerationRequest): AsyncGenerator<string> {
            let stream: AsyncGenerator<GenerateContentResponse>;
            try {
                stream = await genai.models.generateContentStream(paramsFor(request));
            } catch (error) {
                throw toUpstreamFailure(error);
            }

            try {
                for await (const chunk of stream) {
                    const text = chunk.text;
                    if (text) yield text;
                }
            } catch (error) {
                throw toUpstreamFailure(error);
            }
        },
    };
};
