import type { SessionConfig } from "@/lib/domain/schema";

export const GEMINI_MODELS = {
    DEFAULT: "gemini-2.5-flash",
    EXPERIMENTAL: "gemini-2.0-flash-exp",
    LEGACY: "gemini-1.5-flash",
} as const;

export const AVAILABLE_MODELS: readonly string[] = Object.values(GEMINI_MODELS);

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
    model: GEMINI_MODELS.DEFAULT,
    temperature: 1.0,
    systemInstruction: undefined,
    thinkingEnabled: true,
    streamingEnabled: true,
};

// Number of exchanges (user + model turns) kept in a session.
export const DEFAULT_RETENTION_LIMIT = 5;

export const SUPPORTED_IMAGE_TYPES = {
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
    ".webp": "image/webp",
} as const;
