import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { EnvError } from "./errors";

const MISSING_KEY_MESSAGE = "Missing GEMINI_API_KEY. Set it in your environment or .env file before running.";

export const EnvSchema = z.object({
    GEMINI_API_KEY: z.string({ error: MISSING_KEY_MESSAGE }).trim().min(1, MISSING_KEY_MESSAGE),
    GEMINI_MODEL: z.string().trim().min(1).optional(),
    GEMINI_HISTORY_LIMIT: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates an environment record. Empty strings count as unset for the
 * optional keys, the way a blank line in `.env` usually means "not configured".
 */
export const parseEnv = (source: Record<string, string | undefined>): Env => {
    const blankToUndefined = (value: string | undefined) => (value?.trim() ? value : undefined);
    const result = EnvSchema.safeParse({
        GEMINI_API_KEY: source.GEMINI_API_KEY,
        GEMINI_MODEL: blankToUndefined(source.GEMINI_MODEL),
        GEMINI_HISTORY_LIMIT: blankToUndefined(source.GEMINI_HISTORY_LIMIT),
    });

    if (!result.success) {
        const [first] = result.error.issues;
        const key = first?.path.map(String).join(".");
        const message = first?.message ?? "Invalid environment";
        throw new EnvError(key === "GEMINI_API_KEY" ? message : `${key}: ${message}`);
    }
    return result.data;
};

/** Loads `.env` (if present) into `process.env`, then validates it. */
export const loadEnv = (): Env => {
    loadDotenv({ quiet: true });
    return parseEnv(process.env);
};
