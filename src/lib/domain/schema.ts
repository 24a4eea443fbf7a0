import { z } from "zod";

// ==========================================
// Primitives
// ==========================================
export const MessageIdSchema = z.uuid().brand("MessageId");

export const TimestampSchema = z.iso.datetime(); // ISO 8601

export const RoleSchema = z.enum(["user", "model"]);
export type Role = z.infer<typeof RoleSchema>;

// ==========================================
// Parts & Messages
// ==========================================

export const ImagePartSchema = z.object({
    kind: z.literal("image"),
    mimeType: z.string().min(1),
    data: z.string().min(1), // base64
});

export const TextPartSchema = z.object({
    kind: z.literal("text"),
    text: z.string(),
});

export const PartSchema = z.discriminatedUnion("kind", [TextPartSchema, ImagePartSchema]);

export type TextPart = z.infer<typeof TextPartSchema>;
export type ImagePart = z.infer<typeof ImagePartSchema>;
export type Part = z.infer<typeof PartSchema>;

export const MessageSchema = z.object({
    id: MessageIdSchema,
    role: RoleSchema,
    parts: z.array(PartSchema).min(1),
    createdAt: TimestampSchema,
    // Set on model messages assembled from a stream that did not run to completion.
    incomplete: z.boolean().default(false),
});

export type Message = z.infer<typeof MessageSchema>;

// ==========================================
// Configuration
// ==========================================

export const TEMPERATURE_MIN = 0;
export const TEMPERATURE_MAX = 2;

export const SessionConfigSchema = z.strictObject({
    model: z.string().trim().min(1, "model must not be empty"),
    temperature: z.number().min(TEMPERATURE_MIN).max(TEMPERATURE_MAX),
    systemInstruction: z.string().optional(),
    thinkingEnabled: z.boolean(),
    streamingEnabled: z.boolean(),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export const SessionConfigPatchSchema = SessionConfigSchema.partial();
export type SessionConfigPatch = z.infer<typeof SessionConfigPatchSchema>;

export const RetentionLimitSchema = z.number().int().positive();

// ==========================================
// Helpers
// ==========================================

export const textOf = (parts: readonly Part[]): string => {
    return parts.filter((part) => part.kind === "text").map((part) => part.text).join("");
};
