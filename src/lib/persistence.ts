import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { MessageSchema, SessionConfigSchema, TimestampSchema, type Message, type SessionConfig } from "./domain/schema";
import { TranscriptError, errorMessage } from "./errors";

export const TRANSCRIPT_VERSION = 1;

export const TranscriptSchema = z.object({
    version: z.literal(TRANSCRIPT_VERSION),
    savedAt: TimestampSchema,
    config: SessionConfigSchema,
    messages: z.array(MessageSchema),
});

export type Transcript = z.infer<typeof TranscriptSchema>;

/**
 * Writes the session as pretty JSON. The orchestrator itself keeps history in
 * memory only; this is for hosts that want to keep a run around.
 */
export async function saveTranscript(
    filePath: string,
    session: { config: SessionConfig; messages: readonly Message[] }
): Promise<Transcript> {
    const transcript: Transcript = {
        version: TRANSCRIPT_VERSION,
        savedAt: new Date().toISOString(),
        config: session.config,
        messages: [...session.messages],
    };

    try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, JSON.stringify(transcript, null, 2));
    } catch (error) {
        throw new TranscriptError(`Failed to save transcript to ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    return transcript;
}

export async function loadTranscript(filePath: string): Promise<Transcript> {
    let raw: unknown;
    try {
        const content = await fs.readFile(filePath, "utf-8");
        raw = JSON.parse(content);
    } catch (error) {
        throw new TranscriptError(`Failed to read transcript ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    const result = TranscriptSchema.safeParse(raw);
    if (!result.success) {
        throw new TranscriptError(`Malformed transcript ${filePath}: ${z.prettifyError(result.error)}`);
    }
    return result.data;
}
