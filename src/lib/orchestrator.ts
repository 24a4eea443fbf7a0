import { DEFAULT_RETENTION_LIMIT, DEFAULT_SESSION_CONFIG } from "@/lib/constants";
import {
    ImagePartSchema,
    RetentionLimitSchema,
    SessionConfigPatchSchema,
    SessionConfigSchema,
    type ImagePart,
    type Message,
    type Part,
    type SessionConfig,
    type SessionConfigPatch,
} from "@/lib/domain/schema";
import {
    CancelledError,
    EmptyInputError,
    InvalidConfigurationError,
    UnsupportedImageError,
    UpstreamFailureError,
    toUpstreamFailure,
} from "@/lib/errors";
import { normalizeSystemInstruction, type GenerationRequest, type LLMClient } from "@/lib/llm/common";
import { createMessage } from "@/lib/llm/history";
import { createSessionStore, type SessionStoreApi } from "@/stores/sessionStore";
import type { z } from "zod";

export type UserContent = {
    text?: string;
    image?: ImagePart;
};

export type SendResult =
    | { kind: "complete"; message: Message }
    | { kind: "stream"; stream: ReplyStream };

export type Logger = Pick<Console, "warn" | "error">;

export type SessionOrchestratorOptions = {
    config?: SessionConfigPatch;
    retentionLimit?: number;
    logger?: Logger;
};

type StreamOutcome = "complete" | "cancelled" | "failed";

const describeIssues = (error: z.ZodError): string[] => {
    return error.issues.map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
};

const validateConfig = (current: SessionConfig, options: unknown): SessionConfig => {
    const patch = SessionConfigPatchSchema.safeParse(options);
    if (!patch.success) {
        const issues = describeIssues(patch.error);
        throw new InvalidConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
    }

    const merged = SessionConfigSchema.safeParse({ ...current, ...patch.data });
    if (!merged.success) {
        const issues = describeIssues(merged.error);
        throw new InvalidConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
    }
    return merged.data;
};

const toParts = (content: UserContent): Part[] => {
    const parts: Part[] = [];
    if (content.image) {
        const image = ImagePartSchema.safeParse(content.image);
        if (!image.success) {
            throw new UnsupportedImageError(`Invalid image attachment: ${describeIssues(image.error).join("; ")}`);
        }
        parts.push(image.data);
    }
    if (content.text !== undefined && content.text.trim().length > 0) {
        parts.push({ kind: "text", text: content.text });
    }
    if (parts.length === 0) {
        throw new EmptyInputError();
    }
    return parts;
};

/**
 * Single-use stream of reply fragments.
 *
 * The model message is recorded when iteration ends: in full once the upstream
 * is exhausted, or as an incomplete message holding only the fragments already
 * handed out when the consumer stops early, calls `cancel()`, or the upstream
 * fails part way.
 */
export class ReplyStream implements AsyncIterable<string> {
    private iterator?: AsyncGenerator<string>;
    private cancelled = false;
    private isSettled = false;
    private readonly settled: Promise<Message | undefined>;
    private readonly resolveSettled: (message: Message | undefined) => void;

    constructor(
        private readonly source: AsyncIterable<string>,
        private readonly onSettle: (fragments: string[], outcome: StreamOutcome) => Message | undefined
    ) {
        let resolve: (message: Message | undefined) => void = () => {};
        this.settled = new Promise((r) => {
            resolve = r;
        });
        this.resolveSettled = resolve;
    }

    [Symbol.asyncIterator](): AsyncGenerator<string> {
        if (this.cancelled) throw new CancelledError();
        if (this.iterator) throw new Error("ReplyStream can only be consumed once");
        this.iterator = this.run();
        return this.iterator;
    }

    /** Resolves to the recorded model message once the stream has settled. */
    result(): Promise<Message | undefined> {
        return this.settled;
    }

    /**
     * Stops the stream. While an upstream read is pending this settles at the
     * next fragment boundary, once that read returns.
     */
    async cancel(): Promise<Message | undefined> {
        if (this.isSettled) return this.settled;
        this.cancelled = true;
        if (this.iterator) {
            await this.iterator.return(undefined);
        }
        // No-op when the generator already settled in its finally block.
        this.settle([], "cancelled");
        return this.settled;
    }

    private async *run(): AsyncGenerator<string> {
        const fragments: string[] = [];
        let outcome: StreamOutcome = "cancelled";
        try {
            for await (const fragment of this.source) {
                fragments.push(fragment);
                yield fragment;
            }
            if (fragments.length === 0) {
                throw new UpstreamFailureError("Upstream stream ended without any text");
            }
            outcome = "complete";
        } catch (error) {
            outcome = "failed";
            throw toUpstreamFailure(error, "Streaming failed");
        } finally {
            this.settle(fragments, outcome);
        }
    }

    private settle(fragments: string[], outcome: StreamOutcome): void {
        if (this.isSettled) return;
        this.isSettled = true;
        this.resolveSettled(this.onSettle(fragments, outcome));
    }
}

/**
 * Drives one conversational session against an `LLMClient`.
 *
 * Callers must not overlap `sendMessage` calls (or unsettled streams) on the
 * same orchestrator; nothing here locks.
 */
export class SessionOrchestrator {
    readonly store: SessionStoreApi;
    private readonly logger: Logger;

    constructor(private readonly client: LLMClient, options: SessionOrchestratorOptions = {}) {
        const retentionLimit = options.retentionLimit ?? DEFAULT_RETENTION_LIMIT;
        if (!RetentionLimitSchema.safeParse(retentionLimit).success) {
            throw new InvalidConfigurationError(`Retention limit must be a positive integer, got ${retentionLimit}`);
        }

        const config = validateConfig(DEFAULT_SESSION_CONFIG, options.config ?? {});
        this.store = createSessionStore({ config, retentionLimit });
        this.logger = options.logger ?? console;
    }

    get retentionLimit(): number {
        return this.store.getState().retentionLimit;
    }

    getConfig(): SessionConfig {
        return this.store.getState().config;
    }

    /**
     * Merges `options` over the current configuration and swaps it in whole.
     * Nothing changes when validation fails.
     */
    configure(options: SessionConfigPatch): SessionConfig {
        const next = validateConfig(this.getConfig(), options);
        this.store.getState().setConfig(next);
        return next;
    }

    history(): readonly Message[] {
        return [...this.store.getState().messages];
    }

    clearHistory(): void {
        this.store.getState().clearMessages();
    }

    async sendMessage(content: UserContent): Promise<SendResult> {
        const parts = toParts(content);
        const config = this.getConfig();
        const state = this.store.getState();

        // The user turn stays recorded even if the model turn fails.
        state.appendMessage(createMessage({ role: "user", parts }));
        const messages = this.store.getState().messages;

        const request: GenerationRequest = {
            model: config.model,
            temperature: config.temperature,
            systemInstruction: normalizeSystemInstruction(config.systemInstruction),
            thinkingEnabled: config.thinkingEnabled,
            history: messages.slice(0, -1),
            input: parts,
        };

        state.setGenerating(true);

        if (!config.streamingEnabled) {
            try {
                const reply = await this.client.generate(request);
                if (!reply.text) {
                    throw new UpstreamFailureError("Upstream returned an empty reply");
                }
                const message = createMessage({ role: "model", parts: [{ kind: "text", text: reply.text }] });
                state.appendMessage(message);
                return { kind: "complete", message };
            } catch (error) {
                this.logger.error("Gemini request failed:", error);
                throw toUpstreamFailure(error);
            } finally {
                state.setGenerating(false);
            }
        }

        let source: AsyncIterable<string>;
        try {
            source = this.client.generateStream(request);
        } catch (error) {
            state.setGenerating(false);
            this.logger.error("Gemini stream could not be opened:", error);
            throw toUpstreamFailure(error);
        }

        const stream = new ReplyStream(source, (fragments, outcome) => this.recordStreamedReply(fragments, outcome));
        return { kind: "stream", stream };
    }

    private recordStreamedReply(fragments: string[], outcome: StreamOutcome): Message | undefined {
        const state = this.store.getState();
        state.setGenerating(false);

        if (outcome === "cancelled") {
            this.logger.warn(`Streaming reply cancelled after ${fragments.length} fragment(s)`);
        } else if (outcome === "failed") {
            this.logger.error(`Streaming reply failed after ${fragments.length} fragment(s)`);
        }

        const text = fragments.join("");
        if (text.length === 0) return undefined;

        const message = createMessage({
            role: "model",
            parts: [{ kind: "text", text }],
            incomplete: outcome !== "complete",
        });
        state.appendMessage(message);
        return message;
    }
}
