export type PlaygroundErrorCode =
    | "INVALID_CONFIGURATION"
    | "EMPTY_INPUT"
    | "UPSTREAM_FAILURE"
    | "CANCELLED"
    | "ENV"
    | "UNSUPPORTED_IMAGE"
    | "TRANSCRIPT";

export abstract class PlaygroundError extends Error {
    abstract readonly code: PlaygroundErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidConfigurationError extends PlaygroundError {
    readonly code = "INVALID_CONFIGURATION";

    constructor(message: string, readonly issues: string[] = []) {
        super(message);
    }
}

export class EmptyInputError extends PlaygroundError {
    readonly code = "EMPTY_INPUT";

    constructor() {
        super("Message must contain text or an image");
    }
}

/**
 * Raised when the generative API call fails: network errors, quota, or a
 * response without usable content. Never retried here.
 */
export class UpstreamFailureError extends PlaygroundError {
    readonly code = "UPSTREAM_FAILURE";

    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class CancelledError extends PlaygroundError {
    readonly code = "CANCELLED";

    constructor() {
        super("Streaming reply was cancelled");
    }
}

export class EnvError extends PlaygroundError {
    readonly code = "ENV";
}

export class UnsupportedImageError extends PlaygroundError {
    readonly code = "UNSUPPORTED_IMAGE";
}

export class TranscriptError extends PlaygroundError {
    readonly code = "TRANSCRIPT";
}

const statusOf = (error: unknown): number | undefined => {
    if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
        return error.status;
    }
    return undefined;
};

/** Passes upstream failures through; wraps anything else, keeping an HTTP status when present. */
export const toUpstreamFailure = (error: unknown, prefix: string = "Gemini request failed"): UpstreamFailureError => {
    if (error instanceof UpstreamFailureError) return error;
    return new UpstreamFailureError(`${prefix}: ${errorMessage(error)}`, statusOf(error), { cause: error });
};

export const isPlaygroundError = (value: unknown): value is PlaygroundError => {
    return value instanceof PlaygroundError;
};

export const errorMessage = (error: unknown): string => {
    return error instanceof Error ? error.message : String(error);
};
