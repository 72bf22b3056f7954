import type { Session } from "./session/Session";

/**
 * Stable error codes surfaced by the session store and adapters.
 */
export type ErrorCode =
    | "INVALID_SESSION"
    | "SERIALIZATION_FAILED"
    | "PAYLOAD_TOO_LARGE"
    | "STORE_UNAVAILABLE"
    | "CONFIGURATION_ERROR"
    | "INTERNAL_ERROR";

/**
 * Canonical error type used across kvsession packages.
 */
export class SessionStoreError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SessionStoreError";
        this.details = details;
    }
}

/**
 * Raised by `new`/`get` when a cookie was present but the session behind it
 * could not be restored. `session` is the fresh session the store built before
 * failing, so callers may carry on with it.
 */
export class SessionLoadError extends SessionStoreError {
    constructor(
        public readonly session: Session,
        error: SessionStoreError
    ) {
        super(error.code, error.message, error.cause ?? error, error.details);
        this.name = "SessionLoadError";
    }
}

/**
 * JSON-safe error response shape used by adapters.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Logger contract used by the store for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: Record<string, unknown>): void;
    info(msg: string, meta?: Record<string, unknown>): void;
    warn(msg: string, meta?: Record<string, unknown>): void;
    error(msg: string, meta?: Record<string, unknown>): void;
};

/**
 * Creates a normalized error response body.
 */
export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

/**
 * Type guard for {@link SessionStoreError}.
 */
export function isSessionStoreError(error: unknown): error is SessionStoreError {
    return error instanceof SessionStoreError;
}

/**
 * Converts unknown errors into {@link SessionStoreError}.
 */
export function toSessionStoreError(error: unknown): SessionStoreError {
    if (isSessionStoreError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new SessionStoreError("INTERNAL_ERROR", error.message, error);
    }

    return new SessionStoreError("INTERNAL_ERROR", "Unexpected internal error.", error);
}

/**
 * Maps {@link ErrorCode} to an HTTP status code.
 */
export function statusFromErrorCode(code: ErrorCode): 401 | 413 | 500 | 503 {
    switch (code) {
        case "INVALID_SESSION":
            return 401;
        case "PAYLOAD_TOO_LARGE":
            return 413;
        case "STORE_UNAVAILABLE":
            return 503;
        case "SERIALIZATION_FAILED":
        case "CONFIGURATION_ERROR":
        case "INTERNAL_ERROR":
        default:
            return 500;
    }
}
