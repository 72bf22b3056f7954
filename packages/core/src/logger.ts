import pino from "pino";
import type { Logger } from "./errors";

type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

function getLogLevel(): LogLevel {
    const envLevel = process.env["LOG_LEVEL"];
    if (
        envLevel === "fatal" ||
        envLevel === "error" ||
        envLevel === "warn" ||
        envLevel === "info" ||
        envLevel === "debug" ||
        envLevel === "trace" ||
        envLevel === "silent"
    ) {
        return envLevel;
    }
    return "info";
}

/**
 * Adapts a pino logger to the {@link Logger} contract.
 */
export function fromPino(base: pino.Logger): Logger {
    return {
        debug: (msg, meta) => base.debug(meta ?? {}, msg),
        info: (msg, meta) => base.info(meta ?? {}, msg),
        warn: (msg, meta) => base.warn(meta ?? {}, msg),
        error: (msg, meta) => base.error(meta ?? {}, msg),
    };
}

/**
 * Logger used when none is injected.
 */
export function createDefaultLogger(component = "session-store"): Logger {
    return fromPino(pino({ name: "kvsession", level: getLogLevel() }).child({ component }));
}
