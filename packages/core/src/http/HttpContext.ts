import type { SessionOptions } from "../types";
import type { SessionRegistry } from "../session/SessionRegistry";

/**
 * Framework-neutral HTTP context required by the session store.
 */
export interface HttpContext {
    // Cookie I/O
    getCookie(name: string): string | null;
    setCookie(name: string, value: string, options: SessionOptions): void;

    // Request-scoped session registry
    getRegistry(): SessionRegistry | null;
    setRegistry(registry: SessionRegistry): void;
}

/**
 * Middleware function signature used by the session store.
 */
export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;
