import type { HttpContext } from "../http/HttpContext";
import type { SessionOptions } from "../types";
import type { SessionValues } from "./SessionSerializer";

/**
 * Anything that can persist a {@link Session}; implemented by `SessionStore`.
 */
export interface SessionPersister {
    save(ctx: HttpContext, session: Session): Promise<void>;
}

const DEFAULT_FLASH_KEY = "_flash";

/**
 * Request-scoped session state. Not safe to share across requests.
 */
export class Session {
    /** Empty until the first save assigns one. */
    id = "";
    isNew = true;
    readonly values: SessionValues = new Map();

    constructor(
        private readonly persister: SessionPersister,
        readonly name: string,
        public options: SessionOptions
    ) {}

    save(ctx: HttpContext): Promise<void> {
        return this.persister.save(ctx, this);
    }

    addFlash(value: unknown, key: string = DEFAULT_FLASH_KEY): void {
        const existing = this.values.get(key);
        const list = Array.isArray(existing) ? existing : [];
        list.push(value);
        this.values.set(key, list);
    }

    /**
     * Returns queued flash messages and removes them from the session.
     */
    flashes(key: string = DEFAULT_FLASH_KEY): unknown[] {
        const existing = this.values.get(key);
        if (!Array.isArray(existing)) {
            return [];
        }
        this.values.delete(key);
        return existing;
    }
}
