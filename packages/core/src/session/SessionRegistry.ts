import type { HttpContext } from "../http/HttpContext";
import { SessionLoadError } from "../errors";
import type { Session } from "./Session";

/**
 * Per-request memo of sessions by cookie name.
 *
 * Failed loads are memoised too: a second lookup of the same name rejects with
 * the same error instead of hitting the backend again.
 */
export class SessionRegistry {
    private readonly sessions = new Map<string, Promise<Session>>();

    get(name: string, load: () => Promise<Session>): Promise<Session> {
        const found = this.sessions.get(name);
        if (found) return found;

        const pending = load();
        this.sessions.set(name, pending);
        return pending;
    }

    set(name: string, session: Session): void {
        this.sessions.set(name, Promise.resolve(session));
    }

    has(name: string): boolean {
        return this.sessions.has(name);
    }

    /**
     * Saves every registered session. Sessions whose load failed are saved
     * from the fresh session their error carries.
     */
    async saveAll(ctx: HttpContext): Promise<void> {
        for (const pending of this.sessions.values()) {
            const session = await pending.catch((error: unknown) => {
                if (error instanceof SessionLoadError) return error.session;
                throw error;
            });
            await session.save(ctx);
        }
    }
}

/**
 * Returns the registry bound to `ctx`, creating it on first use.
 */
export function getRegistry(ctx: HttpContext): SessionRegistry {
    const found = ctx.getRegistry();
    if (found) return found;

    const registry = new SessionRegistry();
    ctx.setRegistry(registry);
    return registry;
}
