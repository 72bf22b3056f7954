import type { KeyValueBackend } from "./KeyValueBackend";

type Entry = { payload: string; expiresAt: number };

/**
 * In-process {@link KeyValueBackend} with per-key expiry. For development and tests.
 */
export class MapKeyValueBackend implements KeyValueBackend {
    private readonly map = new Map<string, Entry>();
    private readonly cleanupTimer: NodeJS.Timeout;

    constructor(
        options?: {
            cleanupIntervalSeconds?: number; // default 60
        }
    ) {
        const interval = (options?.cleanupIntervalSeconds ?? 60) * 1000;
        this.cleanupTimer = setInterval(() => this.cleanup(), interval);
        this.cleanupTimer.unref();
    }

    async setWithExpiry(key: string, ttlSeconds: number, payload: string): Promise<void> {
        if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
            throw new Error("ttlSeconds must be a positive integer.");
        }
        this.map.set(key, { payload, expiresAt: Date.now() + ttlSeconds * 1000 });
    }

    async get(key: string): Promise<string | null> {
        const e = this.map.get(key);
        if (!e) return null;

        if (Date.now() >= e.expiresAt) {
            this.map.delete(key);
            return null;
        }
        return e.payload;
    }

    async delete(key: string): Promise<void> {
        this.map.delete(key);
    }

    async healthCheck(): Promise<boolean> {
        return true;
    }

    async close(): Promise<void> {
        clearInterval(this.cleanupTimer);
        this.map.clear();
    }

    /**
     * Keys currently held, expired ones excluded.
     */
    keys(): string[] {
        this.cleanup();
        return [...this.map.keys()];
    }

    private cleanup(): void {
        const now = Date.now();
        for (const [k, e] of this.map.entries()) {
            if (now >= e.expiresAt) this.map.delete(k);
        }
    }
}
