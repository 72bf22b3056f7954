import type { SessionMiddlewareOptions, SessionOptions, SessionStoreOptions } from "./types";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import type { KeyValueBackend } from "./store/KeyValueBackend";
import {
    codecsFromPairs,
    decodeMulti,
    encodeMulti,
    supportsMaxAge,
    type CookieCodec,
} from "./cookie/CookieCodec";
import { StructuredSerializer, type SessionSerializer } from "./session/SessionSerializer";
import { Session, type SessionPersister } from "./session/Session";
import { getRegistry } from "./session/SessionRegistry";
import { generateSessionId } from "./session/sessionId";
import { SessionLoadError, SessionStoreError, toSessionStoreError, type Logger } from "./errors";
import { createDefaultLogger } from "./logger";

const DEFAULT_KEY_PREFIX = "session_";
const DEFAULT_COOKIE_MAX_AGE = 86400 * 30;
const DEFAULT_TTL_SECONDS = 60 * 20;
const DEFAULT_MAX_LENGTH = 4096;

/**
 * Backend TTL for a session saved with `maxAge`: zero falls back to the store
 * default, anything else is used as is.
 */
export function resolveTtl(maxAge: number, defaultMaxAge: number): number {
    return maxAge === 0 ? defaultMaxAge : maxAge;
}

/**
 * Session lifecycle on top of a {@link KeyValueBackend}: the cookie carries an
 * authenticated session id, the backend holds the serialized values under
 * `keyPrefix + id`.
 *
 * Configuration setters are meant for startup; calling them while requests
 * are in flight gives no ordering guarantee.
 */
export class SessionStore implements SessionPersister {
    private readonly codecs: CookieCodec[];
    private readonly logger: Logger;
    private readonly options: SessionOptions;
    private keyPrefix: string;
    private defaultMaxAge: number;
    private maxLength: number;
    private serializer: SessionSerializer;

    constructor(
        private readonly backend: KeyValueBackend,
        opts: SessionStoreOptions = {}
    ) {
        this.options = { path: "/", ...opts.options, maxAge: opts.options?.maxAge ?? DEFAULT_COOKIE_MAX_AGE };
        this.codecs = [...codecsFromPairs(opts.keyPairs ?? [], this.options.maxAge), ...(opts.codecs ?? [])];
        if (this.codecs.length === 0) {
            throw new SessionStoreError("CONFIGURATION_ERROR", "At least one key pair or codec is required.");
        }

        this.keyPrefix = opts.keyPrefix ?? DEFAULT_KEY_PREFIX;
        this.defaultMaxAge = opts.defaultMaxAge ?? DEFAULT_TTL_SECONDS;
        this.maxLength = opts.maxLength ?? DEFAULT_MAX_LENGTH;
        this.serializer = opts.serializer ?? new StructuredSerializer();
        this.logger = opts.logger ?? createDefaultLogger();
    }

    /**
     * Builds a store and runs the backend liveness check; fails when the
     * backend is unreachable or answers unexpectedly.
     */
    static async create(backend: KeyValueBackend, opts?: SessionStoreOptions): Promise<SessionStore> {
        const store = new SessionStore(backend, opts);

        let alive: boolean;
        try {
            alive = await backend.healthCheck();
        } catch (error) {
            throw new SessionStoreError("STORE_UNAVAILABLE", "Session backend health check failed.", error);
        }

        if (!alive) {
            throw new SessionStoreError("STORE_UNAVAILABLE", "Session backend health check failed.");
        }
        return store;
    }

    /**
     * Returns the session for `name`, memoised for the rest of the request.
     */
    get(ctx: HttpContext, name: string): Promise<Session> {
        return getRegistry(ctx).get(name, () => this.new(ctx, name));
    }

    /**
     * Builds the session for `name` without touching the request registry.
     *
     * Rejects with {@link SessionLoadError} when the request cookie cannot be
     * decoded or the backend read fails. A cookie whose data is gone is not a
     * failure: the session just stays new.
     */
    async new(ctx: HttpContext, name: string): Promise<Session> {
        const session = new Session(this, name, { ...this.options });

        const cookie = ctx.getCookie(name);
        if (cookie === null) {
            return session;
        }

        try {
            session.id = await decodeMulti(name, cookie, this.codecs);
            const found = await this.load(session);
            session.isNew = !found;
        } catch (error) {
            throw new SessionLoadError(session, toSessionStoreError(error));
        }

        return session;
    }

    /**
     * Persists the session and writes its cookie, or deletes both when the
     * session's `maxAge` is zero or negative.
     */
    async save(ctx: HttpContext, session: Session): Promise<void> {
        if (session.options.maxAge <= 0) {
            if (session.id) {
                await this.backend.delete(this.makeKey(session.id));
            }
            ctx.setCookie(session.name, "", { ...session.options, maxAge: -1 });
            return;
        }

        if (!session.id) {
            session.id = generateSessionId();
        }

        await this.persist(session);

        const encoded = await encodeMulti(session.name, session.id, this.codecs);
        ctx.setCookie(session.name, encoded, session.options);
    }

    /**
     * Removes the session from the backend, expires its cookie and empties its
     * values. A failed backend delete leaves the session untouched.
     */
    async delete(ctx: HttpContext, session: Session): Promise<void> {
        await this.backend.delete(this.makeKey(session.id));

        ctx.setCookie(session.name, "", { ...session.options, maxAge: -1 });
        session.values.clear();
    }

    /**
     * Preloads the session into the request registry.
     */
    middleware(name: string, options?: SessionMiddlewareOptions): HttpMiddleware {
        const onInvalid = options?.onInvalidSession ?? "fresh";

        return async (ctx, next) => {
            try {
                await this.get(ctx, name);
            } catch (error) {
                if (!(error instanceof SessionLoadError) || error.code !== "INVALID_SESSION" || onInvalid === "fail") {
                    throw error;
                }
                getRegistry(ctx).set(name, error.session);
            }
            await next();
        };
    }

    setKeyPrefix(prefix: string): void {
        this.keyPrefix = prefix;
    }

    /**
     * Caps serialized payloads at `length` bytes; 0 removes the cap. Negative
     * values are ignored.
     */
    setMaxLength(length: number): void {
        if (length >= 0) {
            this.maxLength = length;
        }
    }

    setSerializer(serializer: SessionSerializer): void {
        this.serializer = serializer;
    }

    /**
     * Changes the default cookie max-age and the freshness window of every
     * codec, so cookie validity and backend expiry stay in step.
     */
    setMaxAge(age: number): void {
        this.options.maxAge = age;
        this.codecs.forEach((codec, index) => {
            if (supportsMaxAge(codec)) {
                codec.setMaxAge(age);
            } else {
                this.logger.warn("Cannot change max age on cookie codec.", { codecIndex: index });
            }
        });
    }

    /**
     * Backend TTL for sessions whose `maxAge` is 0.
     */
    setDefaultMaxAge(seconds: number): void {
        this.defaultMaxAge = seconds;
    }

    async close(): Promise<void> {
        await this.backend.close?.();
    }

    private async persist(session: Session): Promise<void> {
        const payload = this.serializer.serialize(session.values);
        const length = Buffer.byteLength(payload, "utf8");
        if (this.maxLength !== 0 && length > this.maxLength) {
            throw new SessionStoreError("PAYLOAD_TOO_LARGE", "The value to store is too big.", undefined, {
                length,
                maxLength: this.maxLength,
            });
        }

        const ttl = resolveTtl(session.options.maxAge, this.defaultMaxAge);
        await this.backend.setWithExpiry(this.makeKey(session.id), ttl, payload);
    }

    private async load(session: Session): Promise<boolean> {
        const payload = await this.backend.get(this.makeKey(session.id));
        if (payload === null) {
            return false;
        }

        this.serializer.deserialize(payload, session.values);
        return true;
    }

    private makeKey(sessionId: string): string {
        return `${this.keyPrefix}${sessionId}`;
    }
}
