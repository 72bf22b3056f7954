import type {CookieCodec, KeyPair} from "./cookie/CookieCodec";
import type {SessionSerializer} from "./session/SessionSerializer";
import type {Logger} from "./errors";

/**
 * Cookie and lifetime options copied onto every session.
 */
export type SessionOptions = {
    path?: string;
    domain?: string;
    /**
     * Seconds. `> 0` is the cookie lifetime and backend TTL, `<= 0` deletes the
     * session on the next save.
     */
    maxAge: number;
    secure?: boolean;
    httpOnly?: boolean;
    sameSite?: "lax" | "strict" | "none";
    partitioned?: boolean;
};

/**
 * Root configuration for a {@link SessionStore}.
 */
export type SessionStoreOptions = {
    /**
     * Signing/encryption key pairs. The first pair encodes new cookies; every
     * pair is tried when decoding, which is what allows rotation.
     */
    keyPairs?: KeyPair[];

    /** Pre-built codecs, used instead of (or in addition to) `keyPairs`. */
    codecs?: CookieCodec[];

    keyPrefix?: string;        // default "session_"
    options?: Partial<SessionOptions>;
    defaultMaxAge?: number;    // default 1200, TTL for sessions saved with maxAge 0
    maxLength?: number;        // default 4096, 0 disables the limit
    serializer?: SessionSerializer;

    logger?: Logger;
};

/**
 * Options for {@link SessionStore.middleware}.
 */
export type SessionMiddlewareOptions = {
    /**
     * What to do when the request cookie cannot be decoded: continue with a
     * fresh session, or fail the request.
     */
    onInvalidSession?: "fresh" | "fail"; // default "fresh"
};
