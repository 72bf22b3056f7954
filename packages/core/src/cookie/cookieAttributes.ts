import type { SessionOptions } from "../types";

/**
 * Set-Cookie attributes in the shape cookie serializers take.
 */
export type CookieAttributes = {
    path?: string;
    domain?: string;
    maxAge?: number;
    expires?: Date;
    secure?: boolean;
    httpOnly?: boolean;
    sameSite?: "lax" | "strict" | "none";
    partitioned?: boolean;
};

/**
 * Maps session options onto cookie attributes.
 *
 * A positive `maxAge` yields both `Max-Age` and `Expires`; a negative one
 * expires the cookie immediately; zero leaves a browser-session cookie.
 */
export function cookieAttributes(options: SessionOptions, now: Date = new Date()): CookieAttributes {
    const attrs: CookieAttributes = {
        path: options.path ?? "/",
        httpOnly: options.httpOnly ?? true,
    };

    if (options.domain !== undefined) attrs.domain = options.domain;
    if (options.secure !== undefined) attrs.secure = options.secure;
    if (options.sameSite !== undefined) attrs.sameSite = options.sameSite;
    if (options.partitioned !== undefined) attrs.partitioned = options.partitioned;

    if (options.maxAge > 0) {
        attrs.maxAge = Math.floor(options.maxAge);
        attrs.expires = new Date(now.getTime() + attrs.maxAge * 1000);
    } else if (options.maxAge < 0) {
        attrs.maxAge = 0;
        attrs.expires = new Date(1000);
    }

    return attrs;
}
