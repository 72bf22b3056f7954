import { CompactEncrypt, SignJWT, compactDecrypt, jwtVerify } from "jose";
import { SessionStoreError } from "../errors";

/**
 * Raw key material. Strings are taken as UTF-8 bytes.
 */
export type KeyMaterial = Uint8Array | string;

/**
 * A signing key with an optional encryption key.
 *
 * `hashKey` authenticates the cookie (HMAC-SHA256). `blockKey`, when given,
 * must be 16, 24 or 32 bytes and selects AES-128/192/256-GCM encryption.
 */
export type KeyPair = {
    hashKey: KeyMaterial;
    blockKey?: KeyMaterial;
};

/**
 * Authenticated encoding of a value into a cookie-safe token, bound to the
 * cookie name.
 */
export interface CookieCodec {
    encode(name: string, value: string): Promise<string>;
    decode(name: string, encoded: string): Promise<string>;
}

/**
 * Codecs whose freshness window can be changed after construction.
 */
export interface MaxAgeAware {
    setMaxAge(seconds: number): void;
}

export function supportsMaxAge(codec: CookieCodec): codec is CookieCodec & MaxAgeAware {
    return "setMaxAge" in codec && typeof codec.setMaxAge === "function";
}

type ContentEncryption = "A128GCM" | "A192GCM" | "A256GCM";

const VALUE_CLAIM = "val";
const DEFAULT_CODEC_MAX_AGE = 86400 * 30;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * {@link CookieCodec} built on jose: an HS256 JWT carrying the value and its
 * issue time, optionally wrapped in a `dir` JWE.
 *
 * Tokens older than `maxAge` seconds are rejected; `maxAge <= 0` turns the
 * freshness check off.
 */
export class JoseCookieCodec implements CookieCodec, MaxAgeAware {
    private readonly hashKey: Uint8Array;
    private readonly encryption: { key: Uint8Array; enc: ContentEncryption } | null;
    private maxAge: number;

    constructor(pair: KeyPair, maxAge: number = DEFAULT_CODEC_MAX_AGE) {
        this.hashKey = toKeyBytes(pair.hashKey);
        if (this.hashKey.length === 0) {
            throw new SessionStoreError("CONFIGURATION_ERROR", "hashKey must not be empty.");
        }

        if (pair.blockKey === undefined) {
            this.encryption = null;
        } else {
            const key = toKeyBytes(pair.blockKey);
            this.encryption = { key, enc: contentEncryptionFor(key.length) };
        }

        this.maxAge = maxAge;
    }

    getMaxAge(): number {
        return this.maxAge;
    }

    setMaxAge(seconds: number): void {
        this.maxAge = seconds;
    }

    async encode(name: string, value: string): Promise<string> {
        const jwt = await new SignJWT({ [VALUE_CLAIM]: value })
            .setProtectedHeader({ alg: "HS256" })
            .setAudience(name)
            .setIssuedAt()
            .sign(this.hashKey);

        if (!this.encryption) {
            return jwt;
        }

        return new CompactEncrypt(encoder.encode(jwt))
            .setProtectedHeader({ alg: "dir", enc: this.encryption.enc })
            .encrypt(this.encryption.key);
    }

    async decode(name: string, encoded: string): Promise<string> {
        let jwt = encoded;
        if (this.encryption) {
            const { plaintext } = await compactDecrypt(encoded, this.encryption.key, {
                keyManagementAlgorithms: ["dir"],
                contentEncryptionAlgorithms: [this.encryption.enc],
            });
            jwt = decoder.decode(plaintext);
        }

        const { payload } = await jwtVerify(jwt, this.hashKey, {
            algorithms: ["HS256"],
            audience: name,
            ...(this.maxAge > 0 ? { maxTokenAge: this.maxAge } : {}),
        });

        const value = payload[VALUE_CLAIM];
        if (typeof value !== "string") {
            throw new Error("Cookie token carries no value.");
        }
        return value;
    }
}

/**
 * Builds one {@link JoseCookieCodec} per key pair.
 */
export function codecsFromPairs(pairs: KeyPair[], maxAge?: number): CookieCodec[] {
    return pairs.map((pair) => new JoseCookieCodec(pair, maxAge));
}

/**
 * Encodes with the first codec that succeeds.
 */
export async function encodeMulti(name: string, value: string, codecs: CookieCodec[]): Promise<string> {
    if (codecs.length === 0) {
        throw new SessionStoreError("CONFIGURATION_ERROR", "No cookie codecs configured.");
    }

    const failures: unknown[] = [];
    for (const codec of codecs) {
        try {
            return await codec.encode(name, value);
        } catch (error) {
            failures.push(error);
        }
    }

    throw new SessionStoreError("INTERNAL_ERROR", "Session cookie could not be encoded.", failures[0], {
        cookieName: name,
        attempts: failures.length,
    });
}

/**
 * Decodes with the first codec that accepts the value, so cookies issued under
 * an older key pair keep working during rotation.
 */
export async function decodeMulti(name: string, encoded: string, codecs: CookieCodec[]): Promise<string> {
    if (codecs.length === 0) {
        throw new SessionStoreError("CONFIGURATION_ERROR", "No cookie codecs configured.");
    }

    const failures: unknown[] = [];
    for (const codec of codecs) {
        try {
            return await codec.decode(name, encoded);
        } catch (error) {
            failures.push(error);
        }
    }

    throw new SessionStoreError("INVALID_SESSION", "Session cookie could not be decoded.", failures[0], {
        cookieName: name,
        attempts: failures.length,
    });
}

function toKeyBytes(material: KeyMaterial): Uint8Array {
    return typeof material === "string" ? encoder.encode(material) : material;
}

function contentEncryptionFor(length: number): ContentEncryption {
    switch (length) {
        case 16:
            return "A128GCM";
        case 24:
            return "A192GCM";
        case 32:
            return "A256GCM";
        default:
            throw new SessionStoreError(
                "CONFIGURATION_ERROR",
                `blockKey must be 16, 24 or 32 bytes, got ${length}.`
            );
    }
}
