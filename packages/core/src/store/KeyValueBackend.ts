/**
 * Remote key-value operations the session store needs. Each call is a single
 * round trip; keys arrive already prefixed.
 */
export interface KeyValueBackend {
    /** Writes `payload` under `key`, expiring after `ttlSeconds`. */
    setWithExpiry(key: string, ttlSeconds: number, payload: string): Promise<void>;
    /** Resolves `null` when the key does not exist. */
    get(key: string): Promise<string | null>;
    /** Deleting a missing key is not an error. */
    delete(key: string): Promise<void>;
    /** Resolves `true` when the backend answers its liveness probe. */
    healthCheck(): Promise<boolean>;
    close?(): Promise<void>;
}
