import { SessionStore, type SessionStoreOptions } from "@kvsession/core";
import { RedisKeyValueBackend } from "./RedisKeyValueBackend";
import type { RedisConnectionInput } from "./internal/redisClient";

/**
 * Builds a {@link SessionStore} on Redis/Valkey from connection params, a
 * client, or a `{ client, manageClient }` wrapper. Rejects when the server does
 * not answer `PING` with `PONG`.
 */
export async function createRedisSessionStore(
  connection: RedisConnectionInput,
  options?: SessionStoreOptions,
): Promise<SessionStore> {
  const backend = new RedisKeyValueBackend(connection, { logger: options?.logger });
  try {
    return await SessionStore.create(backend, options);
  } catch (error) {
    try {
      await backend.close();
    } catch (closeError) {
      options?.logger?.warn("Failed to close Redis client after failed health check.", { error: closeError });
    }
    throw error;
  }
}

/**
 * Same as {@link createRedisSessionStore}, from a `redis://` or `rediss://` URL.
 */
export function createRedisSessionStoreWithUrl(url: string, options?: SessionStoreOptions): Promise<SessionStore> {
  return createRedisSessionStore({ url }, options);
}
