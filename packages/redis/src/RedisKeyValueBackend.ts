import { SessionStoreError, type KeyValueBackend, type Logger } from "@kvsession/core";
import {
  RedisClientManager,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
  normalizeTtl,
  setWithTtl,
} from "./internal/redisClient";

type Command = "PING" | "SETEX" | "GET" | "DEL";

/**
 * Redis/Valkey-backed {@link KeyValueBackend}: `SETEX`, `GET`, `DEL` and `PING`.
 *
 * Client failures are rethrown as `SessionStoreError`, with connection-level
 * problems classified as `STORE_UNAVAILABLE`.
 */
export class RedisKeyValueBackend implements KeyValueBackend {
  private readonly clientManager: RedisClientManager;

  constructor(connection: RedisConnectionInput, options?: { logger?: Logger }) {
    this.clientManager = new RedisClientManager(connection, options?.logger);
  }

  async setWithExpiry(key: string, ttlSeconds: number, payload: string): Promise<void> {
    await this.run("SETEX", key, (client) => setWithTtl(client, key, payload, normalizeTtl(ttlSeconds)));
  }

  async get(key: string): Promise<string | null> {
    return this.run("GET", key, (client) => client.get(key));
  }

  async delete(key: string): Promise<void> {
    await this.run("DEL", key, (client) => client.del(key));
  }

  async healthCheck(): Promise<boolean> {
    const reply = await this.run("PING", null, (client) => client.ping());
    return reply === "PONG";
  }

  async close(): Promise<void> {
    await this.clientManager.close();
  }

  private async run<T>(
    command: Command,
    key: string | null,
    fn: (client: RedisClientLike) => Promise<T>,
  ): Promise<T> {
    try {
      const client = await this.clientManager.getClient();
      return await fn(client);
    } catch (error) {
      throw toRedisStoreError(error, command, key);
    }
  }
}

function toRedisStoreError(error: unknown, command: Command, key: string | null): SessionStoreError {
  if (error instanceof SessionStoreError) {
    return error;
  }

  const code = classifyRedisError(error);
  return new SessionStoreError(
    code,
    code === "STORE_UNAVAILABLE" ? "Session store is unavailable." : "Redis command failed.",
    error,
    {
      command,
      key,
      redisCode: getErrorCode(error),
    },
  );
}

function classifyRedisError(error: unknown): "STORE_UNAVAILABLE" | "INTERNAL_ERROR" {
  const msg = getErrorMessage(error).toLowerCase();
  const code = getErrorCode(error);

  const storeCodes = new Set([
    "ECONNREFUSED",
    "ECONNRESET",
    "ETIMEDOUT",
    "ENOTFOUND",
    "EAI_AGAIN",
    "NR_CLOSED",
  ]);

  if (storeCodes.has(code)) {
    return "STORE_UNAVAILABLE";
  }

  const storeKeywords = [
    "connect",
    "connection",
    "socket",
    "closed",
    "timeout",
    "read only",
    "loading",
    "clusterdown",
    "try again",
    "no connection",
    "the client is closed",
  ];

  if (storeKeywords.some((k) => msg.includes(k))) {
    return "STORE_UNAVAILABLE";
  }

  return "INTERNAL_ERROR";
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "");
}

function getErrorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    return String(error.code ?? "").toUpperCase();
  }
  return "";
}

export type { RedisClientLike, RedisConnectionInput, RedisConnectionParams };
