import type { Logger } from "@kvsession/core";
import type { RedisClientOptions } from "redis";

/**
 * The slice of a Redis/Valkey client the backend uses. node-redis clients fit
 * through the wrapper built in {@link RedisClientManager}; ioredis clients fit
 * as they are (`setex`).
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  setEx?(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  setex?(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  connect?(): Promise<unknown>;
  quit?(): Promise<unknown>;
  disconnect?(): Promise<unknown> | void;
  isOpen?: boolean;
  status?: string;
}

export type RedisConnectionParams = {
  url?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: number;
  tls?: boolean;
  lazyConnect?: boolean;
  redisOptions?: RedisClientOptions;
};

export type RedisClientWrapper = {
  client: RedisClientLike;
  manageClient?: boolean;
  lazyConnect?: boolean;
};

export type RedisConnectionInput = RedisClientLike | RedisClientWrapper | RedisConnectionParams;

export class RedisClientManager {
  private readonly ownClient: boolean;
  private readonly connectionInput: RedisConnectionInput;
  private client: RedisClientLike | null = null;
  private clientInitPromise: Promise<RedisClientLike> | null = null;

  constructor(
    connection: RedisConnectionInput,
    private readonly logger?: Logger,
  ) {
    this.connectionInput = connection;

    if (isRedisClientLike(connection)) {
      this.ownClient = false;
      this.client = connection;
      return;
    }

    if (isClientWrapper(connection)) {
      this.ownClient = connection.manageClient ?? false;
      this.client = connection.client;
      return;
    }

    this.ownClient = true;
  }

  async getClient(): Promise<RedisClientLike> {
    if (this.client) {
      await ensureConnected(this.client, this.connectionInput);
      return this.client;
    }

    if (!this.clientInitPromise) {
      this.clientInitPromise = this.createOwnedClient();
    }

    this.client = await this.clientInitPromise;
    return this.client;
  }

  async close(): Promise<void> {
    if (!this.ownClient || !this.client) {
      return;
    }

    const client = this.client;
    if (typeof client.quit === "function") {
      await client.quit();
      return;
    }

    if (typeof client.disconnect === "function") {
      await client.disconnect();
    }
  }

  private async createOwnedClient(): Promise<RedisClientLike> {
    const connection = this.connectionInput;
    if (isRedisClientLike(connection)) {
      await ensureConnected(connection, connection);
      return connection;
    }

    if (isClientWrapper(connection)) {
      await ensureConnected(connection.client, connection);
      return connection.client;
    }

    const { createClient } = await import("redis");
    const redis = createClient(buildNodeRedisOptions(connection));
    redis.on("error", (error: unknown) => {
      this.logger?.error("Redis client error.", { error });
    });

    const client: RedisClientLike = {
      async get(key) {
        const value = await redis.get(key);
        return value === null ? null : String(value);
      },
      async del(key) {
        return Number(await redis.del(key));
      },
      async ping() {
        return String(await redis.ping());
      },
      async setEx(key, ttlSeconds, value) {
        return redis.setEx(key, ttlSeconds, value);
      },
      async connect() {
        await redis.connect();
      },
      async quit() {
        await redis.quit();
      },
      get isOpen() {
        return redis.isOpen;
      },
    };

    await ensureConnected(client, connection);
    return client;
  }
}

export function normalizeTtl(ttlSeconds: number): number {
  const ttl = Math.floor(ttlSeconds);
  if (!Number.isFinite(ttl) || ttl <= 0) {
    throw new Error("ttlSeconds must be a positive integer.");
  }
  return ttl;
}

export async function setWithTtl(
  client: RedisClientLike,
  key: string,
  value: string,
  ttlSeconds: number,
): Promise<void> {
  if (typeof client.setEx === "function") {
    await client.setEx(key, ttlSeconds, value);
    return;
  }

  if (typeof client.setex === "function") {
    await client.setex(key, ttlSeconds, value);
    return;
  }

  throw new Error("Redis client supports neither setEx nor setex.");
}

export function isRedisClientLike(value: unknown): value is RedisClientLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  return (
    "get" in value &&
    typeof value.get === "function" &&
    "del" in value &&
    typeof value.del === "function" &&
    "ping" in value &&
    typeof value.ping === "function"
  );
}

export function isClientWrapper(value: unknown): value is RedisClientWrapper {
  if (!value || typeof value !== "object") {
    return false;
  }

  return "client" in value && isRedisClientLike(value.client);
}

function buildNodeRedisOptions(connection: RedisConnectionParams): RedisClientOptions {
  const options: RedisClientOptions = {
    ...(connection.redisOptions ?? {}),
  };

  if (connection.url) {
    options.url = connection.url;
  }

  if (connection.host || connection.port !== undefined || connection.tls) {
    const base = {
      ...options.socket,
      ...(connection.host ? { host: connection.host } : {}),
      ...(connection.port !== undefined ? { port: connection.port } : {}),
    };
    options.socket = connection.tls ? { ...base, tls: true } : base;
  }

  if (connection.username) {
    options.username = connection.username;
  }

  if (connection.password) {
    options.password = connection.password;
  }

  if (connection.database !== undefined) {
    options.database = connection.database;
  }

  return options;
}

async function ensureConnected(client: RedisClientLike, input: RedisConnectionInput): Promise<void> {
  if (isClientReady(client)) {
    return;
  }

  const lazyConnect = isClientWrapper(input)
    ? (input.lazyConnect ?? false)
    : isRedisClientLike(input)
      ? false
      : (input.lazyConnect ?? false);

  if (lazyConnect) {
    return;
  }

  if (typeof client.connect === "function") {
    await client.connect();
  }
}

function isClientReady(client: RedisClientLike): boolean {
  if (client.isOpen === true) {
    return true;
  }

  if (typeof client.status === "string") {
    return client.status === "ready" || client.status === "connect" || client.status === "connecting";
  }

  return false;
}
