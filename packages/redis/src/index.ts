export {
  RedisKeyValueBackend,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
} from "./RedisKeyValueBackend";

export { createRedisSessionStore, createRedisSessionStoreWithUrl } from "./createRedisSessionStore";

export { loadRedisConnectionFromEnv } from "./config";
