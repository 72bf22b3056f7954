export {
  createExpressHttpContext,
  toExpressMiddleware,
  type KvSessionExpressAdapterOptions,
  type KvSessionExpressHandler,
  type KvSessionExpressNext,
  type KvSessionExpressRequest,
  type KvSessionExpressResponse,
} from "./ExpressAdapter";
