import {
  cookieAttributes,
  defaultErrorBody,
  isSessionStoreError,
  statusFromErrorCode,
  type HttpContext,
  type HttpMiddleware,
  type SessionRegistry,
  type SessionStoreError,
} from "@kvsession/core";
import { parse as parseCookie, serialize as serializeCookie } from "cookie";

export type KvSessionExpressRequest = {
  headers: Record<string, string | string[] | undefined>;
  sessionRegistry?: SessionRegistry;
};

export type KvSessionExpressResponse = {
  status(code: number): unknown;
  json(body: unknown): unknown;
  getHeader(name: string): unknown;
  setHeader(name: string, value: string | string[]): unknown;
};

export type KvSessionExpressNext = (error?: unknown) => void;
export type KvSessionExpressHandler = (
  req: KvSessionExpressRequest,
  res: KvSessionExpressResponse,
  next: KvSessionExpressNext,
) => Promise<void>;

export type KvSessionExpressAdapterOptions = {
  onError?: (
    error: SessionStoreError,
    req: KvSessionExpressRequest,
    res: KvSessionExpressResponse,
  ) => Promise<void> | void;
};

/**
 * Builds an {@link HttpContext} over Express-style `req`/`res`. The session
 * registry lives on `req`, so contexts built for the same request share it.
 */
export function createExpressHttpContext(req: KvSessionExpressRequest, res: KvSessionExpressResponse): HttpContext {
  return {
    getCookie(name) {
      const header = req.headers.cookie;
      if (!header) {
        return null;
      }

      const parsed = parseCookie(Array.isArray(header) ? header.join("; ") : header);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      appendSetCookie(res, serializeCookie(name, value, cookieAttributes(options)));
    },

    getRegistry() {
      return req.sessionRegistry ?? null;
    },

    setRegistry(registry) {
      req.sessionRegistry = registry;
    },
  };
}

/**
 * Runs a session middleware as an Express handler. Session errors become a
 * JSON error response (or go to `onError`); anything else goes to `next`.
 */
export function toExpressMiddleware(
  middleware: HttpMiddleware,
  options?: KvSessionExpressAdapterOptions,
): KvSessionExpressHandler {
  return async (req, res, next) => {
    const ctx = createExpressHttpContext(req, res);

    try {
      await middleware(ctx, async () => {
        next();
      });
    } catch (error) {
      if (isSessionStoreError(error)) {
        if (options?.onError) {
          await options.onError(error, req, res);
          return;
        }

        res.status(statusFromErrorCode(error.code));
        res.json(defaultErrorBody(error.code, error.message));
        return;
      }

      next(error);
    }
  };
}

function appendSetCookie(res: KvSessionExpressResponse, value: string): void {
  const prev = res.getHeader("Set-Cookie");

  if (!prev) {
    res.setHeader("Set-Cookie", value);
    return;
  }

  const list = Array.isArray(prev) ? prev.map(String) : [String(prev)];
  list.push(value);
  res.setHeader("Set-Cookie", list);
}
