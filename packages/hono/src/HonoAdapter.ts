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
import type { Context, MiddlewareHandler } from "hono";
import { parse as parseCookie, serialize as serializeCookie } from "cookie";

declare module "hono" {
  interface ContextVariableMap {
    sessionRegistry: SessionRegistry;
  }
}

/**
 * Adapter options for Hono integration.
 */
export type KvSessionHonoAdapterOptions = {
  onError?: (error: SessionStoreError, c: Context) => Promise<Response | void> | Response | void;
};

/**
 * Creates a framework-neutral `HttpContext` from Hono context. The session
 * registry is kept in the context variable `sessionRegistry`.
 */
export function createHonoHttpContext(c: Context): HttpContext {
  return {
    getCookie(name) {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      const parsed = parseCookie(raw);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      c.header("Set-Cookie", serializeCookie(name, value, cookieAttributes(options)), { append: true });
    },

    getRegistry() {
      return c.get("sessionRegistry") ?? null;
    },

    setRegistry(registry) {
      c.set("sessionRegistry", registry);
    },
  };
}

/**
 * Converts core middleware into a Hono middleware handler.
 */
export function toHonoMiddleware(middleware: HttpMiddleware, options?: KvSessionHonoAdapterOptions): MiddlewareHandler {
  return async (c, next) => {
    const ctx = createHonoHttpContext(c);

    try {
      await middleware(ctx, async () => {
        await next();
      });
    } catch (error) {
      if (isSessionStoreError(error)) {
        if (options?.onError) {
          const handled = await options.onError(error, c);
          if (handled) {
            return handled;
          }
          if (c.finalized) {
            return;
          }
        }
        return c.json(defaultErrorBody(error.code, error.message), statusFromErrorCode(error.code));
      }
      throw error;
    }
  };
}
