export * from "./types";
export * from "./errors";
export * from "./logger";

export * from "./http/HttpContext";

export * from "./store/KeyValueBackend";
export * from "./store/MapKeyValueBackend";

export * from "./cookie/CookieCodec";
export * from "./cookie/cookieAttributes";

export * from "./session/Session";
export * from "./session/SessionRegistry";
export * from "./session/SessionSerializer";
export * from "./session/sessionId";

export * from "./SessionStore";
