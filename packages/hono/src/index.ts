export { createHonoHttpContext, toHonoMiddleware, type KvSessionHonoAdapterOptions } from "./HonoAdapter";
