export * from "./protocol/index.js";
export * from "./consumer/index.js";
export * from "./producer/index.js";
export { createApp, type ConsumerStatus } from "./app.js";
