export * from "./config/index.ts";
export * from "./services/index.ts";
export * from "./types.ts";
export * from "./utils/error-util.ts";
export * from "./utils/event-normalizer-util.ts";
export * from "./utils/event-order-util.ts";
export * from "./utils/file-util.ts";
export * from "./utils/slug-util.ts";
export * from "./validation/data-validation.ts";
export * from "./validation/event-validation.ts";
