export * from "./errors.js";
export * from "./events.js";
export * from "./binder.js";
export * from "./model.js";
export * from "./parser.js";
export * from "./views.js";
export * from "./query.js";
export * from "./loader.js";
export * from "./logger.js";
export * from "./config.js";
