export * from "./types.js";
export * from "./errors.js";
export * from "./logger/index.js";
export * from "./config/env.js";
export * from "./config/schema.js";
export * from "./config/loadSettings.js";
export * from "./manifest/node.js";
export * from "./manifest/locate.js";
export * from "./manifest/store.js";
export * from "./target/resolve.js";
export * from "./project.js";
