export * from "./server.js";
export * from "./watcher.js";
export * from "./binding.js";
export * from "./session.js";
