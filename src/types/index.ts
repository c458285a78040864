export * from "./config.js";
export * from "./work-item.js";
export * from "./session.js";
