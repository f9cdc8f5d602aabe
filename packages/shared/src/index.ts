export * from "./config.js";
export * from "./statusCodes.js";
