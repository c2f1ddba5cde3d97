export * from "./json";
export * from "./logger";
export * from "./worker";
