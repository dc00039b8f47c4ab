export * from "./ids";
export * from "./invariants";
export * from "./model";
export * from "./events";
export * from "./errors";
export * from "./logger";
