export * from "./key-notation";
export * from "./metadata";
export * from "./sanitize";
export * from "./template";
