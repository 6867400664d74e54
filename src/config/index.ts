export * from "./catalog";
export * from "./loadConfig";
export * from "./schema";
export * from "./types";
