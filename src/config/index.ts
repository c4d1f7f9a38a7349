export * from "./loadConfig";
export * from "./types";
