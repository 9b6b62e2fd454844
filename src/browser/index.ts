export * from "./session";
export * from "./types";
