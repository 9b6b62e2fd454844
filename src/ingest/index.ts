export * from "./dates";
export * from "./fileName";
export * from "./judgmentIngestor";
