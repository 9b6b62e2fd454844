export * from "./htmlParser";
export * from "./listingWalker";
