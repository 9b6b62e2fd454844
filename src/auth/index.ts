export * from "./authSession";
export * from "./oneTimeCode";
