export * from "./enumerator";
export * from "./format";
