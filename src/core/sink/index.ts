export * from "./destination";
export * from "./product-sink";
