export * from "./city";
export * from "./config";
export * from "./crawl";
export * from "./product";
