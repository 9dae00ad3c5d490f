export * from "./detail-enricher";
export * from "./errors";
export * from "./runner";
