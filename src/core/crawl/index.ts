export * from "./category-menu";
export * from "./host-pacer";
export * from "./scheduler";
export * from "./walker";
