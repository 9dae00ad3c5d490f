/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Config
export * from "./config/index";

// Types
export * from "./types/index";

// Utils
export * from "./utils/index";

// Fetch
export * from "./fetch/index";

// Extraction
export * from "./extraction/index";

// Crawl
export * from "./crawl/index";

// Validation
export * from "./validation/index";

// Sink
export * from "./sink/index";

// Cities
export * from "./cities/index";

// Execution
export * from "./execution/index";
