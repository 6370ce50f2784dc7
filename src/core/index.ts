/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Errors
export * from "./errors";

// Types
export * from "./types/index";

// Config
export * from "./config/index";

// Extraction
export * from "./extraction/index";

// Classification
export * from "./classification/index";

// Fetching
export * from "./fetching/index";

// Browser
export * from "./browser/index";

// Dynamic content
export * from "./resolution/index";

// Crawling
export * from "./crawling/index";

// Execution
export * from "./execution/index";

// Storage
export * from "./storage/index";

// Utils
export * from "./utils/index";
