// Types & envelope
export * from "./envelope.js";

// Errors
export * from "./errors.js";

// Wide integers (decimal-string convention)
export * from "./numeric.js";

// Wire encoding
export * from "./wire.js";

// Wire Zod schemas (runtime validation)
export * from "./envelope-schema.js";

// Native objects & dispatch-table definitions
export * from "./definitions.js";

// Pipeline
export * from "./pipeline.js";

// Logger interface
export * from "./logger.js";

// Utilities
export * from "./utils.js";
export { AsyncQueue } from "./async-queue.js";
