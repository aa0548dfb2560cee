// Engine interface
export * from "./engine.js";

// Domain errors
export * from "./errors.js";

// Dispatch-table configuration
export * from "./methods.js";
