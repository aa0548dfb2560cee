// Facade & process singleton
export * from "./gateway.js";
export * from "./process.js";

// Components
export * from "./runtime-supervisor.js";
export * from "./blocking-pool.js";
export * from "./handle-registry.js";
export * from "./dispatch-table.js";
export * from "./ports.js";
export * from "./delivery.js";
export * from "./subscription.js";

// Host bridge
export * from "./nats-bridge.js";

// Config & logging
export * from "./config.js";
export * from "./logger.js";
