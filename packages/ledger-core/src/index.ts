export * from "./types.js";
export * from "./result.js";
export * from "./u128.js";
export * from "./storage/backend.js";
export * from "./storage/memory-backend.js";
export * from "./storage/sqlite-backend.js";
export * from "./storage/codec.js";
export * from "./storage/maps.js";
export * from "./allocator.js";
export * from "./balance-ledger.js";
export * from "./ownership.js";
export * from "./event-sink.js";
export * from "./command.js";
export * from "./sellable.js";
export * from "./asset-registry.js";
export * from "./unique-asset-registry.js";
export * from "./ledger.js";
