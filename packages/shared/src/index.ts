export * from "./crypto/digest.js";
export * from "./crypto/ed25519.js";
export * from "./auth/service-auth.js";
export * from "./auth/account-auth.js";
export * from "./types/assets.js";
export * from "./types/events.js";
export * from "./types/api.js";
