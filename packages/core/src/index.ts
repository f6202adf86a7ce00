/**
 * Shared contracts, configuration and helpers. Every other workspace
 * depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./env";
export * from "./exchange";
export * from "./time/time";
export * from "./time/constants";
export * from "./utils/logger";
