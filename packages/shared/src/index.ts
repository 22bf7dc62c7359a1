// Shared core for Faultline: analysis engine, errors, logging and retry.
// Import from "@faultline/shared/rca" for the analysis module alone.

export * from "./abort";
export * from "./constants";
export * from "./errors";
export * from "./logger";
export * from "./retry";
export * from "./rca";
