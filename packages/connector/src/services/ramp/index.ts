/**
 * Ramp
 */

export * from "./api-client.js";
