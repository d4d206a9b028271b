/**
 * Gusto
 */

export * from "./api-client.js";
