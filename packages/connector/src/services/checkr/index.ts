/**
 * Checkr
 */

export * from "./api-client.js";
