/**
 * Zoom
 */

export * from "./api-client.js";
