/**
 * Google Drive
 */

export * from "./api-client.js";
