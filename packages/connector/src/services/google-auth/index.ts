/**
 * Google OAuth
 */

export * from "./api-client.js";
