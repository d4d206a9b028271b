/**
 * Google Workspace Directory
 */

export * from "./api-client.js";
