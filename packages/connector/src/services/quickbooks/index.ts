/**
 * QuickBooks Online
 */

export * from "./api-client.js";
