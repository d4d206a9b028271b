/**
 * Airtable
 */

export * from "./api-client.js";
export * from "./scim.js";
export * from "./types.js";
