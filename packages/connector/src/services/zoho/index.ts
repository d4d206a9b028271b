/**
 * Zoho CRM
 */

export * from "./api-client.js";
