/**
 * MailChimp
 */

export * from "./api-client.js";
export * from "./webhook.js";
