/**
 * TripActions
 */

export * from "./api-client.js";
