/**
 * @cio/connector
 *
 * API clients for the business-operations services, the Postgres record
 * store and Airtable mirroring.
 */

// Re-export services as namespaces to avoid conflicts
export * as airtable from "./services/airtable/index.js";
export * as checkr from "./services/checkr/index.js";
export * as googleAuth from "./services/google-auth/index.js";
export * as googleDirectory from "./services/google-directory/index.js";
export * as googleDrive from "./services/google-drive/index.js";
export * as gusto from "./services/gusto/index.js";
export * as mailchimp from "./services/mailchimp/index.js";
export * as quickbooks from "./services/quickbooks/index.js";
export * as ramp from "./services/ramp/index.js";
export * as tripactions from "./services/tripactions/index.js";
export * as zoho from "./services/zoho/index.js";
export * as zoom from "./services/zoom/index.js";

// Record store seam
export type {
  AirtableFields,
  AirtableRecord,
  AirtableTableClient,
} from "./services/airtable/types.js";

// Re-export lib utilities
export * from "./lib/config.js";
export * from "./lib/errors.js";
export * from "./lib/http-client.js";
export * from "./lib/logger.js";
export * from "./lib/oauth.js";

// Re-export db utilities
export * from "./db/client.js";
export * from "./db/migrate.js";
export * from "./db/raw-client.js";
export * from "./db/record-store.js";
export * from "./db/sql.js";
