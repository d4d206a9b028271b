export { MemoryDb } from "./memory-db.js";
export { MemoryAirtable } from "./memory-airtable.js";
export { stubFetch, type FetchCall, type FetchRoute } from "./fetch.js";
