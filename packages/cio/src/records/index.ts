export * from "./api-tokens.js";
export * from "./background-checks.js";
export * from "./bookings.js";
export * from "./companies.js";
export * from "./employees.js";
export * from "./finance.js";
export * from "./functions.js";
export * from "./mailing-list.js";
export * from "./rack-line.js";
export * from "./recorded-meetings.js";
