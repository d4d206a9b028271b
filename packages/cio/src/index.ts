/**
 * @cio/cio
 *
 * Records, jobs and the webhooky server.
 */

export * from "./airtable.js";
export * from "./clients.js";
export * from "./token-store.js";
export * from "./records/index.js";

export { createJobContext, mirrorToAirtable, type JobContext } from "./jobs/context.js";
export { JOBS, JOB_NAMES, getJob, isJobName, type Job, type JobName } from "./jobs/registry.js";
export { REEXEC_WINDOW_MS, runJob, startJob, type RunOptions, type StartedJob } from "./jobs/runner.js";

export { createApp, type AppOptions } from "./server/app.js";
export { OAUTH_PRODUCTS, isOAuthProduct, oauthFlows, type OAuthFlow, type OAuthFlows, type OAuthProduct } from "./server/oauth.js";
export { startServer } from "./server.js";
