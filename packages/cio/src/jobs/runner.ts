/**
 * Job runner
 *
 * Every run is tracked as a Function record: created in progress, then
 * completed with the logs it emitted and its conclusion.
 */

import { RecordStore, captureLogs, errorMessage, setupLogger } from "@cio/connector";
import {
  Functions,
  completeFunction,
  getRunningFunction,
  startFunction,
  truncateLogs,
  type FunctionRecord,
} from "../records/functions.js";
import type { JobContext } from "./context.js";
import { getJob, type JobName } from "./registry.js";

const logger = setupLogger("runner");

/** A run younger than this is returned instead of starting another */
export const REEXEC_WINDOW_MS = 60 * 60 * 1000;

export interface RunOptions {
  /** Log failures instead of rethrowing them */
  background?: boolean;
}

export interface StartedJob {
  sagaId: string;
  /** true when an in-progress run was returned */
  existing: boolean;
  /** Settles when the run is complete */
  done: Promise<FunctionRecord>;
}

async function mirrorFunction(ctx: JobContext, fn: FunctionRecord): Promise<FunctionRecord> {
  try {
    return await new RecordStore(Functions, ctx.db).upsertInAirtable(ctx.airtable("cio"), fn);
  } catch (error) {
    logger.warn(`Could not mirror function ${fn.saga_id} to Airtable: ${errorMessage(error)}`);
    return fn;
  }
}

async function execute(name: JobName, ctx: JobContext, started: FunctionRecord, options: RunOptions): Promise<FunctionRecord> {
  const fn = await mirrorFunction(ctx, started);
  logger.info(`Running ${name}`, { saga_id: fn.saga_id });

  const outcome = await captureLogs(() => getJob(name).run(ctx));
  const logs = outcome.ok ? outcome.logs : [...outcome.logs, `error: ${errorMessage(outcome.error)}`];
  const completed = await completeFunction(
    ctx.db,
    fn,
    outcome.ok ? "success" : "failure",
    truncateLogs(logs.join("\n")),
    ctx.now()
  );
  const mirrored = await mirrorFunction(ctx, completed);

  if (!outcome.ok) {
    logger.error(`${name} failed: ${errorMessage(outcome.error)}`, { saga_id: fn.saga_id });
    if (!options.background) {
      throw outcome.error;
    }
  } else {
    logger.info(`${name} succeeded`, { saga_id: fn.saga_id });
  }
  return mirrored;
}

/**
 * Run a job to completion.
 */
export async function runJob(name: JobName, ctx: JobContext, options: RunOptions = {}): Promise<FunctionRecord> {
  const fn = await startFunction(ctx.db, name, ctx.company.id, ctx.now());
  return execute(name, ctx, fn, options);
}

interface Claim {
  existing: boolean;
  fn: FunctionRecord;
}

// Pending claims per job name. Only covers this process; a second instance
// sharing the database can still start a duplicate run.
const claims = new Map<JobName, Promise<Claim>>();

async function claimRun(name: JobName, ctx: JobContext): Promise<Claim> {
  const running = await getRunningFunction(ctx.db, name);
  if (running !== null && ctx.now().getTime() - running.created_at.getTime() < REEXEC_WINDOW_MS) {
    return { existing: true, fn: running };
  }
  return { existing: false, fn: await startFunction(ctx.db, name, ctx.company.id, ctx.now()) };
}

/**
 * Checks for a running function and inserts a new one, one caller at a time
 * per job name.
 */
function claimRunSerialized(name: JobName, ctx: JobContext): Promise<Claim> {
  const previous = claims.get(name);
  const next = () => claimRun(name, ctx);
  const claim = previous === undefined ? next() : previous.then(next, next);
  claims.set(name, claim);
  const forget = () => {
    if (claims.get(name) === claim) {
      claims.delete(name);
    }
  };
  // The caller receives claim itself, so its rejection is not lost here
  void claim.then(forget, forget);
  return claim;
}

/**
 * Start a job unless a run of it started within the last hour is still in
 * progress. In background mode the run is not awaited.
 */
export async function startJob(name: JobName, ctx: JobContext, options: RunOptions = {}): Promise<StartedJob> {
  const claim = await claimRunSerialized(name, ctx);
  if (claim.existing) {
    logger.info(`${name} is already running`, { saga_id: claim.fn.saga_id });
    return { sagaId: claim.fn.saga_id, existing: true, done: Promise.resolve(claim.fn) };
  }

  const fn = claim.fn;
  if (!options.background) {
    return { sagaId: fn.saga_id, existing: false, done: Promise.resolve(await execute(name, ctx, fn, options)) };
  }

  const done = execute(name, ctx, fn, options);
  void done.catch((error: unknown) => {
    logger.error(`${name} could not be recorded: ${errorMessage(error)}`, { saga_id: fn.saga_id });
  });
  return { sagaId: fn.saga_id, existing: false, done };
}
