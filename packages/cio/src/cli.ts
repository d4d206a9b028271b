#!/usr/bin/env npx tsx
/**
 * cio CLI
 *
 * Usage:
 *   npx tsx packages/cio/src/cli.ts <command> [options]
 *
 * Commands:
 *   server           Start webhooky
 *   run <job>        Run a job for the default company
 *   migrate [dir]    Apply SQL migrations (default: packages/cio/migrations)
 *   jobs             List jobs
 *
 * Options:
 *   --log-level      Set log level (debug|info|warn|error)
 */

import { fileURLToPath } from "node:url";
import { closeDbClient, errorMessage, getConfig, getDbClient, migrate, setLogLevel } from "@cio/connector";
import { parseArgs, type ParsedArgs } from "./args.js";
import { createJobContext } from "./jobs/context.js";
import { JOBS, JOB_NAMES, isJobName } from "./jobs/registry.js";
import { runJob } from "./jobs/runner.js";
import { getCompanyByName } from "./records/companies.js";
import { startServer } from "./server.js";

const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations", import.meta.url));

function printUsage(): void {
  console.log("Usage: npx tsx packages/cio/src/cli.ts <command> [options]");
  console.log("");
  console.log("Commands:");
  console.log("  server           Start webhooky");
  console.log("  run <job>        Run a job for the default company");
  console.log("  migrate [dir]    Apply SQL migrations");
  console.log("  jobs             List jobs");
  console.log("");
  console.log("Options:");
  console.log("  --log-level      Set log level (debug|info|warn|error)");
  console.log("  --help, -h       Show this help message");
}

function parseOrExit(args: string[]): ParsedArgs {
  try {
    return parseArgs(args);
  } catch (error) {
    console.error(errorMessage(error));
    printUsage();
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const parsed = parseOrExit(process.argv.slice(2));

  if (parsed.logLevel) {
    setLogLevel(parsed.logLevel);
  }
  const { command } = parsed;

  switch (command.name) {
    case "help":
      printUsage();
      return;

    case "jobs":
      for (const name of JOB_NAMES) {
        console.log(`  ${name.padEnd(24)}${JOBS[name].description}`);
      }
      return;

    case "migrate": {
      const result = await migrate(command.dir ?? MIGRATIONS_DIR);
      console.log(`[OK] Applied ${result.applied.length} migrations (${result.skipped.length} already applied)`);
      await closeDbClient();
      return;
    }

    case "server":
      startServer();
      return;

    case "run": {
      if (!isJobName(command.job)) {
        console.error(`Unknown job: ${command.job}. Run "jobs" to list them.`);
        process.exit(1);
      }
      const db = getDbClient();
      const name = getConfig().CIO_COMPANY_NAME;
      const company = await getCompanyByName(db, name);
      if (company === null) {
        throw new Error(`Company ${name} not found`);
      }
      try {
        const fn = await runJob(command.job, createJobContext(db, company));
        console.log(`[OK] ${command.job} completed (${fn.saga_id})`);
      } finally {
        await closeDbClient();
      }
      return;
    }
  }
}

main().catch((error: unknown) => {
  console.error(`[ERROR] ${errorMessage(error)}`);
  process.exit(1);
});
