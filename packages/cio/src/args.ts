import { isLogLevel, type LogLevel } from "@cio/connector";

export type Command =
  | { name: "server" }
  | { name: "run"; job: string }
  | { name: "migrate"; dir?: string }
  | { name: "jobs" }
  | { name: "help" };

export interface ParsedArgs {
  command: Command;
  logLevel?: LogLevel;
}

/**
 * Parse `cio <command> [arg] [--log-level <level>]`.
 *
 * @throws Error with a message fit for the terminal
 */
export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  let logLevel: LogLevel | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      return { command: { name: "help" } };
    }

    if (arg === "--log-level") {
      const level = args[i + 1] ?? "";
      if (!isLogLevel(level)) {
        throw new Error("Invalid --log-level value. Must be one of: debug, info, warn, error");
      }
      logLevel = level;
      i++;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    positional.push(arg);
  }

  const [name, value] = positional;
  switch (name) {
    case "server":
    case "jobs":
      return { command: { name }, logLevel };
    case "run":
      if (value === undefined) {
        throw new Error("Missing job name: cio run <job>");
      }
      return { command: { name, job: value }, logLevel };
    case "migrate":
      return { command: { name, dir: value }, logLevel };
    case undefined:
      return { command: { name: "help" }, logLevel };
    default:
      throw new Error(`Unknown command: ${name}`);
  }
}
