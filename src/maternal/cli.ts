import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig } from "./config";
import { isMaternalError } from "./errors";
import { createLogger } from "./logger";
import { isMaternalOperation, MATERNAL_OPERATIONS, MaternalService } from "./service";
import { toJson } from "./web/router";

interface CliOptions {
  operation?: string;
  inputPath?: string;
  dbPath: string;
  rulesPath: string;
  pretty: boolean;
}

function main() {
  const config = loadConfig();
  const options = parseArgs(process.argv.slice(2), {
    dbPath: config.MATERNAL_DB_PATH,
    rulesPath: config.MATERNAL_RULES_PATH,
    pretty: true,
  });

  if (!options.operation || !isMaternalOperation(options.operation)) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const payload = options.inputPath ? loadJson(options.inputPath) : {};
  // Logs go to stderr so stdout stays machine-readable.
  const logger = createLogger({ name: "maternal-cli", level: config.LOG_LEVEL, stderr: true });
  const service = MaternalService.open({
    dbPath: options.dbPath,
    rulesPath: options.rulesPath,
    logger,
  });

  try {
    const result = service.invoke(options.operation, payload);
    process.stdout.write(`${format({ ok: true, result }, options.pretty)}\n`);
  } catch (error) {
    if (!isMaternalError(error)) throw error;
    process.stdout.write(`${format({ ok: false, error: error.toSafeError() }, options.pretty)}\n`);
    process.exitCode = 1;
  } finally {
    service.close();
  }
}

function parseArgs(args: string[], defaults: CliOptions): CliOptions {
  const options: CliOptions = { ...defaults };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      printUsage();
      process.exit(0);
    }
    if (arg === "--input") {
      options.inputPath = requireValue(args, i, arg);
      i += 1;
      continue;
    }
    if (arg === "--db") {
      options.dbPath = requireValue(args, i, arg);
      i += 1;
      continue;
    }
    if (arg === "--rules") {
      options.rulesPath = requireValue(args, i, arg);
      i += 1;
      continue;
    }
    if (arg === "--compact") {
      options.pretty = false;
      continue;
    }
    if (arg !== undefined && !arg.startsWith("-") && options.operation === undefined) {
      options.operation = arg;
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  return options;
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function printUsage() {
  process.stdout.write(
    [
      "Usage:",
      "  npm run maternal -- <operation> [--input <path-to-json>] [--db <path>] [--rules <path>] [--compact]",
      "",
      "Operations:",
      ...MATERNAL_OPERATIONS.map((name) => `  ${name}`),
      "",
      "Example:",
      "  npm run maternal -- get_upcoming_appointments --input requests/window-7.json",
    ].join("\n")
  );
  process.stdout.write("\n");
}

function format(value: unknown, pretty: boolean): string {
  const compact = toJson(value);
  return pretty ? JSON.stringify(JSON.parse(compact), null, 2) : compact;
}

function loadJson(path: string): unknown {
  const absolutePath = resolve(path);
  const raw = readFileSync(absolutePath, "utf8");
  return JSON.parse(raw) as unknown;
}

main();
