#!/usr/bin/env node

/**
 * adb-push CLI
 * Push files to an Android device over a Wi-Fi adb connection
 */

import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { z } from "zod";

import { pushFiles, readPathLines, type PushOptions } from "./src/push-files.js";
import { loadConfig, resolveTarget, targetSerial, type AppConfig } from "./src/config.js";
import { AdbService } from "./src/core/adb/adb-service.js";
import { ConnectionManager } from "./src/core/adb/connection-manager.js";
import { formatError, formatErrorDetails } from "./src/utils/error-handler.js";
import { loadJsonFromFile } from "./src/utils/fs-utils.js";
import * as logger from "./src/utils/logger.js";

const PackageSchema = z.object({ version: z.string() });

// dist/index.js sits one level below package.json; index.ts sits beside it
async function readVersion(): Promise<string> {
  for (const candidate of ["../package.json", "./package.json"]) {
    const raw = await loadJsonFromFile(fileURLToPath(new URL(candidate, import.meta.url)));
    const parsed = PackageSchema.safeParse(raw);
    if (parsed.success) {
      return parsed.data.version;
    }
  }
  return "unknown";
}

const VERSION = await readVersion();

// Zod schemas for CLI validation
const port = z.coerce.number().int().min(1).max(65535).optional();

const EndpointSchema = z.object({
  address: z.string().min(1).optional(),
  port,
  config: z.string().min(1).optional(),
  quiet: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

const PushSchema = EndpointSchema.extend({
  files: z.array(z.string().min(1)),
  destination: z.string().min(1).optional(),
  "no-summary": z.boolean().optional(),
  "dry-run": z.boolean().optional(),
  confirm: z.boolean().optional(),
});

const ConnectSchema = EndpointSchema.extend({
  status: z.boolean().optional(),
});

const CatSchema = EndpointSchema.extend({
  remotePath: z.string().min(1, "Remote path is required"),
});

// Parse command line arguments
function parse(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      "destination": { type: "string" },
      "address": { type: "string" },
      "port": { type: "string" },
      "config": { type: "string" },
      "no-summary": { type: "boolean" },
      "dry-run": { type: "boolean" },
      "confirm": { type: "boolean" },
      "status": { type: "boolean" },
      "quiet": { type: "boolean" },
      "verbose": { type: "boolean" },
      "help": { type: "boolean", short: "h" },
      "version": { type: "boolean", short: "v" }
    },
    allowPositionals: true
  });

  return {
    ...values,
    command: positionals[0],
    operands: positionals.slice(1)
  };
}

type CliArgs = ReturnType<typeof parse>;

// Display help information
function showHelp() {
  console.log(`
${chalk.bold(`adb-push v${VERSION} - Push files to an Android device over Wi-Fi adb`)}

${chalk.bold("Commands:")}
  push <file...>            Push files to the device (reads paths from stdin when none are given)
  connect                   Connect to the device over Wi-Fi
  cat <remote-path>         Write a file from the device to stdout

${chalk.bold("Push Options:")}
  --destination=<dir>     Directory on the device (default: /sdcard/Download)
  --no-summary            Do not print the summary line
  --dry-run               Show what would be pushed without pushing
  --confirm               Ask before pushing each file

${chalk.bold("Connection Options:")}
  --address=<ip>          Device IP address
  --port=<n>              adb TCP port (default: 5555)
  --status                (connect) Only report whether the device is attached

${chalk.bold("Global Options:")}
  --config=<file>         Config file (default: ~/.adb-push.json)
  --quiet                 Show minimal output (only errors and the summary)
  --verbose               Show detailed output including adb commands
  --help, -h              Show this help message
  --version, -v           Show version information

${chalk.bold("Examples:")}
  adb-push push ./photo.jpg ./clip.mp4 --address=192.168.1.20
  adb-push push *.pdf --destination=/sdcard/Documents --confirm
  find ./music -name '*.mp3' | adb-push push --address=192.168.1.20
  adb-push connect --status
  adb-push cat /sdcard/Download/photo.jpg > photo.jpg
`);
}

// Show version information
function showVersion() {
  console.log(`adb-push v${VERSION}`);
}

// Usage errors print the help text as well
const handleCliError = (error: unknown): never => {
  const msg = formatError(error);
  console.error(chalk.red(`Error: ${msg}`));
  console.log();
  showHelp();
  process.exit(1);
};

const validate = <T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const errorMessages = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    return handleCliError(new Error(`Validation failed:\n${errorMessages}`));
  }
  return parsed.data;
};

// Handle push command
async function handlePush(args: CliArgs): Promise<number> {
  const validated = validate(PushSchema, { ...args, files: args.operands });

  const fromStdin = validated.files.length === 0;
  if (fromStdin && process.stdin.isTTY) {
    handleCliError(new Error("At least one file is required"));
  }
  if (fromStdin && validated.confirm) {
    handleCliError(new Error("--confirm cannot be used while reading paths from stdin"));
  }

  const config = await loadConfig(validated.config);

  const options: PushOptions = {
    destination: validated.destination,
    address: validated.address,
    port: validated.port,
    summary: !validated["no-summary"],
    dryRun: validated["dry-run"],
    confirm: validated.confirm,
    quiet: validated.quiet,
    verbose: validated.verbose
  };

  const items = fromStdin ? readPathLines(process.stdin) : validated.files;
  const outcome = await pushFiles(items, config, options);
  return outcome.hasFailures ? 1 : 0;
}

const createClient = (config: AppConfig, verbosity: logger.Verbosity) =>
  new AdbService({ adbPath: config.adbPath, verbosity, trace: config.trace });

// Handle connect command
async function handleConnect(args: CliArgs): Promise<number> {
  const validated = validate(ConnectSchema, args);
  const verbosity = logger.verbosityFromFlags(validated);
  const config = await loadConfig(validated.config);
  const target = resolveTarget({ address: validated.address, port: validated.port }, config);
  const manager = new ConnectionManager(createClient(config, verbosity), verbosity);

  if (validated.status) {
    const connected = await manager.isConnected(target);
    logger.always(connected
      ? chalk.green(`${targetSerial(target)} connected`)
      : chalk.yellow(`${targetSerial(target)} not connected`));
    return connected ? 0 : 1;
  }

  const connected = await manager.ensureConnected(target);
  if (!connected) {
    logger.error(`Unable to connect to ${targetSerial(target)}`);
    return 1;
  }
  return 0;
}

// Handle cat command
async function handleCat(args: CliArgs): Promise<number> {
  const validated = validate(CatSchema, { ...args, remotePath: args.operands[0] });
  const verbosity = logger.verbosityFromFlags(validated);
  const config = await loadConfig(validated.config);
  const target = resolveTarget({ address: validated.address, port: validated.port }, config);

  const content = await createClient(config, verbosity).readFile(validated.remotePath, target);
  process.stdout.write(content);
  return 0;
}

// Main function
async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);

  // Check for help flag
  if (rawArgs.includes("--help") || rawArgs.includes("-h") || rawArgs.length === 0) {
    showHelp();
    return;
  }

  // Check for version flag
  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    showVersion();
    return;
  }

  let args: CliArgs;
  try {
    args = parse(rawArgs);
  } catch (error) {
    return handleCliError(error);
  }

  let exitCode: number;
  try {
    switch (args.command) {
      case "push":
        exitCode = await handlePush(args);
        break;

      case "connect":
        exitCode = await handleConnect(args);
        break;

      case "cat":
        exitCode = await handleCat(args);
        break;

      default:
        return handleCliError(new Error(`Unknown command "${args.command ?? ""}"`));
    }
  } catch (error) {
    // Fatal errors: adb missing, connection failure, bad config
    logger.error(`Error: ${formatError(error)}`);
    const details = formatErrorDetails(error);
    if (details) {
      logger.verbose(details, logger.verbosityFromFlags(args));
    }
    exitCode = 1;
  }

  process.exitCode = exitCode;
}

main().catch(handleCliError);
