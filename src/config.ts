import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { loadJsonFromFile } from "./utils/fs-utils.js";
import { DEFAULT_THROTTLE_MS } from "./core/push/progress-parser.js";
import type { ConnectionTarget } from "./interfaces/adb.js";

export const DEFAULT_DESTINATION = "/sdcard/Download";
export const DEFAULT_PORT = 5555;
export const DEFAULT_TRACE = "all";

export { DEFAULT_THROTTLE_MS };

const ConfigSchema = z.object({
  destination: z.string().min(1).default(DEFAULT_DESTINATION),
  address: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  adbPath: z.string().min(1).optional(),
  throttleMs: z.number().int().min(1).default(DEFAULT_THROTTLE_MS),
  trace: z.string().min(1).default(DEFAULT_TRACE),
}).strict();

export type AppConfig = Readonly<z.infer<typeof ConfigSchema>>;

export const defaultConfigPath = (): string => path.join(os.homedir(), ".adb-push.json");

/**
 * Load runtime configuration.
 *
 * Precedence for the file location:
 * - explicit `configPath` (the `--config` flag)
 * - `ADB_PUSH_CONFIG` env var
 * - `~/.adb-push.json`
 *
 * A missing default file yields the built-in defaults. A missing explicit file,
 * malformed JSON or a schema violation throws.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  const explicitPath = configPath ?? env.ADB_PUSH_CONFIG;
  const resolvedPath = explicitPath ? path.resolve(explicitPath) : defaultConfigPath();

  let raw: unknown;
  try {
    raw = await loadJsonFromFile(resolvedPath);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config at ${resolvedPath}: ${msg}`);
  }

  if (raw === undefined) {
    if (explicitPath) {
      throw new Error(`Config file not found: ${resolvedPath}`);
    }
    raw = {};
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config at ${resolvedPath}: ${issues}`);
  }

  return Object.freeze(parsed.data);
}

/**
 * Resolve the device endpoint from command-line overrides and configured defaults.
 */
export function resolveTarget(
  overrides: { address?: string; port?: number },
  config: AppConfig
): ConnectionTarget {
  const address = overrides.address ?? config.address;
  if (!address) {
    throw new Error("No device address given. Pass --address or set \"address\" in the config file.");
  }
  return Object.freeze({ address, port: overrides.port ?? config.port });
}

export const targetSerial = (target: ConnectionTarget): string => `${target.address}:${target.port}`;
