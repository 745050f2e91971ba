import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import type { AppConfig } from "@clean-articles/types";

export const CONFIG_FILE_NAME = "config.yaml";
export const DEFAULT_SEARCH_PATHS: readonly string[] = ["../configs", "./configs", "."];
export const DEFAULT_ADDRESS = ":9090";
export const DEFAULT_TIMEOUT_SECONDS = 30;

export type ConfigErrorCode =
  | "FILE_NOT_FOUND"
  | "FILE_READ_ERROR"
  | "YAML_PARSE_ERROR"
  | "VALIDATION_ERROR"
  | "NOT_INITIALIZED";

export interface ConfigErrorDetail {
  message: string;
  path: (string | number)[];
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details: ConfigErrorDetail[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Schema of config.yaml. Keys mirror the file layout; defaults fill in
 * everything except the database coordinates.
 */
export const configSchema = z.object({
  debug: z.boolean().default(false),
  server: z
    .object({
      address: z.string().default(DEFAULT_ADDRESS),
      adapter: z.enum(["staged", "native"]).default("staged"),
    })
    .default({}),
  context: z
    .object({
      timeout: z.number().int().nonnegative().default(0),
    })
    .default({}),
  database: z.object({
    host: z.string().min(1, "database.host is required"),
    port: z.coerce.number().int().positive().default(5432),
    user: z.string().min(1, "database.user is required"),
    password: z.coerce.string().default(""),
    name: z.string().min(1, "database.name is required"),
    poolMax: z.number().int().positive().default(10),
  }),
  log: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
    })
    .default({}),
  cors: z
    .object({
      origin: z.string().min(1).default("*"),
    })
    .default({}),
});

export type RawConfig = z.input<typeof configSchema>;

function toAppConfig(parsed: z.output<typeof configSchema>): AppConfig {
  return {
    debug: parsed.debug,
    server: {
      address: parsed.server.address || DEFAULT_ADDRESS,
      adapter: parsed.server.adapter,
    },
    context: {
      timeout: parsed.context.timeout === 0 ? DEFAULT_TIMEOUT_SECONDS : parsed.context.timeout,
    },
    database: parsed.database,
    log: {
      level: parsed.log.level ?? (parsed.debug ? "debug" : "info"),
    },
    cors: parsed.cors,
  };
}

/**
 * Validate an already-decoded config object.
 */
export function validateConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path,
    }));
    const summary = details
      .map((d) => (d.path.length > 0 ? `${d.path.join(".")}: ${d.message}` : d.message))
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${summary}`, "VALIDATION_ERROR", details, {
      cause: result.error,
    });
  }
  return toAppConfig(result.data);
}

export function parseConfig(source: string): AppConfig {
  let raw: unknown;
  try {
    raw = yaml.load(source);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`YAML syntax error: ${reason}`, "YAML_PARSE_ERROR", [], { cause: err });
  }
  return validateConfig(raw);
}

export interface LoadConfigOptions {
  /** Explicit file path. Takes precedence over `CONFIG_FILE` and the search paths. */
  path?: string;
  /** Directories searched in order for config.yaml. */
  searchPaths?: readonly string[];
  /** Base directory for relative search paths. Defaults to process.cwd(). */
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export function resolveConfigPath(options: LoadConfigOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.path ?? env["CONFIG_FILE"];

  if (explicit) {
    const resolved = path.resolve(cwd, explicit);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`, "FILE_NOT_FOUND");
    }
    return resolved;
  }

  const searchPaths = options.searchPaths ?? DEFAULT_SEARCH_PATHS;
  for (const dir of searchPaths) {
    const candidate = path.resolve(cwd, dir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new ConfigError(
    `${CONFIG_FILE_NAME} not found in: ${searchPaths.join(", ")}`,
    "FILE_NOT_FOUND",
  );
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const file = resolveConfigPath(options);

  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read config file: ${file}`, "FILE_READ_ERROR", [], {
      cause: err,
    });
  }

  return parseConfig(source);
}

let current: AppConfig | undefined;

/**
 * Load the config file once and keep it as the process-wide config.
 */
export function initConfig(options: LoadConfigOptions = {}): AppConfig {
  current = loadConfig(options);
  return current;
}

export function setConfig(config: AppConfig): void {
  current = config;
}

export function getConfig(): AppConfig {
  if (!current) {
    throw new ConfigError("Configuration has not been initialised", "NOT_INITIALIZED");
  }
  return current;
}

export function resetConfig(): void {
  current = undefined;
}

export interface ListenAddress {
  host?: string;
  port: number;
}

/**
 * Split a `host:port` listen address. `:9090` binds every interface.
 */
export function parseListenAddress(address: string): ListenAddress {
  const separator = address.lastIndexOf(":");
  const host = separator > 0 ? address.slice(0, separator) : undefined;
  const portText = separator >= 0 ? address.slice(separator + 1) : address;
  const port = Number(portText);

  if (portText === "" || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid listen address: ${address}`, "VALIDATION_ERROR", [
      { message: "port must be an integer between 0 and 65535", path: ["server", "address"] },
    ]);
  }

  return host ? { host, port } : { port };
}
