export type LogLevel = "debug" | "info" | "warn" | "error";

export type RouterAdapter = "staged" | "native";

export interface AppConfig {
  debug: boolean;
  server: ServerConfig;
  context: ContextConfig;
  database: DatabaseConfig;
  log: LogConfig;
  cors: CorsConfig;
}

export interface ServerConfig {
  address: string;
  adapter: RouterAdapter;
}

export interface ContextConfig {
  /** Per-request deadline in seconds. */
  timeout: number;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  poolMax: number;
}

export interface LogConfig {
  level: LogLevel;
}

export interface CorsConfig {
  origin: string;
}
