import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import type { DatabaseConfig } from "@clean-articles/types";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_POOL = { max: 10 };

export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL.max,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  return drizzle(connection, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;

/**
 * Build a postgres:// URL from the config file's database section.
 */
export function buildDatabaseUrl(config: DatabaseConfig): string {
  const user = encodeURIComponent(config.user);
  const credentials = config.password
    ? `${user}:${encodeURIComponent(config.password)}`
    : user;
  return `postgres://${credentials}@${config.host}:${String(config.port)}/${encodeURIComponent(config.name)}`;
}

export async function pingDatabase(db: DbClient): Promise<void> {
  await db.execute(sql`select 1`);
}

export async function closeDbClient(db: DbClient): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
