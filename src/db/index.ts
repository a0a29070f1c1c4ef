import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema";
import { config } from "../config";

const poolMax = parseInt(process.env.DB_POOL_MAX ?? "", 10);

// Connections are opened lazily on the first query
export const sql = postgres(config.database.url, {
  max: Number.isFinite(poolMax) && poolMax > 0 ? poolMax : 20,
  idle_timeout: 20,
  connect_timeout: 10,
});

export const db = drizzle(sql, { schema });

export type Database = PostgresJsDatabase<typeof schema>;

export * from "./schema";
