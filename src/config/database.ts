import postgres from "postgres";
import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

export type Sql = postgres.Sql;

// PostgreSQL standard environment variables
export function databaseOptions(env: NodeJS.ProcessEnv = process.env) {
  return {
    host: env.PGHOST || "localhost",
    port: parseInt(env.PGPORT || "5432"),
    database: env.PGDATABASE || "pool_engine_dev",
    username: env.PGUSER || "postgres",
    password: env.PGPASSWORD || "",
    ssl: env.PGSSL === "true" ? ("require" as const) : false,
    max: parseInt(env.PGMAXCONNECTIONS || "10"), // connection pool size
    idle_timeout: parseInt(env.PGIDLE_TIMEOUT || "20"),
    connect_timeout: parseInt(env.PGCONNECT_TIMEOUT || "30"),
  };
}

// connects lazily on first query
export function createSql(env: NodeJS.ProcessEnv = process.env): Sql {
  return postgres({
    ...databaseOptions(env),
    onnotice: () => {}, // Suppress notices
  });
}
