import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import pg from "pg";

const { Pool } = pg;

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

let pool: pg.Pool | null = null;

export type Db = pg.Pool;

export const getSslConfig = (dbUrl: string, env: NodeJS.ProcessEnv = process.env): pg.PoolConfig["ssl"] | undefined => {
  let sslMode = env.DATABASE_SSLMODE ?? env.PGSSLMODE ?? "";

  try {
    const url = new URL(dbUrl);
    sslMode = sslMode || url.searchParams.get("sslmode") || "";
  } catch {
    // Not a URL (e.g. a socket path); the env setting alone decides.
  }

  if (!sslMode) return undefined;
  if (sslMode === "disable") return false;
  if (sslMode === "verify-full") return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
};

export const getPool = (dbUrl: string): Db => {
  if (!dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  if (!pool) {
    pool = new Pool({
      connectionString: dbUrl,
      ssl: getSslConfig(dbUrl)
    });
  }
  return pool;
};

export const closePool = async () => {
  if (pool) {
    await pool.end();
    pool = null;
  }
};

const schemaStatements = (): string[] => {
  const schemaPath = path.resolve(__dirname, "..", "..", "data", "schema.sql");
  const schema = fs.readFileSync(schemaPath, "utf-8");
  return schema
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
};

export const ensureSchema = async (db: Db) => {
  for (const statement of schemaStatements()) {
    await db.query(statement);
  }
};

/** Drops the artwork table and recreates it empty. Runs before every search. */
export const resetSchema = async (db: Db) => {
  await db.query("DROP TABLE IF EXISTS artwork");
  await ensureSchema(db);
};
