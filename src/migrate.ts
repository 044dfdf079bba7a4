import { config } from "./shared/config.js";
import { closePool, ensureSchema, getPool } from "./shared/db.js";

const run = async () => {
  await ensureSchema(getPool(config.requireEnv("DATABASE_URL")));
  await closePool();
  console.log("Schema applied.");
};

run().catch((error) => {
  console.error("Migration failed:", error);
  process.exit(1);
});
