import { config } from "../shared/config.js";
import { ensureSchema, getPool } from "../shared/db.js";
import { createApp } from "./app.js";

const start = async () => {
  await ensureSchema(getPool(config.requireEnv("DATABASE_URL")));

  const app = createApp();
  app.listen(config.port, () => {
    console.log(`API listening on http://localhost:${config.port}`);
  });
};

start().catch((error) => {
  console.error("Server failed to start:", error instanceof Error ? error.message : error);
  process.exit(1);
});
