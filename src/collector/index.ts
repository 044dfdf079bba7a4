import { config, envInfo } from "../shared/config.js";
import { closePool, getPool, resetSchema } from "../shared/db.js";
import { createMuseumAdapters, runSearch, searchAndStore } from "./aggregate.js";

type RunOptions = {
  keyword: string;
  dryRun: boolean;
};

const parseArgs = (argv: string[]): RunOptions => {
  let keyword = "";
  let dryRun = false;
  for (const arg of argv) {
    if (arg === "--dry-run") {
      dryRun = true;
      continue;
    }
    if (arg.startsWith("--keyword=")) {
      keyword = arg.slice("--keyword=".length);
      continue;
    }
  }
  return { keyword: keyword.trim(), dryRun };
};

const requireDatabaseUrl = () => {
  try {
    return config.requireEnv("DATABASE_URL");
  } catch (error) {
    const details = envInfo.envFileExists ? `Check ${envInfo.envFile}.` : `Expected ${envInfo.envFile} (not found).`;
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${message}. ${details}`, { cause: error });
  }
};

const run = async () => {
  const options = parseArgs(process.argv.slice(2));
  if (!options.keyword) {
    throw new Error("Usage: collect --keyword=<term> [--dry-run]");
  }

  const adapters = createMuseumAdapters(config);

  if (options.dryRun) {
    const summary = await runSearch(options.keyword, adapters, async (records) => records.length);
    console.log(`Dry-run: fetched ${summary.total} records for "${options.keyword}"`);
    return;
  }

  const db = getPool(requireDatabaseUrl());
  try {
    await resetSchema(db);
    const summary = await searchAndStore(db, options.keyword, adapters);
    for (const outcome of summary.outcomes) {
      const status = outcome.error ? `failed (${outcome.error})` : `${outcome.count} records`;
      console.log(`  ${outcome.museum}: ${status}`);
    }
    console.log(`Stored ${summary.total} artworks for "${options.keyword}"`);
  } finally {
    await closePool();
  }
};

run().catch((err) => {
  console.error("Collector failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
