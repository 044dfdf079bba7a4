import { newDb } from "pg-mem";
import { ensureSchema, type Db } from "../shared/db.js";

export type MemoryDb = {
  db: Db;
  /** Restores the freshly migrated, empty schema. */
  reset: () => Promise<void>;
};

// pg-mem keeps the primary-key index of a dropped table registered, so a DROP/CREATE
// rebuild fails there. Tests rebuild from a snapshot taken right after migration.
export const createMemoryDb = async (): Promise<MemoryDb> => {
  const mem = newDb();
  const { Pool } = mem.adapters.createPg();
  const db: Db = new Pool();
  await ensureSchema(db);
  const empty = mem.backup();
  return {
    db,
    reset: async () => {
      empty.restore();
    }
  };
};
