import type { Db } from "./db.js";
import type { ArtworkRecord } from "./record.js";

export const PAGE_SIZE = 20;

const INSERT_CHUNK = 500;

const COLUMNS = [
  "surrogate_key",
  "external_id",
  "title",
  "artist",
  "medium",
  "date",
  "url",
  "image_url",
  "museum_name",
  "museum_url"
] as const satisfies ReadonlyArray<keyof ArtworkRecord>;

const QUOTED_COLUMNS = COLUMNS.map((column) => `"${column}"`).join(", ");

export type ArtworkFilter = {
  mediums: string[];
  dateFrom?: string | null;
  dateTo?: string | null;
};

export type ArtworkOrder = "title" | "insertion";

export type ArtworkPage = {
  page: number;
  perPage: number;
  rows: ArtworkRecord[];
};

export const NO_FILTER: ArtworkFilter = { mediums: [] };

const nextSequence = async (db: Db): Promise<number> => {
  const result = await db.query<{ last: string | number | null }>(
    "SELECT MAX(inserted_seq) AS last FROM artwork"
  );
  return Number(result.rows[0]?.last ?? 0) + 1;
};

/**
 * Writes records with a multi-row upsert. Records sharing a surrogate key overwrite
 * each other, the last one in `records` winning; an overwritten row keeps its original
 * insertion position. Callers must not run two writes at once, since positions are
 * numbered from the current maximum.
 * @returns the number of distinct rows written
 */
export const insertArtworks = async (db: Db, records: ArtworkRecord[]): Promise<number> => {
  const unique = new Map<string, ArtworkRecord>();
  for (const record of records) {
    unique.set(record.surrogate_key, record);
  }
  const rows = Array.from(unique.values());
  if (rows.length === 0) return 0;

  const updates = COLUMNS.slice(1)
    .map((column) => `"${column}" = EXCLUDED."${column}"`)
    .join(", ");
  let sequence = await nextSequence(db);

  for (let start = 0; start < rows.length; start += INSERT_CHUNK) {
    const chunk = rows.slice(start, start + INSERT_CHUNK);
    const params: Array<string | number | null> = [];
    const pushParam = (value: string | number | null) => {
      params.push(value);
      return `$${params.length}`;
    };
    const tuples = chunk.map((record) => {
      const refs = COLUMNS.map((column) => pushParam(record[column]));
      refs.push(pushParam(sequence));
      sequence += 1;
      return `(${refs.join(", ")})`;
    });

    await db.query(
      `INSERT INTO artwork (${QUOTED_COLUMNS}, inserted_seq)
       VALUES ${tuples.join(", ")}
       ON CONFLICT (surrogate_key) DO UPDATE SET ${updates}`,
      params
    );
  }

  return rows.length;
};

export const buildFilterClause = (filter: ArtworkFilter) => {
  const clauses: string[] = [];
  const params: Array<string | number> = [];

  const pushParam = (value: string | number) => {
    params.push(value);
    return `$${params.length}`;
  };

  if (filter.mediums.length > 0) {
    clauses.push(`medium IN (${filter.mediums.map(pushParam).join(", ")})`);
  }

  // Dates are display strings, so bounds compare lexicographically.
  if (filter.dateFrom) {
    clauses.push(`"date" >= ${pushParam(filter.dateFrom)}`);
  }

  if (filter.dateTo) {
    clauses.push(`"date" <= ${pushParam(filter.dateTo)}`);
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
  return { where, params, pushParam };
};

export const listMediums = async (db: Db): Promise<string[]> => {
  const result = await db.query<{ medium: string }>(
    `SELECT DISTINCT medium
     FROM artwork
     WHERE medium <> ''
     ORDER BY medium ASC`
  );
  return result.rows.map((row) => row.medium);
};

export const countArtworks = async (db: Db, filter: ArtworkFilter = NO_FILTER): Promise<number> => {
  const { where, params } = buildFilterClause(filter);
  const result = await db.query<{ total: string | number }>(
    `SELECT COUNT(*) AS total FROM artwork ${where}`,
    params
  );
  return Number(result.rows[0]?.total ?? 0);
};

// Keeps the row offset within a 32-bit integer.
export const MAX_PAGE = Math.floor(2_147_483_647 / PAGE_SIZE);

export const normalizePage = (value: unknown): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) return 1;
  return Math.min(parsed, MAX_PAGE);
};

export const totalPages = (total: number, perPage = PAGE_SIZE) => Math.ceil(total / perPage);

const ORDER_BY: Record<ArtworkOrder, string> = {
  title: "title ASC, artist ASC, inserted_seq ASC",
  insertion: "inserted_seq ASC"
};

export const listArtworksPage = async (
  db: Db,
  filter: ArtworkFilter,
  options: { page: number; order: ArtworkOrder }
): Promise<ArtworkPage> => {
  const page = normalizePage(options.page);
  const offset = (page - 1) * PAGE_SIZE;
  const { where, params, pushParam } = buildFilterClause(filter);

  const result = await db.query<ArtworkRecord>(
    `SELECT ${QUOTED_COLUMNS}
     FROM artwork
     ${where}
     ORDER BY ${ORDER_BY[options.order]}
     LIMIT ${pushParam(PAGE_SIZE)} OFFSET ${pushParam(offset)}`,
    params
  );

  return { page, perPage: PAGE_SIZE, rows: result.rows };
};
