import pLimit from "p-limit";
import type { AppConfig } from "../shared/config.js";
import { insertArtworks } from "../shared/artworks.js";
import type { Db } from "../shared/db.js";
import { createHttpClient, type FetchLike } from "../shared/http.js";
import type { ArtworkRecord } from "../shared/record.js";
import { createMetAdapter } from "./museums/met.js";
import { createRijksAdapter } from "./museums/rijks.js";
import type { MuseumAdapter } from "./museums/types.js";
import { createVamAdapter } from "./museums/vam.js";

export type ArtworkWriter = (records: ArtworkRecord[]) => Promise<number>;

export type AdapterOutcome = {
  museum: string;
  count: number;
  error: string | null;
};

export type SearchSummary = {
  keyword: string;
  total: number;
  outcomes: AdapterOutcome[];
};

type AdapterSettings = Pick<AppConfig, "httpTimeoutMs" | "userAgent" | "detailConcurrency" | "metDetailCap" | "rijksApiKey">;

export const createMuseumAdapters = (settings: AdapterSettings, fetchImpl?: FetchLike): MuseumAdapter[] => {
  const http = createHttpClient({
    timeoutMs: settings.httpTimeoutMs,
    userAgent: settings.userAgent,
    fetchImpl
  });
  return [
    createVamAdapter(http),
    createMetAdapter(http, { concurrency: settings.detailConcurrency, detailCap: settings.metDetailCap }),
    createRijksAdapter(http, { concurrency: settings.detailConcurrency, apiKey: settings.rijksApiKey })
  ];
};

/**
 * Runs every adapter concurrently for one keyword. Each adapter's records are written
 * as soon as it finishes; writes go through a single-slot queue so only one insert
 * touches the table at a time. A failing adapter is logged and reported in the
 * summary without affecting the others.
 */
export const runSearch = async (
  keyword: string,
  adapters: MuseumAdapter[],
  write: ArtworkWriter
): Promise<SearchSummary> => {
  const writer = pLimit(1);

  const outcomes = await Promise.all(
    adapters.map(async (adapter): Promise<AdapterOutcome> => {
      const museum = adapter.museum.name;
      try {
        const records = await adapter.fetch(keyword);
        const count = await writer(() => write(records));
        console.log(`[${museum}] Stored ${count} records for "${keyword}"`);
        return { museum, count, error: null };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[${museum}] Search failed:`, message);
        return { museum, count: 0, error: message };
      }
    })
  );

  const total = outcomes.reduce((sum, outcome) => sum + outcome.count, 0);
  return { keyword, total, outcomes };
};

export const searchAndStore = (db: Db, keyword: string, adapters: MuseumAdapter[]) =>
  runSearch(keyword, adapters, (records) => insertArtworks(db, records));
