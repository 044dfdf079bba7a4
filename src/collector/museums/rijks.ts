/**
 * Rijksmuseum collection API (requires an API key).
 * The list call gives title, maker, link and image; medium and date only come from
 * the per-object detail call.
 */
import pLimit from "p-limit";
import { z } from "zod";
import type { HttpClient } from "../../shared/http.js";
import { buildArtworkRecord, type ArtworkRecord, type Museum } from "../../shared/record.js";
import { parseEntries, readList } from "../payload.js";
import type { DetailOptions, MuseumAdapter } from "./types.js";

export const RIJKS: Museum = {
  name: "Rijksmuseum",
  url: "https://www.rijksmuseum.nl/en"
};

const API_BASE = "https://www.rijksmuseum.nl/api/en/collection";

const rijksSummarySchema = z.object({
  objectNumber: z.string().min(1),
  title: z.string().nullish(),
  principalOrFirstMaker: z.string().nullish(),
  links: z.object({ web: z.string().nullish() }).nullish(),
  webImage: z.object({ url: z.string().nullish() }).nullish()
});

const rijksDetailSchema = z.object({
  artObject: z.object({
    objectTypes: z.array(z.string()).nullish(),
    dating: z.object({ presentingDate: z.string().nullish() }).nullish()
  })
});

type RijksSummary = z.infer<typeof rijksSummarySchema>;

type RijksDetail = {
  medium: string;
  date: string;
};

export type RijksAdapterOptions = DetailOptions & {
  apiKey: string;
};

export const buildRijksSearchUrl = (apiKey: string, keyword: string) => {
  const url = new URL(API_BASE);
  url.searchParams.set("key", apiKey);
  url.searchParams.set("q", keyword);
  return url;
};

export const buildRijksObjectUrl = (apiKey: string, objectNumber: string) => {
  const url = new URL(`${API_BASE}/${encodeURIComponent(objectNumber)}`);
  url.searchParams.set("key", apiKey);
  return url;
};

const EMPTY_DETAIL: RijksDetail = { medium: "", date: "" };

const fetchRijksDetail = async (http: HttpClient, apiKey: string, objectNumber: string): Promise<RijksDetail> => {
  try {
    const payload = await http.getJson(buildRijksObjectUrl(apiKey, objectNumber));
    const parsed = rijksDetailSchema.safeParse(payload);
    if (!parsed.success) return EMPTY_DETAIL;
    const { artObject } = parsed.data;
    return {
      medium: artObject.objectTypes?.[0] ?? "",
      date: artObject.dating?.presentingDate ?? ""
    };
  } catch (error) {
    console.warn(
      `[${RIJKS.name}] Detail for ${objectNumber} unavailable:`,
      error instanceof Error ? error.message : error
    );
    return EMPTY_DETAIL;
  }
};

const normalizeRijks = (summary: RijksSummary, detail: RijksDetail): ArtworkRecord =>
  buildArtworkRecord(RIJKS, {
    externalId: summary.objectNumber,
    title: summary.title,
    artist: summary.principalOrFirstMaker,
    medium: detail.medium,
    date: detail.date,
    url: summary.links?.web || `${RIJKS.url}/collection/${encodeURIComponent(summary.objectNumber)}`,
    imageUrl: summary.webImage?.url
  });

export const createRijksAdapter = (http: HttpClient, options: RijksAdapterOptions): MuseumAdapter => ({
  museum: RIJKS,
  fetch: async (keyword) => {
    if (!options.apiKey) {
      console.warn(`[${RIJKS.name}] RIJKSMUSEUM_API_KEY is not set; skipping`);
      return [];
    }
    const payload = await http.getJson(buildRijksSearchUrl(options.apiKey, keyword));
    const entries = readList(payload, "artObjects", RIJKS.name);
    const summaries = parseEntries(entries, rijksSummarySchema, RIJKS.name);
    const limit = pLimit(options.concurrency);

    return Promise.all(
      summaries.map((summary) =>
        limit(async () => normalizeRijks(summary, await fetchRijksDetail(http, options.apiKey, summary.objectNumber)))
      )
    );
  }
});
