/**
 * Victoria and Albert Museum search API.
 * One call returns up to 100 matches under `records`; no detail calls are needed.
 */
import { z } from "zod";
import type { HttpClient } from "../../shared/http.js";
import { buildArtworkRecord, type ArtworkRecord, type Museum } from "../../shared/record.js";
import { parseEntries, readList } from "../payload.js";
import type { MuseumAdapter } from "./types.js";

export const VAM: Museum = {
  name: "Victoria and Albert Museum",
  url: "https://www.vam.ac.uk/"
};

const SEARCH_URL = "https://api.vam.ac.uk/v2/objects/search";
const ITEM_BASE_URL = "https://collections.vam.ac.uk/item/";

// Hard maximum of the V&A API for a single page.
export const VAM_PAGE_SIZE = 100;

const vamRecordSchema = z.object({
  systemNumber: z.string().min(1),
  _primaryTitle: z.string().nullish(),
  _primaryMaker: z.object({ name: z.string().nullish() }).nullish(),
  _primaryDate: z.string().nullish(),
  objectType: z.string().nullish(),
  _primaryImageId: z.string().nullish(),
  _images: z.object({ _primary_thumbnail: z.string().nullish() }).nullish()
});

type VamRecord = z.infer<typeof vamRecordSchema>;

export const buildVamSearchUrl = (keyword: string) => {
  const url = new URL(SEARCH_URL);
  url.searchParams.set("q", keyword);
  url.searchParams.set("page_size", String(VAM_PAGE_SIZE));
  return url;
};

const normalizeVam = (entry: VamRecord): ArtworkRecord =>
  buildArtworkRecord(VAM, {
    externalId: entry.systemNumber,
    title: entry._primaryTitle,
    artist: entry._primaryMaker?.name,
    medium: entry.objectType,
    date: entry._primaryDate,
    url: `${ITEM_BASE_URL}${encodeURIComponent(entry.systemNumber)}`,
    imageUrl: entry._primaryImageId ? entry._images?._primary_thumbnail : null
  });

export const createVamAdapter = (http: HttpClient): MuseumAdapter => ({
  museum: VAM,
  fetch: async (keyword) => {
    const payload = await http.getJson(buildVamSearchUrl(keyword));
    const entries = readList(payload, "records", VAM.name);
    return parseEntries(entries, vamRecordSchema, VAM.name).map(normalizeVam);
  }
});
