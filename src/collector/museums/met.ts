/**
 * Metropolitan Museum of Art collection API.
 * The search call only returns object IDs; each object needs its own detail call.
 * The API allows 80 requests per second, so detail calls are capped and pooled.
 */
import pLimit from "p-limit";
import { z } from "zod";
import type { HttpClient } from "../../shared/http.js";
import { buildArtworkRecord, type ArtworkRecord, type Museum } from "../../shared/record.js";
import { readList } from "../payload.js";
import type { DetailOptions, MuseumAdapter } from "./types.js";

export const MET: Museum = {
  name: "Metropolitan Museum of Art",
  url: "https://www.metmuseum.org/"
};

const API_BASE = "https://collectionapi.metmuseum.org/public/collection/v1";

export const MET_DETAIL_CAP = 100;

const metObjectSchema = z.object({
  objectID: z.union([z.number().int(), z.string().min(1)]),
  title: z.string().nullish(),
  artistDisplayName: z.string().nullish(),
  objectURL: z.string().nullish(),
  objectDate: z.string().nullish(),
  objectName: z.string().nullish(),
  isPublicDomain: z.boolean().nullish(),
  primaryImage: z.string().nullish()
});

type MetObject = z.infer<typeof metObjectSchema>;

export type MetAdapterOptions = DetailOptions & {
  detailCap?: number;
};

export const buildMetSearchUrl = (keyword: string) => {
  const url = new URL(`${API_BASE}/search`);
  url.searchParams.set("q", keyword);
  return url;
};

export const buildMetObjectUrl = (objectId: string | number) =>
  `${API_BASE}/objects/${encodeURIComponent(String(objectId))}`;

const normalizeMet = (object: MetObject): ArtworkRecord => {
  const externalId = String(object.objectID);
  return buildArtworkRecord(MET, {
    externalId,
    title: object.title,
    artist: object.artistDisplayName,
    medium: object.objectName,
    date: object.objectDate,
    url: object.objectURL || `https://www.metmuseum.org/art/collection/search/${encodeURIComponent(externalId)}`,
    // Only public-domain works come with a usable image.
    imageUrl: object.isPublicDomain === true ? object.primaryImage : null
  });
};

const fetchMetObject = async (http: HttpClient, objectId: unknown): Promise<ArtworkRecord | null> => {
  if (typeof objectId !== "number" && typeof objectId !== "string") {
    console.warn(`[${MET.name}] Skipping non-scalar object id`);
    return null;
  }
  try {
    const payload = await http.getJson(buildMetObjectUrl(objectId));
    const parsed = metObjectSchema.safeParse(payload);
    if (!parsed.success) {
      console.warn(`[${MET.name}] Skipping object ${objectId}: unexpected response shape`);
      return null;
    }
    return normalizeMet(parsed.data);
  } catch (error) {
    console.warn(
      `[${MET.name}] Skipping object ${objectId}:`,
      error instanceof Error ? error.message : error
    );
    return null;
  }
};

export const createMetAdapter = (http: HttpClient, options: MetAdapterOptions): MuseumAdapter => ({
  museum: MET,
  fetch: async (keyword) => {
    const payload = await http.getJson(buildMetSearchUrl(keyword));
    const objectIds = readList(payload, "objectIDs", MET.name);
    const count = Math.min(options.detailCap ?? MET_DETAIL_CAP, objectIds.length);
    const limit = pLimit(options.concurrency);

    const results = await Promise.all(
      objectIds.slice(0, count).map((objectId) => limit(() => fetchMetObject(http, objectId)))
    );
    return results.filter((record): record is ArtworkRecord => record !== null);
  }
});
