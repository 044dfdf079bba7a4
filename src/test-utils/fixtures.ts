import type { FetchLike } from "../shared/http.js";
import { buildArtworkRecord, type ArtworkFields, type ArtworkRecord, type Museum } from "../shared/record.js";

export const TEST_MUSEUM: Museum = { name: "Test Museum", url: "https://museum.test/" };

export const makeArtwork = (overrides: Partial<ArtworkFields> & { externalId: string }, museum = TEST_MUSEUM): ArtworkRecord =>
  buildArtworkRecord(museum, {
    title: `Work ${overrides.externalId}`,
    artist: "Anonymous",
    medium: "Print",
    date: "1900",
    url: `https://museum.test/item/${overrides.externalId}`,
    imageUrl: null,
    ...overrides
  });

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });

export type Route = (url: URL) => Response | Promise<Response> | undefined;

/** Fake fetch that answers from the first route returning a response, 404 otherwise. */
export const routeFetch = (...routes: Route[]) => {
  const calls: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    calls.push(url);
    const parsed = new URL(url);
    for (const route of routes) {
      const response = await route(parsed);
      if (response) return response;
    }
    return jsonResponse({ message: "Not found" }, 404);
  };
  return { fetchImpl, calls };
};

/** Fake fetch that never answers; it settles only when the request signal aborts. */
export const hangingFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      reject(new Error("request sent without an abort signal"));
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
