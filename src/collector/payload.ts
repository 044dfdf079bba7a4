import type { z } from "zod";

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads the result list under `key` of a search response. A missing or null key is
 * treated as an empty result; anything else that is not an array is a malformed payload.
 */
export const readList = (payload: unknown, key: string, source: string): unknown[] => {
  if (!isPlainObject(payload)) {
    throw new Error(`${source}: unexpected response (expected a JSON object)`);
  }
  const value = payload[key];
  if (value === undefined || value === null) {
    console.warn(`[${source}] Response has no "${key}"; treating as no results`);
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`${source}: "${key}" is not a list`);
  }
  return value;
};

export const parseEntries = <T extends z.ZodTypeAny>(entries: unknown[], schema: T, source: string): Array<z.infer<T>> => {
  const parsed: Array<z.infer<T>> = [];
  let skipped = 0;
  for (const entry of entries) {
    const result = schema.safeParse(entry);
    if (result.success) {
      parsed.push(result.data);
    } else {
      skipped += 1;
    }
  }
  if (skipped > 0) {
    console.warn(`[${source}] Skipped ${skipped} of ${entries.length} malformed entries`);
  }
  return parsed;
};
