import type { ArtworkRecord, Museum } from "../../shared/record.js";

export type MuseumAdapter = {
  museum: Museum;
  fetch: (keyword: string) => Promise<ArtworkRecord[]>;
};

export type DetailOptions = {
  concurrency: number;
};
