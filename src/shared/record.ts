import crypto from "crypto";

export const NO_IMAGE_PLACEHOLDER = "static/no_image.jpg";

export type Museum = {
  name: string;
  url: string;
};

export type ArtworkRecord = {
  surrogate_key: string;
  external_id: string;
  title: string | null;
  artist: string | null;
  medium: string; // "" when the museum gives none
  date: string; // free-form display date, e.g. "ca. 1890" or "early 1900s"
  url: string;
  image_url: string; // http(s) URL or NO_IMAGE_PLACEHOLDER
  museum_name: string;
  museum_url: string;
};

export type ArtworkFields = {
  externalId: string;
  title?: string | null;
  artist?: string | null;
  medium?: string | null;
  date?: string | null;
  url: string;
  imageUrl?: string | null;
};

export const hashId = (input: string) => crypto.createHash("sha256").update(input, "utf8").digest("hex");

// Museum-qualified so that equal identifiers from two museums land on different rows.
export const surrogateKey = (museumName: string, externalId: string) => hashId(`${museumName}:${externalId}`);

export const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
};

export const imageOrPlaceholder = (value: string | null | undefined): string =>
  value && isHttpUrl(value) ? value : NO_IMAGE_PLACEHOLDER;

export const buildArtworkRecord = (museum: Museum, fields: ArtworkFields): ArtworkRecord => ({
  surrogate_key: surrogateKey(museum.name, fields.externalId),
  external_id: fields.externalId,
  title: fields.title ?? null,
  artist: fields.artist ?? null,
  medium: fields.medium ?? "",
  date: fields.date ?? "",
  url: fields.url,
  image_url: imageOrPlaceholder(fields.imageUrl),
  museum_name: museum.name,
  museum_url: museum.url
});
