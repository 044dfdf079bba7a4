import express from "express";
import { createMuseumAdapters, searchAndStore, type SearchSummary } from "../collector/aggregate.js";
import { MET } from "../collector/museums/met.js";
import { RIJKS } from "../collector/museums/rijks.js";
import { VAM } from "../collector/museums/vam.js";
import { isPlainObject } from "../collector/payload.js";
import {
  countArtworks,
  listArtworksPage,
  listMediums,
  normalizePage,
  totalPages,
  type ArtworkFilter,
  type ArtworkOrder
} from "../shared/artworks.js";
import { config } from "../shared/config.js";
import { getPool, resetSchema, type Db } from "../shared/db.js";

export type AppDeps = {
  getDb: () => Db;
  resetStore: (db: Db) => Promise<void>;
  search: (db: Db, keyword: string) => Promise<SearchSummary>;
};

type ListingRequest = {
  keyword: string;
  filter: ArtworkFilter;
  page: number;
  order: ArtworkOrder;
};

const defaultDeps = (): AppDeps => {
  const adapters = createMuseumAdapters(config);
  return {
    getDb: () => getPool(config.dbUrl),
    resetStore: resetSchema,
    search: (db, keyword) => searchAndStore(db, keyword, adapters)
  };
};

const firstString = (value: unknown): string => {
  if (typeof value === "string") return value.trim();
  if (Array.isArray(value)) return firstString(value[0]);
  return "";
};

const stringList = (value: unknown): string[] => {
  if (value === undefined || value === null) return [];
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const parseOrder = (value: unknown, fallback: ArtworkOrder): ArtworkOrder => {
  const order = firstString(value);
  return order === "title" || order === "insertion" ? order : fallback;
};

const sendError = (res: express.Response, error: unknown) => {
  const message = error instanceof Error ? error.message : "Database error";
  res.status(500).json({ error: message });
};

export const sortedMuseums = () =>
  [VAM, MET, RIJKS].map(({ name, url }) => ({ name, url })).sort((a, b) => a.name.localeCompare(b.name));

const buildListing = async (db: Db, request: ListingRequest) => {
  const { keyword, filter, order } = request;
  const [mediums, stored, total, page] = await Promise.all([
    listMediums(db),
    countArtworks(db),
    countArtworks(db, filter),
    listArtworksPage(db, filter, { page: request.page, order })
  ]);

  return {
    header: stored === 0 ? `No results for '${keyword}'` : `Search results for '${keyword}'`,
    keyword,
    total_results: total,
    mediums,
    selected_types: filter.mediums,
    from_date: filter.dateFrom ?? "",
    to_date: filter.dateTo ?? "",
    order,
    page: page.page,
    per_page: page.perPage,
    total_pages: totalPages(total, page.perPage),
    count: page.rows.length,
    works: page.rows
  };
};

export type ArtworkListing = Awaited<ReturnType<typeof buildListing>>;

export const createApp = (overrides: Partial<AppDeps> = {}) => {
  const deps: AppDeps = { ...defaultDeps(), ...overrides };
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/", async (_req, res) => {
    try {
      await deps.resetStore(deps.getDb());
      res.redirect("/search");
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/search", async (_req, res) => {
    try {
      await deps.resetStore(deps.getDb());
      res.json({
        form: { method: "POST", action: "/search", fields: ["keyword"] },
        museums: sortedMuseums()
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/search", async (req, res) => {
    const body: unknown = req.body;
    const keyword = isPlainObject(body) ? firstString(body.keyword) : "";
    if (!keyword) {
      res.status(400).json({ error: "keyword is required" });
      return;
    }

    try {
      const db = deps.getDb();
      await deps.resetStore(db);
      const summary = await deps.search(db, keyword);
      console.log(`Search "${keyword}" stored ${summary.total} artworks`);
      res.redirect(303, `/results?keyword=${encodeURIComponent(keyword)}`);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/results", async (req, res) => {
    const { keyword, page, medium, from, to, order } = req.query;
    try {
      const listing = await buildListing(deps.getDb(), {
        keyword: firstString(keyword),
        filter: {
          mediums: stringList(medium),
          dateFrom: firstString(from) || null,
          dateTo: firstString(to) || null
        },
        page: normalizePage(firstString(page)),
        order: parseOrder(order, "title")
      });
      res.json(listing);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/apply_filter", async (req, res) => {
    const body: unknown = req.body;
    const form: Record<string, unknown> = isPlainObject(body) ? body : {};
    const mediums = stringList(form.selectedTypes ?? form["selectedTypes[]"]);

    try {
      const listing = await buildListing(deps.getDb(), {
        keyword: firstString(form.keyword) || firstString(req.query.keyword),
        filter: {
          mediums,
          dateFrom: firstString(form.fromDate) || null,
          dateTo: firstString(form.toDate) || null
        },
        page: normalizePage(firstString(req.query.page)),
        order: mediums.length > 0 ? "title" : "insertion"
      });
      res.json(listing);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/museums", (_req, res) => {
    res.json({ museums: sortedMuseums() });
  });

  return app;
};
