import { beforeEach, describe, expect, it } from "vitest";
import { makeArtwork } from "../test-utils/fixtures.js";
import { createMemoryDb } from "../test-utils/memory-db.js";
import {
  buildFilterClause,
  countArtworks,
  insertArtworks,
  listArtworksPage,
  listMediums,
  MAX_PAGE,
  normalizePage,
  totalPages
} from "./artworks.js";
import type { Db } from "./db.js";

const seed = [
  makeArtwork({ externalId: "a", title: "Alpha", medium: "Print", date: "1990" }),
  makeArtwork({ externalId: "b", title: "Bravo", medium: "Print", date: "1995" }),
  makeArtwork({ externalId: "c", title: "Charlie", medium: "Painting", date: "1995" }),
  makeArtwork({ externalId: "d", title: "Delta", medium: "Print", date: "2005" }),
  makeArtwork({ externalId: "e", title: "Echo", medium: "", date: "1998" })
];

const titles = (rows: Array<{ title: string | null }>) => rows.map((row) => row.title);

describe("buildFilterClause", () => {
  it("omits the WHERE clause without filters", () => {
    expect(buildFilterClause({ mediums: [] })).toMatchObject({ where: "", params: [] });
  });

  it("ORs mediums and ANDs the date bounds that are present", () => {
    expect(buildFilterClause({ mediums: ["Print", "Painting"], dateFrom: "1991" })).toMatchObject({
      where: 'WHERE medium IN ($1, $2) AND "date" >= $3',
      params: ["Print", "Painting", "1991"]
    });
    expect(buildFilterClause({ mediums: [], dateFrom: null, dateTo: "2000" })).toMatchObject({
      where: 'WHERE "date" <= $1',
      params: ["2000"]
    });
  });
});

describe("normalizePage", () => {
  it("falls back to the first page for invalid input", () => {
    expect(normalizePage("3")).toBe(3);
    expect(normalizePage("0")).toBe(1);
    expect(normalizePage("-2")).toBe(1);
    expect(normalizePage("1.5")).toBe(1);
    expect(normalizePage("abc")).toBe(1);
    expect(normalizePage(undefined)).toBe(1);
  });

  it("caps huge page numbers so the offset fits a 32-bit integer", () => {
    expect(MAX_PAGE).toBe(107_374_182);
    expect(normalizePage("100000000000000000000")).toBe(MAX_PAGE);
    expect(normalizePage(String(MAX_PAGE + 1))).toBe(MAX_PAGE);
  });
});

describe("buildFilterClause parameters", () => {
  it("continues parameter numbering after the filter", () => {
    const { where, params, pushParam } = buildFilterClause({ mediums: ["Print"] });
    expect(`${where} LIMIT ${pushParam(20)} OFFSET ${pushParam(40)}`).toBe("WHERE medium IN ($1) LIMIT $2 OFFSET $3");
    expect(params).toEqual(["Print", 20, 40]);
  });
});

describe("artwork store", () => {
  let db: Db;
  let reset: () => Promise<void>;

  beforeEach(async () => {
    ({ db, reset } = await createMemoryDb());
    await insertArtworks(db, seed);
  });

  it("lists distinct non-empty mediums in ascending order", async () => {
    await expect(listMediums(db)).resolves.toEqual(["Painting", "Print"]);
  });

  it("combines medium membership with the date range", async () => {
    const filter = { mediums: ["Print"], dateFrom: "1991", dateTo: "2000" };

    await expect(countArtworks(db, filter)).resolves.toBe(1);
    const page = await listArtworksPage(db, filter, { page: 1, order: "title" });
    expect(titles(page.rows)).toEqual(["Bravo"]);
  });

  it("matches any of the selected mediums", async () => {
    const page = await listArtworksPage(db, { mediums: ["Print", "Painting"] }, { page: 1, order: "title" });
    expect(titles(page.rows)).toEqual(["Alpha", "Bravo", "Charlie", "Delta"]);
  });

  it("applies a lone date bound", async () => {
    await expect(countArtworks(db, { mediums: [], dateFrom: "2000" })).resolves.toBe(1);
    await expect(countArtworks(db, { mediums: [], dateTo: "1995" })).resolves.toBe(3);
  });

  it("overwrites a row when the same key is written again", async () => {
    const written = await insertArtworks(db, [
      makeArtwork({ externalId: "a", title: "Alpha (first)" }),
      makeArtwork({ externalId: "a", title: "Alpha (revised)" })
    ]);

    expect(written).toBe(1);
    await expect(countArtworks(db)).resolves.toBe(5);
    const page = await listArtworksPage(db, { mediums: [] }, { page: 1, order: "insertion" });
    expect(page.rows[0]?.title).toBe("Alpha (revised)");
  });

  it("orders by title or by insertion", async () => {
    await reset();
    await insertArtworks(db, [
      makeArtwork({ externalId: "1", title: "Cypress" }),
      makeArtwork({ externalId: "2", title: "Apple" }),
      makeArtwork({ externalId: "3", title: "Bridge" })
    ]);

    const byTitle = await listArtworksPage(db, { mediums: [] }, { page: 1, order: "title" });
    const byInsertion = await listArtworksPage(db, { mediums: [] }, { page: 1, order: "insertion" });

    expect(titles(byTitle.rows)).toEqual(["Apple", "Bridge", "Cypress"]);
    expect(titles(byInsertion.rows)).toEqual(["Cypress", "Apple", "Bridge"]);
  });

  it("pages through 45 rows twenty at a time", async () => {
    await reset();
    await insertArtworks(
      db,
      Array.from({ length: 45 }, (_, index) => makeArtwork({ externalId: `n${index}` }))
    );

    const sizes: number[] = [];
    for (const page of [1, 2, 3, 4]) {
      const result = await listArtworksPage(db, { mediums: [] }, { page, order: "insertion" });
      sizes.push(result.rows.length);
    }

    expect(sizes).toEqual([20, 20, 5, 0]);
    expect(totalPages(45)).toBe(3);
  });

  it("returns an empty page far past the end", async () => {
    const page = await listArtworksPage(db, { mediums: [] }, { page: normalizePage("100000000000000000000"), order: "title" });
    expect(page.page).toBe(MAX_PAGE);
    expect(page.rows).toEqual([]);
  });

  it("returns rows with every stored column", async () => {
    const page = await listArtworksPage(db, { mediums: ["Painting"] }, { page: 1, order: "title" });
    expect(page.rows).toEqual([seed[2]]);
  });

  it("ignores null mediums in the facet list", async () => {
    await db.query("UPDATE artwork SET medium = NULL WHERE external_id = 'c'");
    await expect(listMediums(db)).resolves.toEqual(["Print"]);
  });
});
