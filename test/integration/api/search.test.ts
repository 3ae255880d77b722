// ---------------------------------------------------------------------------
// Integration tests for the public /search route.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";

import { asCentralCoordinator, buildTestApp, postJson } from "../../support/app.js";

describe("GET /search", () => {
  let app: Awaited<ReturnType<typeof buildTestApp>>["app"];

  beforeEach(async () => {
    ({ app } = await buildTestApp());
  });

  it("finds copies across the network without an actor", async () => {
    const res = await app.request("/search?q=CASMURRO");

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.query).toBe("CASMURRO");
    expect(body.total).toBe(3);
    expect(
      body.results.map((r: { libraryName: string; copyCode: string }) => [
        r.libraryName,
        r.copyCode,
      ]),
    ).toEqual([
      ["Biblioteca Central", "C101"],
      ["Biblioteca Central", "C102"],
      ["Biblioteca Regional Norte", "N101"],
    ]);
  });

  it("reports the current status of each copy", async () => {
    await app.request("/loans", postJson(asCentralCoordinator, { readerId: "r-ana", copyId: "c-101" }));

    const body = await (await app.request("/search?q=casmurro&library=lib-central")).json();

    expect(body.results).toEqual([
      {
        titleId: "t-casmurro",
        title: "Dom Casmurro",
        author: "Machado de Assis",
        category: "Romance",
        libraryId: "lib-central",
        libraryName: "Biblioteca Central",
        copyCode: "C101",
        status: "ON_LOAN",
      },
      {
        titleId: "t-casmurro",
        title: "Dom Casmurro",
        author: "Machado de Assis",
        category: "Romance",
        libraryId: "lib-central",
        libraryName: "Biblioteca Central",
        copyCode: "C102",
        status: "AVAILABLE",
      },
    ]);
  });

  it("trims the term before matching", async () => {
    const body = await (await app.request("/search?q=%20sert%C3%B5es%20")).json();

    expect(body.query).toBe("sertões");
    expect(body.results.map((r: { copyCode: string }) => r.copyCode)).toEqual(["N301"]);
  });

  it("returns an empty list when nothing matches", async () => {
    const body = await (await app.request("/search?q=iracema")).json();
    expect(body).toEqual({ query: "iracema", results: [], total: 0 });
  });

  it("returns 400 without a term", async () => {
    const res = await app.request("/search");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "invalid query parameters",
      type: "validation_error",
      issues: ["q: required"],
    });
  });

  it("returns 400 for a blank term", async () => {
    const res = await app.request("/search?q=%20%20");

    expect(res.status).toBe(400);
    expect((await res.json()).error).toBe("search term must not be blank");
  });
});
