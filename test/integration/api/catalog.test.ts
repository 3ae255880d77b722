// ---------------------------------------------------------------------------
// Integration tests for the /catalog routes.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";

import { asAdmin, asCentralCoordinator, buildTestApp, postJson } from "../../support/app.js";
import type { ManualClock } from "../../support/network.js";

describe("catalog routes", () => {
  let app: Awaited<ReturnType<typeof buildTestApp>>["app"];
  let clock: ManualClock;

  beforeEach(async () => {
    ({ app, clock } = await buildTestApp());
  });

  describe("POST /catalog/titles", () => {
    it("registers a title with a normalised ISBN", async () => {
      const res = await app.request(
        "/catalog/titles",
        postJson(asAdmin, {
          title: "Iracema",
          author: "José de Alencar",
          category: "Romance",
          isbn: "978-0-306-40615-7",
          year: 1865,
        }),
      );

      expect(res.status).toBe(201);
      const title = await res.json();
      expect(title.isbn).toBe("9780306406157");
      expect(title.year).toBe(1865);
      expect(title.publisher).toBeNull();
      expect(title.createdAt).toBe("2024-03-01T10:00:00.000Z");
    });

    it("returns 403 for coordinators", async () => {
      const res = await app.request(
        "/catalog/titles",
        postJson(asCentralCoordinator, { title: "Iracema", author: "José de Alencar", category: "Romance" }),
      );

      expect(res.status).toBe(403);
      expect((await res.json()).type).toBe("forbidden");
    });

    it("returns 400 for an ISBN with a bad check digit", async () => {
      const res = await app.request(
        "/catalog/titles",
        postJson(asAdmin, {
          title: "Iracema",
          author: "José de Alencar",
          category: "Romance",
          isbn: "978-0-306-40615-8",
        }),
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid ISBN "978-0-306-40615-8"',
        type: "validation_error",
        issues: ["isbn: bad length or check digit"],
      });
    });

    it("returns 400 for a missing author", async () => {
      const res = await app.request(
        "/catalog/titles",
        postJson(asAdmin, { title: "Iracema", category: "Romance" }),
      );

      expect(res.status).toBe(400);
      expect((await res.json()).issues).toEqual(["author: Required"]);
    });
  });

  describe("POST /catalog/libraries", () => {
    it("registers a library that then appears in the listing", async () => {
      const res = await app.request(
        "/catalog/libraries",
        postJson(asAdmin, { name: "Biblioteca do Sul", city: "Sul" }),
      );

      expect(res.status).toBe(201);
      const library = await res.json();
      expect(library.address).toBeNull();
      expect(library.active).toBe(true);

      const listing = await (await app.request("/libraries")).json();
      expect(listing.libraries.map((l: { name: string }) => l.name)).toEqual([
        "Biblioteca Central",
        "Biblioteca do Sul",
        "Biblioteca Regional Norte",
      ]);
    });

    it("returns 401 without an actor", async () => {
      const res = await app.request("/catalog/libraries", postJson({}, { name: "X", city: "Y" }));
      expect(res.status).toBe(401);
    });
  });

  describe("GET /catalog/summary", () => {
    it("counts records and overdue loans for administrators", async () => {
      await app.request("/loans", postJson(asCentralCoordinator, { readerId: "r-ana", copyId: "c-101" }));
      await app.request("/loans", postJson(asCentralCoordinator, { readerId: "r-davi", copyId: "c-201" }));
      clock.advanceDays(15);

      const res = await app.request("/catalog/summary", { headers: asAdmin });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        libraries: 2,
        titles: 3,
        copies: 5,
        openLoans: 2,
        overdueLoans: 2,
      });
    });

    it("returns 403 for coordinators", async () => {
      const res = await app.request("/catalog/summary", { headers: asCentralCoordinator });
      expect(res.status).toBe(403);
    });
  });
});
