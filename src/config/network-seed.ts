// ---------------------------------------------------------------------------
// Network seed loader.
// Reads YAML files from a directory, validates them with Zod, and loads the
// libraries, titles, copies and readers they describe into the store.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";
import type pino from "pino";

import { CopyStatus } from "../core/types.js";
import type {
  CopyId,
  LibraryId,
  ReaderId,
  TitleId,
} from "../core/types.js";
import { normalizeISBN } from "../domain/isbn.js";
import type { InventoryStore } from "../store/inventory-store.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

const SeedLibrarySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  city: z.string().min(1),
  address: z.string().optional(),
});

const SeedTitleSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  author: z.string().min(1),
  category: z.string().min(1),
  isbn: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined) return null;
      const isbn = normalizeISBN(raw);
      if (!isbn) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid ISBN "${raw}"` });
        return z.NEVER;
      }
      return isbn;
    }),
  publisher: z.string().optional(),
  year: z.number().int().optional(),
});

const SeedCopySchema = z.object({
  id: z.string().min(1),
  titleId: z.string().min(1),
  libraryId: z.string().min(1),
  code: z.string().min(1),
});

const SeedReaderSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  email: z.string().email(),
  document: z.string().optional(),
  homeLibraryId: z.string().min(1),
  active: z.boolean().default(true),
});

export const NetworkSeedSchema = z.object({
  libraries: z.array(SeedLibrarySchema).default([]),
  titles: z.array(SeedTitleSchema).default([]),
  copies: z.array(SeedCopySchema).default([]),
  readers: z.array(SeedReaderSchema).default([]),
});

export type NetworkSeed = z.infer<typeof NetworkSeedSchema>;

// ── Public API ──────────────────────────────────────────────────────────────

function emptySeed(): NetworkSeed {
  return { libraries: [], titles: [], copies: [], readers: [] };
}

/**
 * Load every `*.yaml` file from `dir` in name order, validate each against
 * {@link NetworkSeedSchema} and merge them. A missing directory yields an
 * empty seed; files that fail validation are skipped with a warning.
 */
export function loadNetworkSeed(dir: string, logger: pino.Logger): NetworkSeed {
  const absoluteDir = path.resolve(dir);
  const merged = emptySeed();

  if (!fs.existsSync(absoluteDir)) {
    return merged;
  }

  const files = fs
    .readdirSync(absoluteDir)
    .filter((f) => f.endsWith(".yaml") || f.endsWith(".yml"))
    .sort();

  for (const file of files) {
    try {
      const raw = fs.readFileSync(path.join(absoluteDir, file), "utf-8");
      const seed = NetworkSeedSchema.parse(parse(raw) ?? {});
      merged.libraries.push(...seed.libraries);
      merged.titles.push(...seed.titles);
      merged.copies.push(...seed.copies);
      merged.readers.push(...seed.readers);
    } catch (err) {
      logger.warn(
        { file, err: err instanceof Error ? err.message : String(err) },
        "skipping invalid seed file",
      );
    }
  }

  return merged;
}

/**
 * Insert the seed into the store in one transaction. Copies start AVAILABLE.
 * Any invalid reference aborts the whole seed.
 */
export async function applyNetworkSeed(
  store: InventoryStore,
  seed: NetworkSeed,
  now: Date,
): Promise<void> {
  await store.transaction(async (tx) => {
    for (const lib of seed.libraries) {
      await tx.insertLibrary({
        id: lib.id as LibraryId,
        name: lib.name,
        city: lib.city,
        address: lib.address ?? null,
        active: true,
        createdAt: now,
      });
    }
    for (const t of seed.titles) {
      await tx.insertTitle({
        id: t.id as TitleId,
        title: t.title,
        author: t.author,
        category: t.category,
        isbn: t.isbn,
        publisher: t.publisher ?? null,
        year: t.year ?? null,
        createdAt: now,
      });
    }
    for (const c of seed.copies) {
      await tx.insertCopy({
        id: c.id as CopyId,
        titleId: c.titleId as TitleId,
        libraryId: c.libraryId as LibraryId,
        code: c.code,
        status: CopyStatus.AVAILABLE,
        acquiredAt: now,
      });
    }
    for (const r of seed.readers) {
      await tx.insertReader({
        id: r.id as ReaderId,
        name: r.name,
        email: r.email.toLowerCase(),
        document: r.document ?? null,
        homeLibraryId: r.homeLibraryId as LibraryId,
        active: r.active,
        consentedAt: now,
        registeredAt: now,
      });
    }
  });
}
