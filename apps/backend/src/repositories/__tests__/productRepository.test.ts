/// <reference types="vitest" />
/**
 * Product repository test suite
 *
 * Uses a temporary on-disk database so the reader and the creation-run
 * writer are separate connections, as in the server.
 */

import pino from "pino";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { finalizeProduct, type ProductDraft } from "../../domain/product";
import { RetrievalFailedError } from "../../domain/errors";
import { ProductRepository } from "../productRepository";
import { SAMPLE_METADATA, createTestStore, type TestStore } from "../../test/fakes";

const draft = (overrides: Partial<ProductDraft> = {}): ProductDraft => ({
  ...SAMPLE_METADATA,
  tags: [...SAMPLE_METADATA.tags],
  description: "A blade that never cools.",
  ...overrides,
});

const insert = (repo: ProductRepository, name: string, createdAt: number) => {
  const tx = repo.begin();
  const reserved = tx.reserve(draft({ name }), createdAt);
  tx.commit(finalizeProduct(reserved, `/images/${reserved.id}.jpg`));
  return reserved.id;
};

describe("ProductRepository", () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.close();
  });

  it("returns an empty list for an empty store", () => {
    expect(store.repo.listAll()).toEqual([]);
  });

  it("returns undefined for an unknown id", () => {
    expect(store.repo.getById(999)).toBeUndefined();
  });

  it("round-trips a committed product", () => {
    const writer = store.openWriter();
    const tx = writer.repo.begin();
    const reserved = tx.reserve(draft(), 1_700_000_000_000);
    tx.commit(finalizeProduct(reserved, `/images/${reserved.id}_20231114_221320.jpg`));

    expect(store.repo.getById(reserved.id)).toEqual({
      id: reserved.id,
      name: "Dragon Fire Sword",
      description: "A blade that never cools.",
      image_path: `/images/${reserved.id}_20231114_221320.jpg`,
      price: "10000 Gold Coins",
      category: "Weapons",
      tags: ["dragon", "fire", "sword", "legendary"],
      rarity: "Legendary",
      created_at: 1_700_000_000_000,
    });
  });

  it("lists newest first, breaking ties by id", () => {
    insert(store.repo, "Oldest", 1_000);
    insert(store.repo, "Newest", 3_000);
    insert(store.repo, "Middle", 2_000);
    insert(store.repo, "Middle twin", 2_000);

    expect(store.repo.listAll().map((product) => product.name)).toEqual([
      "Newest",
      "Middle twin",
      "Middle",
      "Oldest",
    ]);
  });

  describe("creation transaction", () => {
    it("keeps the provisional row invisible until commit", () => {
      const writer = store.openWriter();
      const tx = writer.repo.begin();
      const reserved = tx.reserve(draft(), 5_000);

      expect(reserved.id).toBeGreaterThan(0);
      expect(store.repo.listAll()).toEqual([]);
      expect(store.repo.getById(reserved.id)).toBeUndefined();

      tx.commit(finalizeProduct(reserved, "/images/done.jpg"));

      expect(store.repo.listAll()).toHaveLength(1);
      expect(store.repo.getById(reserved.id)?.image_path).toBe("/images/done.jpg");
    });

    it("leaves nothing behind on rollback", () => {
      const writer = store.openWriter();
      const tx = writer.repo.begin();
      tx.reserve(draft(), 5_000);

      tx.rollback();

      expect(tx.isOpen).toBe(false);
      expect(writer.db.inTransaction).toBe(false);
      expect(store.repo.listAll()).toEqual([]);
    });

    it("tolerates a second rollback", () => {
      const tx = store.repo.begin();
      tx.rollback();
      expect(() => tx.rollback()).not.toThrow();
    });

    it("refuses to commit a closed transaction", () => {
      const tx = store.repo.begin();
      const reserved = tx.reserve(draft(), 1);
      tx.rollback();

      expect(() => tx.commit(finalizeProduct(reserved, "/images/late.jpg"))).toThrow(
        "Product transaction is already closed",
      );
    });

    it("returns a frozen reservation", () => {
      const tx = store.repo.begin();
      const reserved = tx.reserve(draft(), 42);
      tx.rollback();

      expect(Object.isFrozen(reserved)).toBe(true);
      expect(Object.isFrozen(reserved.draft)).toBe(true);
      expect(reserved.created_at).toBe(42);
    });

    it("fails a second writer at once instead of waiting for the lock", () => {
      const first = store.openWriter();
      const second = store.openWriter();
      const tx = first.repo.begin();

      const started = Date.now();
      expect(() => second.repo.begin()).toThrow(/database is locked/);
      expect(Date.now() - started).toBeLessThan(1000);
      expect(store.repo.listAll()).toEqual([]);

      tx.rollback();
      const retry = second.repo.begin();
      expect(retry.isOpen).toBe(true);
      retry.rollback();
    });

    it("enforces column constraints", () => {
      const tx = store.repo.begin();
      expect(() => tx.reserve(draft({ name: "" }), 1)).toThrow();
      tx.rollback();
      expect(store.repo.listAll()).toEqual([]);
    });
  });

  describe("stored tags", () => {
    it("logs rows whose tags are not a JSON list", () => {
      const lines: string[] = [];
      const logger = pino({ level: "error" }, { write: (line: string) => void lines.push(line) });
      const repo = new ProductRepository(store.db, logger);
      const { id } = store.db
        .prepare(
          `INSERT INTO products (name, description, image_path, price, category, tags, rarity, created_at)
           VALUES ('Cracked Orb', 'Hums faintly.', '/images/orb.jpg', '5 Gold Coins', 'Artifacts', 'not json', 'Common', 1)
           RETURNING id`,
        )
        .get() as { id: number };

      expect(repo.getById(id)?.tags).toEqual([]);
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "products.tags.corrupt", id, tags: "not json" });
    });

    it("stays quiet for well-formed rows", () => {
      const lines: string[] = [];
      const logger = pino({ level: "error" }, { write: (line: string) => void lines.push(line) });
      insert(store.repo, "Sound Orb", 1);

      expect(new ProductRepository(store.db, logger).listAll()[0]?.tags).toEqual(SAMPLE_METADATA.tags);
      expect(lines).toEqual([]);
    });
  });

  describe("failures", () => {
    it("wraps list failures", () => {
      store.db.close();
      expect(() => store.repo.listAll()).toThrow(RetrievalFailedError);
      expect(() => store.repo.listAll()).toThrow(/^Failed to retrieve products: /);
    });

    it("wraps lookup failures", () => {
      store.db.close();
      expect(() => store.repo.getById(3)).toThrow(/^Failed to retrieve product 3: /);
    });
  });
});
