import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { Product, ProductDraft, ReservedProduct } from "../domain/product";
import { RetrievalFailedError, errorMessage } from "../domain/errors";

interface ProductRow {
  id: number;
  name: string;
  description: string;
  image_path: string;
  price: string;
  category: string;
  tags: string;
  rarity: string;
  created_at: number;
}

const serialize = (value: unknown) => JSON.stringify(value ?? null);
const parseTags = (value: string | null): string[] | undefined => {
  if (!value) return undefined;
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.map((tag) => String(tag)) : undefined;
  } catch {
    return undefined;
  }
};

const mapRow = (row: ProductRow, logger?: Logger): Product => {
  const tags = parseTags(row.tags);
  if (!tags) {
    logger?.error({ id: row.id, tags: row.tags }, "products.tags.corrupt");
  }
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    image_path: row.image_path,
    price: row.price,
    category: row.category,
    tags: tags ?? [],
    rarity: row.rarity,
    created_at: row.created_at,
  };
};

/**
 * Write side of a single creation run. Opened with BEGIN IMMEDIATE; exactly one
 * of commit() or rollback() ends it.
 */
export class ProductTransaction {
  private open = true;

  constructor(private readonly db: Database.Database) {
    this.db.exec("BEGIN IMMEDIATE");
  }

  get isOpen(): boolean {
    return this.open;
  }

  /**
   * Insert the provisional row (empty image_path) and hand back its id.
   * Nothing is visible to other connections until commit().
   */
  reserve(draft: ProductDraft, createdAt: number): ReservedProduct {
    this.assertOpen();
    const row = this.db
      .prepare(
        `INSERT INTO products (name, description, image_path, price, category, tags, rarity, created_at)
         VALUES (@name, @description, '', @price, @category, @tags, @rarity, @created_at)
         RETURNING id, created_at`
      )
      .get({
        name: draft.name,
        description: draft.description,
        price: draft.price,
        category: draft.category,
        tags: serialize(draft.tags),
        rarity: draft.rarity,
        created_at: createdAt,
      }) as { id: number; created_at: number };

    return Object.freeze({
      id: row.id,
      created_at: row.created_at,
      draft: Object.freeze({ ...draft, tags: [...draft.tags] }),
    });
  }

  /** Persist the final image reference and commit. */
  commit(product: Readonly<Product>): void {
    this.assertOpen();
    const result = this.db
      .prepare(`UPDATE products SET image_path = @image_path WHERE id = @id`)
      .run({ id: product.id, image_path: product.image_path });
    if (result.changes !== 1) {
      throw new Error(`Reserved product ${product.id} disappeared before commit`);
    }
    this.db.exec("COMMIT");
    this.open = false;
  }

  rollback(): void {
    if (!this.open) return;
    this.open = false;
    if (this.db.inTransaction) {
      this.db.exec("ROLLBACK");
    }
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new Error("Product transaction is already closed");
    }
  }
}

/**
 * ProductRepository: read queries over committed products, plus the entry
 * point for the creation transaction.
 */
export class ProductRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly logger?: Logger,
  ) {}

  begin(): ProductTransaction {
    return new ProductTransaction(this.db);
  }

  /**
   * All committed products, newest first. An empty store yields [].
   */
  listAll(): Product[] {
    try {
      const rows = this.db
        .prepare(`SELECT * FROM products ORDER BY created_at DESC, id DESC`)
        .all() as ProductRow[];
      this.logger?.debug({ count: rows.length }, "products.list");
      return rows.map((row) => mapRow(row, this.logger));
    } catch (error) {
      this.logger?.error({ err: error }, "products.list.failed");
      throw new RetrievalFailedError(`Failed to retrieve products: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Product by id, or undefined when there is none.
   */
  getById(id: number): Product | undefined {
    try {
      const row = this.db.prepare(`SELECT * FROM products WHERE id = @id`).get({ id }) as
        | ProductRow
        | undefined;
      return row ? mapRow(row, this.logger) : undefined;
    } catch (error) {
      this.logger?.error({ err: error, id }, "products.get.failed");
      throw new RetrievalFailedError(`Failed to retrieve product ${id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
