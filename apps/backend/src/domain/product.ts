/**
 * Product domain types
 *
 * A product is written once by ProductCreator and never updated afterwards.
 * Creation is two-phase: the store hands back a ReservedProduct (id assigned,
 * not yet committed) and finalizeProduct() produces the committed record once
 * the image is in place.
 */

export const FALLBACK_TAG = "Magical";
export const MIN_TAGS = 2;
export const MAX_TAGS = 5;

/** Column limits, mirrored by CHECK constraints in the products migration. */
export const FIELD_LIMITS = {
  name: 200,
  image_path: 500,
  price: 100,
  category: 100,
  rarity: 50,
} as const;

/** Suggested to the model; not enforced on extracted values. */
export const RECOMMENDED_CATEGORIES = [
  "Weapons",
  "Potions",
  "Artifacts",
  "Armor",
  "Scrolls",
  "Wands",
  "Rings",
  "Amulets",
  "Books",
  "Ingredients",
] as const;

export const RECOMMENDED_RARITIES = ["Legendary", "Epic", "Rare", "Uncommon", "Common"] as const;

export interface ProductMetadata {
  name: string;
  category: string;
  /** 2..5 entries after normalization */
  tags: string[];
  rarity: string;
  /** Free-form currency string, e.g. "500 Gold Coins" */
  price: string;
}

export interface ProductDraft extends ProductMetadata {
  description: string;
}

export interface ReservedProduct {
  readonly id: number;
  readonly created_at: number;
  readonly draft: Readonly<ProductDraft>;
}

export interface Product {
  id: number;
  name: string;
  description: string;
  /** Web-relative reference to the converted image, e.g. /images/7_20250101_120000.jpg */
  image_path: string;
  price: string;
  category: string;
  tags: string[];
  rarity: string;
  /** Epoch milliseconds */
  created_at: number;
}

export function finalizeProduct(reserved: ReservedProduct, imagePath: string): Readonly<Product> {
  const { draft } = reserved;
  return Object.freeze({
    id: reserved.id,
    name: draft.name,
    description: draft.description,
    image_path: imagePath,
    price: draft.price,
    category: draft.category,
    tags: [...draft.tags],
    rarity: draft.rarity,
    created_at: reserved.created_at,
  });
}

/**
 * Apply the tag policy: one fallback tag when under the minimum, then keep at
 * most MAX_TAGS in their original order.
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const normalized = [...tags];
  if (normalized.length < MIN_TAGS) {
    normalized.push(FALLBACK_TAG);
  }
  return normalized.slice(0, MAX_TAGS);
}
