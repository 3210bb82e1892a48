import type { Db } from "../../db/connection";
import { StorageError } from "../../lib/errors";
import { toDietaryTag, toFoodCategory, type FoodItem } from "./types";

/**
 * Storage seam for food items. Implementations must give per-row atomicity
 * for each call; nothing beyond that is assumed by the service.
 */
export type FoodItemRepository = {
  listAll(): FoodItem[];
  getById(id: string): FoodItem | null;
  insert(item: FoodItem): FoodItem;
  replace(item: FoodItem): FoodItem;
  /** True when a row was found and removed. */
  deleteById(id: string): boolean;
};

type FoodItemRow = {
  id: string;
  name: string;
  description: string | null;
  price: number;
  category: string;
  dietaryTag: string | null;
  createdAt: string;
  updatedAt: string;
};

function fromRow(row: FoodItemRow): FoodItem {
  const category = toFoodCategory(row.category);
  if (!category) {
    throw new StorageError("read", new Error(`Unknown category "${row.category}" on ${row.id}`));
  }

  let dietaryTag: FoodItem["dietaryTag"] = null;
  if (row.dietaryTag !== null) {
    dietaryTag = toDietaryTag(row.dietaryTag);
    if (!dietaryTag) {
      throw new StorageError("read", new Error(`Unknown dietary tag "${row.dietaryTag}" on ${row.id}`));
    }
  }

  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: row.price,
    category,
    dietaryTag,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, err);
  }
}

const COLUMNS = "id, name, description, price, category, dietaryTag, createdAt, updatedAt";

export function createSqliteFoodItemRepository(db: Db): FoodItemRepository {
  const listStmt = db.prepare(`SELECT ${COLUMNS} FROM food_items ORDER BY createdAt ASC, rowid ASC`);
  const getStmt = db.prepare(`SELECT ${COLUMNS} FROM food_items WHERE id = ?`);
  const insertStmt = db.prepare(
    `INSERT INTO food_items (${COLUMNS})
     VALUES (@id, @name, @description, @price, @category, @dietaryTag, @createdAt, @updatedAt)`
  );
  const replaceStmt = db.prepare(
    `UPDATE food_items
     SET name = @name,
         description = @description,
         price = @price,
         category = @category,
         dietaryTag = @dietaryTag,
         updatedAt = @updatedAt
     WHERE id = @id`
  );
  const deleteStmt = db.prepare("DELETE FROM food_items WHERE id = ?");

  return {
    listAll() {
      return guard("listAll", () => (listStmt.all() as FoodItemRow[]).map(fromRow));
    },

    getById(id) {
      return guard("getById", () => {
        const row = getStmt.get(id) as FoodItemRow | undefined;
        return row ? fromRow(row) : null;
      });
    },

    insert(item) {
      return guard("insert", () => {
        insertStmt.run(item);
        return { ...item };
      });
    },

    // createdAt is never rewritten
    replace(item) {
      return guard("replace", () => {
        const info = replaceStmt.run({
          id: item.id,
          name: item.name,
          description: item.description,
          price: item.price,
          category: item.category,
          dietaryTag: item.dietaryTag,
          updatedAt: item.updatedAt,
        });
        if (info.changes === 0) throw new Error(`FOOD_ITEM_NOT_FOUND: ${item.id}`);
        const row = getStmt.get(item.id) as FoodItemRow | undefined;
        if (!row) throw new Error(`FOOD_ITEM_NOT_FOUND: ${item.id}`);
        return fromRow(row);
      });
    },

    deleteById(id) {
      return guard("deleteById", () => deleteStmt.run(id).changes > 0);
    },
  };
}

/** Process-local store; listAll returns insertion order. */
export function createMemoryFoodItemRepository(seed: FoodItem[] = []): FoodItemRepository {
  const items = new Map<string, FoodItem>();
  for (const item of seed) items.set(item.id, { ...item });

  return {
    listAll() {
      return Array.from(items.values(), (item) => ({ ...item }));
    },

    getById(id) {
      const item = items.get(id);
      return item ? { ...item } : null;
    },

    insert(item) {
      if (items.has(item.id)) {
        throw new StorageError("insert", new Error(`Duplicate id ${item.id}`));
      }
      items.set(item.id, { ...item });
      return { ...item };
    },

    replace(item) {
      const existing = items.get(item.id);
      if (!existing) {
        throw new StorageError("replace", new Error(`FOOD_ITEM_NOT_FOUND: ${item.id}`));
      }
      const next = { ...item, createdAt: existing.createdAt };
      items.set(item.id, next);
      return { ...next };
    },

    deleteById(id) {
      return items.delete(id);
    },
  };
}
