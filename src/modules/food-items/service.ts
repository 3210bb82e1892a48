import crypto from "node:crypto";
import { z } from "zod";
import type { FoodItemRepository } from "./repository";
import type { FoodItem } from "./types";
import { validateCreate, validateUpdate, type FieldErrors } from "./validation";

export type ValidationFailed = { ok: false; reason: "VALIDATION_FAILED"; errors: FieldErrors };
export type NotFound = { ok: false; reason: "NOT_FOUND" };

export type CreateResult = { ok: true; item: FoodItem } | ValidationFailed;
export type UpdateResult = { ok: true; item: FoodItem } | ValidationFailed | NotFound;

export type FoodItemService = {
  list(): FoodItem[];
  getById(id: string): FoodItem | null;
  create(input: unknown): CreateResult;
  update(id: string, input: unknown): UpdateResult;
  delete(id: string): boolean;
};

export type FoodItemServiceOptions = {
  now?: () => Date;
  newId?: () => string;
};

const IdSchema = z.string().uuid();

/**
 * Storage failures are not caught here; they reach the caller as thrown
 * StorageErrors. Updates are read-merge-write with no version check, so
 * concurrent writers to one id resolve as last write wins.
 */
export function createFoodItemService(
  repo: FoodItemRepository,
  opts: FoodItemServiceOptions = {}
): FoodItemService {
  const now = opts.now ?? (() => new Date());
  const newId = opts.newId ?? (() => crypto.randomUUID());

  // Ids are only ever UUIDs; anything else cannot exist in storage.
  function find(id: string): FoodItem | null {
    if (!IdSchema.safeParse(id).success) return null;
    return repo.getById(id);
  }

  // Strictly after the previous stamp, even within the same millisecond.
  function nextUpdatedAt(previous: string): string {
    const at = Math.max(now().getTime(), Date.parse(previous) + 1);
    return new Date(at).toISOString();
  }

  return {
    list() {
      return repo.listAll().map((item) => ({ ...item }));
    },

    getById(id) {
      const item = find(id);
      return item ? { ...item } : null;
    },

    create(input) {
      const checked = validateCreate(input);
      if (!checked.ok) return { ok: false, reason: "VALIDATION_FAILED", errors: checked.errors };

      const stamp = now().toISOString();
      const created = repo.insert({
        id: newId(),
        name: checked.value.name,
        description: checked.value.description ?? null,
        price: checked.value.price,
        category: checked.value.category,
        dietaryTag: checked.value.dietaryTag ?? null,
        createdAt: stamp,
        updatedAt: stamp,
      });

      return { ok: true, item: { ...created } };
    },

    update(id, input) {
      const existing = find(id);
      if (!existing) return { ok: false, reason: "NOT_FOUND" };

      const checked = validateUpdate(input);
      if (!checked.ok) return { ok: false, reason: "VALIDATION_FAILED", errors: checked.errors };

      const patch = checked.value;
      const merged: FoodItem = {
        ...existing,
        name: patch.name ?? existing.name,
        price: patch.price ?? existing.price,
        category: patch.category ?? existing.category,
        description: patch.description ?? existing.description,
        dietaryTag: patch.dietaryTag ?? existing.dietaryTag,
        updatedAt: nextUpdatedAt(existing.updatedAt),
      };

      return { ok: true, item: { ...repo.replace(merged) } };
    },

    delete(id) {
      if (!find(id)) return false;
      return repo.deleteById(id);
    },
  };
}
