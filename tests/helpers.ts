import type { FoodItemRepository } from "../src/modules/food-items/repository";

export const T0 = "2026-01-01T00:00:00.000Z";

/** Each call returns a time `stepMs` after the previous one, starting at T0. */
export function steppingClock(stepMs = 1000) {
  let calls = 0;
  return () => new Date(Date.parse(T0) + stepMs * calls++);
}

export function testId(n: number) {
  return `00000000-0000-4000-8000-${String(n).padStart(12, "0")}`;
}

export function sequentialIds() {
  let n = 0;
  return () => testId(++n);
}

export type RepoCalls = Record<keyof FoodItemRepository, number>;

/** Wraps a repository and counts calls per operation. */
export function countingRepository(inner: FoodItemRepository) {
  const calls: RepoCalls = { listAll: 0, getById: 0, insert: 0, replace: 0, deleteById: 0 };

  const repo: FoodItemRepository = {
    listAll() {
      calls.listAll++;
      return inner.listAll();
    },
    getById(id) {
      calls.getById++;
      return inner.getById(id);
    },
    insert(item) {
      calls.insert++;
      return inner.insert(item);
    },
    replace(item) {
      calls.replace++;
      return inner.replace(item);
    },
    deleteById(id) {
      calls.deleteById++;
      return inner.deleteById(id);
    },
  };

  return { repo, calls };
}
