import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { StorageError } from "../src/lib/errors";
import {
  createMemoryFoodItemRepository,
  type FoodItemRepository,
} from "../src/modules/food-items/repository";
import { createFoodItemService, type FoodItemService } from "../src/modules/food-items/service";
import type { FoodItem } from "../src/modules/food-items/types";
import { countingRepository, sequentialIds, steppingClock, T0, testId, type RepoCalls } from "./helpers";

const margherita = {
  name: "Margherita Pizza",
  price: 16.99,
  category: "MainCourses",
  dietaryTag: "Vegetarian",
};

function mustCreate(service: FoodItemService, input: unknown): FoodItem {
  const out = service.create(input);
  if (!out.ok) throw new Error(`create failed: ${JSON.stringify(out.errors)}`);
  return out.item;
}

describe("FoodItemService", () => {
  let repo: FoodItemRepository;
  let calls: RepoCalls;
  let service: FoodItemService;

  beforeEach(() => {
    ({ repo, calls } = countingRepository(createMemoryFoodItemRepository()));
    service = createFoodItemService(repo, { now: steppingClock(1000), newId: sequentialIds() });
  });

  describe("create", () => {
    it("assigns an id and equal timestamps", () => {
      const item = mustCreate(service, margherita);

      assert.equal(item.id, testId(1));
      assert.equal(item.createdAt, T0);
      assert.equal(item.updatedAt, T0);
      assert.equal(repo.listAll().length, 1);
    });

    it("round-trips through getById", () => {
      const created = mustCreate(service, margherita);

      assert.deepEqual(service.getById(created.id), {
        id: testId(1),
        name: "Margherita Pizza",
        description: null,
        price: 16.99,
        category: "MainCourses",
        dietaryTag: "Vegetarian",
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it("uses a fresh id per item", () => {
      const a = mustCreate(service, margherita);
      const b = mustCreate(service, { name: "Caesar Salad", price: 11, category: "Salads" });
      assert.notEqual(a.id, b.id);
    });

    it("writes nothing when the name is empty", () => {
      const out = service.create({ name: "", price: 10, category: "Appetizers" });

      assert.deepEqual(out, {
        ok: false,
        reason: "VALIDATION_FAILED",
        errors: { name: ["Name cannot be empty or whitespace."] },
      });
      assert.equal(calls.insert, 0);
      assert.equal(repo.listAll().length, 0);
    });

    it("fails on a negative price", () => {
      const out = service.create({ name: "Soup", price: -1, category: "Soups" });
      assert.equal(out.ok, false);
      if (!out.ok) assert.deepEqual(Object.keys(out.errors), ["price"]);
      assert.equal(calls.insert, 0);
    });

    it("fails on an undefined category ordinal", () => {
      const out = service.create({ name: "Soup", price: 4, category: 9 });
      assert.equal(out.ok, false);
      if (!out.ok) assert.deepEqual(Object.keys(out.errors), ["category"]);
    });

    it("lets storage failures propagate", () => {
      const broken: FoodItemRepository = {
        ...createMemoryFoodItemRepository(),
        insert() {
          throw new StorageError("insert", new Error("disk full"));
        },
      };
      const svc = createFoodItemService(broken);

      assert.throws(() => svc.create(margherita), StorageError);
    });
  });

  describe("update", () => {
    it("changes only the price and bumps updatedAt", () => {
      const created = mustCreate(service, { ...margherita, description: "Classic" });
      const out = service.update(created.id, { price: 18.5 });

      assert.equal(out.ok, true);
      if (!out.ok) return;
      assert.deepEqual(out.item, {
        ...created,
        price: 18.5,
        updatedAt: "2026-01-01T00:00:01.000Z",
      });
      assert.ok(Date.parse(out.item.updatedAt) > Date.parse(created.updatedAt));
      assert.deepEqual(service.getById(created.id), out.item);
    });

    it("keeps updatedAt strictly increasing when the clock stands still", () => {
      const frozen = createFoodItemService(repo, { now: () => new Date(T0), newId: sequentialIds() });
      const created = mustCreate(frozen, margherita);

      const first = frozen.update(created.id, { name: "Margherita" });
      const second = frozen.update(created.id, { name: "Margherita DOP" });

      assert.equal(first.ok && first.item.updatedAt, "2026-01-01T00:00:00.001Z");
      assert.equal(second.ok && second.item.updatedAt, "2026-01-01T00:00:00.002Z");
      assert.equal(second.ok && second.item.createdAt, T0);
    });

    it("returns NOT_FOUND for an unknown id without validating or writing", () => {
      const out = service.update(testId(42), { price: -3 });

      assert.deepEqual(out, { ok: false, reason: "NOT_FOUND" });
      assert.equal(calls.replace, 0);
    });

    it("rejects an unknown dietary tag and leaves the item as it was", () => {
      const created = mustCreate(service, margherita);
      const out = service.update(created.id, { dietaryTag: "NotARealTag" });

      assert.equal(out.ok, false);
      if (!out.ok && out.reason === "VALIDATION_FAILED") {
        assert.deepEqual(Object.keys(out.errors), ["dietaryTag"]);
      }
      assert.equal(calls.replace, 0);
      assert.deepEqual(service.getById(created.id), created);
    });

    it("keeps stored values for fields sent as null", () => {
      const created = mustCreate(service, { ...margherita, description: "Wood fired" });
      const out = service.update(created.id, {
        name: null,
        description: null,
        price: 7,
        category: null,
        dietaryTag: null,
      });

      assert.equal(out.ok, true);
      if (!out.ok) return;
      assert.equal(out.item.name, "Margherita Pizza");
      assert.equal(out.item.description, "Wood fired");
      assert.equal(out.item.price, 7);
      assert.equal(out.item.category, "MainCourses");
      assert.equal(out.item.dietaryTag, "Vegetarian");
    });

    it("applies every supplied field", () => {
      const created = mustCreate(service, margherita);
      const out = service.update(created.id, {
        name: " Marinara ",
        description: "No cheese",
        price: 12,
        category: 0,
        dietaryTag: "Vegan",
      });

      assert.equal(out.ok, true);
      if (!out.ok) return;
      assert.deepEqual(out.item, {
        id: created.id,
        name: "Marinara",
        description: "No cheese",
        price: 12,
        category: "Appetizers",
        dietaryTag: "Vegan",
        createdAt: T0,
        updatedAt: "2026-01-01T00:00:01.000Z",
      });
    });
  });

  describe("getById", () => {
    it("returns null for a missing id", () => {
      assert.equal(service.getById(testId(7)), null);
    });

    it("treats a malformed id as absent without asking storage", () => {
      assert.equal(service.getById("not-a-uuid"), null);
      assert.equal(calls.getById, 0);
    });
  });

  describe("list", () => {
    it("returns items in storage order", () => {
      mustCreate(service, margherita);
      mustCreate(service, { name: "Lemonade", price: 3.5, category: "Beverages" });
      mustCreate(service, { name: "Panna Cotta", price: 7, category: "Desserts" });

      assert.deepEqual(
        service.list().map((i) => i.name),
        ["Margherita Pizza", "Lemonade", "Panna Cotta"]
      );
    });

    it("is empty for an empty store", () => {
      assert.deepEqual(service.list(), []);
    });
  });

  describe("delete", () => {
    it("removes an existing item", () => {
      const created = mustCreate(service, margherita);

      assert.equal(service.delete(created.id), true);
      assert.equal(service.getById(created.id), null);
      assert.equal(service.delete(created.id), false);
    });

    it("returns false for unknown and malformed ids", () => {
      assert.equal(service.delete(testId(3)), false);
      assert.equal(service.delete("nope"), false);
      assert.equal(calls.deleteById, 0);
    });
  });
});
