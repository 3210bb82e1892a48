// Declaration order defines the ordinal accepted at the API boundary.
export const FOOD_CATEGORIES = [
  "Appetizers",
  "MainCourses",
  "Desserts",
  "Beverages",
  "Salads",
  "Soups",
] as const;

export type FoodCategory = (typeof FOOD_CATEGORIES)[number];

export const DIETARY_TAGS = ["Vegetarian", "Vegan", "GlutenFree", "DairyFree", "Spicy"] as const;

export type DietaryTag = (typeof DIETARY_TAGS)[number];

export type FoodItem = {
  id: string;
  name: string;
  description: string | null;
  price: number;
  category: FoodCategory;
  dietaryTag: DietaryTag | null;
  createdAt: string; // ISO-8601 UTC
  updatedAt: string; // ISO-8601 UTC
};

export function toFoodCategory(raw: unknown): FoodCategory | null {
  return FOOD_CATEGORIES.find((c) => c === raw) ?? null;
}

export function toDietaryTag(raw: unknown): DietaryTag | null {
  return DIETARY_TAGS.find((t) => t === raw) ?? null;
}
