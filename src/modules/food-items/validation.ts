import { z } from "zod";
import { DIETARY_TAGS, FOOD_CATEGORIES } from "./types";

export const NAME_MAX_LENGTH = 100;
export const DESCRIPTION_MAX_LENGTH = 1000;

/** Field name to the ordered list of messages for that field. */
export type FieldErrors = Record<string, string[]>;

export type Validation<T> = { ok: true; value: T } | { ok: false; errors: FieldErrors };

/**
 * Accepts a closed enumeration member by tag (case-insensitive) or by its
 * ordinal in `values`. Anything else, out-of-range ordinals included, is an
 * issue on the field.
 */
function enumeration<T extends string>(values: readonly T[], label: string) {
  const allowed = `${label} must be one of: ${values.join(", ")}.`;

  return z.unknown().transform((raw, ctx): T => {
    if (raw === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} is required.` });
      return z.NEVER;
    }

    if (typeof raw === "string") {
      const key = raw.trim().toLowerCase();
      const byTag = values.find((v) => v.toLowerCase() === key);
      if (byTag) return byTag;
    }

    if (typeof raw === "number" && Number.isInteger(raw)) {
      const byOrdinal = values[raw];
      if (raw >= 0 && byOrdinal !== undefined) return byOrdinal;
    }

    ctx.addIssue({ code: z.ZodIssueCode.custom, message: allowed });
    return z.NEVER;
  });
}

const name = z
  .string({ required_error: "Name is required.", invalid_type_error: "Name must be a string." })
  .trim()
  .min(1, "Name cannot be empty or whitespace.")
  .max(NAME_MAX_LENGTH, `Name must be at most ${NAME_MAX_LENGTH} characters.`);

const description = z
  .string({ invalid_type_error: "Description must be a string." })
  .max(DESCRIPTION_MAX_LENGTH, `Description must be at most ${DESCRIPTION_MAX_LENGTH} characters.`);

const price = z
  .number({ required_error: "Price is required.", invalid_type_error: "Price must be a number." })
  .finite("Price must be a finite number.")
  .gt(0, "Price must be greater than 0.");

const category = enumeration(FOOD_CATEGORIES, "Category");
const dietaryTag = enumeration(DIETARY_TAGS, "DietaryTag");

// On update a JSON null carries no value: the field is treated as omitted.
function omittable<S extends z.ZodTypeAny>(schema: S) {
  return z.preprocess((raw) => raw ?? undefined, schema.optional());
}

const bodyIssues = {
  required_error: "Request body must be a JSON object.",
  invalid_type_error: "Request body must be a JSON object.",
};

const CreateFoodItemSchema = z.object(
  {
    name,
    description: description.nullable().optional(),
    price,
    category,
    dietaryTag: dietaryTag.nullable().optional(),
  },
  bodyIssues
);

// Every field optional: an omitted or null key leaves the stored value as it is.
const UpdateFoodItemSchema = z.object(
  {
    name: omittable(name),
    description: omittable(description),
    price: omittable(price),
    category: omittable(category),
    dietaryTag: omittable(dietaryTag),
  },
  bodyIssues
);

export type CreateFoodItemInput = z.output<typeof CreateFoodItemSchema>;
export type UpdateFoodItemInput = z.output<typeof UpdateFoodItemSchema>;

function toFieldErrors(error: z.ZodError): FieldErrors {
  const flat = error.flatten();
  const out: FieldErrors = {};

  if (flat.formErrors.length > 0) out.body = flat.formErrors;
  for (const [field, messages] of Object.entries(flat.fieldErrors)) {
    if (messages && messages.length > 0) out[field] = messages;
  }

  return out;
}

/** Full check of a create request; every field is evaluated. */
export function validateCreate(input: unknown): Validation<CreateFoodItemInput> {
  const parsed = CreateFoodItemSchema.safeParse(input);
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, errors: toFieldErrors(parsed.error) };
}

/** Checks only the fields present on an update request. */
export function validateUpdate(input: unknown): Validation<UpdateFoodItemInput> {
  const parsed = UpdateFoodItemSchema.safeParse(input);
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, errors: toFieldErrors(parsed.error) };
}
