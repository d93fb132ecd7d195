import { z } from "zod";

export const positiveId = z.coerce.number().int().positive();

// A blank form field is missing, not zero.
const formNumber = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.coerce.number(),
);

export const homeQuery = z.object({
  t: positiveId.optional().catch(undefined),
  edit: z.enum(["0", "1"]).optional().catch(undefined),
});

// Numbers are range-checked by the set logger; here they only need to parse.
export const logSetBody = z.object({
  template_id: positiveId,
  workout: z.string().optional(),
  exercise: z.string(),
  weight: formNumber,
  reps: formNumber,
});

export const addExerciseBody = z.object({
  template_id: positiveId,
  exercise_name: z.string(),
});

export const removeExerciseBody = z.object({
  template_id: positiveId,
  exercise_id: positiveId,
});

export const templateIdBody = z.object({
  template_id: positiveId,
});
