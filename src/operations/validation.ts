import { z } from "zod";
import type { TaskLimits } from "../lib/types.ts";
import type { Validation } from "./types.ts";

export const DEFAULT_LIMITS: TaskLimits = {
  titleMaxLength: 100,
  descriptionMaxLength: 500,
};

export const taskIdSchema = z
  .number({ invalid_type_error: "Task ID must be an integer" })
  .int("Task ID must be an integer")
  .positive("Task ID must be positive");

// Limits count code points, so an emoji is one character.
function codePointLength(text: string): number {
  return [...text].length;
}

export function titleSchema(maxLength: number) {
  return z
    .string({ invalid_type_error: "Title must be text" })
    .trim()
    .min(1, "Title cannot be empty")
    .refine((title) => codePointLength(title) <= maxLength, {
      message: `Title cannot exceed ${maxLength} characters`,
    });
}

export function descriptionSchema(maxLength: number) {
  return z
    .string({ invalid_type_error: "Description must be text" })
    .trim()
    .refine((description) => codePointLength(description) <= maxLength, {
      message: `Description cannot exceed ${maxLength} characters`,
    });
}

export const markAsSchema = z
  .boolean({ invalid_type_error: "Completion state must be true or false" })
  .optional();

export const statusFilterSchema = z.enum(["complete", "incomplete"]);

/** Reports the first issue only, matching how the menu shows one error line. */
export function check<T>(schema: z.ZodType<T>, value: unknown): Validation<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, error: parsed.error.issues[0]?.message ?? "Invalid input" };
}
