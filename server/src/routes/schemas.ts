import { z } from "zod";
import {
  EXPENSE_SORTS,
  MAX_AMOUNT,
  isValidDate,
  parseAmount,
  type ExpenseSort,
} from "@kakeibo/shared";

// Query strings send "" for untouched form fields
const blankToUndefined = (v: unknown) => (v === "" ? undefined : v);

export const optionalQuery = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(blankToUndefined, schema.optional());

export const dateSchema = z
  .string()
  .refine(isValidDate, "Date must be a valid YYYY-MM-DD date");

export const amountSchema = z
  .number()
  .int("Amount must be a whole number")
  .min(1, "Amount must be 1 or more")
  .max(MAX_AMOUNT, `Amount must be at most ${MAX_AMOUNT}`);

// Accepts "1,280" as well as 1280
export const lenientAmountSchema = z
  .union([z.number(), z.string()])
  .transform(parseAmount)
  .pipe(amountSchema);

export const monthSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, "Month must be a valid YYYY-MM month");

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const pageSchema = optionalQuery(z.coerce.number().int());

export const perPageSchema = z
  .string()
  .optional()
  .transform((str) => {
    const n = str ? parseInt(str, 10) : NaN;
    return Number.isNaN(n) ? undefined : n;
  });

export const sortSchema = z
  .string()
  .optional()
  .transform((str): ExpenseSort | undefined =>
    EXPENSE_SORTS.find((sort) => sort === str)
  );

export const categoryIdSchema = z.number().int().positive().nullable().optional();

export const jsonField = <T extends z.ZodTypeAny>(schema: T) =>
  z
    .string()
    .transform((str, ctx): unknown => {
      try {
        return JSON.parse(str);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid JSON" });
        return z.NEVER;
      }
    })
    .pipe(schema);
