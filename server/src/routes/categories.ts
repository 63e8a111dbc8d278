import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { CategoryGuess } from "@kakeibo/shared";
import type { Services } from "../services";
import { errorResponse } from "./errors";
import { idParamSchema } from "./schemas";

const categorySchema = z.object({
  name: z.string().trim().min(1).max(50),
});

const guessSchema = z.object({
  item: z.string().optional().default(""),
  memo: z.string().optional().default(""),
  categoryId: z.number().int().positive().nullable().optional(),
});

export const categoryRoutes = (services: Services) =>
  new Hono()
    .get("/", (c) => c.json(services.categories.list(), 200))
    .post("/guess", zValidator("json", guessSchema), (c) => {
      const { item, memo, categoryId } = c.req.valid("json");
      try {
        // A stale id from the form is ignored rather than rejected
        const userChoice = categoryId ? services.categories.find(categoryId) : null;
        const category = services.categories.guess(item, memo, userChoice);
        const body: CategoryGuess = {
          ok: true,
          suggestedId: category?.id ?? null,
          suggestedName: category?.name ?? null,
        };
        return c.json(body, 200);
      } catch (err) {
        return errorResponse(c, err, "guessing category");
      }
    })
    .post("/", zValidator("json", categorySchema), (c) => {
      try {
        return c.json(services.categories.create(c.req.valid("json").name), 201);
      } catch (err) {
        return errorResponse(c, err, "creating category");
      }
    })
    .put(
      "/:id",
      zValidator("param", idParamSchema),
      zValidator("json", categorySchema),
      (c) => {
        try {
          const category = services.categories.rename(
            c.req.valid("param").id,
            c.req.valid("json").name
          );
          return c.json(category, 200);
        } catch (err) {
          return errorResponse(c, err, "renaming category");
        }
      }
    )
    .delete("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        services.categories.delete(c.req.valid("param").id);
        return c.json({ success: true }, 200);
      } catch (err) {
        return errorResponse(c, err, "deleting category");
      }
    });

const ruleSchema = z.object({
  keyword: z.string().trim().min(1).max(100),
  categoryId: z.number().int().positive(),
});

export const categoryRuleRoutes = (services: Services) =>
  new Hono()
    .get("/", (c) => c.json(services.categories.listRules(), 200))
    .post("/", zValidator("json", ruleSchema), (c) => {
      const { keyword, categoryId } = c.req.valid("json");
      try {
        return c.json(services.categories.createRule(keyword, categoryId), 201);
      } catch (err) {
        return errorResponse(c, err, "creating category rule");
      }
    })
    .delete("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        services.categories.deleteRule(c.req.valid("param").id);
        return c.json({ success: true }, 200);
      } catch (err) {
        return errorResponse(c, err, "deleting category rule");
      }
    });
