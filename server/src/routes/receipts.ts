import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { Services } from "../services";
import { RECEIPT_IMAGE_TYPES } from "../services/storage/helpers";
import { errorResponse } from "./errors";
import {
  dateSchema,
  idParamSchema,
  jsonField,
  lenientAmountSchema,
  monthSchema,
  optionalQuery,
} from "./schemas";

const lineItemSchema = z.object({
  item: z.string().trim().min(1).max(100),
  amount: lenientAmountSchema,
  categoryId: z.number().int().positive().nullable().optional(),
});

export const MAX_LINE_ITEMS = 500;

const lineItemsSchema = z
  .array(lineItemSchema)
  .min(1, "A receipt needs at least one line item")
  .max(MAX_LINE_ITEMS, `A receipt takes at most ${MAX_LINE_ITEMS} line items`);

const imageSchema = (maxFileSize: number) =>
  z
    .instanceof(File)
    .refine(
      (f) => f.size <= maxFileSize,
      `Max file size is ${maxFileSize / 1024 / 1024}MB`
    )
    .refine(
      (f) => RECEIPT_IMAGE_TYPES.some((type) => type === f.type),
      "Receipt image must be a JPEG, PNG, WebP or HEIC file"
    );

export const receiptRoutes = (services: Services, maxFileSize: number) =>
  new Hono()
    .get(
      "/",
      zValidator(
        "query",
        z.object({
          month: optionalQuery(monthSchema),
        })
      ),
      (c) => c.json(services.receipts.list(c.req.valid("query").month), 200)
    )
    .post(
      "/check",
      zValidator(
        "json",
        z.object({
          total: lenientAmountSchema,
          lineItems: z.array(lineItemSchema).max(MAX_LINE_ITEMS),
        })
      ),
      (c) => {
        const { total, lineItems } = c.req.valid("json");
        return c.json(services.receipts.check(total, lineItems), 200);
      }
    )
    .post(
      "/",
      zValidator(
        "form",
        z.object({
          date: dateSchema,
          storeName: z.string().max(100).optional(),
          total: lenientAmountSchema,
          image: imageSchema(maxFileSize),
          lineItems: jsonField(lineItemsSchema),
        })
      ),
      async (c) => {
        const submission = c.req.valid("form");
        try {
          const receipt = await services.receipts.register(submission);
          return c.json(receipt, 201);
        } catch (err) {
          return errorResponse(c, err, "registering receipt");
        }
      }
    )
    .get("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        return c.json(services.receipts.get(c.req.valid("param").id), 200);
      } catch (err) {
        return errorResponse(c, err, "getting receipt");
      }
    })
    .get("/:id/image", zValidator("param", idParamSchema), async (c) => {
      try {
        const { data, type } = await services.receipts.image(c.req.valid("param").id);
        return new Response(new Uint8Array(data), {
          status: 200,
          headers: { "content-type": type },
        });
      } catch (err) {
        return errorResponse(c, err, "reading receipt image");
      }
    })
    .delete("/:id", zValidator("param", idParamSchema), async (c) => {
      try {
        await services.receipts.delete(c.req.valid("param").id);
        return c.json({ success: true }, 200);
      } catch (err) {
        return errorResponse(c, err, "deleting receipt");
      }
    });
