import type { Context } from "hono";
import { ReceiptTotalMismatchError } from "../services/receipt";
import { ConflictError, NotFoundError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";

/**
 * Maps domain errors to their HTTP status. Anything unexpected is logged and
 * answered with a 500.
 */
export const errorResponse = (c: Context, err: unknown, action: string) => {
  if (err instanceof ReceiptTotalMismatchError) {
    return c.json({ error: err.message, ...err.reconciliation }, 422);
  }
  if (err instanceof NotFoundError) {
    return c.json({ error: err.message }, 404);
  }
  if (err instanceof ConflictError) {
    return c.json({ error: err.message }, 409);
  }
  if (err instanceof ValidationError) {
    return c.json({ error: err.message }, 400);
  }
  logger.error(`Error ${action}:`, err);
  return c.json(
    { error: err instanceof Error ? err.message : "An unknown error occurred." },
    500
  );
};
