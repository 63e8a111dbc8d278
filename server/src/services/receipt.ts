import {
  monthBounds,
  reconcileReceipt,
  type Receipt,
  type ReceiptLineItemInput,
  type ReceiptReconciliation,
} from "@kakeibo/shared";
import type { Repositories } from "../repositories";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { CategoryService } from "./category";
import type { StorageService } from "./storage";

export type ReceiptSubmission = {
  date: string;
  storeName?: string;
  total: number;
  image: File;
  lineItems: ReceiptLineItemInput[];
};

export class ReceiptService {
  #repos: Repositories;
  #categories: CategoryService;
  #storage: StorageService;

  constructor(
    repos: Repositories,
    categories: CategoryService,
    storage: StorageService
  ) {
    this.#repos = repos;
    this.#categories = categories;
    this.#storage = storage;
  }

  check(total: number, lineItems: ReceiptLineItemInput[]): ReceiptReconciliation {
    return reconcileReceipt(total, lineItems);
  }

  /**
   * Stores a receipt with its line items and records one expense per line.
   * The declared total has to equal the sum of the line items; otherwise
   * nothing is written.
   */
  async register(submission: ReceiptSubmission): Promise<Receipt> {
    logger.debug("register receipt called", {
      date: submission.date,
      total: submission.total,
      lineItems: submission.lineItems.length,
      fileType: submission.image.type,
      fileSize: submission.image.size,
    });

    const reconciliation = this.check(submission.total, submission.lineItems);
    if (!reconciliation.matches) {
      logger.warn(
        `Line items total ${reconciliation.lineItemTotal} does not match declared total ${reconciliation.declaredTotal}`
      );
      throw new ReceiptTotalMismatchError(reconciliation);
    }

    const chosen = submission.lineItems.map((li) =>
      this.#categories.resolve(li.categoryId)
    );
    const storeName = submission.storeName?.trim() || null;

    let imageKey: string;
    try {
      imageKey = await this.#storage.saveFile(
        storeName ?? "receipt",
        submission.date,
        submission.image
      );
      logger.info("Receipt image stored", { imageKey });
    } catch (err) {
      logger.error("Failed to store the receipt image:", err);
      throw new ReceiptImageStorageError();
    }

    let receiptId: number;
    try {
      receiptId = this.#repos.transaction(() => {
        const id = this.#repos.receipts.create({
          date: submission.date,
          storeName,
          total: submission.total,
          imagePath: imageKey,
          imageType: submission.image.type,
        });
        submission.lineItems.forEach((li, index) => {
          const item = li.item.trim();
          const categoryId = this.#categories.guess(item, "", chosen[index])?.id ?? null;
          const expenseId = this.#repos.expenses.create({
            date: submission.date,
            item,
            amount: li.amount,
            categoryId,
            receiptId: id,
          });
          this.#repos.receipts.addItem(id, {
            position: index + 1,
            item,
            amount: li.amount,
            categoryId,
            expenseId,
          });
        });
        return id;
      });
    } catch (err) {
      logger.error("Failed to save the receipt, removing its image:", err);
      await this.#removeImage(imageKey);
      throw err;
    }

    logger.info("Registered receipt", {
      receiptId,
      lineItems: submission.lineItems.length,
    });
    return this.get(receiptId);
  }

  get(id: number): Receipt {
    const receipt = this.#repos.receipts.get(id);
    if (!receipt) {
      throw new NotFoundError("Receipt", id);
    }
    return receipt;
  }

  list(month?: string): Receipt[] {
    return this.#repos.receipts.list(month ? monthBounds(month) : null);
  }

  async image(id: number): Promise<{ data: Buffer; type: string }> {
    const image = this.#repos.receipts.image(id);
    if (!image) {
      throw new NotFoundError("Receipt", id);
    }
    try {
      return { data: await this.#storage.readFile(image.path), type: image.type };
    } catch (err) {
      logger.error("Failed to read the receipt image:", err);
      throw new ReceiptImageStorageError();
    }
  }

  async delete(id: number): Promise<void> {
    const image = this.#repos.receipts.image(id);
    if (!image) {
      throw new NotFoundError("Receipt", id);
    }
    // Line items and the expenses created from them go with the receipt
    this.#repos.transaction(() => this.#repos.receipts.delete(id));
    await this.#removeImage(image.path);
    logger.info("Deleted receipt", { id });
  }

  // The receipt row is already settled here; a file left behind is only logged
  async #removeImage(key: string): Promise<void> {
    try {
      await this.#storage.deleteFile(key);
    } catch (err) {
      logger.error(`Failed to remove receipt image ${key}:`, err);
    }
  }
}

export class ReceiptTotalMismatchError extends Error {
  readonly reconciliation: ReceiptReconciliation;

  constructor(reconciliation: ReceiptReconciliation) {
    super(
      `Line items add up to ${reconciliation.lineItemTotal} but the receipt total is ${reconciliation.declaredTotal}`
    );
    this.name = "ReceiptTotalMismatchError";
    this.reconciliation = reconciliation;
  }
}

export class ReceiptImageStorageError extends Error {
  constructor() {
    super("Failed to store the receipt image");
    this.name = "ReceiptImageStorageError";
  }
}
