import type { Category, CategoryRule } from "@kakeibo/shared";
import type { Repositories } from "../repositories";
import { ConflictError, NotFoundError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";
import fallbackKeywords from "../data/category-keywords.json";

export type KeywordDictionary = Record<string, string[]>;

export const normalizeText = (s: string | null | undefined): string =>
  s ? s.normalize("NFKC").toLowerCase() : "";

export class CategoryService {
  #repos: Repositories;
  #dictionary: KeywordDictionary;

  constructor(repos: Repositories, dictionary: KeywordDictionary = fallbackKeywords) {
    this.#repos = repos;
    this.#dictionary = dictionary;
  }

  list(): Category[] {
    return this.#repos.categories.list();
  }

  find(id: number): Category | null {
    return this.#repos.categories.get(id);
  }

  get(id: number): Category {
    const category = this.#repos.categories.get(id);
    if (!category) {
      throw new NotFoundError("Category", id);
    }
    return category;
  }

  create(name: string): Category {
    const trimmed = name.trim();
    if (this.#repos.categories.findByName(trimmed)) {
      throw new ConflictError(`Category "${trimmed}" already exists`);
    }
    const category = this.#repos.categories.create(trimmed);
    logger.info("Created category", category);
    return category;
  }

  rename(id: number, name: string): Category {
    const trimmed = name.trim();
    this.get(id);
    const existing = this.#repos.categories.findByName(trimmed);
    if (existing && existing.id !== id) {
      throw new ConflictError(`Category "${trimmed}" already exists`);
    }
    this.#repos.categories.update(id, trimmed);
    return { id, name: trimmed };
  }

  delete(id: number): void {
    if (!this.#repos.categories.delete(id)) {
      throw new NotFoundError("Category", id);
    }
    logger.info("Deleted category", { id });
  }

  /**
   * Checks that an optional category id refers to an existing category.
   * Unknown ids are a validation error rather than a 404: they come from a form.
   */
  resolve(categoryId: number | null | undefined): Category | null {
    if (categoryId === null || categoryId === undefined) {
      return null;
    }
    const category = this.#repos.categories.get(categoryId);
    if (!category) {
      throw new ValidationError(`Unknown category ${categoryId}`);
    }
    return category;
  }

  listRules(): CategoryRule[] {
    return this.#repos.categories.listRules();
  }

  createRule(keyword: string, categoryId: number): CategoryRule {
    this.resolve(categoryId);
    const id = this.#repos.categories.createRule(keyword.trim(), categoryId);
    const rule = this.#repos.categories.getRule(id);
    if (!rule) {
      throw new NotFoundError("Category rule", id);
    }
    return rule;
  }

  deleteRule(id: number): void {
    if (!this.#repos.categories.deleteRule(id)) {
      throw new NotFoundError("Category rule", id);
    }
  }

  /**
   * Picks a category for an item description, in order of preference:
   * the user's own choice, stored keyword rules (longest keyword first),
   * then the built-in dictionary for categories that exist by name.
   */
  guess(item: string, memo = "", userChoice: Category | null = null): Category | null {
    if (userChoice) {
      return userChoice;
    }

    const text = normalizeText(`${item ?? ""} ${memo ?? ""}`);

    for (const rule of this.#repos.categories.listRules()) {
      const keyword = normalizeText(rule.keyword);
      if (keyword && text.includes(keyword)) {
        logger.debug("Category matched rule", { item, keyword: rule.keyword });
        return { id: rule.categoryId, name: rule.categoryName };
      }
    }

    for (const [name, words] of Object.entries(this.#dictionary)) {
      for (const word of words) {
        const keyword = normalizeText(word);
        if (keyword && text.includes(keyword)) {
          const found = this.#repos.categories.findByName(name);
          if (found) {
            logger.debug("Category matched dictionary", { item, keyword: word });
            return found;
          }
        }
      }
    }

    return null;
  }
}
