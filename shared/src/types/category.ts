export interface Category {
  id: number;
  name: string;
}

export interface CategoryRule {
  id: number;
  keyword: string;
  categoryId: number;
  categoryName: string;
}

export interface CategoryGuess {
  ok: true;
  suggestedId: number | null;
  suggestedName: string | null;
}
