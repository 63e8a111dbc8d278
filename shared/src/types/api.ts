export type ApiError = {
  error: string;
};

export type Paginated<T> = {
  items: T[];
  page: number;
  totalPages: number;
};
