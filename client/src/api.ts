import type {
  ApiError,
  Budget,
  BudgetInput,
  Category,
  CategoryGuess,
  CategoryRule,
  ExpenseInput,
  Expense,
  ExpenseListResponse,
  Income,
  IncomeInput,
  MonthSummary,
  MonthlySummaryResponse,
  Paginated,
  Receipt,
  ReceiptLineItemInput,
  ReceiptReconciliation,
} from '@kakeibo/shared'

// The Vite dev server proxies /api to the back end
const API_BASE = '/api'

export class ApiRequestError extends Error {
  readonly status: number
  readonly body: unknown

  constructor(status: number, message: string, body: unknown) {
    super(message)
    this.name = 'ApiRequestError'
    this.status = status
    this.body = body
  }
}

const isApiError = (body: unknown): body is ApiError =>
  typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string'

// Route errors carry { error: string }; validation errors carry zod issues
export function errorMessage(body: unknown, status: number): string {
  if (isApiError(body)) return body.error
  if (typeof body === 'object' && body !== null && 'error' in body) {
    const error = body.error
    if (typeof error === 'object' && error !== null && 'issues' in error && Array.isArray(error.issues)) {
      const issue: unknown = error.issues[0]
      if (typeof issue === 'object' && issue !== null && 'message' in issue && typeof issue.message === 'string') {
        return issue.message
      }
    }
  }
  return `HTTP ${status}`
}

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`, {
    ...init,
    headers: {
      // FormData bodies set their own multipart boundary
      ...(typeof init?.body === 'string' ? { 'Content-Type': 'application/json' } : {}),
      ...(init?.headers ?? {}),
    },
  })

  if (!res.ok) {
    const body: unknown = await res.json().catch(() => null)
    throw new ApiRequestError(res.status, errorMessage(body, res.status), body)
  }
  return res.json()
}

const query = (params: Record<string, string | number | undefined>) => {
  const search = new URLSearchParams()
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== '') search.set(key, String(value))
  }
  const str = search.toString()
  return str ? `?${str}` : ''
}

const json = (method: string, body: unknown): RequestInit => ({
  method,
  body: JSON.stringify(body),
})

/* expenses */

export type ExpenseListParams = {
  month?: string
  view?: 'all'
  page?: number
  per_page?: number
  start_date?: string
  end_date?: string
  q?: string
  category?: number
  sort?: string
}

export const listExpenses = (params: ExpenseListParams) =>
  request<ExpenseListResponse>(`/expenses${query(params)}`)

export const createExpense = (input: ExpenseInput) =>
  request<Expense>('/expenses', json('POST', input))

export const updateExpense = (id: number, input: ExpenseInput) =>
  request<Expense>(`/expenses/${id}`, json('PUT', input))

export const deleteExpense = (id: number) =>
  request<{ month: string }>(`/expenses/${id}`, { method: 'DELETE' })

export const bulkDeleteExpenses = (ids: number[]) =>
  request<{ deleted: number }>('/expenses/bulk-delete', json('POST', { ids }))

/* incomes */

export const listIncomes = (month?: string, page?: number) =>
  request<Paginated<Income>>(`/incomes${query({ month, page })}`)

export const createIncome = (input: IncomeInput) =>
  request<Income>('/incomes', json('POST', input))

export const updateIncome = (id: number, input: IncomeInput) =>
  request<Income>(`/incomes/${id}`, json('PUT', input))

export const deleteIncome = (id: number) =>
  request<{ success: true }>(`/incomes/${id}`, { method: 'DELETE' })

/* budgets */

export const listBudgets = (month?: string) =>
  request<{ month: string; items: Budget[] }>(`/budgets${query({ month })}`)

export const createBudget = (input: BudgetInput) =>
  request<Budget>('/budgets', json('POST', input))

export const updateBudget = (id: number, input: BudgetInput) =>
  request<Budget>(`/budgets/${id}`, json('PUT', input))

export const deleteBudget = (id: number) =>
  request<{ month: string }>(`/budgets/${id}`, { method: 'DELETE' })

/* categories */

export const listCategories = () => request<Category[]>('/categories')

export const createCategory = (name: string) =>
  request<Category>('/categories', json('POST', { name }))

export const renameCategory = (id: number, name: string) =>
  request<Category>(`/categories/${id}`, json('PUT', { name }))

export const deleteCategory = (id: number) =>
  request<{ success: true }>(`/categories/${id}`, { method: 'DELETE' })

export const guessCategory = (item: string, categoryId?: number | null) =>
  request<CategoryGuess>('/categories/guess', json('POST', { item, categoryId }))

export const listCategoryRules = () => request<CategoryRule[]>('/category-rules')

export const createCategoryRule = (keyword: string, categoryId: number) =>
  request<CategoryRule>('/category-rules', json('POST', { keyword, categoryId }))

export const deleteCategoryRule = (id: number) =>
  request<{ success: true }>(`/category-rules/${id}`, { method: 'DELETE' })

/* receipts */

export const listReceipts = (month?: string) =>
  request<Receipt[]>(`/receipts${query({ month })}`)

export const registerReceipt = (form: FormData) =>
  request<Receipt>('/receipts', { method: 'POST', body: form })

export const checkReceipt = (total: number, lineItems: ReceiptLineItemInput[], signal?: AbortSignal) =>
  request<ReceiptReconciliation>('/receipts/check', { ...json('POST', { total, lineItems }), signal })

export const deleteReceipt = (id: number) =>
  request<{ success: true }>(`/receipts/${id}`, { method: 'DELETE' })

export const receiptImageUrl = (id: number) => `${API_BASE}/receipts/${id}/image`

/* summary */

export const getMonthlySummary = (params: { start_date?: string; end_date?: string; q?: string; page?: number }) =>
  request<MonthlySummaryResponse>(`/summary/monthly${query(params)}`)

export const getMonthSummary = (month?: string) =>
  request<MonthSummary>(`/summary/month${query({ month })}`)
