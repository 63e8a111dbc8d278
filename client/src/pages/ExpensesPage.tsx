import { useCallback, useEffect, useState } from 'react'
import {
  Box,
  Button,
  Checkbox,
  FormControlLabel,
  IconButton,
  MenuItem,
  Pagination,
  Switch,
  Table,
  TableBody,
  TableCell,
  TableContainer,
  TableHead,
  TableRow,
  TextField,
  Paper,
  Typography,
} from '@mui/material'
import DeleteIcon from '@mui/icons-material/Delete'
import EditIcon from '@mui/icons-material/Edit'
import {
  EXPENSE_SORTS,
  sumAmounts,
  type Category,
  type Expense,
  type ExpenseInput,
  type ExpenseListResponse,
} from '@kakeibo/shared'
import { bulkDeleteExpenses, createExpense, deleteExpense, listExpenses, updateExpense } from '../api'
import { CategorySelect } from '../components/CategorySelect'
import { ErrorAlert, messageOf } from '../components/ErrorAlert'
import { ExpenseForm } from '../components/ExpenseForm'
import { MonthNavigator } from '../components/MonthNavigator'
import { formatYen } from '../utils/formatYen'

const SORT_LABELS: Record<(typeof EXPENSE_SORTS)[number], string> = {
  date: 'Date ↑',
  '-date': 'Date ↓',
  amount: 'Amount ↑',
  '-amount': 'Amount ↓',
  item: 'Item A→Z',
  '-item': 'Item Z→A',
  category: 'Category A→Z',
  '-category': 'Category Z→A',
}

interface Props {
  month: string
  setMonth: (month: string) => void
  categories: Category[]
}

export function ExpensesPage({ month, setMonth, categories }: Props) {
  const [data, setData] = useState<ExpenseListResponse | null>(null)
  const [q, setQ] = useState('')
  const [category, setCategory] = useState<number | null>(null)
  const [sort, setSort] = useState('-date')
  const [showAll, setShowAll] = useState(false)
  // Changing any filter starts over from the first page
  const filterKey = JSON.stringify([month, q, sort, category, showAll])
  const [paging, setPaging] = useState({ key: filterKey, page: 1 })
  const page = paging.key === filterKey ? paging.page : 1
  const [selected, setSelected] = useState<number[]>([])
  const [editing, setEditing] = useState<Expense | null>(null)
  const [error, setError] = useState<string | null>(null)

  const load = useCallback(async () => {
    try {
      const result = await listExpenses({
        month,
        page,
        q,
        sort,
        category: category ?? undefined,
        view: showAll ? 'all' : undefined,
      })
      setData(result)
      setSelected([])
    } catch (err) {
      setError(messageOf(err))
    }
  }, [month, page, q, sort, category, showAll])

  useEffect(() => {
    void load()
  }, [load])

  const save = async (input: ExpenseInput) => {
    try {
      if (editing) {
        await updateExpense(editing.id, input)
        setEditing(null)
      } else {
        await createExpense(input)
      }
      await load()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  const remove = async (id: number) => {
    try {
      await deleteExpense(id)
      await load()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  const removeSelected = async () => {
    try {
      await bulkDeleteExpenses(selected)
      await load()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  const toggle = (id: number) =>
    setSelected((prev) => (prev.includes(id) ? prev.filter((x) => x !== id) : [...prev, id]))

  const items = data?.items ?? []

  return (
    <Box>
      <ErrorAlert error={error} onClose={() => setError(null)} />
      <Box sx={{ display: 'flex', alignItems: 'center', justifyContent: 'space-between', mb: 2 }}>
        <MonthNavigator month={month} onChange={setMonth} />
        <FormControlLabel
          control={<Switch checked={showAll} onChange={(e) => setShowAll(e.target.checked)} />}
          label="All months"
        />
      </Box>
      <ExpenseForm categories={categories} editing={editing} onSubmit={save} onCancel={() => setEditing(null)} />
      <Box sx={{ display: 'flex', flexWrap: 'wrap', gap: 2, mb: 2 }}>
        <TextField size="small" label="Search" value={q} onChange={(e) => setQ(e.target.value)} />
        <CategorySelect
          size="small"
          categories={categories}
          value={category}
          onChange={setCategory}
          label="Filter by category"
          placeholder="Any"
        />
        <TextField select size="small" label="Sort" value={sort} onChange={(e) => setSort(e.target.value)}>
          {EXPENSE_SORTS.map((s) => (
            <MenuItem key={s} value={s}>
              {SORT_LABELS[s]}
            </MenuItem>
          ))}
        </TextField>
        <Button
          variant="outlined"
          color="error"
          startIcon={<DeleteIcon />}
          disabled={selected.length === 0}
          onClick={removeSelected}
        >
          Delete selected ({selected.length})
        </Button>
      </Box>
      <TableContainer component={Paper}>
        <Table size="small">
          <TableHead>
            <TableRow>
              <TableCell padding="checkbox" />
              <TableCell>Date</TableCell>
              <TableCell>Item</TableCell>
              <TableCell>Category</TableCell>
              <TableCell align="right">Amount</TableCell>
              <TableCell />
            </TableRow>
          </TableHead>
          <TableBody>
            {items.map((expense) => (
              <TableRow key={expense.id} selected={selected.includes(expense.id)}>
                <TableCell padding="checkbox">
                  <Checkbox checked={selected.includes(expense.id)} onChange={() => toggle(expense.id)} />
                </TableCell>
                <TableCell>{expense.date}</TableCell>
                <TableCell>
                  {expense.item}
                  {expense.receiptId !== null && (
                    <Typography component="span" variant="caption" color="text.secondary" sx={{ ml: 1 }}>
                      receipt #{expense.receiptId}
                    </Typography>
                  )}
                </TableCell>
                <TableCell>{expense.categoryName ?? '—'}</TableCell>
                <TableCell align="right">{formatYen(expense.amount)}</TableCell>
                <TableCell align="right">
                  <IconButton size="small" aria-label="Edit" onClick={() => setEditing(expense)}>
                    <EditIcon fontSize="small" />
                  </IconButton>
                  <IconButton size="small" aria-label="Delete" onClick={() => remove(expense.id)}>
                    <DeleteIcon fontSize="small" />
                  </IconButton>
                </TableCell>
              </TableRow>
            ))}
            <TableRow>
              <TableCell colSpan={4} sx={{ fontWeight: 700 }} align="right">
                Shown total ({data?.totalCount ?? 0} entries)
              </TableCell>
              <TableCell align="right" sx={{ fontWeight: 700 }}>
                {formatYen(sumAmounts(items))}
              </TableCell>
              <TableCell />
            </TableRow>
          </TableBody>
        </Table>
      </TableContainer>
      {data && data.totalPages > 1 && (
        <Pagination
          sx={{ mt: 2 }}
          count={data.totalPages}
          page={data.page}
          onChange={(_, value) => setPaging({ key: filterKey, page: value })}
        />
      )}
    </Box>
  )
}
