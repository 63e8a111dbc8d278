import { useCallback, useEffect, useState } from 'react'
import {
  Box,
  Button,
  IconButton,
  Paper,
  Table,
  TableBody,
  TableCell,
  TableContainer,
  TableHead,
  TableRow,
  TextField,
} from '@mui/material'
import DeleteIcon from '@mui/icons-material/Delete'
import EditIcon from '@mui/icons-material/Edit'
import SaveIcon from '@mui/icons-material/Save'
import { parseAmount, type Budget, type Category } from '@kakeibo/shared'
import { createBudget, deleteBudget, listBudgets, updateBudget } from '../api'
import { CategorySelect } from '../components/CategorySelect'
import { ErrorAlert, messageOf } from '../components/ErrorAlert'
import { MonthNavigator } from '../components/MonthNavigator'
import { formatYen } from '../utils/formatYen'

interface Props {
  month: string
  setMonth: (month: string) => void
  categories: Category[]
}

export function BudgetsPage({ month, setMonth, categories }: Props) {
  const [budgets, setBudgets] = useState<Budget[]>([])
  const [editing, setEditing] = useState<Budget | null>(null)
  const [categoryId, setCategoryId] = useState<number | null>(null)
  const [amount, setAmount] = useState('')
  const [error, setError] = useState<string | null>(null)

  const load = useCallback(async () => {
    try {
      setBudgets((await listBudgets(month)).items)
    } catch (err) {
      setError(messageOf(err))
    }
  }, [month])

  useEffect(() => {
    void load()
  }, [load])

  const startEditing = (budget: Budget | null) => {
    setEditing(budget)
    setCategoryId(budget?.categoryId ?? null)
    setAmount(budget ? String(budget.amount) : '')
  }

  const save = async () => {
    const input = { month: editing?.month ?? month, categoryId, amount: parseAmount(amount) }
    try {
      if (editing) {
        await updateBudget(editing.id, input)
      } else {
        await createBudget(input)
      }
      startEditing(null)
      await load()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  const remove = async (id: number) => {
    try {
      await deleteBudget(id)
      await load()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  return (
    <Box>
      <ErrorAlert error={error} onClose={() => setError(null)} />
      <Box sx={{ mb: 2 }}>
        <MonthNavigator month={month} onChange={setMonth} />
      </Box>
      <Box sx={{ display: 'flex', flexWrap: 'wrap', gap: 2, alignItems: 'center', mb: 2 }}>
        <CategorySelect
          categories={categories}
          value={categoryId}
          onChange={setCategoryId}
          placeholder="Overall"
        />
        <TextField
          label="Budget (¥)"
          value={amount}
          onChange={(e) => setAmount(e.target.value)}
          inputProps={{ inputMode: 'numeric' }}
        />
        <Button variant="contained" startIcon={<SaveIcon />} disabled={parseAmount(amount) < 1} onClick={save}>
          {editing ? 'Update' : 'Add'}
        </Button>
        {editing && (
          <Button variant="outlined" onClick={() => startEditing(null)}>
            Cancel
          </Button>
        )}
      </Box>
      <TableContainer component={Paper}>
        <Table size="small">
          <TableHead>
            <TableRow>
              <TableCell>Category</TableCell>
              <TableCell align="right">Budget</TableCell>
              <TableCell />
            </TableRow>
          </TableHead>
          <TableBody>
            {budgets.map((budget) => (
              <TableRow key={budget.id}>
                <TableCell sx={{ fontWeight: budget.categoryId === null ? 700 : undefined }}>
                  {budget.categoryName ?? 'Overall'}
                </TableCell>
                <TableCell align="right">{formatYen(budget.amount)}</TableCell>
                <TableCell align="right">
                  <IconButton size="small" aria-label="Edit" onClick={() => startEditing(budget)}>
                    <EditIcon fontSize="small" />
                  </IconButton>
                  <IconButton size="small" aria-label="Delete" onClick={() => remove(budget.id)}>
                    <DeleteIcon fontSize="small" />
                  </IconButton>
                </TableCell>
              </TableRow>
            ))}
          </TableBody>
        </Table>
      </TableContainer>
    </Box>
  )
}
