import { useCallback, useEffect, useState } from 'react'
import {
  Box,
  Button,
  IconButton,
  Pagination,
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
import { formatDate, parseAmount, type Income, type Paginated } from '@kakeibo/shared'
import { createIncome, deleteIncome, listIncomes, updateIncome } from '../api'
import { ErrorAlert, messageOf } from '../components/ErrorAlert'
import { MonthNavigator } from '../components/MonthNavigator'
import { formatYen } from '../utils/formatYen'

interface Props {
  month: string
  setMonth: (month: string) => void
}

export function IncomesPage({ month, setMonth }: Props) {
  const [data, setData] = useState<Paginated<Income> | null>(null)
  const [paging, setPaging] = useState({ month, page: 1 })
  const page = paging.month === month ? paging.page : 1
  const [editing, setEditing] = useState<Income | null>(null)
  const [date, setDate] = useState(formatDate(new Date()))
  const [source, setSource] = useState('')
  const [amount, setAmount] = useState('')
  const [note, setNote] = useState('')
  const [error, setError] = useState<string | null>(null)

  const load = useCallback(async () => {
    try {
      setData(await listIncomes(month, page))
    } catch (err) {
      setError(messageOf(err))
    }
  }, [month, page])

  useEffect(() => {
    void load()
  }, [load])

  const startEditing = (income: Income | null) => {
    setEditing(income)
    setDate(income?.date ?? formatDate(new Date()))
    setSource(income?.source ?? '')
    setAmount(income ? String(income.amount) : '')
    setNote(income?.note ?? '')
  }

  const save = async () => {
    const input = { date, source: source.trim(), amount: parseAmount(amount), note: note.trim() }
    try {
      if (editing) {
        await updateIncome(editing.id, input)
      } else {
        await createIncome(input)
      }
      startEditing(null)
      await load()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  const remove = async (id: number) => {
    try {
      await deleteIncome(id)
      await load()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  const valid = date !== '' && source.trim() !== '' && parseAmount(amount) >= 1

  return (
    <Box>
      <ErrorAlert error={error} onClose={() => setError(null)} />
      <Box sx={{ mb: 2 }}>
        <MonthNavigator month={month} onChange={setMonth} />
      </Box>
      <Box sx={{ display: 'flex', flexWrap: 'wrap', gap: 2, alignItems: 'center', mb: 2 }}>
        <TextField
          label="Date"
          type="date"
          value={date}
          onChange={(e) => setDate(e.target.value)}
          InputLabelProps={{ shrink: true }}
        />
        <TextField label="Source" value={source} onChange={(e) => setSource(e.target.value)} inputProps={{ maxLength: 100 }} />
        <TextField
          label="Amount (¥)"
          value={amount}
          onChange={(e) => setAmount(e.target.value)}
          inputProps={{ inputMode: 'numeric' }}
        />
        <TextField label="Note" value={note} onChange={(e) => setNote(e.target.value)} inputProps={{ maxLength: 200 }} />
        <Button variant="contained" startIcon={<SaveIcon />} disabled={!valid} onClick={save}>
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
              <TableCell>Date</TableCell>
              <TableCell>Source</TableCell>
              <TableCell>Note</TableCell>
              <TableCell align="right">Amount</TableCell>
              <TableCell />
            </TableRow>
          </TableHead>
          <TableBody>
            {(data?.items ?? []).map((income) => (
              <TableRow key={income.id}>
                <TableCell>{income.date}</TableCell>
                <TableCell>{income.source}</TableCell>
                <TableCell>{income.note}</TableCell>
                <TableCell align="right">{formatYen(income.amount)}</TableCell>
                <TableCell align="right">
                  <IconButton size="small" aria-label="Edit" onClick={() => startEditing(income)}>
                    <EditIcon fontSize="small" />
                  </IconButton>
                  <IconButton size="small" aria-label="Delete" onClick={() => remove(income.id)}>
                    <DeleteIcon fontSize="small" />
                  </IconButton>
                </TableCell>
              </TableRow>
            ))}
          </TableBody>
        </Table>
      </TableContainer>
      {data && data.totalPages > 1 && (
        <Pagination
          sx={{ mt: 2 }}
          count={data.totalPages}
          page={data.page}
          onChange={(_, value) => setPaging({ month, page: value })}
        />
      )}
    </Box>
  )
}
