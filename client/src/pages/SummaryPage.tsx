import { useEffect, useState } from 'react'
import {
  Box,
  Card,
  CardContent,
  LinearProgress,
  Pagination,
  Paper,
  Table,
  TableBody,
  TableCell,
  TableContainer,
  TableHead,
  TableRow,
  TextField,
  Typography,
} from '@mui/material'
import type { MonthSummary, MonthlySummaryResponse } from '@kakeibo/shared'
import { getMonthSummary, getMonthlySummary } from '../api'
import { ErrorAlert, messageOf } from '../components/ErrorAlert'
import { MonthNavigator } from '../components/MonthNavigator'
import { formatYen } from '../utils/formatYen'

interface Props {
  month: string
  setMonth: (month: string) => void
}

function Figure({ label, value }: { label: string; value: number }) {
  return (
    <Card variant="outlined" sx={{ flex: 1, minWidth: 160 }}>
      <CardContent>
        <Typography variant="body2" color="text.secondary">{label}</Typography>
        <Typography variant="h5" color={value < 0 ? 'error' : undefined}>{formatYen(value)}</Typography>
      </CardContent>
    </Card>
  )
}

export function SummaryPage({ month, setMonth }: Props) {
  const [summary, setSummary] = useState<MonthSummary | null>(null)
  const [monthly, setMonthly] = useState<MonthlySummaryResponse | null>(null)
  const [filters, setFilters] = useState({ start_date: '', end_date: '', q: '', page: 1 })
  const [error, setError] = useState<string | null>(null)

  useEffect(() => {
    getMonthSummary(month)
      .then(setSummary)
      .catch((err: unknown) => setError(messageOf(err)))
  }, [month])

  useEffect(() => {
    getMonthlySummary(filters)
      .then(setMonthly)
      .catch((err: unknown) => setError(messageOf(err)))
  }, [filters])

  const setFilter = (key: 'start_date' | 'end_date' | 'q', value: string) =>
    setFilters((prev) => ({ ...prev, [key]: value, page: 1 }))

  return (
    <Box>
      <ErrorAlert error={error} onClose={() => setError(null)} />
      <Box sx={{ mb: 2 }}>
        <MonthNavigator month={month} onChange={setMonth} />
      </Box>
      {summary && (
        <>
          <Box sx={{ display: 'flex', flexWrap: 'wrap', gap: 2, mb: 3 }}>
            <Figure label="Income" value={summary.incomeTotal} />
            <Figure label="Expenses" value={summary.expenseTotal} />
            <Figure label="Net" value={summary.net} />
            {summary.overallBudget !== null && (
              <Figure label="Left of overall budget" value={summary.overallBudget - summary.expenseTotal} />
            )}
          </Box>
          <Typography variant="h6" sx={{ mb: 1 }}>By category</Typography>
          <TableContainer component={Paper} sx={{ mb: 3 }}>
            <Table size="small">
              <TableHead>
                <TableRow>
                  <TableCell>Category</TableCell>
                  <TableCell align="right">Spent</TableCell>
                  <TableCell align="right">Budget</TableCell>
                  <TableCell align="right">Remaining</TableCell>
                  <TableCell sx={{ width: 160 }} />
                </TableRow>
              </TableHead>
              <TableBody>
                {summary.budgetProgress.map((row) => (
                  <TableRow key={row.categoryId ?? 'none'}>
                    <TableCell>{row.name}</TableCell>
                    <TableCell align="right">{formatYen(row.spent)}</TableCell>
                    <TableCell align="right">{row.budget === null ? '—' : formatYen(row.budget)}</TableCell>
                    <TableCell align="right">{row.remaining === null ? '—' : formatYen(row.remaining)}</TableCell>
                    <TableCell>
                      {row.budget !== null && (
                        <LinearProgress
                          variant="determinate"
                          color={row.spent > row.budget ? 'error' : 'primary'}
                          value={Math.min(100, (row.spent / row.budget) * 100)}
                        />
                      )}
                    </TableCell>
                  </TableRow>
                ))}
              </TableBody>
            </Table>
          </TableContainer>
        </>
      )}
      <Typography variant="h6" sx={{ mb: 1 }}>Month by month</Typography>
      <Box sx={{ display: 'flex', flexWrap: 'wrap', gap: 2, mb: 2 }}>
        <TextField
          size="small"
          type="date"
          label="From"
          value={filters.start_date}
          onChange={(e) => setFilter('start_date', e.target.value)}
          InputLabelProps={{ shrink: true }}
        />
        <TextField
          size="small"
          type="date"
          label="To"
          value={filters.end_date}
          onChange={(e) => setFilter('end_date', e.target.value)}
          InputLabelProps={{ shrink: true }}
        />
        <TextField size="small" label="Item contains" value={filters.q} onChange={(e) => setFilter('q', e.target.value)} />
      </Box>
      {monthly && (
        <TableContainer component={Paper}>
          <Table size="small">
            <TableHead>
              <TableRow>
                <TableCell>Month</TableCell>
                <TableCell align="right">Entries</TableCell>
                <TableCell align="right">Expenses</TableCell>
                <TableCell align="right">Income</TableCell>
                <TableCell align="right">Net</TableCell>
              </TableRow>
            </TableHead>
            <TableBody>
              {monthly.rows.map((row) => (
                <TableRow key={row.month} hover onClick={() => setMonth(row.month)} sx={{ cursor: 'pointer' }}>
                  <TableCell>{row.month}</TableCell>
                  <TableCell align="right">{row.count}</TableCell>
                  <TableCell align="right">{formatYen(row.total)}</TableCell>
                  <TableCell align="right">{formatYen(row.incomeTotal)}</TableCell>
                  <TableCell align="right">{formatYen(row.net)}</TableCell>
                </TableRow>
              ))}
              <TableRow>
                <TableCell colSpan={2} sx={{ fontWeight: 700 }} align="right">Total</TableCell>
                <TableCell align="right" sx={{ fontWeight: 700 }}>{formatYen(monthly.grandTotal)}</TableCell>
                <TableCell colSpan={2} />
              </TableRow>
            </TableBody>
          </Table>
        </TableContainer>
      )}
      {monthly && monthly.totalPages > 1 && (
        <Pagination
          sx={{ mt: 2 }}
          count={monthly.totalPages}
          page={monthly.page}
          onChange={(_, page) => setFilters((prev) => ({ ...prev, page }))}
        />
      )}
    </Box>
  )
}
