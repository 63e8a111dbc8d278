import { Fragment, useCallback, useEffect, useState } from 'react'
import {
  Box,
  Collapse,
  Divider,
  IconButton,
  Link,
  Paper,
  Table,
  TableBody,
  TableCell,
  TableContainer,
  TableHead,
  TableRow,
  Typography,
} from '@mui/material'
import DeleteIcon from '@mui/icons-material/Delete'
import KeyboardArrowDownIcon from '@mui/icons-material/KeyboardArrowDown'
import KeyboardArrowUpIcon from '@mui/icons-material/KeyboardArrowUp'
import type { Category, Receipt } from '@kakeibo/shared'
import { deleteReceipt, listReceipts, receiptImageUrl } from '../api'
import { ErrorAlert, messageOf } from '../components/ErrorAlert'
import { MonthNavigator } from '../components/MonthNavigator'
import { ReceiptForm } from '../components/ReceiptForm'
import { formatYen } from '../utils/formatYen'

interface Props {
  month: string
  setMonth: (month: string) => void
  categories: Category[]
}

export function ReceiptsPage({ month, setMonth, categories }: Props) {
  const [receipts, setReceipts] = useState<Receipt[]>([])
  const [open, setOpen] = useState<{ [id: number]: boolean }>({})
  const [error, setError] = useState<string | null>(null)

  const load = useCallback(async () => {
    try {
      setReceipts(await listReceipts(month))
    } catch (err) {
      setError(messageOf(err))
    }
  }, [month])

  useEffect(() => {
    void load()
  }, [load])

  const remove = async (id: number) => {
    try {
      await deleteReceipt(id)
      await load()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  return (
    <Box sx={{ display: 'flex', flexDirection: { xs: 'column', md: 'row' }, gap: 4 }}>
      <ReceiptForm categories={categories} onRegistered={() => void load()} />
      <Divider orientation="vertical" flexItem sx={{ display: { xs: 'none', md: 'block' } }} />
      <Box sx={{ flex: 1, minWidth: 0 }}>
        <ErrorAlert error={error} onClose={() => setError(null)} />
        <Box sx={{ mb: 2 }}>
          <MonthNavigator month={month} onChange={setMonth} />
        </Box>
        {receipts.length === 0 && <Typography color="text.secondary">No receipts this month.</Typography>}
        {receipts.length > 0 && (
          <TableContainer component={Paper}>
            <Table size="small">
              <TableHead>
                <TableRow>
                  <TableCell />
                  <TableCell>Date</TableCell>
                  <TableCell>Store</TableCell>
                  <TableCell align="right">Total</TableCell>
                  <TableCell />
                </TableRow>
              </TableHead>
              <TableBody>
                {receipts.map((receipt) => (
                  <Fragment key={receipt.id}>
                    <TableRow>
                      <TableCell>
                        <IconButton
                          size="small"
                          onClick={() => setOpen((prev) => ({ ...prev, [receipt.id]: !prev[receipt.id] }))}
                        >
                          {open[receipt.id] ? <KeyboardArrowUpIcon /> : <KeyboardArrowDownIcon />}
                        </IconButton>
                      </TableCell>
                      <TableCell>{receipt.date}</TableCell>
                      <TableCell>
                        <Link href={receiptImageUrl(receipt.id)} target="_blank" rel="noreferrer">
                          {receipt.storeName ?? 'Receipt'}
                        </Link>
                      </TableCell>
                      <TableCell align="right">{formatYen(receipt.total)}</TableCell>
                      <TableCell align="right">
                        <IconButton size="small" aria-label="Delete" onClick={() => remove(receipt.id)}>
                          <DeleteIcon fontSize="small" />
                        </IconButton>
                      </TableCell>
                    </TableRow>
                    <TableRow>
                      <TableCell style={{ paddingBottom: 0, paddingTop: 0 }} colSpan={5}>
                        <Collapse in={open[receipt.id]} timeout="auto" unmountOnExit>
                          <Box sx={{ margin: 1 }}>
                            <Table size="small" padding="none">
                              <TableBody>
                                {receipt.lineItems.map((li) => (
                                  <TableRow key={li.position} sx={{ '&:last-child td, &:last-child th': { border: 0 } }}>
                                    <TableCell>{li.item}</TableCell>
                                    <TableCell>{li.categoryName ?? '—'}</TableCell>
                                    <TableCell align="right">{formatYen(li.amount)}</TableCell>
                                  </TableRow>
                                ))}
                              </TableBody>
                            </Table>
                          </Box>
                        </Collapse>
                      </TableCell>
                    </TableRow>
                  </Fragment>
                ))}
              </TableBody>
            </Table>
          </TableContainer>
        )}
      </Box>
    </Box>
  )
}
