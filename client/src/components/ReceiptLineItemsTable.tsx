import {
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
import AddIcon from '@mui/icons-material/Add'
import DeleteIcon from '@mui/icons-material/Delete'
import { parseAmount, type Category } from '@kakeibo/shared'
import { formatYen } from '../utils/formatYen'
import { CategorySelect } from './CategorySelect'

export type LineItemDraft = {
  item: string
  amount: string
  categoryId: number | null
}

export const emptyLineItem = (): LineItemDraft => ({ item: '', amount: '', categoryId: null })

type Props = {
  lineItems: LineItemDraft[]
  onChange: (lineItems: LineItemDraft[]) => void
  categories: Category[]
  total: number
}

export function ReceiptLineItemsTable({ lineItems, onChange, categories, total }: Props) {
  const update = (index: number, patch: Partial<LineItemDraft>) =>
    onChange(lineItems.map((li, i) => (i === index ? { ...li, ...patch } : li)))

  const lineItemTotal = lineItems.reduce((sum, li) => sum + parseAmount(li.amount), 0)

  return (
    <TableContainer component={Paper} sx={{ mb: 2, maxWidth: '100%', overflowX: 'auto' }}>
      <Table size="small">
        <TableHead>
          <TableRow>
            <TableCell>Item</TableCell>
            <TableCell>Category</TableCell>
            <TableCell align="right">Amount</TableCell>
            <TableCell />
          </TableRow>
        </TableHead>
        <TableBody>
          {lineItems.map((li, idx) => (
            <TableRow key={idx}>
              <TableCell>
                <TextField
                  size="small"
                  value={li.item}
                  placeholder="Item"
                  onChange={(e) => update(idx, { item: e.target.value })}
                  inputProps={{ maxLength: 100 }}
                />
              </TableCell>
              <TableCell>
                <CategorySelect
                  size="small"
                  categories={categories}
                  value={li.categoryId}
                  onChange={(categoryId) => update(idx, { categoryId })}
                />
              </TableCell>
              <TableCell align="right">
                <TextField
                  size="small"
                  value={li.amount}
                  placeholder="0"
                  onChange={(e) => update(idx, { amount: e.target.value })}
                  inputProps={{ inputMode: 'numeric', style: { textAlign: 'right' } }}
                  sx={{ width: 120 }}
                />
              </TableCell>
              <TableCell>
                <IconButton
                  size="small"
                  aria-label="Remove line"
                  disabled={lineItems.length === 1}
                  onClick={() => onChange(lineItems.filter((_, i) => i !== idx))}
                >
                  <DeleteIcon fontSize="small" />
                </IconButton>
              </TableCell>
            </TableRow>
          ))}
          <TableRow>
            <TableCell colSpan={4}>
              <Button size="small" startIcon={<AddIcon />} onClick={() => onChange([...lineItems, emptyLineItem()])}>
                Add line
              </Button>
            </TableCell>
          </TableRow>
          <TableRow>
            <TableCell colSpan={2} sx={{ fontWeight: 600 }} align="right">Line Items</TableCell>
            <TableCell align="right" sx={{ fontWeight: 600 }}>{formatYen(lineItemTotal)}</TableCell>
            <TableCell />
          </TableRow>
          <TableRow>
            <TableCell colSpan={2} sx={{ fontWeight: 700 }} align="right">Receipt Total</TableCell>
            <TableCell align="right" sx={{ fontWeight: 700 }}>{formatYen(total)}</TableCell>
            <TableCell />
          </TableRow>
        </TableBody>
      </Table>
    </TableContainer>
  )
}
