import { useEffect, useState } from 'react'
import { Box, Button, TextField, Typography } from '@mui/material'
import SaveIcon from '@mui/icons-material/Save'
import { formatDate, parseAmount, type Category, type Expense, type ExpenseInput } from '@kakeibo/shared'
import { guessCategory } from '../api'
import { CategorySelect } from './CategorySelect'

interface Props {
  categories: Category[]
  editing: Expense | null
  onSubmit: (input: ExpenseInput) => Promise<void>
  onCancel: () => void
}

export function ExpenseForm({ categories, editing, onSubmit, onCancel }: Props) {
  const [date, setDate] = useState(formatDate(new Date()))
  const [item, setItem] = useState('')
  const [amount, setAmount] = useState('')
  const [categoryId, setCategoryId] = useState<number | null>(null)
  const [suggestion, setSuggestion] = useState<string | null>(null)
  const [saving, setSaving] = useState(false)

  useEffect(() => {
    setDate(editing?.date ?? formatDate(new Date()))
    setItem(editing?.item ?? '')
    setAmount(editing ? String(editing.amount) : '')
    setCategoryId(editing?.categoryId ?? null)
  }, [editing])

  // Preview what the server would pick when no category is chosen
  useEffect(() => {
    if (categoryId !== null || !item.trim()) {
      setSuggestion(null)
      return
    }
    let cancelled = false
    const timer = setTimeout(() => {
      guessCategory(item)
        .then((guess) => {
          if (!cancelled) setSuggestion(guess.suggestedName)
        })
        .catch((err: unknown) => console.warn('Could not guess a category:', err))
    }, 300)
    return () => {
      cancelled = true
      clearTimeout(timer)
    }
  }, [item, categoryId])

  const parsedAmount = parseAmount(amount)
  const valid = date !== '' && item.trim() !== '' && parsedAmount >= 1

  const submit = async () => {
    setSaving(true)
    try {
      await onSubmit({ date, item: item.trim(), amount: parsedAmount, categoryId })
      if (!editing) {
        setItem('')
        setAmount('')
        setCategoryId(null)
      }
    } finally {
      setSaving(false)
    }
  }

  return (
    <Box sx={{ display: 'flex', flexWrap: 'wrap', gap: 2, alignItems: 'center', mb: 2 }}>
      <TextField
        label="Date"
        type="date"
        value={date}
        onChange={(e) => setDate(e.target.value)}
        InputLabelProps={{ shrink: true }}
      />
      <TextField label="Item" value={item} onChange={(e) => setItem(e.target.value)} inputProps={{ maxLength: 100 }} />
      <TextField
        label="Amount (¥)"
        value={amount}
        onChange={(e) => setAmount(e.target.value)}
        inputProps={{ inputMode: 'numeric' }}
      />
      <CategorySelect categories={categories} value={categoryId} onChange={setCategoryId} />
      <Button variant="contained" startIcon={<SaveIcon />} disabled={!valid || saving} onClick={submit}>
        {editing ? 'Update' : 'Add'}
      </Button>
      {editing && (
        <Button variant="outlined" onClick={onCancel}>
          Cancel
        </Button>
      )}
      {suggestion && (
        <Typography variant="body2" color="text.secondary">
          Will be filed under {suggestion}
        </Typography>
      )}
    </Box>
  )
}
