import { useEffect, useState, type ChangeEvent } from 'react'
import { Alert, Box, Button, TextField } from '@mui/material'
import PhotoCameraIcon from '@mui/icons-material/PhotoCamera'
import ReceiptLongIcon from '@mui/icons-material/ReceiptLong'
import InsertPhotoIcon from '@mui/icons-material/InsertPhoto'
import {
  formatDate,
  parseAmount,
  type Category,
  type Receipt,
  type ReceiptReconciliation,
} from '@kakeibo/shared'
import { checkReceipt, registerReceipt } from '../api'
import { generateReceiptFeedback } from '../utils/generateReceiptFeedback'
import { formatLineItems } from '../utils/formatLineItems'
import { messageOf } from './ErrorAlert'
import { ReceiptLineItemsTable, emptyLineItem, type LineItemDraft } from './ReceiptLineItemsTable'

interface Props {
  categories: Category[]
  onRegistered: (receipt: Receipt) => void
}

export function ReceiptForm({ categories, onRegistered }: Props) {
  const [date, setDate] = useState(formatDate(new Date()))
  const [storeName, setStoreName] = useState('')
  const [total, setTotal] = useState('')
  const [lineItems, setLineItems] = useState<LineItemDraft[]>([emptyLineItem()])
  const [file, setFile] = useState<File | null>(null)
  const [previewUrl, setPreviewUrl] = useState<string | null>(null)
  const [check, setCheck] = useState<ReceiptReconciliation | null>(null)
  const [result, setResult] = useState<{ ok: boolean; message: string } | null>(null)
  const [saving, setSaving] = useState(false)

  const filled = lineItems.filter((li) => li.item.trim() !== '')
  const payload = filled.map((li) => ({
    item: li.item.trim(),
    amount: parseAmount(li.amount),
    categoryId: li.categoryId,
  }))
  const declaredTotal = parseAmount(total)

  // Ask the server whether the line items add up while the user types
  const checkKey = JSON.stringify([declaredTotal, payload])
  useEffect(() => {
    if (declaredTotal < 1 || payload.length === 0) {
      setCheck(null)
      return
    }
    const controller = new AbortController()
    const timer = setTimeout(() => {
      checkReceipt(declaredTotal, payload, controller.signal)
        .then(setCheck)
        .catch((err: unknown) => {
          if (!controller.signal.aborted) console.warn('Could not check the receipt totals:', err)
        })
    }, 300)
    return () => {
      clearTimeout(timer)
      controller.abort()
    }
    // payload is rebuilt on every render; checkKey stands in for its content
  }, [checkKey])

  useEffect(() => {
    if (!previewUrl) return
    return () => URL.revokeObjectURL(previewUrl)
  }, [previewUrl])

  const handleFileChange = (e: ChangeEvent<HTMLInputElement>) => {
    const selected = e.target.files?.[0] ?? null
    setFile(selected)
    setPreviewUrl(selected && selected.type.startsWith('image/') ? URL.createObjectURL(selected) : null)
  }

  const reset = () => {
    setStoreName('')
    setTotal('')
    setLineItems([emptyLineItem()])
    setFile(null)
    setPreviewUrl(null)
    setCheck(null)
  }

  const submit = async () => {
    if (!file) return
    const form = new FormData()
    form.append('date', date)
    if (storeName.trim()) form.append('storeName', storeName.trim())
    form.append('total', String(declaredTotal))
    form.append('image', file)
    form.append('lineItems', JSON.stringify(payload))

    setSaving(true)
    try {
      const receipt = await registerReceipt(form)
      setResult({
        ok: true,
        message: `✓ Receipt saved with ${receipt.lineItems.length} expenses:\n${formatLineItems(receipt.lineItems)}`,
      })
      reset()
      onRegistered(receipt)
    } catch (err) {
      setResult({ ok: false, message: `✗ Failed to save receipt: ${messageOf(err)}` })
    } finally {
      setSaving(false)
    }
  }

  const canSubmit = Boolean(file) && check?.matches === true && date !== '' && !saving

  return (
    <Box sx={{ flex: 1, minWidth: 0 }}>
      <Box sx={{ display: 'flex', flexWrap: 'wrap', gap: 2, mb: 2 }}>
        <TextField
          label="Date"
          type="date"
          value={date}
          onChange={(e) => setDate(e.target.value)}
          InputLabelProps={{ shrink: true }}
        />
        <TextField label="Store" value={storeName} onChange={(e) => setStoreName(e.target.value)} inputProps={{ maxLength: 100 }} />
        <TextField
          label="Total (¥)"
          value={total}
          onChange={(e) => setTotal(e.target.value)}
          inputProps={{ inputMode: 'numeric' }}
        />
      </Box>
      <Box sx={{ mb: 2, display: 'flex', alignItems: 'center' }}>
        <TextField
          label="Receipt Image"
          value={file ? file.name : ''}
          disabled
          InputProps={{ readOnly: true }}
          sx={{ mr: 2, flex: 1 }}
        />
        <Button variant="contained" component="label" startIcon={<PhotoCameraIcon />} sx={{ minWidth: 150 }}>
          Take Photo
          <input
            type="file"
            accept="image/jpeg,image/png,image/webp,image/heic"
            capture="environment"
            hidden
            onChange={handleFileChange}
          />
        </Button>
      </Box>
      <Box
        sx={{
          width: '100%',
          height: 240,
          mb: 2,
          border: '1px solid #555',
          borderRadius: 2,
          display: 'flex',
          alignItems: 'center',
          justifyContent: 'center',
          background: '#222',
          overflow: 'hidden',
        }}
      >
        {previewUrl ? (
          <img src={previewUrl} alt="Preview" style={{ maxWidth: '100%', maxHeight: '100%', objectFit: 'contain' }} />
        ) : (
          <InsertPhotoIcon sx={{ fontSize: 80, color: '#666' }} />
        )}
      </Box>
      <ReceiptLineItemsTable
        lineItems={lineItems}
        onChange={setLineItems}
        categories={categories}
        total={declaredTotal}
      />
      {check && (
        <Alert severity={check.matches ? 'success' : 'warning'} sx={{ mb: 2, whiteSpace: 'pre-line' }}>
          {generateReceiptFeedback(check, payload.length)}
        </Alert>
      )}
      <Button variant="contained" onClick={submit} startIcon={<ReceiptLongIcon />} disabled={!canSubmit}>
        Save Receipt
      </Button>
      {result && (
        <Alert
          severity={result.ok ? 'success' : 'error'}
          onClose={() => setResult(null)}
          sx={{ mt: 2, whiteSpace: 'pre-line' }}
        >
          {result.message}
        </Alert>
      )}
    </Box>
  )
}
