import { Autocomplete, TextField } from '@mui/material'
import type { Category } from '@kakeibo/shared'

interface Props {
  categories: Category[]
  value: number | null
  onChange: (categoryId: number | null) => void
  label?: string
  placeholder?: string
  size?: 'small' | 'medium'
}

export function CategorySelect({
  categories,
  value,
  onChange,
  label = 'Category',
  placeholder = 'Guess from item',
  size = 'medium',
}: Props) {
  return (
    <Autocomplete
      autoHighlight
      size={size}
      options={categories}
      getOptionLabel={(option) => option.name}
      isOptionEqualToValue={(option, selected) => option.id === selected.id}
      value={categories.find((c) => c.id === value) ?? null}
      onChange={(_, selected) => onChange(selected?.id ?? null)}
      renderInput={(params) => <TextField {...params} label={label} placeholder={placeholder} />}
      sx={{ minWidth: 180 }}
    />
  )
}
