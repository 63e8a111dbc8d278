import { Box, IconButton, Typography } from '@mui/material'
import ChevronLeftIcon from '@mui/icons-material/ChevronLeft'
import ChevronRightIcon from '@mui/icons-material/ChevronRight'
import { addMonth } from '@kakeibo/shared'

interface Props {
  month: string
  onChange: (month: string) => void
}

export function MonthNavigator({ month, onChange }: Props) {
  return (
    <Box sx={{ display: 'flex', alignItems: 'center', gap: 1 }}>
      <IconButton aria-label="Previous month" onClick={() => onChange(addMonth(month, -1))}>
        <ChevronLeftIcon />
      </IconButton>
      <Typography variant="h6" sx={{ minWidth: 100, textAlign: 'center' }}>
        {month}
      </Typography>
      <IconButton aria-label="Next month" onClick={() => onChange(addMonth(month, 1))}>
        <ChevronRightIcon />
      </IconButton>
    </Box>
  )
}
