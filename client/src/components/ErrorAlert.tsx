import { Alert } from '@mui/material'

export function ErrorAlert({ error, onClose }: { error: string | null; onClose: () => void }) {
  if (!error) return null
  return (
    <Alert severity="error" onClose={onClose} sx={{ mb: 2, whiteSpace: 'pre-line' }}>
      {error}
    </Alert>
  )
}

export const messageOf = (err: unknown) => (err instanceof Error ? err.message : 'Unknown error')
