import { useCallback, useEffect, useState } from 'react'
import {
  Box,
  Button,
  IconButton,
  List,
  ListItem,
  ListItemText,
  Paper,
  TextField,
  Typography,
} from '@mui/material'
import AddIcon from '@mui/icons-material/Add'
import DeleteIcon from '@mui/icons-material/Delete'
import EditIcon from '@mui/icons-material/Edit'
import CheckIcon from '@mui/icons-material/Check'
import type { Category, CategoryRule } from '@kakeibo/shared'
import {
  createCategory,
  createCategoryRule,
  deleteCategory,
  deleteCategoryRule,
  listCategoryRules,
  renameCategory,
} from '../api'
import { CategorySelect } from '../components/CategorySelect'
import { ErrorAlert, messageOf } from '../components/ErrorAlert'

interface Props {
  categories: Category[]
  reloadCategories: () => Promise<void>
}

export function CategoriesPage({ categories, reloadCategories }: Props) {
  const [rules, setRules] = useState<CategoryRule[]>([])
  const [name, setName] = useState('')
  const [renaming, setRenaming] = useState<{ id: number; name: string } | null>(null)
  const [keyword, setKeyword] = useState('')
  const [ruleCategoryId, setRuleCategoryId] = useState<number | null>(null)
  const [error, setError] = useState<string | null>(null)

  const loadRules = useCallback(async () => {
    try {
      setRules(await listCategoryRules())
    } catch (err) {
      setError(messageOf(err))
    }
  }, [])

  useEffect(() => {
    void loadRules()
  }, [loadRules])

  // Wraps an action so that failures land in the error banner
  const run = (action: () => Promise<unknown>) => async () => {
    try {
      await action()
    } catch (err) {
      setError(messageOf(err))
    }
  }

  const add = run(async () => {
    await createCategory(name.trim())
    setName('')
    await reloadCategories()
  })

  const saveRename = run(async () => {
    if (!renaming) return
    await renameCategory(renaming.id, renaming.name.trim())
    setRenaming(null)
    await reloadCategories()
  })

  const addRule = run(async () => {
    if (ruleCategoryId === null) return
    await createCategoryRule(keyword.trim(), ruleCategoryId)
    setKeyword('')
    await loadRules()
  })

  return (
    <Box sx={{ display: 'flex', flexDirection: { xs: 'column', md: 'row' }, gap: 4 }}>
      <Box sx={{ flex: 1 }}>
        <ErrorAlert error={error} onClose={() => setError(null)} />
        <Typography variant="h6">Categories</Typography>
        <Box sx={{ display: 'flex', gap: 2, my: 2 }}>
          <TextField size="small" label="New category" value={name} onChange={(e) => setName(e.target.value)} inputProps={{ maxLength: 50 }} />
          <Button variant="contained" startIcon={<AddIcon />} disabled={!name.trim()} onClick={add}>
            Add
          </Button>
        </Box>
        <Paper>
          <List dense>
            {categories.map((category) => (
              <ListItem
                key={category.id}
                secondaryAction={
                  renaming?.id === category.id ? (
                    <IconButton edge="end" aria-label="Save" onClick={saveRename}>
                      <CheckIcon />
                    </IconButton>
                  ) : (
                    <>
                      <IconButton aria-label="Rename" onClick={() => setRenaming({ id: category.id, name: category.name })}>
                        <EditIcon fontSize="small" />
                      </IconButton>
                      <IconButton
                        edge="end"
                        aria-label="Delete"
                        onClick={run(async () => {
                          await deleteCategory(category.id)
                          await Promise.all([reloadCategories(), loadRules()])
                        })}
                      >
                        <DeleteIcon fontSize="small" />
                      </IconButton>
                    </>
                  )
                }
              >
                {renaming?.id === category.id ? (
                  <TextField
                    size="small"
                    value={renaming.name}
                    onChange={(e) => setRenaming({ id: category.id, name: e.target.value })}
                    inputProps={{ maxLength: 50 }}
                  />
                ) : (
                  <ListItemText primary={category.name} />
                )}
              </ListItem>
            ))}
          </List>
        </Paper>
      </Box>
      <Box sx={{ flex: 1 }}>
        <Typography variant="h6">Keyword rules</Typography>
        <Typography variant="body2" color="text.secondary">
          Items containing a keyword are filed under its category. Longer keywords win.
        </Typography>
        <Box sx={{ display: 'flex', flexWrap: 'wrap', gap: 2, my: 2 }}>
          <TextField size="small" label="Keyword" value={keyword} onChange={(e) => setKeyword(e.target.value)} inputProps={{ maxLength: 100 }} />
          <CategorySelect size="small" categories={categories} value={ruleCategoryId} onChange={setRuleCategoryId} placeholder="" />
          <Button
            variant="contained"
            startIcon={<AddIcon />}
            disabled={!keyword.trim() || ruleCategoryId === null}
            onClick={addRule}
          >
            Add rule
          </Button>
        </Box>
        <Paper>
          <List dense>
            {rules.map((rule) => (
              <ListItem
                key={rule.id}
                secondaryAction={
                  <IconButton
                    edge="end"
                    aria-label="Delete"
                    onClick={run(async () => {
                      await deleteCategoryRule(rule.id)
                      await loadRules()
                    })}
                  >
                    <DeleteIcon fontSize="small" />
                  </IconButton>
                }
              >
                <ListItemText primary={rule.keyword} secondary={rule.categoryName} />
              </ListItem>
            ))}
          </List>
        </Paper>
      </Box>
    </Box>
  )
}
