import { useCallback, useEffect, useState } from 'react'
import { ThemeProvider, createTheme } from '@mui/material/styles'
import { Box, Container, CssBaseline, Tab, Tabs, Typography } from '@mui/material'
import { currentMonth, type Category } from '@kakeibo/shared'
import { listCategories } from './api'
import { BudgetsPage } from './pages/BudgetsPage'
import { CategoriesPage } from './pages/CategoriesPage'
import { ExpensesPage } from './pages/ExpensesPage'
import { IncomesPage } from './pages/IncomesPage'
import { ReceiptsPage } from './pages/ReceiptsPage'
import { SummaryPage } from './pages/SummaryPage'

const theme = createTheme({ palette: { mode: 'dark' } })
const tabs = ['Expenses', 'Receipts', 'Income', 'Budgets', 'Summary', 'Categories'] as const
type TabName = (typeof tabs)[number]

function App() {
  const [tab, setTab] = useState<TabName>('Expenses')
  // Shared by every page so switching tabs keeps the month
  const [month, setMonth] = useState(currentMonth())
  const [categories, setCategories] = useState<Category[]>([])

  const reloadCategories = useCallback(async () => {
    setCategories(await listCategories())
  }, [])

  useEffect(() => {
    reloadCategories().catch((err: unknown) => console.error('Error fetching categories', err))
  }, [reloadCategories])

  return (
    <ThemeProvider theme={theme}>
      <CssBaseline />
      <Container maxWidth="lg" sx={{ py: 4 }}>
        <Typography variant="h4" gutterBottom>
          Kakeibo
        </Typography>
        <Box sx={{ borderBottom: 1, borderColor: 'divider', mb: 3 }}>
          <Tabs value={tab} onChange={(_, value: TabName) => setTab(value)} variant="scrollable">
            {tabs.map((name) => (
              <Tab key={name} label={name} value={name} />
            ))}
          </Tabs>
        </Box>
        {tab === 'Expenses' && <ExpensesPage month={month} setMonth={setMonth} categories={categories} />}
        {tab === 'Receipts' && <ReceiptsPage month={month} setMonth={setMonth} categories={categories} />}
        {tab === 'Income' && <IncomesPage month={month} setMonth={setMonth} />}
        {tab === 'Budgets' && <BudgetsPage month={month} setMonth={setMonth} categories={categories} />}
        {tab === 'Summary' && <SummaryPage month={month} setMonth={setMonth} />}
        {tab === 'Categories' && <CategoriesPage categories={categories} reloadCategories={reloadCategories} />}
      </Container>
    </ThemeProvider>
  )
}

export default App
