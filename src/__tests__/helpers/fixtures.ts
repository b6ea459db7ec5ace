/**
 * Shared fixtures: one engagement whose current workbook balances and
 * rolls forward from the prior year report
 */

import type { SourceTable } from '@/lib/parsers/interfaces'
import type { EngagementConfig } from '@/lib/config/engagement'
import { loadEngagementConfig } from '@/lib/config/engagement'

export const CURRENT_PL: SourceTable = {
  name: 'Consol PL',
  rows: [
    ['Income Statement', 'FY2024', 'FY2025'],
    ['Revenue', 1100000, 1200000],
    ['Cost of sales', '(500,000)', '(540,000)'],
    ['Gross profit', 600000, 660000],
    ['Other income', 10000, 15000],
    ['Distribution costs', -40000, -45000],
    ['Administrative expenses', -300000, -330000],
    ['Other expenses', -20000, -25000],
    ['Profit before income tax', 250000, 275000],
    ['Income tax expense', -75000, -82500],
    ['Net profit for the year', 175000, 192500],
  ],
}

export const CURRENT_BS: SourceTable = {
  name: 'Consol BS',
  rows: [
    ['Balance Sheet', 'FY2024', 'FY2025'],
    ['Current assets'],
    ['Cash and cash equivalents', 80000, 95000],
    ['Trade and other receivables', 120000, 130000],
    ['Inventories', 60000, 70000],
    ['Non-current assets'],
    ['Property, plant and equipment', 400000, 554500],
    ['Intangible assets', 50000, 45000],
    ['Current liabilities'],
    ['Trade and other payables', 90000, 95000],
    ['Provisions', 30000, 35000],
    ['Non-current liabilities'],
    ['Borrowings', 200000, 180000],
    ['Provisions', 'Non-current', 10000, 12000],
    ['Equity'],
    ['Share capital', 100000, 100000],
    ['Retained earnings', 280000, 472500],
  ],
}

export const CURRENT_TABLES: SourceTable[] = [
  { name: 'Cover', rows: [['Example Holdings Pty Ltd']] },
  CURRENT_PL,
  CURRENT_BS,
]

export const TITLE_PAGE = [
  'Financial Statements',
  'Example Holdings Pty Ltd',
  'For the Year Ended 30 June 2024',
].join('\n')

export const CONTENTS_PAGE = [
  'Contents',
  '1. Statement of Profit or Loss and Other Comprehensive Income 3',
  '2. Statement of Financial Position 4',
  '3. Notes to the Financial Statements 5',
  "4. Directors' Declaration 6",
  '5. Compilation Report 7',
].join('\n')

export const INCOME_PAGE = [
  'Statement of Profit or Loss and Other Comprehensive Income',
  'For the Year Ended 30 June 2024',
  'Revenue $1,100,000',
  'Cost of sales (500,000)',
  'Gross profit 600,000',
  'Other income 10,000',
  'Distribution costs (40,000)',
  'Administrative expenses (300,000)',
  'Other expenses (20,000)',
  'Profit before income tax 250,000',
  'Income tax expense (75,000)',
  'Net profit for the year 175,000',
].join('\n')

export const BALANCE_PAGE = [
  'Statement of Financial Position',
  'As at 30 June 2024',
  'Current assets',
  'Cash and cash equivalents 80,000',
  'Trade and other receivables 120,000',
  'Inventories 60,000',
  'Non-current assets',
  'Property, plant and equipment 400,000',
  'Intangible assets 50,000',
  'Total assets 710,000',
  'Current liabilities',
  'Trade and other payables 90,000',
  'Provisions 30,000',
  'Non-current liabilities',
  'Borrowings 200,000',
  'Provisions - non-current 10,000',
  'Total liabilities 330,000',
  'Equity',
  'Share capital 100,000',
  'Retained earnings 280,000',
  'Total equity 380,000',
].join('\n')

export const NOTES_PAGE = [
  'Notes to the Financial Statements',
  'For the Year Ended 30 June 2024',
  '1. Summary of Significant Accounting Policies',
  'The directors have prepared the financial statements on the basis that the company is a non-reporting entity.',
  '2. Income Tax',
  'The company is a member of a tax consolidated group. The head entity is Example Group Holdings Pty Ltd.',
  '3. Contingent Liabilities',
  'The company has provided a bank guarantee of $25,000 in respect of premises.',
  'No other contingent liabilities exist at reporting date.',
].join('\n')

export const DECLARATION_PAGE = [
  "Directors' Declaration",
  "The directors of the company declare that the financial statements present fairly the company's financial position.",
  '______________________',
  'Jane Citizen',
  'Director',
  '______________________',
  'Sam Example',
  'Director',
  'Dated 15 September 2024',
].join('\n')

export const COMPILATION_PAGE = [
  'Compilation Report',
  'We have compiled the accompanying financial statements of Example Holdings Pty Ltd.',
  '______________________',
  'Alex Accountant',
  'Principal, Example Advisory',
  'Date: 20 September 2024',
].join('\n')

export const PRIOR_YEAR_PAGES: string[] = [
  TITLE_PAGE,
  CONTENTS_PAGE,
  INCOME_PAGE,
  BALANCE_PAGE,
  NOTES_PAGE,
  DECLARATION_PAGE,
  COMPILATION_PAGE,
]

export function engagementConfig(overrides: Record<string, unknown> = {}): EngagementConfig {
  return loadEngagementConfig(
    {
      entityName: 'Example Holdings Pty Ltd',
      currentYear: 2025,
      expectedDirectors: ['Jane Citizen', 'Sam Example'],
      expectedCompiler: 'Alex Accountant',
      ...overrides,
    },
    {}
  )
}
