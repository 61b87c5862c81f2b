/**
 * Quick Start Example
 *
 * Cleans two small in-memory exports and prints the resulting CSV and report.
 * It shows how to:
 * - Build a cleaner with the fluent builder
 * - Merge users into transactions on an auto-detected key
 * - Read the run report
 */

import { CleanerBuilder, createSilentLogger, toCsv } from '../src'

const users = [
  {
    user_id: 1,
    email: 'ann.lee@example.com',
    national_id: 'SN1234567',
    phone: '+221 77 123 45 67',
    address: { city: 'Dakar' },
  },
  { user_id: 2, email: 'bo@example.org', national_id: 'AB98', phone: '(555) 010-9999' },
]

const transactions = [
  { tx_id: 'T-001', user_id: '1', amount: '1,234.567', created_at: '2024-01-30T10:15:00Z' },
  { tx_id: 'T-002', user_id: '2', amount: 19.999, created_at: 1706609700 },
  { tx_id: 'T-003', user_id: '3', amount: 'n/a', created_at: 'soon' },
]

const cleaner = new CleanerBuilder().logger(createSilentLogger()).build()
const { table, report } = cleaner.cleanRecords(users, transactions)

console.log(toCsv(table))

console.log(`Join key: ${report.joinKey ?? 'none'}`)
console.log(`Unmatched transactions: ${report.unmatchedTransactions}`)
console.log('Transform fallbacks per category:', report.fallbacks)

// To work with files instead:
// cleaner.clean('users.json', 'transactions.json', 'clean.csv')
