import type { IbookAvailability, IbookLoan } from '../shared/catalog/index.js'
import { formatTable } from './table.js'

const noBooks = 'No books to display.'

// Row numbers start at 1; the menu accepts them as selection
export function availableTable(books: IbookAvailability[]): string[] {
  if (!books.length) return [noBooks]
  return formatTable(
    ['#', 'ID', 'Title', 'Author', 'Available'],
    books.map((book, idx) => [String(idx + 1), book.id, book.title, book.author, String(book.availableCopies)])
  )
}

export function borrowedTable(books: IbookLoan[]): string[] {
  if (!books.length) return [noBooks]
  return formatTable(
    ['#', 'ID', 'Title', 'Author', 'Borrowed'],
    books.map((book, idx) => [String(idx + 1), book.id, book.title, book.author, String(book.borrowedCopies)])
  )
}
