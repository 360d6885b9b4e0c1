import type { Ibook } from '../shared/catalog/index.js'
import { Catalog } from './catalog.js'

const defaultBooks: ReadonlyArray<Omit<Ibook, 'borrowedCopies'>> = [
  { id: 'B001', title: '1984', author: 'George Orwell', totalCopies: 3 },
  { id: 'B002', title: 'Pride and Prejudice', author: 'Jane Austen', totalCopies: 2 },
  { id: 'B003', title: 'To Kill a Mockingbird', author: 'Harper Lee', totalCopies: 4 },
  { id: 'B004', title: 'The Great Gatsby', author: 'F. Scott Fitzgerald', totalCopies: 2 },
  { id: 'B005', title: 'The Hobbit', author: 'J. R. R. Tolkien', totalCopies: 2 },
]

// Starter set used for a first run and whenever the data file cannot be used
export function defaultCatalog(): Catalog {
  return new Catalog(defaultBooks.map((book) => ({ ...book, borrowedCopies: 0 })))
}
