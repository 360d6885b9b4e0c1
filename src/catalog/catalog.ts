import Debug from 'debug'
import {
  CatalogErrorKind,
  type Ibook,
  type IbookAvailability,
  type IbookLoan,
  getAvailableCopies,
  isCountValid,
} from '../shared/catalog/index.js'
import { CatalogError } from './errors.js'

const debug = Debug('catalog')

/**
 * Returns why the books cannot form a catalog, or undefined if they can.
 * Ids must differ regardless of case.
 */
export function checkBooks(books: Ibook[]): string | undefined {
  if (!books.length) return 'Catalog must contain at least one book'
  const titles = new Set<string>()
  const ids = new Set<string>()
  for (const book of books) {
    if (!book.id.length) return 'Book id must not be empty'
    if (!book.title.length) return 'Book title must not be empty'
    if (!isCountValid(book.totalCopies) || !isCountValid(book.borrowedCopies))
      return `Copies of "${book.title}" must be non-negative integers`
    if (book.borrowedCopies > book.totalCopies)
      return `"${book.title}" has more borrowed (${book.borrowedCopies}) than total copies (${book.totalCopies})`
    if (titles.has(book.title)) return `Duplicate title "${book.title}"`
    const id = book.id.toLowerCase()
    if (ids.has(id)) return `Duplicate id "${book.id}"`
    titles.add(book.title)
    ids.add(id)
  }
  return undefined
}

/**
 * Ordered, in-memory set of books.
 * Reads hand out clones; only borrow() and returnBook() change a book.
 */
export class Catalog {
  private items: Ibook[]

  /** Throws if the books break an invariant, see checkBooks() */
  constructor(books: Ibook[]) {
    const reason = checkBooks(books)
    if (reason !== undefined) throw new Error(reason)
    this.items = books.map((book) => structuredClone(book))
  }

  get size(): number {
    return this.items.length
  }

  books(): Ibook[] {
    return this.items.map((book) => structuredClone(book))
  }

  listAvailable(): IbookAvailability[] {
    return this.items
      .filter((book) => getAvailableCopies(book) > 0)
      .map((book) => ({ id: book.id, title: book.title, author: book.author, availableCopies: getAvailableCopies(book) }))
  }

  listBorrowed(): IbookLoan[] {
    return this.items
      .filter((book) => book.borrowedCopies > 0)
      .map((book) => ({ id: book.id, title: book.title, author: book.author, borrowedCopies: book.borrowedCopies }))
  }

  /** Exact, case-sensitive title match. */
  findByTitle(title: string): Ibook | undefined {
    const book = this.items.find((b) => b.title === title)
    return book !== undefined ? structuredClone(book) : undefined
  }

  /** Ids are matched case-insensitively: "b001" selects "B001". */
  findById(id: string): Ibook | undefined {
    const lowered = id.toLowerCase()
    const book = this.items.find((b) => b.id.toLowerCase() === lowered)
    return book !== undefined ? structuredClone(book) : undefined
  }

  borrow(title: string): Ibook {
    const book = this.getRef(title)
    if (getAvailableCopies(book) === 0) throw new CatalogError(CatalogErrorKind.NoCopiesAvailable, title)
    book.borrowedCopies++
    debug('borrow: ' + title + ' borrowed: ' + book.borrowedCopies + '/' + book.totalCopies)
    return structuredClone(book)
  }

  returnBook(title: string): Ibook {
    const book = this.getRef(title)
    if (book.borrowedCopies === 0) throw new CatalogError(CatalogErrorKind.NothingToReturn, title)
    book.borrowedCopies--
    debug('returnBook: ' + title + ' borrowed: ' + book.borrowedCopies + '/' + book.totalCopies)
    return structuredClone(book)
  }

  equals(other: Catalog): boolean {
    const theirs = other.items
    if (theirs.length !== this.items.length) return false
    return this.items.every((book, idx) => {
      const o = theirs[idx]
      return (
        o.id === book.id &&
        o.title === book.title &&
        o.author === book.author &&
        o.totalCopies === book.totalCopies &&
        o.borrowedCopies === book.borrowedCopies
      )
    })
  }

  private getRef(title: string): Ibook {
    const book = this.items.find((b) => b.title === title)
    if (book === undefined) throw new CatalogError(CatalogErrorKind.NotFound, title)
    return book
  }
}
