import type { Ibook } from './types.js'

export function getAvailableCopies(book: Ibook): number {
  return book.totalCopies - book.borrowedCopies
}

export function isCountValid(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
}

