export const CATALOG_VERSION = '0.2'

export interface Ibook {
  id: string
  title: string
  author: string
  totalCopies: number
  borrowedCopies: number
}

export interface IbookAvailability {
  id: string
  title: string
  author: string
  availableCopies: number
}

export interface IbookLoan {
  id: string
  title: string
  author: string
  borrowedCopies: number
}

// On-disk layout of a catalog file
export interface IcatalogFileBook {
  id: string
  title: string
  author: string
  total_copies: number
  borrowed_copies: number
}

export interface IcatalogFile {
  version: string
  books: IcatalogFileBook[]
}

export enum CatalogErrorKind {
  NotFound = 'NotFound',
  NoCopiesAvailable = 'NoCopiesAvailable',
  NothingToReturn = 'NothingToReturn',
  IOError = 'IOError',
}
