import { CatalogErrorKind } from '../shared/catalog/index.js'

const messages: Record<CatalogErrorKind, (subject: string) => string> = {
  [CatalogErrorKind.NotFound]: (title) => `Book not found: "${title}"`,
  [CatalogErrorKind.NoCopiesAvailable]: (title) => `No copies left to borrow: "${title}"`,
  [CatalogErrorKind.NothingToReturn]: (title) => `All copies are already in the library: "${title}"`,
  [CatalogErrorKind.IOError]: (file) => `Unable to save catalog to ${file}`,
}

export class CatalogError extends Error {
  constructor(
    readonly kind: CatalogErrorKind,
    readonly subject: string,
    detail?: string
  ) {
    super(detail ? `${messages[kind](subject)}: ${detail}` : messages[kind](subject))
    this.name = 'CatalogError'
  }
}

export function isCatalogError(e: unknown, kind?: CatalogErrorKind): e is CatalogError {
  return e instanceof CatalogError && (kind === undefined || e.kind === kind)
}

/** Message of a caught value, which need not be an Error */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
