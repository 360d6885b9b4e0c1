/**
 * Persistence interfaces for filesystem abstraction.
 * Business classes use these interfaces; implementations handle filesystem I/O.
 */

/** Persistence for a single object (e.g., the catalog). read() never fails; it falls back to a default. */
export interface ISingletonPersistence<T> {
  read(): T
  write(item: T): void
}
