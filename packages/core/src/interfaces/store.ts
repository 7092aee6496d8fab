/**
 * Document store holding whole JSON documents by key.
 *
 * Incremental state and the relationship cache are each one document,
 * read once at the start of a run and written once at the end.
 */
export interface DocumentStore {
  /** Returns undefined when no document exists under the key */
  read(key: string): Promise<unknown>;
  write(key: string, document: unknown): Promise<void>;
  delete(key: string): Promise<void>;
}
