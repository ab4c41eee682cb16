import type { DocumentFilter } from '../../domain/credentials/search.js';

export type RawDocument = Record<string, unknown>;

/**
 * Gateway over a schema-flexible document database.
 * Every operation propagates the underlying store error to the caller.
 */
export interface DocumentStore {
  /** Logical database name. */
  readonly name: string;

  /** Insert one document and return the store-assigned id as text. */
  createDocument(collection: string, record: object): Promise<string>;

  getDocuments(collection: string, filter: DocumentFilter): Promise<RawDocument[]>;

  listCollectionNames(): Promise<string[]>;
}
