import { ObjectId } from 'mongodb';
import type { DocumentFilter } from '../../../domain/credentials/search.js';
import type { DocumentStore, RawDocument } from '../documentStore.js';

export interface InMemoryFailures {
  create?: Error;
  find?: Error;
  listCollections?: Error;
}

/**
 * In-process stand-in for MongoDocumentStore. Documents keep insertion order.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private collections = new Map<string, RawDocument[]>();

  constructor(
    readonly name = 'test_db',
    public failures: InMemoryFailures = {}
  ) {}

  async createDocument(collection: string, record: object): Promise<string> {
    if (this.failures.create) {
      throw this.failures.create;
    }
    const id = new ObjectId();
    const docs = this.collections.get(collection) ?? [];
    docs.push({ ...record, _id: id });
    this.collections.set(collection, docs);
    return id.toHexString();
  }

  async getDocuments(collection: string, filter: DocumentFilter): Promise<RawDocument[]> {
    if (this.failures.find) {
      throw this.failures.find;
    }
    const docs = this.collections.get(collection) ?? [];
    return docs.filter((doc) => matches(doc, filter)).map((doc) => ({ ...doc }));
  }

  async listCollectionNames(): Promise<string[]> {
    if (this.failures.listCollections) {
      throw this.failures.listCollections;
    }
    return [...this.collections.keys()];
  }

  /** Insert a raw document as-is, bypassing the credential mapping. */
  seed(collection: string, doc: RawDocument): void {
    const docs = this.collections.get(collection) ?? [];
    docs.push({ _id: new ObjectId(), ...doc });
    this.collections.set(collection, docs);
  }
}

function matches(doc: RawDocument, filter: DocumentFilter): boolean {
  switch (filter.kind) {
    case 'all':
      return true;
    case 'anyFieldContains': {
      const needle = filter.text.toLowerCase();
      return filter.fields.some((field) => {
        const value = doc[field];
        return typeof value === 'string' && value.toLowerCase().includes(needle);
      });
    }
  }
}
