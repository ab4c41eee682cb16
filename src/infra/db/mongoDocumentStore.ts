import type { Db, Document, Filter } from 'mongodb';
import type { DocumentFilter } from '../../domain/credentials/search.js';
import type { DocumentStore, RawDocument } from './documentStore.js';

export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly db: Db) {}

  get name(): string {
    return this.db.databaseName;
  }

  async createDocument(collection: string, record: object): Promise<string> {
    const result = await this.db.collection(collection).insertOne({ ...record });
    return String(result.insertedId);
  }

  async getDocuments(collection: string, filter: DocumentFilter): Promise<RawDocument[]> {
    return this.db.collection(collection).find(toMongoFilter(filter)).toArray();
  }

  async listCollectionNames(): Promise<string[]> {
    const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();
    return collections.map((c) => c.name);
  }
}

/**
 * Translate a DocumentFilter into a MongoDB query.
 * Search text is matched literally, so regex metacharacters are escaped.
 */
export function toMongoFilter(filter: DocumentFilter): Filter<Document> {
  switch (filter.kind) {
    case 'all':
      return {};
    case 'anyFieldContains': {
      const pattern = escapeRegex(filter.text);
      return {
        $or: filter.fields.map((field) => ({
          [field]: { $regex: pattern, $options: 'i' },
        })),
      };
    }
  }
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
