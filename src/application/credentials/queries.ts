import {
  CREDENTIAL_COLLECTION,
  CredentialOut,
  toCredentialOut,
} from '../../domain/credentials/credential.js';
import { buildCredentialSearch } from '../../domain/credentials/search.js';
import { DatabaseProvider, requireStore } from '../../infra/db/client.js';

export class CredentialQueries {
  constructor(private getDatabase: DatabaseProvider) {}

  /**
   * All credentials in store order, or those whose title or username
   * contains `q` (case-insensitive).
   */
  async listCredentials(q?: string): Promise<CredentialOut[]> {
    const store = requireStore(this.getDatabase());
    const docs = await store.getDocuments(CREDENTIAL_COLLECTION, buildCredentialSearch(q));
    return docs.map(toCredentialOut);
  }
}
