import {
  CREDENTIAL_COLLECTION,
  Credential,
  toCredentialDocument,
} from '../../domain/credentials/credential.js';
import { DatabaseProvider, requireStore } from '../../infra/db/client.js';

export interface CreateCredentialResult {
  id: string;
}

export class CreateCredentialUseCase {
  constructor(
    private getDatabase: DatabaseProvider,
    private now: () => Date = () => new Date()
  ) {}

  async execute(command: Credential): Promise<CreateCredentialResult> {
    const store = requireStore(this.getDatabase());
    const id = await store.createDocument(
      CREDENTIAL_COLLECTION,
      toCredentialDocument(command, this.now())
    );
    return { id };
  }
}
