import { MongoClient } from 'mongodb';
import { DatabaseUnavailableError, errorMessage } from '../../application/errors.js';
import type { AppConfig } from '../config.js';
import type { DocumentStore } from './documentStore.js';
import { MongoDocumentStore } from './mongoDocumentStore.js';

/**
 * Process-wide database state. `unconfigured` means DATABASE_URL or
 * DATABASE_NAME is missing; `failed` means the client could not be built.
 */
export type DatabaseHandle =
  | { status: 'ready'; store: DocumentStore }
  | { status: 'unconfigured' }
  | { status: 'failed'; error: Error };

export type DatabaseProvider = () => DatabaseHandle;

let client: MongoClient | null = null;
let handle: DatabaseHandle = { status: 'unconfigured' };

/**
 * Build the shared client once at startup. The driver connects lazily on the
 * first operation, so an unreachable server surfaces per request.
 */
export function initDatabase(config: AppConfig): DatabaseHandle {
  if (!config.databaseUrl || !config.databaseName) {
    handle = { status: 'unconfigured' };
    console.warn('DATABASE_URL or DATABASE_NAME not set; database disabled');
    return handle;
  }

  let created: MongoClient | undefined;
  let store: DocumentStore;
  try {
    created = new MongoClient(config.databaseUrl, {
      serverSelectionTimeoutMS: config.serverSelectionTimeoutMs,
    });
    // db() validates the name
    store = new MongoDocumentStore(created.db(config.databaseName));
  } catch (error) {
    handle = {
      status: 'failed',
      error: error instanceof Error ? error : new Error(errorMessage(error)),
    };
    console.error('Failed to create database client:', error);
    if (created) {
      created.close().catch((closeError: unknown) => {
        console.error('Failed to close database client:', closeError);
      });
    }
    return handle;
  }

  created.on('open', () => {
    console.log('Database connection established');
  });

  created.on('serverHeartbeatFailed', (event) => {
    console.error('Database heartbeat failed:', event.failure);
  });

  client = created;
  handle = { status: 'ready', store };
  return handle;
}

export const getDatabase: DatabaseProvider = () => handle;

/**
 * Unwrap a handle, throwing when no store is usable.
 */
export function requireStore(current: DatabaseHandle): DocumentStore {
  switch (current.status) {
    case 'ready':
      return current.store;
    case 'unconfigured':
      throw new DatabaseUnavailableError();
    case 'failed':
      throw new DatabaseUnavailableError(`Database not available: ${current.error.message}`);
  }
}

export async function closeDatabase(): Promise<void> {
  const current = client;
  client = null;
  handle = { status: 'unconfigured' };
  if (current) {
    await current.close();
  }
}
