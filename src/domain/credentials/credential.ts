export const CREDENTIAL_COLLECTION = 'credential';

/**
 * A credential as submitted by a client.
 */
export interface Credential {
  title: string;
  username: string;
  password: string;
  url?: string | null;
  note?: string | null;
}

/**
 * A stored credential as returned to clients. Every key is always present.
 */
export interface CredentialOut {
  id: string;
  title: string;
  username: string;
  password: string;
  url: string | null;
  note: string | null;
  created_at: string | null;
  updated_at: string | null;
}

/**
 * Shape written to the credential collection. The store assigns `_id`.
 */
export interface CredentialDocument {
  title: string;
  username: string;
  password: string;
  url: string | null;
  note: string | null;
  created_at: Date;
  updated_at: Date;
}

export function toCredentialDocument(credential: Credential, now: Date): CredentialDocument {
  return {
    title: credential.title,
    username: credential.username,
    password: credential.password,
    url: credential.url ?? null,
    note: credential.note ?? null,
    created_at: now,
    updated_at: now,
  };
}

/**
 * Map a raw stored document to the outbound shape.
 * Missing or mistyped fields fall back to '' or null instead of failing.
 */
export function toCredentialOut(doc: Record<string, unknown>): CredentialOut {
  return {
    id: doc._id === undefined || doc._id === null ? '' : String(doc._id),
    title: textOrEmpty(doc.title),
    username: textOrEmpty(doc.username),
    password: textOrEmpty(doc.password),
    url: textOrNull(doc.url),
    note: textOrNull(doc.note),
    created_at: formatTimestamp(doc.created_at),
    updated_at: formatTimestamp(doc.updated_at),
  };
}

/**
 * ISO-8601 text for a decodable instant, null for anything else.
 */
export function formatTimestamp(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
  }
  return null;
}

function textOrEmpty(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function textOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}
