/**
 * Storage-agnostic filter over raw documents.
 * Gateways translate it to their own query language.
 */
export type DocumentFilter =
  | { kind: 'all' }
  | { kind: 'anyFieldContains'; fields: readonly string[]; text: string };

export const MATCH_ALL: DocumentFilter = { kind: 'all' };

export const CREDENTIAL_SEARCH_FIELDS = ['title', 'username'] as const;

/**
 * Case-insensitive substring search on title OR username.
 * Absent or empty text matches everything.
 */
export function buildCredentialSearch(text?: string): DocumentFilter {
  if (!text) {
    return MATCH_ALL;
  }
  return { kind: 'anyFieldContains', fields: CREDENTIAL_SEARCH_FIELDS, text };
}
