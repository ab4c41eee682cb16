import { describe, it, expect } from 'vitest';
import { buildCredentialSearch, MATCH_ALL } from '../search.js';

describe('buildCredentialSearch', () => {
  it('matches everything without search text', () => {
    expect(buildCredentialSearch()).toEqual(MATCH_ALL);
    expect(buildCredentialSearch('')).toEqual({ kind: 'all' });
  });

  it('searches title or username', () => {
    expect(buildCredentialSearch('git')).toEqual({
      kind: 'anyFieldContains',
      fields: ['title', 'username'],
      text: 'git',
    });
  });

  it('keeps the text untouched', () => {
    const filter = buildCredentialSearch('a.b (c)');
    expect(filter.kind === 'anyFieldContains' && filter.text).toBe('a.b (c)');
  });
});
