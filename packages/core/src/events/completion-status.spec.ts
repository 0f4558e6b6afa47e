import { describe, expect, it } from 'vitest';

import {
  COMPLETION_STATUSES,
  completionStatusToString,
  isCompletionStatus,
  parseCompletionStatus,
} from './completion-status.js';

describe('completion statuses', () => {
  it('maps every status to distinct canonical text', () => {
    const rendered = COMPLETION_STATUSES.map((status) => completionStatusToString(status));

    expect(rendered).toEqual(['success', 'validation_error', 'panic', 'error', 'junk']);
    expect(new Set(rendered).size).toBe(COMPLETION_STATUSES.length);
  });

  it('parses status text case-insensitively', () => {
    expect(parseCompletionStatus('SUCCESS')).toBe('success');
    expect(parseCompletionStatus('Validation_Error')).toBe('validation_error');
    expect(parseCompletionStatus('failure')).toBeUndefined();
    expect(parseCompletionStatus('')).toBeUndefined();
  });

  it('narrows only canonical status strings', () => {
    expect(isCompletionStatus('panic')).toBe(true);
    expect(isCompletionStatus('Panic')).toBe(false);
    expect(isCompletionStatus(null)).toBe(false);
  });
});
