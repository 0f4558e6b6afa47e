import { describe, expect, it } from 'vitest';

import { formatMetadata } from './metadata.js';

describe('formatMetadata', () => {
  it('omits the segment when no metadata is attached', () => {
    expect(formatMetadata(undefined)).toBe('');
  });

  it('renders an empty segment for an empty record', () => {
    expect(formatMetadata({})).toBe(' kvs:[]');
  });

  it('sorts keys ascending regardless of insertion order', () => {
    const first = formatMetadata({ wat: 'ok', another: 'thing', level: 'info' });
    const second = formatMetadata({ level: 'info', another: 'thing', wat: 'ok' });

    expect(first).toBe(' kvs:[another:thing level:info wat:ok]');
    expect(second).toBe(first);
  });

  it('orders by code point rather than locale', () => {
    expect(formatMetadata({ b: '2', B: '1', a: '3' })).toBe(' kvs:[B:1 a:3 b:2]');
  });

  it('places keys outside the basic multilingual plane after the rest', () => {
    expect(formatMetadata({ '\u{1F600}': 'a', '\uFF61': 'b' })).toBe(
      ' kvs:[\uFF61:b \u{1F600}:a]',
    );
  });

  it('sorts a prefix before its extensions', () => {
    expect(formatMetadata({ ab: '2', a: '1' })).toBe(' kvs:[a:1 ab:2]');
  });

  it('copies keys and values verbatim', () => {
    expect(formatMetadata({ 'user id': 'a:b c' })).toBe(' kvs:[user id:a:b c]');
  });
});
