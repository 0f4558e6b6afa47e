import type { EventMetadata } from '../events/index.js';

/**
 * Serialises event metadata into the ` kvs:[...]` segment of a line.
 *
 * Keys are sorted by Unicode code point so that the output does not depend on the order
 * the record was built in. An absent record yields an empty string; an empty record
 * still yields ` kvs:[]`.
 */
export function formatMetadata(metadata: EventMetadata | undefined): string {
  if (metadata === undefined) {
    return '';
  }

  const entries = Object.keys(metadata)
    .sort(compareCodePoints)
    .map((key) => `${key}:${metadata[key] ?? ''}`);

  return ` kvs:[${entries.join(' ')}]`;
}

function compareCodePoints(left: string, right: string): number {
  const a = [...left];
  const b = [...right];
  const length = Math.min(a.length, b.length);

  for (let index = 0; index < length; index += 1) {
    const difference = (a[index]?.codePointAt(0) ?? 0) - (b[index]?.codePointAt(0) ?? 0);
    if (difference !== 0) {
      return difference;
    }
  }
  return a.length - b.length;
}
