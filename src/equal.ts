import type { RawTag } from './decoder.ts';

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) return true;
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Structural equality of two decoded trees.
 *
 * Spans compare by bytes, maps by key set and per-key value regardless of
 * member order, lists element by element in order. Values of different
 * kinds are never equal. Nested values are walked with an explicit stack
 * rather than recursion.
 */
export function rawTagEquals(left: RawTag, right: RawTag): boolean {
  const pending: Array<[RawTag, RawTag]> = [[left, right]];

  let pair: [RawTag, RawTag] | undefined;
  while ((pair = pending.pop()) !== undefined) {
    const [a, b] = pair;

    if (a.kind === 'span') {
      if (b.kind !== 'span' || !bytesEqual(a.bytes, b.bytes)) return false;
    } else if (a.kind === 'map') {
      if (b.kind !== 'map' || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined) return false;
        pending.push([value, other]);
      }
    } else {
      if (b.kind !== 'list' || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        pending.push([a.items[i], b.items[i]]);
      }
    }
  }

  return true;
}
