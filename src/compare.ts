import type { NbtDecodeOptions } from './config.ts';
import { loadRoot, nameKey, type RawCompound } from './decoder.ts';
import { rawTagEquals } from './equal.ts';
import { NbtError, type NbtSide } from './errors.ts';

/** Timestamp member that differs between otherwise identical snapshots. */
export const LAST_UPDATE_FIELD = 'LastUpdate';

const textEncoder = new TextEncoder();

function loadSide(
  buffer: ArrayBufferLike | Uint8Array,
  side: NbtSide,
  options: Partial<NbtDecodeOptions>,
): RawCompound {
  try {
    return loadRoot(buffer, options);
  } catch (error) {
    if (error instanceof NbtError) {
      throw error.withSide(side);
    }
    throw error;
  }
}

/**
 * Decide whether two uncompressed NBT documents are structurally equal.
 *
 * Both documents are fully decoded before anything is compared; a decode
 * failure is re-thrown as an {@link NbtError} with `side` set.
 *
 * @param exclude - Top-level member to ignore on both sides. A string is
 *   matched against the UTF-8 bytes of the name; pass a `Uint8Array` to
 *   match exact name bytes.
 *
 * @example
 * ```typescript
 * import { compare, LAST_UPDATE_FIELD } from 'nbt-raw-compare';
 *
 * if (compare(before, after, LAST_UPDATE_FIELD)) {
 *   console.log('unchanged');
 * }
 * ```
 */
export function compare(
  left: ArrayBufferLike | Uint8Array,
  right: ArrayBufferLike | Uint8Array,
  exclude?: string | Uint8Array,
  options: Partial<NbtDecodeOptions> = {},
): boolean {
  const leftRoot = loadSide(left, 'left', options);
  const rightRoot = loadSide(right, 'right', options);

  if (exclude !== undefined) {
    const key = nameKey(typeof exclude === 'string' ? textEncoder.encode(exclude) : exclude);
    leftRoot.entries.delete(key);
    rightRoot.entries.delete(key);
  }

  return rawTagEquals(leftRoot, rightRoot);
}
