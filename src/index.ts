/**
 * nbt-raw-compare: structural equality of uncompressed NBT documents
 *
 * Documents are decoded into a tree of views over the input buffers
 * (numeric payloads, arrays and strings are never converted), then compared
 * member by member. Compound member order does not matter; list order does.
 *
 * @example
 * ```typescript
 * import { compare, LAST_UPDATE_FIELD } from 'nbt-raw-compare';
 *
 * const same = compare(leftBytes, rightBytes, LAST_UPDATE_FIELD);
 * ```
 *
 * @packageDocumentation
 */

export { compare, LAST_UPDATE_FIELD } from './compare.ts';

export { NbtError } from './errors.ts';
export type { NbtErrorKind, NbtSide } from './errors.ts';

export { DEFAULT_OPTIONS } from './config.ts';
export type { NbtDecodeOptions } from './config.ts';

export { TagId } from './tags.ts';

export { loadRoot, nameKey } from './decoder.ts';
export type { RawTag, RawCompound } from './decoder.ts';

export { rawTagEquals } from './equal.ts';

export { NbtReader } from './reader.ts';
