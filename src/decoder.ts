import { resolveOptions, type NbtDecodeOptions } from './config.ts';
import { NbtError } from './errors.ts';
import { NbtReader } from './reader.ts';
import { TagId, arrayElementSize, isTagId, primitiveSize } from './tags.ts';

/**
 * A decoded NBT value, still in raw form.
 *
 * - `span`: numeric tags, arrays, strings, and lists of numeric tags, as a
 *   view into the input buffer
 * - `map`: a compound, keyed by member name (see {@link nameKey})
 * - `list`: a list of strings, lists, compounds or arrays, in order
 */
export type RawTag =
  | { kind: 'span'; bytes: Uint8Array }
  | { kind: 'map'; entries: Map<string, RawTag> }
  | { kind: 'list'; items: RawTag[] };

export type RawCompound = Extract<RawTag, { kind: 'map' }>;

/**
 * Map member name bytes to a `Map` key, one UTF-16 code unit per byte.
 *
 * Names are Modified UTF-8 and are never decoded as text: two names give
 * the same key exactly when their bytes are identical.
 */
export function nameKey(bytes: Uint8Array): string {
  let key = '';
  for (let i = 0; i < bytes.length; i++) {
    key += String.fromCharCode(bytes[i]);
  }
  return key;
}

function spanLength(reader: NbtReader, count: number, width: number, options: NbtDecodeOptions): number {
  const length = count * width;
  if (length > options.maxSpanLength) {
    throw new NbtError(
      'ArithmeticOverflow',
      `Overflow when calculating byte length of ${count} elements of ${width} bytes`,
      reader.pos,
    );
  }
  return length;
}

function unknownTag(reader: NbtReader, id: number, at: number = reader.pos - 1): NbtError {
  return new NbtError('UnknownTag', `Unknown tag id: ${id}`, at);
}

function checkDepth(reader: NbtReader, depth: number, options: NbtDecodeOptions): void {
  if (depth > options.maxDepth) {
    throw new NbtError(
      'DepthLimitExceeded',
      `Nesting depth exceeds the limit of ${options.maxDepth}`,
      reader.pos,
    );
  }
}

/**
 * Decode the payload of a tag whose id has already been read.
 */
export function decodeTag(
  reader: NbtReader,
  id: Exclude<TagId, TagId.End>,
  options: NbtDecodeOptions,
  depth: number,
): RawTag {
  switch (id) {
    case TagId.Byte:
    case TagId.Short:
    case TagId.Int:
    case TagId.Long:
    case TagId.Float:
    case TagId.Double:
      return { kind: 'span', bytes: reader.take(primitiveSize(id) ?? 0) };
    case TagId.ByteArray:
    case TagId.IntArray:
    case TagId.LongArray: {
      const count = reader.readU32();
      return { kind: 'span', bytes: reader.take(spanLength(reader, count, arrayElementSize(id), options)) };
    }
    case TagId.String:
      return { kind: 'span', bytes: reader.take(reader.readU16()) };
    case TagId.List:
      return decodeList(reader, options, depth + 1);
    case TagId.Compound:
      return decodeCompound(reader, options, depth + 1);
  }
}

/**
 * Decode a list payload: element tag id, u32 count, then the elements.
 *
 * Lists of fixed-size numeric tags become a single span. The declared count
 * is trusted; a count larger than the input runs out of bytes while the
 * elements are decoded.
 */
export function decodeList(reader: NbtReader, options: NbtDecodeOptions, depth: number): RawTag {
  checkDepth(reader, depth, options);
  const idOffset = reader.pos;
  const elementId = reader.readU8();
  const count = reader.readU32();

  if (!isTagId(elementId)) {
    throw unknownTag(reader, elementId, idOffset);
  }
  if (count === 0) {
    return { kind: 'list', items: [] };
  }
  if (elementId === TagId.End) {
    throw new NbtError('UnknownTag', `List of End tags with nonzero length ${count}`, idOffset);
  }

  const width = primitiveSize(elementId);
  if (width !== undefined) {
    return { kind: 'span', bytes: reader.take(spanLength(reader, count, width, options)) };
  }

  const items: RawTag[] = [];
  for (let i = 0; i < count; i++) {
    items.push(decodeTag(reader, elementId, options, depth));
  }
  return { kind: 'list', items };
}

/**
 * Decode compound members until the End tag.
 * A name declared twice keeps the later value.
 */
export function decodeCompound(reader: NbtReader, options: NbtDecodeOptions, depth: number): RawCompound {
  checkDepth(reader, depth, options);
  const entries = new Map<string, RawTag>();

  for (;;) {
    const id = reader.readU8();
    if (!isTagId(id)) {
      throw unknownTag(reader, id);
    }
    if (id === TagId.End) break;
    const name = reader.take(reader.readU16());
    entries.set(nameKey(name), decodeTag(reader, id, options, depth));
  }

  return { kind: 'map', entries };
}

/**
 * Decode a whole document. The root must be a compound; its name is skipped.
 */
export function loadRoot(
  buffer: ArrayBufferLike | Uint8Array,
  options: Partial<NbtDecodeOptions> = {},
): RawCompound {
  const resolved = resolveOptions(options);
  const reader = new NbtReader(buffer);

  const id = reader.readU8();
  if (id !== TagId.Compound) {
    throw new NbtError('InvalidRoot', `Root tag is not a compound (found tag id ${id})`, 0);
  }
  reader.skip(reader.readU16());

  return decodeCompound(reader, resolved, 0);
}
