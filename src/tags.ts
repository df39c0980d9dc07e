export enum TagId {
  End = 0,
  Byte = 1,
  Short = 2,
  Int = 3,
  Long = 4,
  Float = 5,
  Double = 6,
  ByteArray = 7,
  String = 8,
  List = 9,
  Compound = 10,
  IntArray = 11,
  LongArray = 12,
}

/**
 * Payload width in bytes of the fixed-size numeric tags, indexed by tag id.
 * End has no payload and is not a valid list element with a nonzero count.
 */
const TAG_SIZE: readonly number[] = [0, 1, 2, 4, 8, 4, 8];

export function isTagId(id: number): id is TagId {
  return Number.isInteger(id) && id >= TagId.End && id <= TagId.LongArray;
}

export function primitiveSize(id: TagId): number | undefined {
  return id >= TagId.Byte && id <= TagId.Double ? TAG_SIZE[id] : undefined;
}

// Element width of the array tags
export function arrayElementSize(id: TagId.ByteArray | TagId.IntArray | TagId.LongArray): number {
  switch (id) {
    case TagId.ByteArray:
      return 1;
    case TagId.IntArray:
      return 4;
    case TagId.LongArray:
      return 8;
  }
}
