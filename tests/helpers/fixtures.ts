import { TagId } from '../../src/tags.ts';
import {
  byte,
  byteArray,
  compound,
  double,
  float,
  int,
  intArray,
  list,
  long,
  longArray,
  nbt,
  short,
  string,
} from './writer.ts';

/**
 * A document using every tag type, including nested lists and compounds.
 */
export function everyTagDocument(rootName = 'root'): Uint8Array {
  return nbt(
    [
      ['b', byte(1)],
      ['s', short(2)],
      ['i', int(3)],
      ['l', long(4n)],
      ['f', float(1.5)],
      ['d', double(2.5)],
      ['ba', byteArray([1, 2, 3])],
      ['str', string('hello')],
      ['ints', list(TagId.Int, [int(1), int(2)])],
      ['names', list(TagId.String, [string('a'), string('b')])],
      ['nested', compound([
        ['ia', intArray([7])],
        ['la', longArray([8n])],
      ])],
      ['compounds', list(TagId.Compound, [compound([['k', byte(0)]]), compound([])])],
      ['lists', list(TagId.List, [list(TagId.Short, [short(9)]), list(TagId.End, [])])],
      ['empty', list(TagId.End, [])],
    ],
    rootName,
  );
}

/**
 * `depth` compounds nested inside the root, each under the name "c".
 */
export function nestedCompounds(depth: number): Uint8Array {
  const bytes: number[] = [TagId.Compound, 0x00, 0x00];
  for (let i = 0; i < depth; i++) {
    bytes.push(TagId.Compound, 0x00, 0x01, 0x63);
  }
  for (let i = 0; i <= depth; i++) {
    bytes.push(TagId.End);
  }
  return Uint8Array.from(bytes);
}
