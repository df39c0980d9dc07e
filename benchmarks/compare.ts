import { run, bench, summary } from 'mitata';

import { compare, LAST_UPDATE_FIELD, loadRoot } from '../src/index.ts';
import { TagId } from '../src/tags.ts';
import { compound, int, intArray, list, long, longArray, nbt, string } from '../tests/helpers/writer.ts';

function chunk(seed: number, lastUpdate: bigint): Uint8Array {
  const sections = Array.from({ length: 16 }, (_, y) =>
    compound([
      ['Y', int(y)],
      ['BlockStates', longArray(Array.from({ length: 256 }, (_, i) => BigInt(seed + i)))],
      ['Palette', list(TagId.Compound, [
        compound([['Name', string('minecraft:stone')]]),
        compound([['Name', string('minecraft:dirt')]]),
      ])],
    ]),
  );

  return nbt([
    ['DataVersion', int(3465)],
    ['LastUpdate', long(lastUpdate)],
    ['Heightmaps', compound([['MOTION_BLOCKING', longArray(Array.from({ length: 37 }, () => 0n))]])],
    ['Biomes', intArray(Array.from({ length: 1024 }, (_, i) => i % 8))],
    ['sections', list(TagId.Compound, sections)],
  ]);
}

const a = chunk(1, 100n);
const b = chunk(1, 200n);

summary(() => {
  bench('chunk - loadRoot', () => loadRoot(a));
  bench('chunk - compare', () => compare(a, b));
  bench('chunk - compare (exclude LastUpdate)', () => compare(a, b, LAST_UPDATE_FIELD));
});

await run();
