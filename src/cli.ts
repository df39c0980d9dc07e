import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { compare, LAST_UPDATE_FIELD } from './compare.ts';
import { NbtError } from './errors.ts';

export const EXIT_EQUAL = 0;
export const EXIT_DIFFERENT = 1;
export const EXIT_ERROR = 2;

export interface CliArgs {
  left: string;
  right: string;
  exclude?: string;
}

export function printHelp(): void {
  console.log(`Usage: nbt-compare <left.nbt> <right.nbt> [options]

Compares two uncompressed NBT documents. Exits 0 when equal, 1 when
different, 2 on error.

Options:
  -e, --exclude <name>     Ignore a top-level member on both sides
  --ignore-last-update     Same as --exclude ${LAST_UPDATE_FIELD}
  -h, --help               Show this help`);
}

/**
 * Parse command line arguments (without the node and script entries).
 * Returns `null` when help was requested.
 */
export function parseArgs(args: string[]): CliArgs | null {
  const files: string[] = [];
  let exclude: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h' || arg === '--help') {
      return null;
    } else if (arg === '-e' || arg === '--exclude') {
      const name = args[++i];
      if (name === undefined) {
        throw new Error(`${arg} requires a field name`);
      }
      exclude = name;
    } else if (arg === '--ignore-last-update') {
      exclude = LAST_UPDATE_FIELD;
    } else if (arg.startsWith('-')) {
      throw new Error(`unknown option: ${arg}`);
    } else {
      files.push(arg);
    }
  }

  if (files.length !== 2) {
    throw new Error(`expected 2 files, got ${files.length}`);
  }

  return { left: files[0], right: files[1], exclude };
}

export async function run(args: string[]): Promise<number> {
  let parsed: CliArgs | null;
  try {
    parsed = parseArgs(args);
  } catch (err) {
    console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    printHelp();
    return EXIT_ERROR;
  }

  if (parsed === null) {
    printHelp();
    return EXIT_EQUAL;
  }

  const [left, right] = await Promise.all([
    readFile(resolve(parsed.left)),
    readFile(resolve(parsed.right)),
  ]);

  try {
    const equal = compare(left, right, parsed.exclude);
    console.log(equal ? 'equal' : 'different');
    return equal ? EXIT_EQUAL : EXIT_DIFFERENT;
  } catch (err) {
    if (err instanceof NbtError) {
      console.error(`error: ${err.message}`);
      return EXIT_ERROR;
    }
    throw err;
  }
}
