/**
 * Limits applied while decoding an NBT document.
 */
export interface NbtDecodeOptions {
  /**
   * Maximum nesting of lists and compounds below the root compound.
   * Deeper documents fail with `DepthLimitExceeded`.
   * Default is 512, the limit the game itself enforces.
   */
  maxDepth: number;

  /**
   * Largest byte length an array or primitive list may declare
   * (element count times element width). Larger products fail with
   * `ArithmeticOverflow`.
   * Default is 0xffffffff, a 32-bit address space.
   */
  maxSpanLength: number;
}

export const DEFAULT_OPTIONS: NbtDecodeOptions = {
  maxDepth: 512,
  maxSpanLength: 0xffff_ffff,
};

export function resolveOptions(options: Partial<NbtDecodeOptions> = {}): NbtDecodeOptions {
  return {
    maxDepth: options.maxDepth ?? DEFAULT_OPTIONS.maxDepth,
    maxSpanLength: options.maxSpanLength ?? DEFAULT_OPTIONS.maxSpanLength,
  };
}
