export type NbtErrorKind =
  | 'InvalidRoot'
  | 'UnexpectedEndOfInput'
  | 'UnknownTag'
  | 'ArithmeticOverflow'
  | 'DepthLimitExceeded';

/** Which input of a comparison failed to decode. */
export type NbtSide = 'left' | 'right';

/**
 * Error thrown for any malformed NBT input.
 *
 * `kind` identifies the failure; `side` is only set by `compare`, which
 * re-throws decode failures annotated with the input they came from.
 */
export class NbtError extends Error {
  readonly kind: NbtErrorKind;
  readonly offset: number | undefined;
  readonly side: NbtSide | undefined;

  constructor(
    kind: NbtErrorKind,
    message: string,
    offset?: number,
    options: { side?: NbtSide; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'NbtError';
    this.kind = kind;
    this.offset = offset;
    this.side = options.side;
  }

  withSide(side: NbtSide): NbtError {
    return new NbtError(
      this.kind,
      `${this.message} (occurred while parsing ${side})`,
      this.offset,
      { side, cause: this },
    );
  }
}
