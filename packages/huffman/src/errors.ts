export type HuffmanErrorKind =
  | "UnknownSymbol"
  | "MisalignedPayload"
  | "TruncatedOrCorruptPayload"
  | "InvalidFrequencyTable"
  | "InvalidArchive";

/**
 * Base class of every failure raised by the codec. Switch on `kind` or use
 * `instanceof` on the concrete classes.
 */
export abstract class HuffmanError extends Error {
  abstract readonly kind: HuffmanErrorKind;
}

export function describeSymbol(symbol: unknown): string {
  return typeof symbol === "string" ? JSON.stringify(symbol) : String(symbol);
}

export class UnknownSymbolError extends HuffmanError {
  readonly kind = "UnknownSymbol" as const;

  constructor(
    readonly symbol: unknown,
    readonly position: number
  ) {
    super(
      `No code for symbol ${describeSymbol(symbol)} at position ${position}`
    );
    this.name = "UnknownSymbolError";
  }
}

export class MisalignedPayloadError extends HuffmanError {
  readonly kind = "MisalignedPayload" as const;

  constructor(readonly bitLength: number) {
    super(`Padded bit stream of ${bitLength} bits is not byte aligned`);
    this.name = "MisalignedPayloadError";
  }
}

export class TruncatedOrCorruptPayloadError extends HuffmanError {
  readonly kind = "TruncatedOrCorruptPayload" as const;

  constructor(readonly reason: string) {
    super(`Truncated or corrupt payload: ${reason}`);
    this.name = "TruncatedOrCorruptPayloadError";
  }
}

export class InvalidFrequencyTableError extends HuffmanError {
  readonly kind = "InvalidFrequencyTable" as const;

  constructor(
    readonly symbol: unknown,
    readonly frequency: number
  ) {
    super(
      `Frequency of symbol ${describeSymbol(symbol)} must be a positive integer, got ${frequency}`
    );
    this.name = "InvalidFrequencyTableError";
  }
}

export class InvalidArchiveError extends HuffmanError {
  readonly kind = "InvalidArchive" as const;

  constructor(reason: string) {
    super(`Invalid archive: ${reason}`);
    this.name = "InvalidArchiveError";
  }
}
