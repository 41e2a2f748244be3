export interface HintedErrorOptions {
  readonly detailLines?: readonly string[];
  readonly hintLines?: readonly string[];
  readonly cause?: unknown;
}

/** An error with a one-line headline plus optional detail and hint lines. */
export class HintedError extends Error {
  public readonly headline: string;
  public readonly detailLines: readonly string[];
  public readonly hintLines: readonly string[];

  constructor(headline: string, options: HintedErrorOptions = {}) {
    const { cause, detailLines = [], hintLines = [] } = options;
    super(headline, cause !== undefined ? { cause } : undefined);
    this.headline = headline;
    this.detailLines = [...detailLines];
    this.hintLines = [...hintLines];
  }
}

/**
 * Errors meant to reach the operator as-is: the lifecycle logs
 * {@link messageForDisplay} followed by the detail and hint lines.
 */
export abstract class DisplayableError extends HintedError {
  public messageForDisplay(): string {
    return this.headline;
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(toErrorMessage(error));
}
