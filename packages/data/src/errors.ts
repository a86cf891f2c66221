import type { ISODate } from "@daybook/sdk";

export type FeedErrorCode = "NOT_FOUND" | "INSUFFICIENT_HISTORY" | "LOOKAHEAD";

/**
 * Base class for every failure a feed reports. Callers branch on `code`.
 */
export class FeedError extends Error {
  public constructor(
    public readonly code: FeedErrorCode,
    public readonly instrumentId: string,
    public readonly date: ISODate,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BarNotFoundError extends FeedError {
  public constructor(instrumentId: string, date: ISODate) {
    super("NOT_FOUND", instrumentId, date, `No bar for ${instrumentId} on ${date}`);
  }
}

export class InsufficientHistoryError extends FeedError {
  public constructor(
    instrumentId: string,
    date: ISODate,
    public readonly available: number,
    public readonly required: number,
  ) {
    super(
      "INSUFFICIENT_HISTORY",
      instrumentId,
      date,
      `Indicators for ${instrumentId} on ${date} need ${required} bars, found ${available}`,
    );
  }
}

export class LookaheadError extends FeedError {
  public constructor(instrumentId: string, date: ISODate, public readonly asOf: ISODate) {
    super("LOOKAHEAD", instrumentId, date, `Requested ${instrumentId} on ${date} beyond as-of ${asOf}`);
  }
}

export const isFeedError = (error: unknown, code?: FeedErrorCode): error is FeedError =>
  error instanceof FeedError && (code === undefined || error.code === code);
