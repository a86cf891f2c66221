import type { ISODate } from "@daybook/sdk";
import { isIsoDate } from "@daybook/sdk";

import { EndOfCalendarError, InvalidStateError } from "./errors.js";

/**
 * Ordered, de-duplicated list of the run's trading days.
 */
export class TradingCalendar {
  private readonly days: ReadonlyArray<ISODate>;
  private readonly positions: ReadonlyMap<ISODate, number>;

  public constructor(days: ReadonlyArray<ISODate>) {
    days.forEach((day, index) => {
      if (!isIsoDate(day)) {
        throw new Error(`Calendar entry ${index} is not a YYYY-MM-DD date: "${String(day)}"`);
      }
      const previous = days[index - 1];
      if (previous !== undefined && day <= previous) {
        throw new Error(`Calendar must be strictly increasing (${previous} then ${day})`);
      }
    });
    this.days = Object.freeze([...days]);
    this.positions = new Map(this.days.map((day, index) => [day, index]));
  }

  public get length(): number {
    return this.days.length;
  }

  public get first(): ISODate | null {
    return this.days[0] ?? null;
  }

  public get last(): ISODate | null {
    return this.days[this.days.length - 1] ?? null;
  }

  public dates(): ReadonlyArray<ISODate> {
    return this.days;
  }

  public at(index: number): ISODate | null {
    return this.days[index] ?? null;
  }

  /** Position of `date` in the calendar, or -1. */
  public indexOf(date: ISODate): number {
    return this.positions.get(date) ?? -1;
  }

  /**
   * The trading day `n` entries after `date`; null when `date` is not a trading day
   * or the result falls outside the calendar.
   */
  public offset(date: ISODate, n: number): ISODate | null {
    const index = this.indexOf(date);
    if (index < 0) {
      return null;
    }
    return this.at(index + n);
  }
}

export type ClockState = "idle" | "running" | "completed";

/**
 * Walks the calendar one day at a time: idle, then running on each day in turn, then completed.
 */
export class SimulationClock {
  private status: ClockState = "idle";
  private index = -1;

  public constructor(private readonly calendar: TradingCalendar) {}

  public get state(): ClockState {
    return this.status;
  }

  /** Zero-based index of the current day; -1 before the first advance. */
  public get dayIndex(): number {
    return this.index;
  }

  public hasNext(): boolean {
    return this.status !== "completed" && this.index + 1 < this.calendar.length;
  }

  /**
   * Moves to the next trading day and returns it.
   * @throws EndOfCalendarError when stepping past the last day (the clock is then completed).
   * @throws InvalidStateError once completed.
   */
  public advance(): ISODate {
    if (this.status === "completed") {
      throw new InvalidStateError("Cannot advance a completed clock");
    }
    const next = this.calendar.at(this.index + 1);
    if (next === null) {
      this.status = "completed";
      throw new EndOfCalendarError(
        `No trading day after ${this.calendar.last ?? "an empty calendar"}`,
      );
    }
    this.index += 1;
    this.status = "running";
    return next;
  }

  /** @throws InvalidStateError unless running. */
  public current(): ISODate {
    const date = this.status === "running" ? this.calendar.at(this.index) : null;
    if (date === null) {
      throw new InvalidStateError(`Clock is ${this.status}; there is no current day`);
    }
    return date;
  }

  public complete(): void {
    if (this.status === "completed") {
      throw new InvalidStateError("Clock is already completed");
    }
    this.status = "completed";
  }
}
