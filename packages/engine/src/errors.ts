export type SimulationErrorCode = "END_OF_CALENDAR" | "INVALID_STATE";

/**
 * Terminal failures of the clock or day loop. These always propagate to the caller.
 */
export class SimulationError extends Error {
  public constructor(
    public readonly code: SimulationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class EndOfCalendarError extends SimulationError {
  public constructor(message = "The trading calendar is exhausted") {
    super("END_OF_CALENDAR", message);
  }
}

export class InvalidStateError extends SimulationError {
  public constructor(message: string) {
    super("INVALID_STATE", message);
  }
}

export const isSimulationError = (
  error: unknown,
  code?: SimulationErrorCode,
): error is SimulationError =>
  error instanceof SimulationError && (code === undefined || error.code === code);
