/** Minor units (cents) per currency unit. */
export const MINOR_UNITS = 100;

// Absorbs binary representation error such as 1.005 * 100 = 100.49999999999999.
const HALF_UP_NUDGE = 1e-6;

/**
 * Converts an amount to integer minor units, rounding half away from zero.
 */
export const toMinorUnits = (amount: number): number => {
  const scaled = amount * MINOR_UNITS;
  if (scaled < 0) {
    return -Math.round(-scaled + HALF_UP_NUDGE);
  }
  return Math.round(scaled + HALF_UP_NUDGE);
};

export const fromMinorUnits = (minor: number): number => minor / MINOR_UNITS;

/** Rounds an amount to the nearest minor unit. */
export const roundMoney = (amount: number): number => fromMinorUnits(toMinorUnits(amount));
