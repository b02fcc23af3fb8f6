/**
 * Counter Clock
 * Maps Unix time onto RFC 6238 time-step counters
 */

/**
 * Current wall-clock time in whole seconds
 */
export function currentTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}

function floorDiv(numerator: bigint, denominator: bigint): bigint {
  const quotient = numerator / denominator;
  // BigInt division truncates toward zero
  return numerator % denominator !== 0n && (numerator < 0n) !== (denominator < 0n)
    ? quotient - 1n
    : quotient;
}

function floorMod(numerator: bigint, denominator: bigint): bigint {
  return numerator - floorDiv(numerator, denominator) * denominator;
}

/**
 * Time-step counter: floor((timestamp - t0) / timeStep).
 * Timestamps before t0 yield negative counters.
 */
export function counterAt(timestamp: number, t0: number, timeStep: number): bigint {
  return floorDiv(BigInt(timestamp) - BigInt(t0), BigInt(timeStep));
}

/**
 * Seconds left in the current time step, in [1, timeStep]
 */
export function timeRemainingAt(timestamp: number, t0: number, timeStep: number): number {
  const elapsed = floorMod(BigInt(timestamp) - BigInt(t0), BigInt(timeStep));
  return timeStep - Number(elapsed);
}
