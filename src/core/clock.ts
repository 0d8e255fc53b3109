/**
 * Time source injected into everything that reads "now", so that expiry can be
 * exercised without sleeping.
 */
export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
