/** Milliseconds since the epoch. Injected so tests control time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** Wire and domain timestamps are whole epoch seconds. */
export function epochSeconds(clock: Clock): number {
  return Math.floor(clock() / 1000);
}
