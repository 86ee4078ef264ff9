/** Millisecond clock; injected so elapsed times are reproducible in tests. */
export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

