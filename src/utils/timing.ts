import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number) => Promise<void>;

/** Milliseconds since the epoch. */
export type Clock = () => number;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

export const systemClock: Clock = () => Date.now();

export class TimeoutError extends Error {
  constructor(readonly label: string, readonly ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Race `promise` against a timer. The timer is cleared once the promise settles;
 * the promise itself keeps running when the timer wins.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}
