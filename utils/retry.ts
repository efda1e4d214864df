/**
 * Sleep helpers.
 * Every wait in a session goes through `interruptibleSleep`, which polls the
 * stop predicate once per second.
 */

import { IngestionErrors } from '../core/errors';

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(() => resolve(), ms);
  });

export interface InterruptibleSleepOptions {
  shouldStop?: () => boolean;
  sleeper?: Sleeper;
  /** Called with the remaining seconds every `notifyEverySeconds` */
  onTick?: (remainingSeconds: number) => void;
  notifyEverySeconds?: number;
  operation?: string;
}

/**
 * Sleeps `seconds` in one-second slices. Throws a CANCELLED IngestionError as
 * soon as the predicate reports true.
 */
export async function interruptibleSleep(
  seconds: number,
  options: InterruptibleSleepOptions = {}
): Promise<void> {
  const { shouldStop = () => false, sleeper = sleep, onTick, notifyEverySeconds, operation } = options;
  const total = Math.max(0, Math.ceil(seconds));

  for (let remaining = total; remaining > 0; remaining--) {
    if (shouldStop()) {
      throw IngestionErrors.cancelled('Stopped during wait', { operation });
    }
    await sleeper(1000);
    const left = remaining - 1;
    if (onTick && notifyEverySeconds && left > 0 && left % notifyEverySeconds === 0) {
      onTick(left);
    }
  }

  if (shouldStop()) {
    throw IngestionErrors.cancelled('Stopped during wait', { operation });
  }
}

/**
 * "MM:SS" rendering of a remaining wait.
 */
export function formatCountdown(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = seconds % 60;
  return `${String(mins).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}
