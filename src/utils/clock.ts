export interface TimerHandle {
  cancel(): void;
  // Stop the timer from keeping the process alive
  unref(): void;
}

/**
 * Time source used by every timer-driven component, swapped for a manual
 * clock in tests
 */
export interface Clock {
  now(): number;
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  setTimeout: (callback, delayMs) => {
    const timer = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(timer),
      unref: () => {
        timer.unref();
      }
    };
  }
};
