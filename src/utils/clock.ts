export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface FixedClock extends Clock {
  set(dateIso: string): void;
  advanceMinutes(minutes: number): void;
}

/** A clock that only moves when told to. */
export function createFixedClock(dateIso: string): FixedClock {
  let current = new Date(dateIso).getTime();
  return {
    now: () => new Date(current),
    set(next: string) {
      current = new Date(next).getTime();
    },
    advanceMinutes(minutes: number) {
      current += minutes * 60_000;
    },
  };
}

export function nowIso(clock: Clock): string {
  return clock.now().toISOString();
}
