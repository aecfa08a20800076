/**
 * Time source injected into the registry and enrollment pipeline.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * A clock that returns a fixed instant until advanced. Used by tests and
 * replays.
 */
export class ManualClock implements Clock {
  private current: Date;

  constructor(start: string | Date) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  set(at: string | Date): void {
    this.current = new Date(at);
  }
}

/** ISO-8601 timestamp for the clock's current time. */
export function nowISO(clock: Clock = systemClock): string {
  return clock.now().toISOString();
}
