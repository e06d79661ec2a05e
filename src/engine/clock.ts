/** Logical clock in whole seconds. Deadlines and unlock times compare against it. */
export interface Clock {
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(time: number): void {
    this.current = time;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }
}
