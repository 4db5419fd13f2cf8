// Block timestamp source, in seconds

export interface Clock {
  now(): bigint;
}

export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

/**
 * Clock that only moves when told to, for tests and scripted runs
 */
export class ManualClock implements Clock {
  constructor(private current: bigint) {}

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    this.current = timestamp;
  }

  advance(seconds: bigint): bigint {
    this.current += seconds;
    return this.current;
  }
}
