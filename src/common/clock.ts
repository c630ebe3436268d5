import { Injectable } from '@nestjs/common';

/**
 * Source of "now" for date arithmetic; replaced with a fixed clock in tests
 */
@Injectable()
export class Clock {
  now(): Date {
    return new Date();
  }
}

export class FixedClock extends Clock {
  constructor(private readonly instant: Date) {
    super();
  }

  now(): Date {
    return new Date(this.instant.getTime());
  }
}
