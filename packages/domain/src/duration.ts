const MS_PER_HOUR = 3_600_000;

export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new TypeError("Duration requires a finite number of milliseconds");
    }
    if (milliseconds < 0) {
      throw new RangeError("Duration cannot be negative");
    }
    this._milliseconds = milliseconds;
  }

  static between(start: Date, end: Date): Duration {
    return new Duration(Math.max(0, end.getTime() - start.getTime()));
  }

  get hours(): number {
    return this._milliseconds / MS_PER_HOUR;
  }

  toJSON(): number {
    return this._milliseconds;
  }
}
