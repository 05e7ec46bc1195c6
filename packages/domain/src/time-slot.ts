import { Duration } from "./duration";

export class TimeSlot {
  private readonly _start: Date;
  private readonly _end: Date;

  private constructor(start: Date, end: Date) {
    if (!(start instanceof Date) || Number.isNaN(start.getTime())) {
      throw new TypeError("Invalid start date for time slot");
    }
    if (!(end instanceof Date) || Number.isNaN(end.getTime())) {
      throw new TypeError("Invalid end date for time slot");
    }
    if (end.getTime() <= start.getTime()) {
      throw new RangeError("Time slot end must be after start");
    }
    this._start = new Date(start.getTime());
    this._end = new Date(end.getTime());
  }

  static fromIso(start: string, end: string): TimeSlot {
    return new TimeSlot(new Date(start), new Date(end));
  }

  /** Returns null instead of throwing when either bound does not parse. */
  static tryFromIso(start: string | null | undefined, end: string | null | undefined): TimeSlot | null {
    if (!start || !end) {
      return null;
    }
    const startMs = Date.parse(start);
    const endMs = Date.parse(end);
    if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || endMs <= startMs) {
      return null;
    }
    return new TimeSlot(new Date(startMs), new Date(endMs));
  }

  get start(): Date {
    return new Date(this._start.getTime());
  }

  get end(): Date {
    return new Date(this._end.getTime());
  }

  get duration(): Duration {
    return Duration.between(this._start, this._end);
  }

  // Half-open: the end instant belongs to the next slot.
  contains(instant: Date): boolean {
    const ms = instant.getTime();
    return this._start.getTime() <= ms && ms < this._end.getTime();
  }

  overlaps(start: Date, end: Date): boolean {
    return this._end.getTime() > start.getTime() && this._start.getTime() < end.getTime();
  }

  endsAfter(instant: Date): boolean {
    return this._end.getTime() > instant.getTime();
  }

  toJSON(): { start: string; end: string } {
    return {start: this._start.toISOString(), end: this._end.toISOString()};
  }
}
