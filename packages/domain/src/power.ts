import { Duration } from "./duration";
import { Energy } from "./energy";

/** Constant draw of a device, e.g. a heat pump or charger. */
export class Power {
  private readonly _watts: number;

  private constructor(watts: number) {
    if (!Number.isFinite(watts)) {
      throw new TypeError("Power requires a finite numeric value in watts");
    }
    this._watts = watts;
  }

  static fromKilowatts(value: number): Power {
    return new Power(value * 1000);
  }

  get watts(): number {
    return this._watts;
  }

  toJSON(): number {
    return this._watts;
  }

  /** Energy drawn when running at this power for `duration`. */
  forDuration(duration: Duration): Energy {
    return Energy.fromPowerAndDuration(this, duration);
  }
}
