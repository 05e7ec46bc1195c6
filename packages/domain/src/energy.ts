import { Duration } from "./duration";
import { Power } from "./power";

/** Amount of electricity, stored in watt-hours. */
export class Energy {
  private readonly _wattHours: number;

  private constructor(wattHours: number) {
    if (!Number.isFinite(wattHours)) {
      throw new TypeError("Energy requires a finite numeric value in watt-hours");
    }
    this._wattHours = wattHours;
  }

  static fromPowerAndDuration(power: Power, duration: Duration): Energy {
    return new Energy(power.watts * duration.hours);
  }

  static zero(): Energy {
    return new Energy(0);
  }

  get kilowattHours(): number {
    return this._wattHours / 1000;
  }

  toJSON(): number {
    return this._wattHours;
  }

  add(other: Energy): Energy {
    return new Energy(this._wattHours + other._wattHours);
  }
}
