import { Energy } from "./energy";

/**
 * Price of one kilowatt-hour in the configured market currency. Negative
 * values are valid: day-ahead prices drop below zero on windy, sunny days.
 */
export class EnergyPrice {
  private readonly _perKwh: number;

  private constructor(perKwh: number) {
    if (!Number.isFinite(perKwh)) {
      throw new TypeError("EnergyPrice requires a finite numeric value");
    }
    this._perKwh = perKwh;
  }

  static perKilowattHour(value: number): EnergyPrice {
    return new EnergyPrice(value);
  }

  costFor(energy: Energy): number {
    return energy.kilowattHours * this._perKwh;
  }

  toJSON(): number {
    return this._perKwh;
  }
}
