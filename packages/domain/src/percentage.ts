export class Percentage {
  private readonly _ratio: number;

  private constructor(ratio: number) {
    if (!Number.isFinite(ratio)) {
      throw new TypeError("Percentage requires a finite numeric value");
    }
    if (ratio < 0) {
      throw new RangeError("Percentage cannot be negative");
    }
    this._ratio = ratio;
  }

  static fromRatio(value: number): Percentage {
    return new Percentage(value);
  }

  // VAT is applied on top of the net amount.
  applyOnTop(amount: number): number {
    return amount * (1 + this._ratio);
  }

  toJSON(): number {
    return this._ratio;
  }
}
