export class Scalar {
  protected readonly numericValue: number;

  protected constructor(value: number) {
    if (!Number.isFinite(value)) {
      throw new TypeError("Scalar requires a finite numeric value");
    }
    this.numericValue = value;
  }

  static one(): Scalar {
    return new Scalar(1);
  }

  get value(): number {
    return this.numericValue;
  }

  times(factor: number | Scalar): Scalar {
    return new Scalar(this.numericValue * Scalar.resolve(factor));
  }

  divide(divisor: number | Scalar): Scalar {
    const numeric = Scalar.resolve(divisor);
    if (numeric === 0) {
      throw new RangeError("Cannot divide by zero");
    }
    return new Scalar(this.numericValue / numeric);
  }

  /** 1 / value; turns an efficiency into the energy needed per delivered unit. */
  reciprocal(): Scalar {
    return Scalar.one().divide(this);
  }

  protected static resolve(input: number | Scalar): number {
    return input instanceof Scalar ? input.numericValue : input;
  }
}
