/**
 * Percentage value object
 * Stores a ratio as a decimal (0.001 = 0.1%)
 */
export class Percentage {
  private constructor(private readonly value: number) {
    if (!Number.isFinite(value)) {
      throw new Error(`Percentage must be finite, got ${value}`);
    }
  }

  /**
   * Create from decimal value (e.g., 0.001 = 0.1%)
   */
  static fromDecimal(decimal: number): Percentage {
    return new Percentage(decimal);
  }

  toDecimal(): number {
    return this.value;
  }

  toPercent(): number {
    return this.value * 100;
  }

  /**
   * 1 - value, e.g. the price multiplier for a discount
   */
  complement(): Percentage {
    return new Percentage(1 - this.value);
  }

  toString(): string {
    return `${this.toPercent()}%`;
  }
}
