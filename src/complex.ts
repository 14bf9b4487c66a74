import { ValidationError, describeKind } from "./errors";

/**
 * Immutable complex number. A kind of its own for hashing: `new Complex(1, 0)`
 * never digests like the float `1` or the int `1n`.
 */
export class Complex {
  readonly re: number;
  readonly im: number;

  constructor(re: number, im = 0) {
    this.re = re;
    this.im = im;
    Object.freeze(this);
  }

  /** Strict constructor: accepts complex numbers and real numbers of any kind. */
  static strict(value: unknown): Complex {
    if (value instanceof Complex) return value;
    if (typeof value === "number") return new Complex(value, 0);
    if (typeof value === "bigint") return new Complex(Number(value), 0);
    throw new ValidationError(
      `expected a complex number, got ${describeKind(value)}`,
      value
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Complex &&
      Object.is(this.re, other.re) &&
      Object.is(this.im, other.im)
    );
  }

  toString(): string {
    const sign = this.im < 0 || Object.is(this.im, -0) ? "-" : "+";
    return `(${this.re}${sign}${Math.abs(this.im)}j)`;
  }
}
