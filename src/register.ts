import { Decimal } from "./decimal";
import { Sign } from "./enums/registers";
import { RegisterOverflowError, Result, fail, ok } from "./errors";

export interface RegisterSnapshot {
  /** Most significant digit first. */
  readonly digits: readonly number[];
  readonly floatActive: boolean;
  readonly floatPosition: number;
  readonly sign: Sign;
}

export class Register {
  public static readonly CAPACITY = 22;
  private static readonly TOP = Register.CAPACITY - 1;

  private readonly digits = new Uint8Array(Register.CAPACITY);
  public floatActive = false;
  public floatPosition = 0; // digits after the decimal point
  public sign = Sign.POSITIVE;

  public digitAt(index: number) {
    return this.digits[index];
  }

  /** Sets the units digit, used by keyboard entry after a shift or erase. */
  public setUnits(digit: number) {
    if (!Number.isInteger(digit) || digit < 0 || digit > 9) {
      throw new RangeError("Not a decimal digit: " + digit);
    }
    this.digits[0] = digit;
  }

  public isFull() {
    return !(
      this.digits[Register.TOP] === 0 && this.floatPosition !== Register.TOP
    );
  }

  public shift() {
    for (let i = Register.TOP; i > 0; i--) {
      this.digits[i] = this.digits[i - 1];
    }
    this.digits[0] = 0;
    if (this.floatActive) {
      this.floatPosition++;
    }
  }

  public erase() {
    this.digits.fill(0);
    this.floatActive = false;
    this.floatPosition = 0;
    this.sign = Sign.POSITIVE;
  }

  public read(): Decimal {
    let text = "";
    for (let i = Register.TOP; i >= 0; i--) {
      text += this.digits[i];
    }
    if (this.floatActive && this.floatPosition > 0) {
      const point = text.length - this.floatPosition;
      text = `${text.slice(0, point)}.${text.slice(point)}`;
    }
    return new Decimal(this.sign === Sign.NEGATIVE ? "-" + text : text);
  }

  /**
   * Stores `value`, keeping at most `displayDigits` fractional digits
   * (the rest are cut, not rounded). Leaves the register untouched when the
   * value does not fit.
   */
  public write(
    value: Decimal,
    displayDigits: number
  ): Result<void, RegisterOverflowError> {
    const [integerPart, fractionPart] = value.abs().toFixed().split(".");
    const kept = (fractionPart ?? "").slice(0, displayDigits);
    const digitText = (integerPart + kept).replace(/^0+(?=\d)/, "");

    if (digitText.length > Register.CAPACITY) {
      return fail(new RegisterOverflowError(value.toFixed(), Register.CAPACITY));
    }

    this.digits.fill(0);
    for (let i = 0; i < digitText.length; i++) {
      this.digits[i] = Number(digitText[digitText.length - 1 - i]);
    }
    this.floatActive = fractionPart !== undefined;
    this.floatPosition = kept.length;
    this.sign = value.isNegative() ? Sign.NEGATIVE : Sign.POSITIVE;
    return ok(undefined);
  }

  public copyFrom(other: Register) {
    this.digits.set(other.digits);
    this.floatActive = other.floatActive;
    this.floatPosition = other.floatPosition;
    this.sign = other.sign;
  }

  public snapshot(): RegisterSnapshot {
    return {
      digits: Array.from(this.digits).reverse(),
      floatActive: this.floatActive,
      floatPosition: this.floatPosition,
      sign: this.sign,
    };
  }
}
