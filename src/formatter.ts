import { Decimal } from "./decimal";

export class OutputFormatter {
  /**
   * Renders `value` with exactly `displayDigits` fractional digits. Extra
   * digits are cut the same way `Register.write` cuts them, so the display
   * shows what the register keeps.
   */
  public format(value: Decimal, displayDigits: number) {
    return value.toFixed(displayDigits, Decimal.ROUND_DOWN);
  }

  public raw(value: Decimal) {
    return value.toFixed();
  }
}
