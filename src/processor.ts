import { Decimal } from "./decimal";
import { Key, isCommandKey, isDigitKey } from "./enums/keys";
import {
  RegisterName,
  Sign,
  isRegisterName,
  isStorageRegister,
} from "./enums/registers";
import {
  CalculatorError,
  DivisionByZeroError,
  InvalidDisplayDigitsError,
  InvalidKeyError,
  NegativeSqrtOperandError,
  RegisterFullError,
  Result,
  fail,
  ok,
} from "./errors";
import { OutputFormatter } from "./formatter";
import { Register } from "./register";
import { BankSnapshot, RegisterBank } from "./register-bank";

export type KeyOutcome =
  | { kind: "none" }
  | { kind: "display"; text: string }
  | { kind: "error"; error: CalculatorError }
  | { kind: "ignored"; error: InvalidKeyError }
  | { kind: "awaitDigits" }
  | { kind: "dump"; registers: BankSnapshot };

const NONE: KeyOutcome = { kind: "none" };

/**
 * Interprets one key at a time. Most keys mean something different
 * depending on the key pressed just before them, so the processor keeps the
 * previous key (plus one step of backup for the undo key) next to the
 * register bank.
 */
export class KeyProcessor {
  public static readonly MAX_DISPLAY_DIGITS = Register.CAPACITY - 1;

  private readonly formatter = new OutputFormatter();
  private lastKey = "";
  private lastKeyBackup = "";
  private digits = 0;

  constructor(
    public readonly bank: RegisterBank = new RegisterBank(),
    displayDigits = 0
  ) {
    const applied = this.setDisplayDigits(displayDigits);
    if (!applied.ok) {
      throw applied.error;
    }
  }

  public get previousKey() {
    return this.lastKey;
  }

  public get previousKeyBackup() {
    return this.lastKeyBackup;
  }

  public get displayDigits() {
    return this.digits;
  }

  public setDisplayDigits(
    input: number | string
  ): Result<number, InvalidDisplayDigitsError> {
    const text = String(input).trim();
    const count = Number(text);
    if (!/^\d+$/.test(text) || count > KeyProcessor.MAX_DISPLAY_DIGITS) {
      return fail(
        new InvalidDisplayDigitsError(text, KeyProcessor.MAX_DISPLAY_DIGITS)
      );
    }
    this.digits = count;
    return ok(count);
  }

  public press(key: string): KeyOutcome {
    if (!isDigitKey(key) && !isCommandKey(key) && !isRegisterName(key)) {
      return { kind: "ignored", error: new InvalidKeyError(key) };
    }
    if (key === Key.UNDO) {
      this.lastKey = this.lastKeyBackup;
      return NONE;
    }
    // A comma outside digit entry leaves the context alone, so the digit
    // after it still continues the number being entered.
    if (key === Key.COMMA && !isDigitKey(this.lastKey)) {
      return NONE;
    }

    const outcome = this.dispatch(key);
    this.lastKeyBackup = this.lastKey;
    this.lastKey = key;
    return outcome;
  }

  private dispatch(key: string): KeyOutcome {
    if (isDigitKey(key)) {
      return this.enterDigit(Number(key));
    }
    if (!isCommandKey(key)) {
      // Register names only select the target of the next key.
      return NONE;
    }

    const M = this.bank.get(RegisterName.M);
    const A = this.bank.get(RegisterName.A);

    switch (key) {
      case Key.COMMA: {
        M.floatActive = true;
        return NONE;
      }
      case Key.SIGN: {
        M.sign = Sign.NEGATIVE;
        return NONE;
      }
      case Key.ADD: {
        return this.store([RegisterName.A], M.read().plus(A.read()));
      }
      case Key.SUBTRACT: {
        return this.store([RegisterName.A], M.read().minus(A.read()));
      }
      case Key.MULTIPLY: {
        const product = M.read().times(A.read());
        return this.storeAndShow([RegisterName.A, RegisterName.R], product);
      }
      case Key.DIVIDE: {
        const divisor = A.read();
        if (divisor.isZero()) {
          return { kind: "error", error: new DivisionByZeroError() };
        }
        const dividend = M.read();
        const quotient = dividend.dividedBy(divisor);
        const shown = this.storeAndShow([RegisterName.A], quotient);
        if (shown.kind === "display" && this.digits === 0) {
          // floored: the remainder takes the divisor's sign
          const floored = quotient.toDecimalPlaces(0, Decimal.ROUND_FLOOR);
          const remainder = this.store(
            [RegisterName.R],
            dividend.minus(divisor.times(floored))
          );
          if (remainder.kind === "error") return remainder;
        }
        return shown;
      }
      case Key.SQRT: {
        const operand = M.read();
        if (operand.lessThan(0)) {
          return {
            kind: "error",
            error: new NegativeSqrtOperandError(operand.toFixed()),
          };
        }
        const root = operand.squareRoot();
        const stored = this.store([RegisterName.A], root);
        if (stored.kind === "error") return stored;
        return this.storeAndShow([RegisterName.M], root.times(2), root);
      }
      case Key.PRINT: {
        if (isStorageRegister(this.lastKey)) {
          const register = this.bank.get(this.lastKey);
          return this.show(this.formatter.raw(register.read()));
        }
        return this.show(this.formatter.format(M.read(), this.digits));
      }
      case Key.PRINT_CLEAR: {
        if (
          this.lastKey === RegisterName.A ||
          this.lastKey === RegisterName.R ||
          isStorageRegister(this.lastKey)
        ) {
          const register = this.bank.get(this.lastKey);
          const text = this.formatter.raw(register.read());
          if (this.lastKey !== RegisterName.R) {
            register.erase();
          }
          return this.show(text);
        }
        return this.show(this.formatter.format(M.read(), this.digits));
      }
      case Key.CLEAR_ALL: {
        this.bank.clearAll();
        return NONE;
      }
      case Key.TRANSFER_DOWN: {
        this.bank.move(RegisterName.M, RegisterName.A);
        return NONE;
      }
      case Key.TRANSFER_UP: {
        if (isStorageRegister(this.lastKey)) {
          this.bank.move(RegisterName.M, this.lastKey);
        }
        return NONE;
      }
      case Key.EXCHANGE: {
        if (this.lastKey === RegisterName.A) {
          A.sign = Sign.POSITIVE;
        } else if (isStorageRegister(this.lastKey)) {
          this.bank.swap(RegisterName.A, this.lastKey);
        }
        return NONE;
      }
      case Key.SET_DIGITS:
        return { kind: "awaitDigits" };
      case Key.DEBUG:
        return { kind: "dump", registers: this.bank.snapshot() };
      case Key.UNDO:
        // handled in press(), it must not move the context forward
        return NONE;
    }
  }

  private enterDigit(digit: number): KeyOutcome {
    const M = this.bank.get(RegisterName.M);
    if (isDigitKey(this.lastKey) || this.lastKey === Key.COMMA) {
      if (M.isFull()) {
        return { kind: "error", error: new RegisterFullError() };
      }
      M.shift();
    } else {
      M.erase();
    }
    M.setUnits(digit);
    return NONE;
  }

  private store(targets: RegisterName[], value: Decimal): KeyOutcome {
    for (const name of targets) {
      const written = this.bank.get(name).write(value, this.digits);
      if (!written.ok) {
        return { kind: "error", error: written.error };
      }
    }
    return NONE;
  }

  private storeAndShow(
    targets: RegisterName[],
    value: Decimal,
    shown: Decimal = value
  ): KeyOutcome {
    const stored = this.store(targets, value);
    if (stored.kind === "error") return stored;
    return this.show(this.formatter.format(shown, this.digits));
  }

  private show(text: string): KeyOutcome {
    return { kind: "display", text };
  }
}
