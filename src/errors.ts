/**
 * Error types reported by the calculator.
 *
 * Key-driven conditions (full register, division by zero, ...) are never
 * thrown out of the key processor: they travel back to the driver inside a
 * {@link KeyOutcome} and are printed as `error: <message>`. Only startup
 * problems (bad options, malformed scripts) are thrown.
 */

export type Result<T, E extends Error = CalculatorError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}

export class CalculatorError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "CalculatorError";
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A value needs more digits than a register holds.
 */
export class RegisterOverflowError extends CalculatorError {
  readonly value: string;

  constructor(value: string, capacity: number) {
    super("register overflow", "REGISTER_OVERFLOW", { value, capacity });
    this.name = "RegisterOverflowError";
    this.value = value;
  }
}

/**
 * Digit entry into M was refused because its top slot is taken.
 */
export class RegisterFullError extends CalculatorError {
  constructor() {
    super("register full", "REGISTER_FULL");
    this.name = "RegisterFullError";
  }
}

export class DivisionByZeroError extends CalculatorError {
  constructor() {
    super("division by zero", "DIVISION_BY_ZERO");
    this.name = "DivisionByZeroError";
  }
}

export class NegativeSqrtOperandError extends CalculatorError {
  constructor(operand: string) {
    super("negative operand", "NEGATIVE_SQRT_OPERAND", { operand });
    this.name = "NegativeSqrtOperandError";
  }
}

export class UnknownRegisterError extends CalculatorError {
  readonly register: string;

  constructor(register: string) {
    super(`unknown register "${register}"`, "UNKNOWN_REGISTER", { register });
    this.name = "UnknownRegisterError";
    this.register = register;
  }
}

export class InvalidKeyError extends CalculatorError {
  readonly key: string;

  constructor(key: string) {
    super(`invalid key "${key}"`, "INVALID_KEY", { key });
    this.name = "InvalidKeyError";
    this.key = key;
  }
}

export class InvalidDisplayDigitsError extends CalculatorError {
  constructor(input: string, max: number) {
    super(
      `display digits must be an integer from 0 to ${max}, received "${input}"`,
      "INVALID_DISPLAY_DIGITS",
      { input, max }
    );
    this.name = "InvalidDisplayDigitsError";
  }
}

export class ScriptSyntaxError extends CalculatorError {
  readonly line: number;

  constructor(message: string, line: number) {
    super(`line ${line}: ${message}`, "SCRIPT_SYNTAX", { line });
    this.name = "ScriptSyntaxError";
    this.line = line;
  }
}

export class ConfigurationError extends CalculatorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigurationError";
  }
}

export class ScriptFileError extends CalculatorError {
  constructor(scriptPath: string, reason: string) {
    super(`cannot read script ${scriptPath}: ${reason}`, "SCRIPT_FILE", {
      scriptPath,
    });
    this.name = "ScriptFileError";
  }
}
