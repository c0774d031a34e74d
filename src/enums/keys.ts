export enum Key {
  COMMA = ",",
  SIGN = "_",
  ADD = "+",
  SUBTRACT = "-",
  MULTIPLY = "×",
  DIVIDE = "÷",
  SQRT = "√",
  PRINT = "◊" /* primary display */,
  PRINT_CLEAR = "*" /* secondary display, clears the register shown */,
  CLEAR_ALL = "r",
  UNDO = "u",
  TRANSFER_DOWN = "↓" /* M -> A */,
  TRANSFER_UP = "↑" /* M -> B..F */,
  EXCHANGE = "↕",
  SET_DIGITS = "d",
  DEBUG = "P",
}

export const DIGIT_KEYS = "0123456789";

const COMMAND_KEYS: readonly string[] = Object.values(Key);

export function isDigitKey(key: string): boolean {
  return key.length === 1 && DIGIT_KEYS.includes(key);
}

export function isCommandKey(key: string): key is Key {
  return COMMAND_KEYS.includes(key);
}
