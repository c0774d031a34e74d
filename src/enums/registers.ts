export enum RegisterName {
  M = "M" /* Operating register, receives keyboard entry */,
  A = "A" /* Arithmetic register */,
  R = "R" /* Result / remainder register */,
  B = "B",
  C = "C",
  D = "D",
  E = "E",
  F = "F",
}

export enum Sign {
  POSITIVE = "+",
  NEGATIVE = "-",
}

export const REGISTER_NAMES: readonly RegisterName[] = [
  RegisterName.M,
  RegisterName.A,
  RegisterName.R,
  RegisterName.B,
  RegisterName.C,
  RegisterName.D,
  RegisterName.E,
  RegisterName.F,
];

/** Storage registers that the display, transfer and exchange keys can address. */
export const STORAGE_REGISTERS: readonly RegisterName[] = [
  RegisterName.B,
  RegisterName.C,
  RegisterName.D,
  RegisterName.E,
  RegisterName.F,
];

export function isRegisterName(key: string): key is RegisterName {
  return REGISTER_NAMES.some((name) => name === key);
}

export function isStorageRegister(key: string): key is RegisterName {
  return STORAGE_REGISTERS.some((name) => name === key);
}
