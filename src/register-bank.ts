import { REGISTER_NAMES, RegisterName } from "./enums/registers";
import { UnknownRegisterError } from "./errors";
import { Register, RegisterSnapshot } from "./register";

export type BankSnapshot = Array<{
  name: RegisterName;
  state: RegisterSnapshot;
}>;

export class RegisterBank {
  private readonly registers = new Map<string, Register>(
    REGISTER_NAMES.map((name): [string, Register] => [name, new Register()])
  );

  public get(name: string): Register {
    const register = this.registers.get(name);
    if (register === undefined) {
      throw new UnknownRegisterError(name);
    }
    return register;
  }

  public clearAll() {
    for (const register of this.registers.values()) {
      register.erase();
    }
  }

  /** Copies digits, sign and float state; `from` keeps its content. */
  public move(from: RegisterName, to: RegisterName) {
    if (from === to) return;
    this.get(to).copyFrom(this.get(from));
  }

  public swap(first: RegisterName, second: RegisterName) {
    if (first === second) return;
    const held = new Register();
    held.copyFrom(this.get(first));
    this.get(first).copyFrom(this.get(second));
    this.get(second).copyFrom(held);
  }

  public snapshot(): BankSnapshot {
    return REGISTER_NAMES.map((name) => ({
      name,
      state: this.get(name).snapshot(),
    }));
  }
}
