import { Decimal } from "../src/decimal";
import { REGISTER_NAMES, RegisterName, Sign } from "../src/enums/registers";
import { UnknownRegisterError } from "../src/errors";
import { RegisterBank } from "../src/register-bank";

describe("RegisterBank", () => {
  it("owns one register per name", () => {
    const bank = new RegisterBank();

    expect(bank.get(RegisterName.B)).toBe(bank.get("B"));
    expect(bank.get(RegisterName.B)).not.toBe(bank.get(RegisterName.C));
  });

  it("rejects names outside the bank", () => {
    expect(() => new RegisterBank().get("Z")).toThrow(UnknownRegisterError);
  });

  it("moves content without linking the registers", () => {
    const bank = new RegisterBank();
    bank.get(RegisterName.M).write(new Decimal("12.5"), 1);

    bank.move(RegisterName.M, RegisterName.A);
    bank.get(RegisterName.M).write(new Decimal("3"), 1);

    expect(bank.get(RegisterName.A).read().toFixed()).toBe("12.5");
    expect(bank.get(RegisterName.M).read().toFixed()).toBe("3");
  });

  it("swaps two registers", () => {
    const bank = new RegisterBank();
    bank.get(RegisterName.A).write(new Decimal("2"), 0);
    bank.get(RegisterName.D).write(new Decimal("-9"), 0);

    bank.swap(RegisterName.A, RegisterName.D);

    expect(bank.get(RegisterName.A).read().toFixed()).toBe("-9");
    expect(bank.get(RegisterName.D).read().toFixed()).toBe("2");
  });

  it("clears every register", () => {
    const bank = new RegisterBank();
    for (const name of REGISTER_NAMES) {
      bank.get(name).write(new Decimal("-1.5"), 1);
    }

    bank.clearAll();

    for (const name of REGISTER_NAMES) {
      const register = bank.get(name);
      expect(register.read().toFixed()).toBe("0");
      expect(register.sign).toBe(Sign.POSITIVE);
      expect(register.floatActive).toBe(false);
    }
  });

  it("snapshots in bank order", () => {
    const names = new RegisterBank().snapshot().map(({ name }) => name);

    expect(names).toEqual(["M", "A", "R", "B", "C", "D", "E", "F"]);
  });
});
