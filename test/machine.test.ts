import { ScriptSyntaxError } from "../src/errors";
import { Machine } from "../src/machine";
import { KeyProcessor } from "../src/processor";
import { RegisterBank } from "../src/register-bank";
import { FakeIO } from "./helpers";

describe("Machine", () => {
  it("prints displays one per line", () => {
    const io = new FakeIO(["6", "↓", "7", "×"]);
    new Machine(io).run();

    expect(io.output).toEqual(["42\n"]);
  });

  it("prints error conditions and keeps going", () => {
    const io = new FakeIO(["5", "÷", "9", "_", "√", "◊"]);
    new Machine(io).run();

    expect(io.output).toEqual([
      "error: division by zero\n",
      "error: negative operand\n",
      "-9\n",
    ]);
  });

  it("reads the display digits from the next line", () => {
    const io = new FakeIO(["d", "2", "1", "◊"]);
    const machine = new Machine(io);
    machine.run();

    expect(machine.processor.displayDigits).toBe(2);
    expect(io.output).toEqual(["1.00\n"]);
  });

  it("stops when the input ends while reading the display digits", () => {
    const io = new FakeIO(["d", null, "5", "◊"]);
    const machine = new Machine(io);
    machine.run();

    expect(io.output).toEqual([]);
    expect(machine.processor.displayDigits).toBe(0);
  });

  it("reports a bad display digit count", () => {
    const io = new FakeIO(["d", "abc"]);
    new Machine(io).run();

    expect(io.output).toEqual([
      'error: display digits must be an integer from 0 to 21, received "abc"\n',
    ]);
  });

  it("reports ignored keys only when verbose", () => {
    const quiet = new FakeIO(["hello"]);
    new Machine(quiet).run();
    const verbose = new FakeIO(["hello"]);
    new Machine(verbose, new KeyProcessor(), { verbose: true }).run();

    expect(quiet.warnings).toEqual([]);
    expect(verbose.warnings).toEqual(['ignored: invalid key "hello"\n']);
  });

  it("dumps every register", () => {
    const io = new FakeIO(["1", ",", "2", "P"]);
    new Machine(io).run();

    const lines = io.output.join("").split("\n");
    expect(lines[0]).toBe("M: " + "0".repeat(20) + "12 float=1 sign=+");
    expect(lines[1]).toBe("A: " + "0".repeat(22) + " float=- sign=+");
    expect(lines).toHaveLength(9);
  });

  describe("runScript", () => {
    it("runs numbers and mnemonics", () => {
      const io = new FakeIO();
      new Machine(io).runScript("; compound\n12,5 down 2 mul\n");

      expect(io.output).toEqual(["25\n"]);
    });

    it("takes the display digit count from the script", () => {
      const io = new FakeIO();
      const machine = new Machine(io, new KeyProcessor(new RegisterBank(), 0));
      machine.runScript("digits 2\n1 down 3 div");

      expect(machine.processor.displayDigits).toBe(2);
      expect(io.output).toEqual(["3.00\n"]);
    });

    it("throws on unknown words", () => {
      const io = new FakeIO();

      expect(() => new Machine(io).runScript("1 add\nfoo")).toThrow(
        new ScriptSyntaxError('Unknown key "foo"', 2)
      );
      expect(io.output).toEqual([]);
    });
  });
});
