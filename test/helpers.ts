import { IO } from "../src/IO/IO";
import { KeyProcessor } from "../src/processor";

export class FakeIO implements IO {
  public readonly output: string[] = [];
  public readonly warnings: string[] = [];
  private lineIndex = 0;

  /** A null entry stands for the user ending the session at that point. */
  constructor(private readonly lines: Array<string | null> = []) {}

  readLine(): string | null {
    if (this.lineIndex >= this.lines.length) return null;
    return this.lines[this.lineIndex++];
  }
  print(string: string): void {
    this.output.push(string);
  }
  warn(string: string): void {
    this.warnings.push(string);
  }
}

/** Presses every character of `keys` in turn. */
export function pressAll(processor: KeyProcessor, keys: string) {
  return Array.from(keys).map((key) => processor.press(key));
}

export function valueOf(processor: KeyProcessor, name: string) {
  return processor.bank.get(name).read().toFixed();
}
