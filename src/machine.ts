import { IO } from "./IO/IO";
import { KeyOutcome, KeyProcessor } from "./processor";
import { BankSnapshot } from "./register-bank";
import { Lexer, TokenType } from "./script/lexer";

export interface MachineOptions {
  /** Report ignored keys on the warning stream. */
  verbose?: boolean;
}

/**
 * Feeds keys from the keyboard or from a key script into the processor and
 * prints what comes back.
 */
export class Machine {
  private readonly lexer = new Lexer();

  constructor(
    private readonly io: IO,
    public readonly processor: KeyProcessor = new KeyProcessor(),
    private readonly options: MachineOptions = {}
  ) {}

  public run() {
    let line = this.io.readLine();
    while (line !== null) {
      if (!this.handle(this.processor.press(line), () => this.io.readLine())) {
        return;
      }
      line = this.io.readLine();
    }
  }

  public runScript(source: string) {
    const tokens = this.lexer.tokenize(source);
    let tokenIndex = 0;
    const nextArgument = () => {
      const token = tokens[tokenIndex];
      if (token.type !== TokenType.ARGUMENT) return null;
      tokenIndex++;
      return token.text;
    };

    while (tokens[tokenIndex].type !== TokenType.EOF) {
      const token = tokens[tokenIndex++];
      this.handle(this.processor.press(token.text), nextArgument);
    }
  }

  /** Returns false once the input has ended. */
  private handle(
    outcome: KeyOutcome,
    readArgument: () => string | null
  ): boolean {
    switch (outcome.kind) {
      case "none":
        break;
      case "display":
        this.io.print(outcome.text + "\n");
        break;
      case "error":
        this.io.print(`error: ${outcome.error.message}\n`);
        break;
      case "ignored":
        if (this.options.verbose) {
          this.io.warn(`ignored: ${outcome.error.message}\n`);
        }
        break;
      case "awaitDigits": {
        const input = readArgument();
        if (input === null) return false;
        const applied = this.processor.setDisplayDigits(input);
        if (!applied.ok) {
          this.io.print(`error: ${applied.error.message}\n`);
        }
        break;
      }
      case "dump":
        this.io.print(this.formatDump(outcome.registers));
        break;
    }
    return true;
  }

  private formatDump(registers: BankSnapshot) {
    return registers
      .map(({ name, state }) => {
        const float = state.floatActive ? String(state.floatPosition) : "-";
        return `${name}: ${state.digits.join("")} float=${float} sign=${state.sign}\n`;
      })
      .join("");
  }
}
