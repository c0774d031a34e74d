import { Key, isCommandKey, isDigitKey } from "../enums/keys";
import { isRegisterName } from "../enums/registers";
import { ScriptSyntaxError } from "../errors";

export type Token = {
  type: TokenType;
  text: string;
  line: number;
};

export enum TokenType {
  KEY,
  ARGUMENT /* raw input line read by the set-digits key */,
  EOF,
}

/**
 * Splits a key script into key tokens. Scripts are whitespace separated;
 * `;` starts a comment. Besides the key characters themselves, a script may
 * spell keys by name and write whole numbers (`12,5`), which expand to one
 * token per digit and comma.
 */
export class Lexer {
  private static readonly MNEMONICS = new Map<string, Key>([
    ["add", Key.ADD],
    ["sub", Key.SUBTRACT],
    ["mul", Key.MULTIPLY],
    ["div", Key.DIVIDE],
    ["sqrt", Key.SQRT],
    ["neg", Key.SIGN],
    ["print", Key.PRINT],
    ["total", Key.PRINT_CLEAR],
    ["clear", Key.CLEAR_ALL],
    ["undo", Key.UNDO],
    ["down", Key.TRANSFER_DOWN],
    ["up", Key.TRANSFER_UP],
    ["swap", Key.EXCHANGE],
    ["digits", Key.SET_DIGITS],
    ["dump", Key.DEBUG],
  ]);

  private static readonly NUMBER_MATCHER = /^[0-9][0-9,]*$/;
  private static readonly ARGUMENT_MATCHER = /^[0-9]+$/;

  private isTokenSeparator(char: string | undefined): boolean {
    return (
      char === undefined ||
      char === " " ||
      char === "\t" ||
      char === "\n" ||
      char === "\r" ||
      char === ";"
    );
  }

  public tokenize(input: string) {
    const out: Token[] = [];
    let currentPosition = 0;
    let line = 1;
    let expectArgument = false;

    while (currentPosition < input.length) {
      const currentToken = input[currentPosition];

      if (currentToken === "\n") {
        line++;
        currentPosition++;
        continue;
      }
      if (currentToken === ";") {
        while (
          input[currentPosition] !== "\n" &&
          input[currentPosition] !== undefined
        ) {
          currentPosition++;
        }
        continue;
      }
      if (this.isTokenSeparator(currentToken)) {
        currentPosition++;
        continue;
      }

      let literal = "";
      while (!this.isTokenSeparator(input[currentPosition])) {
        literal += input[currentPosition];
        currentPosition++;
      }

      if (expectArgument) {
        if (!Lexer.ARGUMENT_MATCHER.test(literal)) {
          throw new ScriptSyntaxError(
            `Expected a display digit count, received "${literal}"`,
            line
          );
        }
        out.push({ type: TokenType.ARGUMENT, text: literal, line });
        expectArgument = false;
        continue;
      }

      const keys = this.keysOf(literal, line);
      for (const key of keys) {
        out.push({ type: TokenType.KEY, text: key, line });
      }
      expectArgument = keys[keys.length - 1] === Key.SET_DIGITS;
    }

    if (expectArgument) {
      throw new ScriptSyntaxError("Missing display digit count", line);
    }
    out.push({ type: TokenType.EOF, text: "", line });

    return out;
  }

  private keysOf(literal: string, line: number): string[] {
    if (
      literal.length === 1 &&
      (isDigitKey(literal) || isCommandKey(literal) || isRegisterName(literal))
    ) {
      return [literal];
    }
    const mnemonic = Lexer.MNEMONICS.get(literal.toLowerCase());
    if (mnemonic !== undefined) {
      return [mnemonic];
    }
    if (Lexer.NUMBER_MATCHER.test(literal)) {
      return literal.split("");
    }
    throw new ScriptSyntaxError(`Unknown key "${literal}"`, line);
  }
}
